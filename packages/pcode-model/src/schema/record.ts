import { readFileSync } from "node:fs";

import Ajv from "ajv";
import type { ErrorObject, SchemaObject } from "ajv";

import { canonicalJson } from "../canon/json.js";
import { PcodeError, pointer } from "../errors.js";
import type { OperationRecord } from "../model/records.js";
import { OPERAND_SLOTS, freezeOperand } from "../model/records.js";
import { errorSegments, firstRelevantError } from "./errors.js";

const schema: SchemaObject = JSON.parse(
  readFileSync(new URL("../../schema/operation-record.schema.json", import.meta.url), "utf8")
);

const decoder = new TextDecoder();

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRecord = ajv.compile<OperationRecord>(schema);

export function parseJsonInput(input: string | Uint8Array | object, code: string): unknown {
  if (typeof input !== "string" && !(input instanceof Uint8Array)) {
    return input;
  }
  const text = typeof input === "string" ? input : decoder.decode(input);
  try {
    return JSON.parse(text);
  } catch {
    throw new PcodeError(code, "/");
  }
}

function mapError(error: ErrorObject | undefined): PcodeError {
  if (!error) return new PcodeError("E_RECORD_TYPE", "/");
  const segments = errorSegments(error);
  const target = pointer(...segments);
  const [head] = segments;
  if (head === undefined) return new PcodeError("E_RECORD_TYPE", "/");
  if (head === "index") return new PcodeError("E_RECORD_INDEX", target);
  if (head === "mnemonic") return new PcodeError("E_RECORD_MNEMONIC", target);
  if ((OPERAND_SLOTS as readonly string[]).includes(head)) {
    return new PcodeError("E_OPERAND_FIELD", target);
  }
  return new PcodeError("E_RECORD_FIELD_UNKNOWN", target);
}

export function parseOperationRecord(input: string | Uint8Array | object): OperationRecord {
  const obj = parseJsonInput(input, "E_RECORD_JSON");
  if (!validateRecord(obj)) {
    throw mapError(firstRelevantError(validateRecord.errors));
  }
  const record: { -readonly [K in keyof OperationRecord]: OperationRecord[K] } = {
    index: obj.index,
    mnemonic: obj.mnemonic,
  };
  for (const slot of OPERAND_SLOTS) {
    const operand = obj[slot];
    if (operand !== undefined) record[slot] = freezeOperand(operand);
  }
  return Object.freeze(record);
}

export function serializeOperationRecord(record: OperationRecord): string {
  return canonicalJson(record);
}
