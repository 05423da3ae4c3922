import { readFileSync } from "node:fs";

import Ajv from "ajv";
import type { ErrorObject, SchemaObject } from "ajv";

import {
  PcodeError,
  errorSegments,
  firstRelevantError,
  parseJsonInput,
  pointer,
  type DatatypeProperties,
  type RawVarnode,
} from "@pcode/model";

import { DumpOperation } from "./operation.js";

type OffsetJson = string | number;

interface VarnodeJson {
  space: string;
  offset: OffsetJson;
  size: number;
}

interface OpJson {
  mnemonic: string;
  inputs?: Array<VarnodeJson | null>;
  output?: VarnodeJson | null;
}

interface ProgramDumpJson {
  version: "1";
  program: string;
  datatypeProperties?: Partial<DatatypeProperties>;
  registers?: Array<{ name: string; offset: OffsetJson; size: number }>;
  instructions: Array<{ address: OffsetJson; ops: OpJson[] }>;
}

export interface RegisterEntry {
  name: string;
  offset: bigint;
  size: number;
}

export interface DumpInstruction {
  address: bigint;
  ops: DumpOperation[];
}

export interface ProgramDump {
  version: "1";
  program: string;
  datatypeProperties: Partial<DatatypeProperties>;
  registers: RegisterEntry[];
  instructions: DumpInstruction[];
}

const schema: SchemaObject = JSON.parse(
  readFileSync(new URL("../../schema/program-dump.schema.json", import.meta.url), "utf8")
);

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDump = ajv.compile<ProgramDumpJson>(schema);

function mapError(error: ErrorObject | undefined): PcodeError {
  if (!error) return new PcodeError("E_DUMP_TYPE", "/");
  const segments = errorSegments(error);
  const target = pointer(...segments);
  const last = segments[segments.length - 1];
  if (segments.length === 1 && last === "version") return new PcodeError("E_DUMP_VERSION", target);
  switch (error.keyword) {
    case "additionalProperties":
      return new PcodeError("E_DUMP_FIELD_UNKNOWN", target);
    case "required":
      return new PcodeError("E_DUMP_FIELD_MISSING", target);
    case "maxItems":
      return new PcodeError("E_DUMP_INPUTS", target);
    default:
      if (last === "offset" || last === "address") return new PcodeError("E_DUMP_OFFSET", target);
      return new PcodeError("E_DUMP_TYPE", target);
  }
}

function toOffset(value: OffsetJson, path: string): bigint {
  if (typeof value === "string") return BigInt(value);
  if (!Number.isSafeInteger(value)) {
    throw new PcodeError("E_DUMP_OFFSET", path);
  }
  return BigInt(value);
}

function toVarnode(value: VarnodeJson | null | undefined, path: string): RawVarnode | null {
  if (value === null || value === undefined) return null;
  return { space: value.space, offset: toOffset(value.offset, `${path}/offset`), size: value.size };
}

/** Validates a program dump and converts its offsets to bigint. */
export function parseProgramDump(input: string | Uint8Array | object): ProgramDump {
  const obj = parseJsonInput(input, "E_DUMP_JSON");
  if (!validateDump(obj)) {
    throw mapError(firstRelevantError(validateDump.errors));
  }

  const registers = (obj.registers ?? []).map((reg, i) => ({
    name: reg.name,
    offset: toOffset(reg.offset, pointer("registers", i, "offset")),
    size: reg.size,
  }));

  const instructions = obj.instructions.map((insn, i) => ({
    address: toOffset(insn.address, pointer("instructions", i, "address")),
    ops: insn.ops.map((op, j) => {
      const base = pointer("instructions", i, "ops", j);
      const inputs = op.inputs ?? [];
      return new DumpOperation(
        op.mnemonic,
        [
          toVarnode(inputs[0], `${base}/inputs/0`),
          toVarnode(inputs[1], `${base}/inputs/1`),
          toVarnode(inputs[2], `${base}/inputs/2`),
        ],
        toVarnode(op.output, `${base}/output`)
      );
    }),
  }));

  return {
    version: obj.version,
    program: obj.program,
    datatypeProperties: { ...obj.datatypeProperties },
    registers,
    instructions,
  };
}
