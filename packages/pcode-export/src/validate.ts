import { readFile } from "node:fs/promises";

import { isPcodeError, parseOperationRecord } from "@pcode/model";

export interface LineError {
  line: number;
  code: string;
  path: string;
}

export interface RecordValidationResult {
  status: "ok" | "error";
  records: number;
  errors: LineError[];
}

/**
 * Checks a JSONL stream of operation records. A line may hold a bare
 * record or an `{ address, record }` entry as written by `export --format jsonl`.
 */
export function validateRecordLines(content: string): RecordValidationResult {
  const errors: LineError[] = [];
  let records = 0;
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line === undefined || line.trim() === "") continue;
    try {
      const value = parseLine(line);
      parseOperationRecord(value);
      records += 1;
    } catch (error) {
      if (!isPcodeError(error)) throw error;
      errors.push({ line: i + 1, code: error.code, path: error.path });
    }
  }
  return { status: errors.length === 0 ? "ok" : "error", records, errors };
}

function parseLine(line: string): object | string {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return line;
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value) && "record" in value) {
    const { record } = value;
    if (record !== null && typeof record === "object") return record;
  }
  return line;
}

export async function validateRecordFile(filePath: string): Promise<RecordValidationResult> {
  const content = await readFile(filePath, "utf8");
  return validateRecordLines(content);
}
