import { readFile } from "node:fs/promises";

import { parseProgramDump, type ProgramDump } from "./dump/parse.js";

export { DumpOperation } from "./dump/operation.js";
export type { InputTuple } from "./dump/operation.js";
export { parseProgramDump } from "./dump/parse.js";
export type { DumpInstruction, ProgramDump, RegisterEntry } from "./dump/parse.js";
export { REGISTER_SPACE, RegisterTable } from "./dump/registers.js";
export { exportProgram } from "./export.js";
export type { ExportOptions, ExportSummary, ExportedInstruction, ProgramExport } from "./export.js";
export { OUTPUT_FORMATS, isOutputFormat, renderExport } from "./render.js";
export type { OutputFormat } from "./render.js";
export { validateRecordFile, validateRecordLines } from "./validate.js";
export type { LineError, RecordValidationResult } from "./validate.js";
export { openSink } from "./sink/text.js";
export type { Sink } from "./sink/text.js";

export const HELP_TEXT = `pcode-export — serialize p-code operations from a program dump\n\n` +
  `Usage:\n` +
  `  pcode-export --help                                  Show this message\n` +
  `  pcode-export export --input <dump.json> [--out <path>] [--format json|jsonl|listing] [--mnemonic M]...\n` +
  `                                                       Build operation records for every instruction\n` +
  `  pcode-export validate --input <records.jsonl>        Check a JSONL file of operation records\n` +
  `\n` +
  `Environment:\n` +
  `  PCODE_TRACE=1          print export trace tags to stderr as JSON lines\n` +
  `  PCODE_TRACE_STDERR=1   print each tag as it is emitted, with a timestamp\n` +
  `\n` +
  `Exit codes:\n` +
  `  0 — success\n` +
  `  1 — invalid input (dump or records)\n` +
  `  2 — CLI misuse (missing flags, unknown command)`;

export async function readProgramDumpFile(filePath: string): Promise<ProgramDump> {
  return parseProgramDump(await readFile(filePath, "utf8"));
}
