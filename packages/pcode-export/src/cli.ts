#!/usr/bin/env node
import { exit } from "node:process";

import { flushTrace, isPcodeError, prettyCanonicalJson, traceToStderr } from "@pcode/model";

import {
  HELP_TEXT,
  exportProgram,
  isOutputFormat,
  openSink,
  readProgramDumpFile,
  renderExport,
  validateRecordFile,
  type OutputFormat,
} from "./index.js";

function printHelp(): void {
  process.stdout.write(`${HELP_TEXT}\n`);
}

type ParsedFlags = {
  values: Partial<Record<string, string[]>>;
  toggles: Set<string>;
};

function parseFlagArgs(
  args: string[],
  valueFlags: string[],
  toggleFlags: string[] = []
): ParsedFlags {
  const valueSet = new Set(valueFlags);
  const toggleSet = new Set(toggleFlags);
  const values: Partial<Record<string, string[]>> = {};
  const toggles = new Set<string>();
  const push = (flag: string, value: string) => {
    values[flag] = [...(values[flag] ?? []), value];
  };
  let index = 0;
  while (index < args.length) {
    const token = args[index] ?? "";
    if (!token.startsWith("-")) {
      throw new Error(`unknown argument: ${token}`);
    }
    if (toggleSet.has(token)) {
      toggles.add(token);
      index += 1;
      continue;
    }
    const [flag = token, inline] = token.split("=", 2);
    if (toggleSet.has(flag)) {
      throw new Error(`flag ${flag} does not take a value`);
    }
    if (!valueSet.has(flag)) {
      throw new Error(`unknown flag: ${flag}`);
    }
    if (inline !== undefined) {
      push(flag, inline);
      index += 1;
      continue;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new Error(`missing value for ${flag}`);
    }
    push(flag, next);
    index += 2;
  }
  return { values, toggles };
}

function lastValue(parsed: ParsedFlags, flag: string): string | undefined {
  const list = parsed.values[flag];
  return list?.[list.length - 1];
}

/** Writes the tags collected during a command to stderr, unless they were mirrored there already. */
function drainTrace(): void {
  const tags = flushTrace();
  if (traceToStderr()) return;
  for (const tag of tags) {
    process.stderr.write(`${JSON.stringify({ tag })}\n`);
  }
}

function failure(error: unknown): number {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  return isPcodeError(error) ? 1 : 2;
}

export async function runExport(args: string[]): Promise<number> {
  try {
    const parsed = parseFlagArgs(args, ["--input", "--out", "--format", "--mnemonic"], ["--help", "-h"]);
    if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
      process.stdout.write(
        "Usage: pcode-export export --input <dump.json> [--out <path>] [--format json|jsonl|listing] [--mnemonic M]...\n"
      );
      return 0;
    }
    const input = lastValue(parsed, "--input");
    if (!input) {
      throw new Error("--input <path> is required");
    }
    const formatValue = lastValue(parsed, "--format") ?? "json";
    if (!isOutputFormat(formatValue)) {
      throw new Error(`invalid format: ${formatValue}`);
    }
    const format: OutputFormat = formatValue;
    const out = lastValue(parsed, "--out") ?? "-";

    const dump = await readProgramDumpFile(input);
    const result = exportProgram(dump, { mnemonics: parsed.values["--mnemonic"] });

    const sink = await openSink(out);
    try {
      await sink.write(renderExport(result, format));
    } finally {
      await sink.close();
    }
    if (out !== "-") {
      process.stdout.write(prettyCanonicalJson(result.summary));
    }
    return 0;
  } catch (error) {
    return failure(error);
  } finally {
    drainTrace();
  }
}

export async function runValidate(args: string[]): Promise<number> {
  try {
    const parsed = parseFlagArgs(args, ["--input"], ["--help", "-h"]);
    if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
      process.stdout.write("Usage: pcode-export validate --input <records.jsonl>\n");
      return 0;
    }
    const input = lastValue(parsed, "--input");
    if (!input) {
      throw new Error("--input <path> is required");
    }
    const result = await validateRecordFile(input);
    process.stdout.write(prettyCanonicalJson(result));
    return result.status === "ok" ? 0 : 1;
  } catch (error) {
    return failure(error);
  }
}

export async function runCli(argv: string[]): Promise<number> {
  if (argv.length === 0 || argv[0] === "--help" || argv[0] === "-h") {
    printHelp();
    return 0;
  }
  const [command, ...rest] = argv;
  switch (command) {
    case "export":
      return runExport(rest);
    case "validate":
      return runValidate(rest);
    default: {
      process.stderr.write(`unknown command: ${command}\n`);
      printHelp();
      return 2;
    }
  }
}

if (!process.env.VITEST) {
  runCli(process.argv.slice(2))
    .then((code) => exit(code))
    .catch((error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      exit(2);
    });
}

export { parseFlagArgs };
