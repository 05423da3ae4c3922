import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { flushTrace, resetTraceForTest } from "@pcode/model";

import { parseFlagArgs, runCli, runExport, runValidate } from "../src/cli.js";
import { captureStderr, captureStdout, fixture } from "./helpers/capture.js";

const WIDE = ["double", "long", "long_long", "pointer"];

describe("pcode-export CLI", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "pcode-export-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints help without arguments", async () => {
    const { result: exitCode, output } = await captureStdout(() => runCli([]));
    expect(exitCode).toBe(0);
    expect(output.startsWith("pcode-export")).toBe(true);
  });

  it("rejects unknown commands", async () => {
    const { result: run, output } = await captureStderr(() => captureStdout(() => runCli(["bogus"])));
    expect(run.result).toBe(2);
    expect(run.output.startsWith("pcode-export")).toBe(true);
    expect(output).toBe("unknown command: bogus\n");
  });

  it("prints a listing", async () => {
    const { result: exitCode, output } = await captureStdout(() =>
      runExport(["--input", fixture, "--format", "listing"])
    );
    expect(exitCode).toBe(0);
    expect(output).toBe(
      [
        "0x401000:",
        "  0: (unique, 0xe80, 8) = COPY RBP",
        "  1: RSP = INT_SUB RSP, (const, 0x8, 8)",
        "  2: STORE (const, 0x1b1, 8), RSP, (unique, 0xe80, 8)",
        "0x401001:",
        "  0: EAX = COPY (const, 0x0, 4)",
        "  1: RAX = INT_ZEXT EAX",
        "0x401006:",
        "  0: RIP = LOAD (const, 0x1b1, 8), RSP",
        "  1: RSP = INT_ADD RSP, (const, 0x8, 8)",
        "  2: RETURN RIP",
        "",
      ].join("\n")
    );
  });

  it("prints command help", async () => {
    const exported = await captureStdout(() => runCli(["export", "--help"]));
    expect(exported.result).toBe(0);
    expect(exported.output).toBe(
      "Usage: pcode-export export --input <dump.json> [--out <path>] [--format json|jsonl|listing] [--mnemonic M]...\n"
    );

    const validated = await captureStdout(() => runCli(["validate", "-h"]));
    expect(validated.result).toBe(0);
    expect(validated.output).toBe("Usage: pcode-export validate --input <records.jsonl>\n");
  });

  it("treats --out - as stdout and prints no summary", async () => {
    const implicit = await captureStdout(() => runExport(["--input", fixture, "--format", "listing"]));
    const explicit = await captureStdout(() => runExport(["--input", fixture, "--format", "listing", "--out", "-"]));
    expect(explicit.result).toBe(0);
    expect(explicit.output).toBe(implicit.output);
    expect(explicit.output.endsWith("  2: RETURN RIP\n")).toBe(true);
  });

  it("prints the whole export as JSON by default", async () => {
    const { result: exitCode, output } = await captureStdout(() => runExport([`--input=${fixture}`]));
    expect(exitCode).toBe(0);
    const parsed = JSON.parse(output);
    expect(parsed.program).toBe("sample-x64");
    expect(parsed.summary.instructionCount).toBe(3);
    const rsp = { size: 8, addressSpace: "register", address: "0x20", registerName: "RSP", typeHints: WIDE };
    expect(parsed.instructions[0].operations[1]).toEqual({
      index: 1,
      mnemonic: "INT_SUB",
      input0: rsp,
      input1: { size: 8, addressSpace: "const", address: "0x8", typeHints: WIDE },
      output: rsp,
    });
  });

  it("writes JSONL records that validate", async () => {
    const out = path.join(dir, "nested", "records.jsonl");
    const exported = await captureStdout(() =>
      runExport(["--input", fixture, "--format=jsonl", "--out", out, "--mnemonic", "COPY", "--mnemonic", "RETURN"])
    );
    expect(exported.result).toBe(0);
    expect(JSON.parse(exported.output).operationCount).toBe(3);

    const lines = readFileSync(out, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[2] ?? "")).toEqual({
      address: "0x401006",
      record: {
        index: 2,
        mnemonic: "RETURN",
        input0: { size: 8, addressSpace: "register", address: "0x288", registerName: "RIP", typeHints: WIDE },
      },
    });

    const validated = await captureStdout(() => runValidate(["--input", out]));
    expect(validated.result).toBe(0);
    expect(JSON.parse(validated.output)).toEqual({ status: "ok", records: 3, errors: [] });
  });

  it("reports invalid record lines", async () => {
    const file = path.join(dir, "records.jsonl");
    writeFileSync(file, '{"index":0,"mnemonic":"COPY"}\n{bad\n\n{"index":-1,"mnemonic":"X"}\n', "utf8");
    const { result: exitCode, output } = await captureStdout(() => runValidate(["--input", file]));
    expect(exitCode).toBe(1);
    expect(JSON.parse(output)).toEqual({
      status: "error",
      records: 1,
      errors: [
        { line: 2, code: "E_RECORD_JSON", path: "/" },
        { line: 4, code: "E_RECORD_INDEX", path: "/index" },
      ],
    });
  });

  it("exits 1 on an invalid dump", async () => {
    const file = path.join(dir, "dump.json");
    writeFileSync(file, JSON.stringify({ version: "2", program: "p", instructions: [] }), "utf8");
    const { result: exitCode, output } = await captureStderr(() => runExport(["--input", file]));
    expect(exitCode).toBe(1);
    expect(output).toBe("E_DUMP_VERSION /version\n");
  });

  it("exits 2 on misuse", async () => {
    const missing = await captureStderr(() => runExport(["--input"]));
    expect(missing.result).toBe(2);
    expect(missing.output).toBe("missing value for --input\n");

    const format = await captureStderr(() => runExport(["--input", fixture, "--format", "xml"]));
    expect(format.result).toBe(2);
    expect(format.output).toBe("invalid format: xml\n");

    const unknown = await captureStderr(() => runValidate(["--input", fixture, "--bogus"]));
    expect(unknown.result).toBe(2);
    expect(unknown.output).toBe("unknown flag: --bogus\n");

    const required = await captureStderr(() => runValidate([]));
    expect(required.result).toBe(2);
    expect(required.output).toBe("--input <path> is required\n");
  });

  it("collects repeated flags in order", () => {
    const parsed = parseFlagArgs(["--mnemonic", "COPY", "--mnemonic=LOAD", "-h"], ["--mnemonic"], ["-h"]);
    expect(parsed.values["--mnemonic"]).toEqual(["COPY", "LOAD"]);
    expect(parsed.toggles.has("-h")).toBe(true);
  });
});

describe("pcode-export CLI tracing", () => {
  const saved = { trace: process.env.PCODE_TRACE, stderr: process.env.PCODE_TRACE_STDERR };

  beforeEach(() => {
    process.env.PCODE_TRACE = "1";
    delete process.env.PCODE_TRACE_STDERR;
    resetTraceForTest();
  });

  afterEach(() => {
    for (const [key, value] of [
      ["PCODE_TRACE", saved.trace],
      ["PCODE_TRACE_STDERR", saved.stderr],
    ] as const) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetTraceForTest();
  });

  it("writes collected tags to stderr and keeps none", async () => {
    const runs = [];
    for (let i = 0; i < 3; i += 1) {
      runs.push(await captureStderr(() => captureStdout(() => runExport(["--input", fixture, "--format", "listing"]))));
    }
    expect(flushTrace()).toEqual([]);

    const first = runs[0];
    expect(first?.result.result).toBe(0);
    const lines = (first?.output ?? "").trimEnd().split("\n");
    expect(lines).toHaveLength(12);
    expect(JSON.parse(lines[0] ?? "")).toEqual({
      tag: { kind: "OperationBuilt", index: 0, mnemonic: "COPY", inputs: 1, output: true },
    });
    expect(JSON.parse(lines[11] ?? "").tag.kind).toBe("ExportFinished");
    expect(runs.map((run) => run.output)).toEqual([first?.output, first?.output, first?.output]);
  });
});
