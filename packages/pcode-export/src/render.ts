import { canonicalJson, prettyCanonicalJson, printOperation } from "@pcode/model";

import type { ProgramExport } from "./export.js";

export const OUTPUT_FORMATS = ["json", "jsonl", "listing"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

function renderJsonl(result: ProgramExport): string {
  const lines: string[] = [];
  for (const insn of result.instructions) {
    for (const record of insn.operations) {
      lines.push(canonicalJson({ address: insn.address, record }));
    }
  }
  return lines.join("");
}

function renderListing(result: ProgramExport): string {
  const lines: string[] = [];
  for (const insn of result.instructions) {
    lines.push(`${insn.address}:`);
    for (const record of insn.operations) {
      lines.push(`  ${printOperation(record)}`);
    }
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

export function renderExport(result: ProgramExport, format: OutputFormat): string {
  switch (format) {
    case "json":
      return prettyCanonicalJson(result);
    case "jsonl":
      return renderJsonl(result);
    case "listing":
      return renderListing(result);
  }
}
