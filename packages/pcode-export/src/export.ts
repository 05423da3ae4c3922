import {
  buildOperationRecord,
  datatypePropertiesLookup,
  emitTag,
  formatOffset,
  recordDigest,
  type OperationRecord,
} from "@pcode/model";

import type { ProgramDump } from "./dump/parse.js";
import { RegisterTable } from "./dump/registers.js";

export interface ExportOptions {
  /** Keep only operations with these mnemonics. Indices are not renumbered. */
  mnemonics?: readonly string[];
}

export interface ExportedInstruction {
  address: string;
  operations: OperationRecord[];
}

export interface ExportSummary {
  instructionCount: number;
  operationCount: number;
  mnemonics: Record<string, number>;
  digest: string;
}

export interface ProgramExport {
  program: string;
  instructions: ExportedInstruction[];
  summary: ExportSummary;
}

function toSortedObject(map: Map<string, number>): Record<string, number> {
  const entries = Array.from(map.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const output: Record<string, number> = {};
  for (const [key, value] of entries) {
    output[key] = value;
  }
  return output;
}

/**
 * Builds one record per dumped operation. An operation's index is its
 * position in its instruction's op list.
 */
export function exportProgram(dump: ProgramDump, options: ExportOptions = {}): ProgramExport {
  const naming = new RegisterTable(dump.registers);
  const types = datatypePropertiesLookup(dump.datatypeProperties);
  const keep = options.mnemonics ? new Set(options.mnemonics) : undefined;
  const byMnemonic = new Map<string, number>();
  let operationCount = 0;

  const instructions = dump.instructions.map((insn) => {
    const address = formatOffset(insn.address);
    const operations: OperationRecord[] = [];
    insn.ops.forEach((op, index) => {
      if (keep && !keep.has(op.mnemonic)) return;
      const record = buildOperationRecord(index, op, naming, types);
      operations.push(record);
      emitTag({
        kind: "OperationBuilt",
        index,
        mnemonic: record.mnemonic,
        inputs: [record.input0, record.input1, record.input2].filter((slot) => slot !== undefined).length,
        output: record.output !== undefined,
      });
      byMnemonic.set(op.mnemonic, (byMnemonic.get(op.mnemonic) ?? 0) + 1);
    });
    operationCount += operations.length;
    emitTag({
      kind: "InstructionExported",
      address,
      operations: operations.length,
      skipped: insn.ops.length - operations.length,
    });
    return { address, operations };
  });

  const digest = recordDigest(instructions);
  emitTag({
    kind: "ExportFinished",
    program: dump.program,
    instructions: instructions.length,
    operations: operationCount,
    digest,
  });

  return {
    program: dump.program,
    instructions,
    summary: {
      instructionCount: instructions.length,
      operationCount,
      mnemonics: toSortedObject(byMnemonic),
      digest,
    },
  };
}
