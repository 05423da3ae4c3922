/**
 * Text listing of operation records, one line per operation:
 *
 *   3: RAX = INT_ADD RAX, (const, 0x8, 8)
 */

import type { OperandRecord, OperationRecord } from "../model/records.js";

export function printOperand(operand: OperandRecord): string {
  if (operand.registerName !== undefined) return operand.registerName;
  return `(${operand.addressSpace}, ${operand.address}, ${operand.size})`;
}

export function printOperation(record: OperationRecord): string {
  const inputs = [record.input0, record.input1, record.input2]
    .filter((operand): operand is OperandRecord => operand !== undefined)
    .map(printOperand);
  const lhs = record.output !== undefined ? `${printOperand(record.output)} = ` : "";
  const args = inputs.length > 0 ? ` ${inputs.join(", ")}` : "";
  return `${record.index}: ${lhs}${record.mnemonic}${args}`;
}

export function printOperations(records: readonly OperationRecord[]): string {
  return `${records.map(printOperation).join("\n")}\n`;
}
