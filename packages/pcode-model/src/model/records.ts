import type { DatatypeKind } from "./datatype.js";

export interface OperandRecord {
  readonly size: number;
  readonly addressSpace: string;
  /** Offset in the address space, lower-case hex with a `0x` prefix. */
  readonly address: string;
  readonly registerName?: string;
  /** Width of the named register when the access covers only part of it. */
  readonly registerSize?: number;
  readonly typeHints: readonly DatatypeKind[];
}

export interface OperationRecord {
  readonly index: number;
  readonly mnemonic: string;
  readonly input0?: OperandRecord;
  readonly input1?: OperandRecord;
  readonly input2?: OperandRecord;
  readonly output?: OperandRecord;
}

export type OperandSlot = "input0" | "input1" | "input2" | "output";

export const OPERAND_SLOTS: readonly OperandSlot[] = ["input0", "input1", "input2", "output"];

/** Frozen copy of an operand, detached from whatever produced it. */
export function freezeOperand(operand: OperandRecord): OperandRecord {
  return Object.freeze({ ...operand, typeHints: Object.freeze([...operand.typeHints]) });
}
