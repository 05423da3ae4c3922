import type { OperandRecord } from "./records.js";
import type { TypePropertyLookup } from "./datatype.js";

/** Input slots an operation record carries. */
export type InputSlot = 0 | 1 | 2;

export interface HasMnemonic {
  getMnemonic(): string;
}

export interface IndexedInputSource<V> {
  /** `null` when the operation has no operand in this slot. */
  getInput(slot: InputSlot): V | null;
}

export interface OptionalOutputSource<V> {
  getOutput(): V | null;
}

/** One low-level operation as the analysis engine hands it over. */
export type RawOperation<V> = HasMnemonic & IndexedInputSource<V> & OptionalOutputSource<V>;

/** Storage location of a raw operand. */
export interface RawVarnode {
  space: string;
  offset: bigint;
  size: number;
}

export interface NamedRegister {
  name: string;
  size: number;
}

/** Resolves a storage location to the register that holds it, if any. */
export interface NamingContext {
  registerAt(space: string, offset: bigint, size: number): NamedRegister | null;
}

export type OperandResolver<V> = (
  raw: V,
  naming: NamingContext,
  types: TypePropertyLookup
) => OperandRecord;
