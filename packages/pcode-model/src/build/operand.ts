import { PcodeError } from "../errors.js";
import { DATATYPE_KINDS, type DatatypeKind, type TypePropertyLookup } from "../model/datatype.js";
import type { NamingContext, RawVarnode } from "../model/raw.js";
import type { OperandRecord } from "../model/records.js";

export function formatOffset(offset: bigint): string {
  return `0x${offset.toString(16)}`;
}

export function typeHintsFor(size: number, types: TypePropertyLookup): DatatypeKind[] {
  return DATATYPE_KINDS.filter((kind) => types.sizeOf(kind) === size);
}

/**
 * Default operand resolver: copies the storage location, names it through
 * the naming context and attaches the datatype kinds of matching width.
 */
export function resolveVarnode(
  raw: RawVarnode,
  naming: NamingContext,
  types: TypePropertyLookup
): OperandRecord {
  if (!Number.isInteger(raw.size) || raw.size < 1) {
    throw new PcodeError("E_OPERAND_SIZE", "/size");
  }
  if (raw.offset < 0n) {
    throw new PcodeError("E_OPERAND_OFFSET", "/offset");
  }

  const register = naming.registerAt(raw.space, raw.offset, raw.size);
  const typeHints = Object.freeze(typeHintsFor(raw.size, types));

  if (register === null) {
    return Object.freeze({
      size: raw.size,
      addressSpace: raw.space,
      address: formatOffset(raw.offset),
      typeHints,
    });
  }
  return Object.freeze({
    size: raw.size,
    addressSpace: raw.space,
    address: formatOffset(raw.offset),
    registerName: register.name,
    ...(register.size !== raw.size ? { registerSize: register.size } : {}),
    typeHints,
  });
}
