export { PcodeError, isPcodeError, pointer } from "./errors.js";
export type {
  HasMnemonic,
  IndexedInputSource,
  InputSlot,
  NamedRegister,
  NamingContext,
  OperandResolver,
  OptionalOutputSource,
  RawOperation,
  RawVarnode,
} from "./model/raw.js";
export type { OperandRecord, OperandSlot, OperationRecord } from "./model/records.js";
export { OPERAND_SLOTS } from "./model/records.js";
export type { DatatypeKind, DatatypeProperties, TypePropertyLookup } from "./model/datatype.js";
export { DATATYPE_KINDS, datatypePropertiesLookup, isDatatypeKind } from "./model/datatype.js";
export { formatOffset, resolveVarnode, typeHintsFor } from "./build/operand.js";
export type { OperationRecordBuilder } from "./build/operation.js";
export { buildOperationRecord, operationRecordBuilder } from "./build/operation.js";
export { canonicalJson, canonicalJsonBytes, prettyCanonicalJson } from "./canon/json.js";
export { blake3hex, recordDigest } from "./canon/hash.js";
export { parseJsonInput, parseOperationRecord, serializeOperationRecord } from "./schema/record.js";
export { errorSegments, firstRelevantError } from "./schema/errors.js";
export { printOperand, printOperation, printOperations } from "./print/listing.js";
export type { TraceTag } from "./trace/tags.js";
export { emitTag, flush as flushTrace, resetTraceForTest } from "./trace/log.js";
export { traceToStderr } from "./trace/flag.js";
