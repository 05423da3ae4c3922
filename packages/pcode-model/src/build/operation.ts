import type { TypePropertyLookup } from "../model/datatype.js";
import type { NamingContext, OperandResolver, RawOperation, RawVarnode } from "../model/raw.js";
import { freezeOperand, type OperationRecord } from "../model/records.js";
import { resolveVarnode } from "./operand.js";

type MutableRecord = { -readonly [K in keyof OperationRecord]: OperationRecord[K] };

export type OperationRecordBuilder<V> = (
  index: number,
  rawOp: RawOperation<V>,
  naming: NamingContext,
  types: TypePropertyLookup
) => OperationRecord;

/**
 * Binds an operand resolver into a record builder.
 *
 * The builder copies `index` and the mnemonic unchanged and resolves each
 * present slot (inputs 0..2, then the output) on its own. Absent slots are
 * left out of the record. Resolver errors propagate as thrown. Each
 * operand is copied, so a resolver may hand out shared objects.
 */
export function operationRecordBuilder<V>(resolver: OperandResolver<V>): OperationRecordBuilder<V> {
  const resolve = (raw: V, naming: NamingContext, types: TypePropertyLookup) =>
    freezeOperand(resolver(raw, naming, types));
  return (index, rawOp, naming, types) => {
    const record: MutableRecord = { index, mnemonic: rawOp.getMnemonic() };

    const in0 = rawOp.getInput(0);
    if (in0 !== null) record.input0 = resolve(in0, naming, types);
    const in1 = rawOp.getInput(1);
    if (in1 !== null) record.input1 = resolve(in1, naming, types);
    const in2 = rawOp.getInput(2);
    if (in2 !== null) record.input2 = resolve(in2, naming, types);
    const out = rawOp.getOutput();
    if (out !== null) record.output = resolve(out, naming, types);

    return Object.freeze(record);
  };
}

export const buildOperationRecord: OperationRecordBuilder<RawVarnode> = operationRecordBuilder(resolveVarnode);
