import type { InputSlot, RawOperation, RawVarnode } from "@pcode/model";

export type InputTuple = readonly [RawVarnode | null, RawVarnode | null, RawVarnode | null];

/** A dumped p-code operation, exposed through the raw-operation capabilities. */
export class DumpOperation implements RawOperation<RawVarnode> {
  constructor(
    readonly mnemonic: string,
    private readonly inputs: InputTuple,
    private readonly output: RawVarnode | null
  ) {}

  getMnemonic(): string {
    return this.mnemonic;
  }

  getInput(slot: InputSlot): RawVarnode | null {
    return this.inputs[slot];
  }

  getOutput(): RawVarnode | null {
    return this.output;
  }
}
