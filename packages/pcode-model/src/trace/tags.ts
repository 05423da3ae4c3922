export interface OperationBuilt {
  kind: "OperationBuilt";
  index: number;
  mnemonic: string;
  inputs: number;
  output: boolean;
}

export interface InstructionExported {
  kind: "InstructionExported";
  address: string;
  operations: number;
  skipped: number;
}

export interface ExportFinished {
  kind: "ExportFinished";
  program: string;
  instructions: number;
  operations: number;
  digest: string;
}

export type TraceTag = OperationBuilt | InstructionExported | ExportFinished;
