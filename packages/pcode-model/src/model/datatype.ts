export const DATATYPE_KINDS = [
  "char",
  "double",
  "float",
  "int",
  "long",
  "long_double",
  "long_long",
  "pointer",
  "short",
] as const;

export type DatatypeKind = (typeof DATATYPE_KINDS)[number];

/** Byte sizes of the program's C datatypes, as reported by the analysis engine. */
export type DatatypeProperties = Record<DatatypeKind, number>;

export interface TypePropertyLookup {
  sizeOf(kind: DatatypeKind): number | undefined;
}

export function datatypePropertiesLookup(props: Partial<DatatypeProperties>): TypePropertyLookup {
  return {
    sizeOf: (kind) => props[kind],
  };
}

export function isDatatypeKind(value: string): value is DatatypeKind {
  return (DATATYPE_KINDS as readonly string[]).includes(value);
}
