/** Column types understood by the trace-item RPC. */
export const STRING = "TYPE_STRING";
export const BOOLEAN = "TYPE_BOOLEAN";
export const FLOAT = "TYPE_FLOAT";
export const INT = "TYPE_INT";

export type AttributeType = typeof STRING | typeof BOOLEAN | typeof FLOAT | typeof INT;

/** Types a public search query can talk about. */
export type SearchType = "string" | "number" | "duration" | "integer" | "boolean";

export const TYPE_MAP: Record<SearchType, AttributeType> = {
  string: STRING,
  number: FLOAT,
  duration: FLOAT,
  integer: INT,
  boolean: BOOLEAN
};
