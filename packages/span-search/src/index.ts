export {
  ResolvedColumn,
  SPAN_COLUMN_DEFINITIONS,
  VIRTUAL_CONTEXTS,
  resolveColumn
} from "./columns";
export type {
  AttributeKey,
  ColumnProcessor,
  ColumnValidator,
  ResolvedColumnInit,
  SearchParams,
  VirtualColumnContext,
  VirtualContextConstructor
} from "./columns";
export { STRING, BOOLEAN, FLOAT, INT, TYPE_MAP } from "./constants";
export type { AttributeType, SearchType } from "./constants";
export { InvalidSearchQuery } from "./errors";
export { isEventId, isSpanId } from "./validators";
