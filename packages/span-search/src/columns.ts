import { INT, TYPE_MAP, type AttributeType, type SearchType } from "./constants";
import { InvalidSearchQuery } from "./errors";
import { isEventId, isSpanId } from "./validators";

export type AttributeKey = {
  name: string;
  type: AttributeType;
};

export type VirtualColumnContext = {
  fromColumnName: string;
  toColumnName: string;
  valueMap: Record<string, string>;
};

export type SearchParams = {
  /** project id -> project slug for every project in the query */
  projectIdMap: Map<number | string, string> | Record<string, string>;
};

export type ColumnProcessor = (value: unknown) => unknown;
export type ColumnValidator = (value: unknown) => boolean;

export type ResolvedColumnInit = {
  /** `p95() as foo` has the public alias `foo`; bare `p95()` is its own alias */
  publicAlias: string;
  internalName: string;
  searchType: SearchType;
  /** mostly inferred from searchType */
  internalType?: AttributeType;
  processor?: ColumnProcessor;
  validator?: ColumnValidator;
};

export class ResolvedColumn {
  readonly publicAlias: string;
  readonly internalName: string;
  readonly searchType: SearchType;
  readonly internalType?: AttributeType;
  readonly processor?: ColumnProcessor;
  readonly validator?: ColumnValidator;

  constructor(init: ResolvedColumnInit) {
    this.publicAlias = init.publicAlias;
    this.internalName = init.internalName;
    this.searchType = init.searchType;
    this.internalType = init.internalType;
    this.processor = init.processor;
    this.validator = init.validator;
    Object.freeze(this);
  }

  /** Rewrites this column's value in `row` through the processor, if any. */
  processColumn(row: Record<string, unknown>): void {
    if (this.processor && this.publicAlias in row) {
      row[this.publicAlias] = this.processor(row[this.publicAlias]);
    }
  }

  validate(value: unknown): void {
    if (this.validator && !this.validator(value)) {
      throw new InvalidSearchQuery(`${String(value)} is an invalid value for ${this.publicAlias}`);
    }
  }

  /** The column as the RPC wants it. */
  get protoDefinition(): AttributeKey {
    return {
      name: this.internalName,
      type: this.internalType ?? TYPE_MAP[this.searchType]
    };
  }
}

function defineColumns(columns: ResolvedColumnInit[]): ReadonlyMap<string, ResolvedColumn> {
  return new Map(columns.map((c) => [c.publicAlias, new ResolvedColumn(c)]));
}

export const SPAN_COLUMN_DEFINITIONS = defineColumns([
  { publicAlias: "id", internalName: "span_id", searchType: "string", validator: isSpanId },
  { publicAlias: "organization.id", internalName: "organization_id", searchType: "string" },
  { publicAlias: "span.action", internalName: "action", searchType: "string" },
  { publicAlias: "span.description", internalName: "name", searchType: "string" },
  { publicAlias: "description", internalName: "name", searchType: "string" },
  // message maps to description so wildcard searches work
  { publicAlias: "message", internalName: "name", searchType: "string" },
  { publicAlias: "span.domain", internalName: "attr_str[domain]", searchType: "string" },
  { publicAlias: "span.group", internalName: "attr_str[group]", searchType: "string" },
  { publicAlias: "span.op", internalName: "attr_str[op]", searchType: "string" },
  { publicAlias: "span.category", internalName: "attr_str[category]", searchType: "string" },
  { publicAlias: "span.self_time", internalName: "exclusive_time_ms", searchType: "duration" },
  { publicAlias: "span.status", internalName: "attr_str[status]", searchType: "string" },
  { publicAlias: "trace", internalName: "trace_id", searchType: "string", validator: isEventId },
  {
    publicAlias: "messaging.destination.name",
    internalName: "attr_str[messaging.destination.name]",
    searchType: "string"
  },
  {
    publicAlias: "messaging.message.id",
    internalName: "attr_str[messaging.message.id]",
    searchType: "string"
  },
  { publicAlias: "span.status_code", internalName: "attr_str[status_code]", searchType: "string" },
  { publicAlias: "replay.id", internalName: "attr_str[replay_id]", searchType: "string" },
  {
    publicAlias: "span.ai.pipeline.group",
    internalName: "attr_str[ai_pipeline_group]",
    searchType: "string"
  },
  { publicAlias: "trace.status", internalName: "attr_str[trace.status]", searchType: "string" },
  { publicAlias: "browser.name", internalName: "attr_str[browser.name]", searchType: "string" },
  { publicAlias: "ai.total_cost", internalName: "attr_num[ai.total_cost]", searchType: "number" },
  {
    publicAlias: "ai.total_tokens.used",
    internalName: "attr_num[ai_total_tokens_used]",
    searchType: "number"
  },
  { publicAlias: "project", internalName: "project_id", searchType: "string", internalType: INT },
  { publicAlias: "project.slug", internalName: "project_id", searchType: "string", internalType: INT }
]);

export function resolveColumn(publicAlias: string): ResolvedColumn {
  const column = SPAN_COLUMN_DEFINITIONS.get(publicAlias);
  if (!column) throw new InvalidSearchQuery(`Could not parse ${publicAlias}`);
  return column;
}

/* -----------------------------
   Virtual columns
----------------------------- */

export type VirtualContextConstructor = (params: SearchParams) => VirtualColumnContext;

function projectContextConstructor(columnName: string): VirtualContextConstructor {
  return (params) => {
    const entries =
      params.projectIdMap instanceof Map
        ? Array.from(params.projectIdMap)
        : Object.entries(params.projectIdMap);

    const valueMap: Record<string, string> = {};
    for (const [projectId, projectName] of entries) valueMap[String(projectId)] = projectName;

    return { fromColumnName: "project_id", toColumnName: columnName, valueMap };
  };
}

/** Columns the engine derives from `project_id` at query time. */
export const VIRTUAL_CONTEXTS: Readonly<Record<string, VirtualContextConstructor>> = {
  project: projectContextConstructor("project"),
  "project.slug": projectContextConstructor("project.slug")
};
