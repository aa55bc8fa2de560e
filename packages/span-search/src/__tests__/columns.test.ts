import { describe, it, expect } from "vitest";
import {
  FLOAT,
  INT,
  InvalidSearchQuery,
  ResolvedColumn,
  SPAN_COLUMN_DEFINITIONS,
  STRING,
  VIRTUAL_CONTEXTS,
  isEventId,
  isSpanId,
  resolveColumn
} from "..";

describe("SPAN_COLUMN_DEFINITIONS", () => {
  it("maps public aliases to storage columns", () => {
    const expected: Record<string, string> = {
      id: "span_id",
      "organization.id": "organization_id",
      "span.action": "action",
      "span.description": "name",
      description: "name",
      message: "name",
      "span.domain": "attr_str[domain]",
      "span.group": "attr_str[group]",
      "span.op": "attr_str[op]",
      "span.category": "attr_str[category]",
      "span.self_time": "exclusive_time_ms",
      "span.status": "attr_str[status]",
      trace: "trace_id",
      "messaging.destination.name": "attr_str[messaging.destination.name]",
      "messaging.message.id": "attr_str[messaging.message.id]",
      "span.status_code": "attr_str[status_code]",
      "replay.id": "attr_str[replay_id]",
      "span.ai.pipeline.group": "attr_str[ai_pipeline_group]",
      "trace.status": "attr_str[trace.status]",
      "browser.name": "attr_str[browser.name]",
      "ai.total_cost": "attr_num[ai.total_cost]",
      "ai.total_tokens.used": "attr_num[ai_total_tokens_used]",
      project: "project_id",
      "project.slug": "project_id"
    };

    const actual = Object.fromEntries(
      Array.from(SPAN_COLUMN_DEFINITIONS, ([alias, column]) => [alias, column.internalName])
    );
    expect(actual).toEqual(expected);
  });

  it("derives the RPC type from the search type unless overridden", () => {
    expect(resolveColumn("span.op").protoDefinition).toEqual({
      name: "attr_str[op]",
      type: STRING
    });
    expect(resolveColumn("span.self_time").protoDefinition).toEqual({
      name: "exclusive_time_ms",
      type: FLOAT
    });
    expect(resolveColumn("ai.total_cost").protoDefinition.type).toBe(FLOAT);
    expect(resolveColumn("project.slug").protoDefinition).toEqual({
      name: "project_id",
      type: INT
    });
  });
});

describe("resolveColumn", () => {
  it("rejects aliases it does not know", () => {
    expect(() => resolveColumn("span.nope")).toThrow(InvalidSearchQuery);
    expect(() => resolveColumn("span.nope")).toThrow("Could not parse span.nope");
  });
});

describe("ResolvedColumn.validate", () => {
  it("accepts well-formed ids", () => {
    expect(() => resolveColumn("id").validate("a1b2c3d4e5f60718")).not.toThrow();
    expect(() => resolveColumn("trace").validate("0123456789abcdef0123456789abcdef")).not.toThrow();
  });

  it("names the offending value and column", () => {
    expect(() => resolveColumn("id").validate("not-a-span")).toThrow(
      "not-a-span is an invalid value for id"
    );
  });

  it("rejects a malformed trace id", () => {
    expect(() => resolveColumn("trace").validate("0123456789abcdef")).toThrow(InvalidSearchQuery);
    expect(() => resolveColumn("trace").validate("not-a-trace")).toThrow(
      "not-a-trace is an invalid value for trace"
    );
  });

  it("accepts anything without a validator", () => {
    expect(() => resolveColumn("span.op").validate("")).not.toThrow();
  });
});

describe("ResolvedColumn.processColumn", () => {
  it("rewrites the column's value in place", () => {
    const column = new ResolvedColumn({
      publicAlias: "span.self_time",
      internalName: "exclusive_time_ms",
      searchType: "duration",
      processor: (value) => (typeof value === "number" ? Math.round(value) : value)
    });
    const row: Record<string, unknown> = { "span.self_time": 12.6, other: 1.4 };

    column.processColumn(row);

    expect(row).toEqual({ "span.self_time": 13, other: 1.4 });
  });

  it("leaves the row alone without a processor", () => {
    const row: Record<string, unknown> = { "span.op": "db" };
    resolveColumn("span.op").processColumn(row);
    expect(row).toEqual({ "span.op": "db" });
  });
});

describe("VIRTUAL_CONTEXTS", () => {
  it("maps project ids to slugs for both project columns", () => {
    const params = { projectIdMap: new Map<number, string>([[1, "backend"], [2, "frontend"]]) };

    expect(VIRTUAL_CONTEXTS["project.slug"](params)).toEqual({
      fromColumnName: "project_id",
      toColumnName: "project.slug",
      valueMap: { "1": "backend", "2": "frontend" }
    });
    expect(VIRTUAL_CONTEXTS.project({ projectIdMap: { "3": "mobile" } })).toEqual({
      fromColumnName: "project_id",
      toColumnName: "project",
      valueMap: { "3": "mobile" }
    });
  });
});

describe("validators", () => {
  it("recognises event ids with or without dashes", () => {
    expect(isEventId("0123456789ABCDEF0123456789abcdef")).toBe(true);
    expect(isEventId("01234567-89ab-cdef-0123-456789abcdef")).toBe(true);
    expect(isEventId("0123456789abcdef")).toBe(false);
    expect(isEventId(42)).toBe(false);
  });

  it("recognises span ids", () => {
    expect(isSpanId("0123456789abcdef")).toBe(true);
    expect(isSpanId("0123456789abcdeg")).toBe(false);
    expect(isSpanId("0123456789abcdef0")).toBe(false);
  });
});
