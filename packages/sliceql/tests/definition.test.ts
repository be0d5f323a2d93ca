/**
 * Query definition tests.
 */
import { describe, expect, it } from "vitest";

import {
  assembleQuery,
  parseQueryDefinition,
  type QueryDefinition,
  UnsupportedFilterKindError,
  ValidationError,
} from "../src";

const EVENTS: QueryDefinition = {
  table: "events",
  timeGrain: { column: "ts", grain: "day", label: "day" },
  slices: ["country"],
  measures: [{ expression: "count(*)", label: "total" }],
  filters: [{ column: "status", value: ["ok"] }],
};

describe("parseQueryDefinition", () => {
  it("accepts a well-formed definition", () => {
    const parsed = parseQueryDefinition(JSON.parse(JSON.stringify(EVENTS)));
    expect(parsed).toEqual(EVENTS);
  });

  it("accepts slices as objects with optional labels", () => {
    const parsed = parseQueryDefinition({
      table: "t",
      timeGrain: { column: "ts", grain: "week", label: "week" },
      slices: [{ column: "device_os", label: "os" }, { column: "browser" }],
    });
    expect(parsed.slices).toEqual([
      { column: "device_os", label: "os" },
      { column: "browser" },
    ]);
  });

  it("accepts any filter kind string", () => {
    const parsed = parseQueryDefinition({
      table: "t",
      timeGrain: { column: "ts", grain: "day", label: "day" },
      filters: [{ column: "ts", kind: "range" }],
    });
    expect(parsed.filters).toEqual([{ column: "ts", kind: "range" }]);
  });

  it("throws ValidationError listing each issue path", () => {
    try {
      parseQueryDefinition({
        table: "",
        timeGrain: { column: "ts", grain: "day" },
        measures: [{ expression: 1, label: "n" }],
      });
      expect.fail("expected parse to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details.subject).toBe("query definition");
        expect(error.details.issues.map((issue) => issue.path)).toEqual([
          "table",
          "timeGrain.label",
          "measures.0.expression",
        ]);
      }
    }
  });

  it("rejects non-object input", () => {
    expect(() => parseQueryDefinition("events")).toThrow(ValidationError);
  });
});

describe("assembleQuery", () => {
  it("builds the same statement as the fluent API", () => {
    expect(assembleQuery(EVENTS).compile()).toBe(
      [
        "SELECT",
        `  date_trunc('day', ts) AS "day",`,
        `  country AS "country",`,
        `  count(*) AS "total"`,
        "FROM events",
        "WHERE TRUE AND",
        "  status IN ('ok')",
        "",
        "GROUP BY 1, 2",
        "ORDER BY 1 DESC, 2",
      ].join("\n"),
    );
  });

  it("keeps definition order within each section", () => {
    const assembler = assembleQuery({
      table: "t",
      timeGrain: { column: "ts", grain: "day", label: "day" },
      slices: ["b", { column: "a_col", label: "a" }],
      ratios: [{ numerator: "x", denominator: "y", label: "xy" }],
      measures: [{ expression: "count(*)", label: "n" }],
    });
    expect(assembler.labels()).toEqual(["day", "b", "a", "n", "xy"]);
  });

  it("defers unsupported filter kinds to compile", () => {
    const assembler = assembleQuery({
      table: "t",
      timeGrain: { column: "ts", grain: "day", label: "day" },
      filters: [{ column: "ts", kind: "range" }],
    });
    expect(() => assembler.compile()).toThrow(UnsupportedFilterKindError);
  });
});
