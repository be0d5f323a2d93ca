/**
 * Filter rendering tests.
 */
import { describe, expect, it } from "vitest";

import {
  customFilter,
  Filter,
  FILTER_KINDS,
  InvalidFilterValueError,
  isFilterKind,
  listFilter,
  MissingExpressionError,
  UnsupportedFilterKindError,
} from "../src";

describe("list filters", () => {
  it("renders IN with quoted values and a trailing newline", () => {
    const filter = new Filter({ column: "x", value: ["1", "2"], kind: "list" });
    expect(filter.render()).toBe("x IN ('1', '2')\n");
  });

  it("defaults the kind to list", () => {
    const filter = new Filter({ column: "status", value: ["ok"] });
    expect(filter.kind).toBe("list");
    expect(filter.render()).toBe("status IN ('ok')\n");
  });

  it("renders an empty list as an empty IN", () => {
    expect(listFilter("x", []).render()).toBe("x IN ()\n");
  });

  it("does not escape values", () => {
    expect(listFilter("name", ["o'brien"]).render()).toBe(
      "name IN ('o'brien')\n",
    );
  });

  it("copies and freezes the value array", () => {
    const values = ["a", "b"];
    const filter = listFilter("x", values);
    values.push("c");
    values[0] = "z";

    expect(filter.value).not.toBe(values);
    expect(filter.value).toEqual(["a", "b"]);
    expect(Object.isFrozen(filter.value)).toBe(true);
    expect(filter.render()).toBe("x IN ('a', 'b')\n");
  });

  it("throws InvalidFilterValueError without a value", () => {
    const filter = new Filter({ column: "x" });
    expect(() => filter.render()).toThrow(InvalidFilterValueError);
  });

  it("throws InvalidFilterValueError for non-string values", () => {
    const filter = new Filter({ column: "x", value: JSON.parse("[1, 2]") });
    expect(() => filter.render()).toThrow(InvalidFilterValueError);
  });

  it("records the column on the error", () => {
    try {
      new Filter({ column: "region" }).render();
      expect.fail("expected render to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidFilterValueError);
      if (error instanceof InvalidFilterValueError) {
        expect(error.code).toBe("INVALID_FILTER_VALUE");
        expect(error.details).toEqual({ column: "region" });
        expect(error.cause).toBeDefined();
      }
    }
  });
});

describe("custom filters", () => {
  it("emits the expression verbatim", () => {
    expect(customFilter("amount", "amount > 100").render()).toBe(
      "amount > 100",
    );
  });

  it("throws MissingExpressionError for an empty expression", () => {
    expect(() => customFilter("amount", "").render()).toThrow(
      MissingExpressionError,
    );
  });

  it("throws MissingExpressionError for an absent expression", () => {
    const filter = new Filter({ column: "amount", kind: "custom" });
    expect(() => filter.render()).toThrow(
      'Filter on "amount" requires a custom expression',
    );
  });

  it("ignores value for the custom kind", () => {
    const filter = new Filter({
      column: "amount",
      kind: "custom",
      value: ["1"],
      customExpression: "amount <> 0",
    });
    expect(filter.render()).toBe("amount <> 0");
  });
});

describe("unsupported kinds", () => {
  it("throws UnsupportedFilterKindError", () => {
    const filter = new Filter({ column: "ts", kind: "range" });
    expect(() => filter.render()).toThrow(UnsupportedFilterKindError);
    expect(() => filter.render()).toThrow(
      'Unsupported filter kind "range" on "ts"',
    );
  });
});

describe("isFilterKind", () => {
  it("accepts exactly the supported kinds", () => {
    expect(FILTER_KINDS).toEqual(["list", "custom"]);
    expect(isFilterKind("list")).toBe(true);
    expect(isFilterKind("custom")).toBe(true);
    expect(isFilterKind("range")).toBe(false);
    expect(isFilterKind("LIST")).toBe(false);
  });
});
