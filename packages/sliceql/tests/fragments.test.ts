/**
 * Fragment rendering tests.
 *
 * Each fragment renders one SQL snippet with plain interpolation.
 */
import { describe, expect, it } from "vitest";

import {
  customFilter,
  isLabeledFragment,
  listFilter,
  Measure,
  measure,
  Ratio,
  ratio,
  renderFragment,
  Slice,
  slice,
  TimeGrain,
  timeGrain,
} from "../src";

describe("TimeGrain", () => {
  it("renders date_trunc with the grain quoted as a literal", () => {
    expect(timeGrain("ts", "day", "day").render()).toBe(
      `date_trunc('day', ts) AS "day"`,
    );
  });

  it("keeps column, grain and label", () => {
    const grain = new TimeGrain("created_at", "month", "Month");
    expect(grain.column).toBe("created_at");
    expect(grain.grain).toBe("month");
    expect(grain.label).toBe("Month");
    expect(grain.__type).toBe("time_grain");
  });
});

describe("Slice", () => {
  it("defaults the label to the column", () => {
    const country = slice("country");
    expect(country.label).toBe("country");
    expect(country.render()).toBe(`country AS "country"`);
  });

  it("uses an explicit label", () => {
    expect(new Slice("device_os", "os").render()).toBe(`device_os AS "os"`);
  });

  it("passes an empty column through verbatim", () => {
    expect(slice("", "blank").render()).toBe(` AS "blank"`);
  });
});

describe("Measure", () => {
  it("renders the expression under its label", () => {
    expect(measure("count(*)", "total").render()).toBe(
      `count(*) AS "total"`,
    );
  });

  it("does not alter raw expressions", () => {
    const m = new Measure("sum(amount) FILTER (WHERE paid)", "paid_total");
    expect(m.render()).toBe(
      `sum(amount) FILTER (WHERE paid) AS "paid_total"`,
    );
  });
});

describe("Ratio", () => {
  it("guards the denominator with NULLIF", () => {
    expect(new Ratio("a", "b", "r").render()).toBe(
      `(a) / NULLIF(b, 0) AS "r"`,
    );
  });

  it("wraps compound numerators in parentheses", () => {
    expect(ratio("sum(x) + sum(y)", "count(*)", "avg_xy").render()).toBe(
      `(sum(x) + sum(y)) / NULLIF(count(*), 0) AS "avg_xy"`,
    );
  });
});

describe("immutability", () => {
  it("freezes fragments on construction", () => {
    expect(Object.isFrozen(timeGrain("ts", "day", "day"))).toBe(true);
    expect(Object.isFrozen(slice("country"))).toBe(true);
    expect(Object.isFrozen(measure("count(*)", "n"))).toBe(true);
    expect(Object.isFrozen(ratio("a", "b", "r"))).toBe(true);
    expect(Object.isFrozen(listFilter("x", ["1"]))).toBe(true);
  });
});

describe("renderFragment", () => {
  it("delegates to the fragment", () => {
    expect(renderFragment(slice("os"))).toBe(`os AS "os"`);
    expect(renderFragment(customFilter("x", "x > 1"))).toBe("x > 1");
  });
});

describe("isLabeledFragment", () => {
  it("is true for select-list fragments only", () => {
    expect(isLabeledFragment(timeGrain("ts", "day", "day"))).toBe(true);
    expect(isLabeledFragment(slice("country"))).toBe(true);
    expect(isLabeledFragment(measure("count(*)", "n"))).toBe(true);
    expect(isLabeledFragment(ratio("a", "b", "r"))).toBe(true);
    expect(isLabeledFragment(listFilter("x", ["1"]))).toBe(false);
  });
});
