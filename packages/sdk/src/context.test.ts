import { describe, it, expect } from "vitest";
import { createNormalizationContext, DEFAULT_LOCALE } from "./context.js";

describe("createNormalizationContext", () => {
  it("should default to the Polish locale", () => {
    const context = createNormalizationContext();
    expect(context.locale).toBe(DEFAULT_LOCALE);
  });

  it("should fold and build queries with its own table", () => {
    const context = createNormalizationContext();

    expect(context.foldText("Łódź")).toBe("Lodz");
    expect(context.buildSearchQuery("Łódź  Kaliska")).toBe("Lodz* Kaliska*");
    expect(context.buildIndexedContent(["Józef", "", "Conrad"])).toBe("Jozef Conrad");
    expect(context.table.stats().size).toBeGreaterThan(0);
  });

  it("should compare and sort with its collator", () => {
    const context = createNormalizationContext();

    expect(context.compare("a", "á")).toBe(-1);
    expect(context.sortRows(["ć", "d", "c"], (value) => value, false)).toEqual(["c", "ć", "d"]);
  });

  it("should not share fold state between contexts", () => {
    const first = createNormalizationContext();
    const second = createNormalizationContext();

    first.foldText("abc");
    expect(second.table.stats().size).toBe(0);
  });

  it("should pass overrides, cache and numeric options through", () => {
    const context = createNormalizationContext({
      locale: "en-US",
      numeric: true,
      overrides: { ø: "o" },
      cache: false,
    });

    expect(context.locale).toBe("en-US");
    expect(context.foldText("Søren")).toBe("Soren");
    expect(context.table.stats().size).toBe(0);
    expect(context.compare("2", "10")).toBe(-1);
  });
});
