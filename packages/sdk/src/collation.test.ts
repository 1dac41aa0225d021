import { describe, it, expect } from "vitest";
import {
  createCollator,
  compareText,
  sortRows,
  toggleSort,
  columnText,
  DEFAULT_SORT,
} from "./collation.js";
import type { Book, SortState } from "./types.js";

const polish = createCollator("pl-PL");
const identity = (value: string): string => value;

describe("compareText", () => {
  it("should order an accented letter next to its base letter", () => {
    expect(compareText(polish, "a", "á")).toBe(-1);
    expect(compareText(polish, "á", "b")).toBe(-1);
    expect(compareText(polish, "á", "z")).toBe(-1);
  });

  it("should order plain letters alphabetically", () => {
    expect(compareText(polish, "a", "b")).toBe(-1);
    expect(compareText(polish, "b", "a")).toBe(1);
    expect(compareText(polish, "kot", "kot")).toBe(0);
  });

  it("should place Polish letters per Polish alphabet", () => {
    expect(compareText(polish, "a", "ą")).toBe(-1);
    expect(compareText(polish, "ą", "b")).toBe(-1);
    expect(compareText(polish, "ł", "m")).toBe(-1);
  });

  it("should compare digit runs by value only when numeric", () => {
    expect(compareText(polish, "2", "10")).toBe(1);
    expect(compareText(createCollator("pl-PL", { numeric: true }), "2", "10")).toBe(-1);
  });
});

describe("createCollator", () => {
  it("should reject malformed locales", () => {
    expect(() => createCollator("not a locale!!")).toThrow(RangeError);
  });
});

describe("sortRows", () => {
  it("should sort by collation rather than codepoint", () => {
    expect(sortRows(["b", "á", "z", "a"], identity, false, polish)).toEqual(["a", "á", "b", "z"]);
  });

  it("should follow Polish ordering of z, ź and ż", () => {
    expect(sortRows(["ż", "z", "ź", "b"], identity, false, polish)).toEqual(["b", "z", "ź", "ż"]);
  });

  it("should keep equal rows in their prior order", () => {
    const rows = [
      { key: "B", seq: 1 },
      { key: "A", seq: 2 },
      { key: "B", seq: 3 },
    ];

    const ascending = sortRows(rows, (row) => row.key, false, polish);
    expect(ascending.map((row) => row.seq)).toEqual([2, 1, 3]);

    const descending = sortRows(rows, (row) => row.key, true, polish);
    expect(descending.map((row) => row.seq)).toEqual([1, 3, 2]);
  });

  it("should reverse exactly when toggled without ties", () => {
    const rows = [{ name: "Prus" }, { name: "Lem" }, { name: "Żeromski" }, { name: "Orzeszkowa" }];

    const ascending = sortRows(rows, (row) => row.name, false, polish);
    const descending = sortRows(rows, (row) => row.name, true, polish);

    expect(ascending.map((row) => row.name)).toEqual(["Lem", "Orzeszkowa", "Prus", "Żeromski"]);
    expect(descending).toEqual([...ascending].reverse());
  });

  it("should sort absent values as empty strings", () => {
    const rows: { id: number; k: string | null | undefined }[] = [
      { id: 1, k: "b" },
      { id: 2, k: null },
      { id: 3, k: undefined },
      { id: 4, k: "a" },
      { id: 5, k: "" },
    ];

    const sorted = sortRows(rows, (row) => row.k, false, polish);
    expect(sorted.map((row) => row.id)).toEqual([2, 3, 5, 4, 1]);
  });

  it("should not modify the input", () => {
    const rows = ["c", "a", "b"];
    sortRows(rows, identity, false, polish);
    expect(rows).toEqual(["c", "a", "b"]);
  });
});

describe("toggleSort", () => {
  it("should start from ascending author", () => {
    expect(DEFAULT_SORT).toEqual({ column: "author", descending: false });
  });

  it("should flip direction on the same column", () => {
    const once = toggleSort(DEFAULT_SORT, "author");
    expect(once).toEqual({ column: "author", descending: true });
    expect(toggleSort(once, "author")).toEqual({ column: "author", descending: false });
  });

  it("should reset to ascending on a different column", () => {
    const state: SortState = { column: "author", descending: true };
    expect(toggleSort(state, "title")).toEqual({ column: "title", descending: false });
  });

  it("should not modify the previous state", () => {
    const state: SortState = { column: "shelf", descending: false };
    toggleSort(state, "shelf");
    expect(state).toEqual({ column: "shelf", descending: false });
  });
});

describe("columnText", () => {
  const book: Book = {
    id: 7,
    shelf: "A1",
    author: "Stanisław Lem",
    title: "Solaris",
    translator: "",
    originalTitle: "",
    borrowed: "",
  };

  it("should render numbers and strings as text", () => {
    expect(columnText(book, "id")).toBe("7");
    expect(columnText(book, "author")).toBe("Stanisław Lem");
  });
});
