import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openCatalog } from "./catalog.js";
import { createNormalizationContext } from "./context.js";
import {
  BookNotFoundError,
  BookValidationError,
  CatalogOpenError,
  SearchQueryError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import type { Book, BookDraft, Catalog } from "./types.js";

const SEED: BookDraft[] = [
  { shelf: "A1", author: "Stanisław Lem", title: "Solaris" },
  { shelf: "A2", author: "Bolesław Prus", title: "Lalka" },
  {
    shelf: "B1",
    author: "Jorge Luis Borges",
    title: "Fikcje",
    translator: "Zofia Chądzyńska",
    originalTitle: "Ficciones",
  },
  { shelf: "B2", author: "Olga Tokarczuk", title: "Bieguni", borrowed: "Ania" },
];

const ids = (books: Book[]): number[] => books.map((book) => book.id);

beforeAll(() => {
  logger.setEnabled(false);
});

afterAll(() => {
  logger.setEnabled(true);
});

describe("Catalog", () => {
  let catalog: Catalog;

  beforeEach(() => {
    catalog = openCatalog();
    for (const draft of SEED) {
      catalog.add(draft);
    }
  });

  afterEach(() => {
    catalog.close();
  });

  describe("add()", () => {
    it("should assign sequential ids and default optional fields", () => {
      expect(catalog.count()).toBe(4);
      expect(catalog.get(1)).toEqual({
        id: 1,
        shelf: "A1",
        author: "Stanisław Lem",
        title: "Solaris",
        translator: "",
        originalTitle: "",
        borrowed: "",
      });
    });

    it("should store collapsed whitespace", () => {
      const book = catalog.add({ shelf: " C1 ", author: "Jan   Kowalski", title: "Test" });

      expect(book).toEqual({
        id: 5,
        shelf: "C1",
        author: "Jan Kowalski",
        title: "Test",
        translator: "",
        originalTitle: "",
        borrowed: "",
      });
      expect(catalog.get(5)).toEqual(book);
    });

    it("should reject a book without a title and store nothing", () => {
      expect(() => catalog.add({ shelf: "C1", author: "Anonim", title: "" })).toThrow(
        BookValidationError
      );
      expect(catalog.count()).toBe(4);
    });
  });

  describe("get()", () => {
    it("should return null for an unknown id", () => {
      expect(catalog.get(99)).toBeNull();
    });
  });

  describe("search()", () => {
    it("should list every book for an empty query, sorted by author", () => {
      expect(ids(catalog.search(""))).toEqual([2, 3, 4, 1]);
      expect(ids(catalog.search("   "))).toEqual([2, 3, 4, 1]);
    });

    it("should match word prefixes", () => {
      expect(ids(catalog.search("stan"))).toEqual([1]);
      expect(ids(catalog.search("tok"))).toEqual([4]);
    });

    it("should ignore accents and case on both sides", () => {
      expect(ids(catalog.search("Bolesław"))).toEqual([2]);
      expect(ids(catalog.search("boleslaw"))).toEqual([2]);
      expect(ids(catalog.search("STANISŁAW"))).toEqual([1]);
    });

    it("should search translator and original title", () => {
      expect(ids(catalog.search("ficc"))).toEqual([3]);
      expect(ids(catalog.search("chadz"))).toEqual([3]);
    });

    it("should require every term to match", () => {
      expect(ids(catalog.search("lem sol"))).toEqual([1]);
      expect(ids(catalog.search("lem lalka"))).toEqual([]);
    });

    it("should not index shelf or borrowed", () => {
      expect(ids(catalog.search("ania"))).toEqual([]);
      expect(ids(catalog.search("A1"))).toEqual([]);
    });

    it("should sort by the requested column and direction", () => {
      const byTitleDesc = catalog.search("", { column: "title", descending: true });
      expect(byTitleDesc.map((book) => book.title)).toEqual([
        "Solaris",
        "Lalka",
        "Fikcje",
        "Bieguni",
      ]);

      const byShelf = catalog.search("", { column: "shelf", descending: false });
      expect(ids(byShelf)).toEqual([1, 2, 3, 4]);
    });

    it("should surface index syntax errors", () => {
      try {
        catalog.search("(lem");
        expect.fail("expected the index to reject the query");
      } catch (err) {
        expect(err).toBeInstanceOf(SearchQueryError);
        if (err instanceof SearchQueryError) {
          expect(err.expression).toBe("(lem*");
          expect(err.cause).toBeInstanceOf(Error);
        }
      }
    });
  });

  describe("match()", () => {
    it("should run a prebuilt expression", () => {
      expect(ids(catalog.match("lem*"))).toEqual([1]);
      expect(ids(catalog.match(""))).toEqual([2, 3, 4, 1]);
    });
  });

  describe("update()", () => {
    it("should replace fields and reindex", () => {
      const updated = catalog.update(1, {
        shelf: "A1",
        author: "Stanisław Lem",
        title: "Niezwyciężony",
      });

      expect(updated.title).toBe("Niezwyciężony");
      expect(catalog.get(1)?.title).toBe("Niezwyciężony");
      expect(ids(catalog.search("solaris"))).toEqual([]);
      expect(ids(catalog.search("niezwyciezony"))).toEqual([1]);
    });

    it("should throw for an unknown id", () => {
      expect(() =>
        catalog.update(99, { shelf: "A1", author: "Nikt", title: "Nic" })
      ).toThrow(BookNotFoundError);
    });

    it("should validate before touching the database", () => {
      expect(() => catalog.update(1, { shelf: "A1", author: "", title: "Solaris" })).toThrow(
        BookValidationError
      );
      expect(catalog.get(1)?.author).toBe("Stanisław Lem");
    });
  });

  describe("remove()", () => {
    it("should delete the book and its index row", () => {
      catalog.remove(2);

      expect(catalog.count()).toBe(3);
      expect(catalog.get(2)).toBeNull();
      expect(ids(catalog.search("prus"))).toEqual([]);
    });

    it("should throw for an unknown id", () => {
      expect(() => catalog.remove(99)).toThrow(BookNotFoundError);
      expect(catalog.count()).toBe(4);
    });
  });

  describe("reindex()", () => {
    it("should rebuild every index row", () => {
      expect(catalog.reindex()).toBe(4);
      expect(ids(catalog.search("lem"))).toEqual([1]);
      expect(ids(catalog.search(""))).toEqual([2, 3, 4, 1]);
    });
  });
});

describe("Catalog on disk", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "bookshelf-test-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should persist books across reopen", () => {
    const path = join(testDir, "books.sqlite3");

    const first = openCatalog({ path });
    first.add({ shelf: "A1", author: "Stanisław Lem", title: "Solaris" });
    first.close();

    const second = openCatalog({ path });
    expect(second.count()).toBe(1);
    expect(ids(second.search("solaris"))).toEqual([1]);
    second.close();
  });

  it("should pick up new fold rules after reindex", () => {
    const path = join(testDir, "books.sqlite3");

    const first = openCatalog({ path });
    first.add({ shelf: "C3", author: "Søren Kierkegaard", title: "Albo-albo" });
    first.close();

    const catalog = openCatalog({
      path,
      context: createNormalizationContext({ overrides: { ø: "o" } }),
    });
    expect(ids(catalog.search("soren"))).toEqual([]);

    expect(catalog.reindex()).toBe(1);
    expect(ids(catalog.search("soren"))).toEqual([1]);
    catalog.close();
  });

  it("should throw CatalogOpenError when the directory is missing", () => {
    const path = join(testDir, "missing", "books.sqlite3");
    expect(() => openCatalog({ path })).toThrow(CatalogOpenError);
  });
});
