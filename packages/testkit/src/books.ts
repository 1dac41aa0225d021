import type { BookDraft } from "@bookshelf/sdk";

/**
 * A small shelf with accents, a translation and a loan
 *
 * Added in order they get ids 1-4; by author (pl-PL) the order is 2, 3, 4, 1.
 */
export const SAMPLE_BOOKS: readonly BookDraft[] = [
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
