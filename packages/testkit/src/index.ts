/**
 * Test helpers for bookshelf packages
 */

export { createTempDir, removeDir, withTempCatalog } from "./fs.js";
export type { TempCatalogOptions } from "./fs.js";
export { SAMPLE_BOOKS } from "./books.js";
