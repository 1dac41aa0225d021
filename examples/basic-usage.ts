/**
 * Basic Usage Example
 *
 * Adds a few books to an in-memory catalog, searches it and sorts the
 * results.
 * Run with: npm run example
 */

import { createNormalizationContext, openCatalog, toggleSort, DEFAULT_SORT } from "@bookshelf/sdk";

function main(): void {
  console.log("📚 Opening in-memory catalog...");
  const catalog = openCatalog({
    context: createNormalizationContext({ locale: "pl-PL" }),
  });

  try {
    catalog.add({ shelf: "A1", author: "Stanisław Lem", title: "Solaris" });
    catalog.add({ shelf: "A1", author: "Stanisław Lem", title: "Cyberiada" });
    catalog.add({
      shelf: "B3",
      author: "Gabriel García Márquez",
      title: "Sto lat samotności",
      translator: "Grażyna Grudzińska",
      originalTitle: "Cien años de soledad",
      borrowed: "Marek",
    });
    console.log(`✓ ${catalog.count()} books stored`);

    // Accents and case do not matter on either side
    console.log('\n🔎 search("stanislaw")');
    for (const book of catalog.search("stanislaw")) {
      console.log(`  ${book.id}. ${book.author}: ${book.title}`);
    }

    console.log('\n🔎 search("cien sol") matches the original title');
    for (const book of catalog.search("cien sol")) {
      console.log(`  ${book.id}. ${book.title} (${book.originalTitle})`);
    }

    // Picking the same column twice flips the direction
    const byTitle = toggleSort(DEFAULT_SORT, "title");
    const byTitleDesc = toggleSort(byTitle, "title");
    console.log("\n↕️  All books by title, descending");
    for (const book of catalog.search("", byTitleDesc)) {
      console.log(`  ${book.title}`);
    }

    console.log(`\n🔤 Folded: ${catalog.context.foldText("Łódź, Żółć, Ærø")}`);
  } finally {
    catalog.close();
  }
}

main();
