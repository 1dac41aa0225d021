/**
 * Codepoint folding for search keys
 *
 * Folds accented letters, ligatures and stroked letters down to an
 * ASCII approximation. Resolution order per codepoint:
 * - Override table (letters whose decomposition is missing or unwanted)
 * - Base character of the compatibility decomposition (first non-mark
 *   component), itself looked up in the override table
 * - Identity
 *
 * Results are memoized per table for the lifetime of the table.
 */

/**
 * Letters with no useful decomposition, digraph conventions and ligatures
 */
export const FOLD_OVERRIDES: Readonly<Record<string, string>> = {
  Æ: "AE",
  æ: "ae",
  Ð: "D",
  ð: "d",
  Ø: "OE",
  ø: "oe",
  Þ: "Th",
  þ: "th",
  ß: "ss",
  ẞ: "SS",
  Đ: "Dj",
  đ: "dj",
  Ħ: "H",
  ħ: "h",
  ı: "i",
  ĸ: "q",
  Ł: "L",
  ł: "l",
  Ŋ: "Ng",
  ŋ: "ng",
  Œ: "OE",
  œ: "oe",
  Ŧ: "Th",
  ŧ: "th",
  Ĳ: "IJ",
  ĳ: "ij",
  ﬀ: "ff",
  ﬁ: "fi",
  ﬂ: "fl",
  ﬃ: "ffi",
  ﬄ: "ffl",
  ﬅ: "st",
  ﬆ: "st",
};

const MAX_CODE_POINT = 0x10ffff;
const COMBINING_MARK = /\p{M}/u;
const ASCII_ONLY = /^[\x00-\x7f]*$/;

/**
 * Options for a fold table
 */
export interface FoldTableOptions {
  /** Extra or replacement overrides, keyed by single character */
  overrides?: Readonly<Record<string, string>>;
  /** Memoize resolved entries (default: true) */
  cache?: boolean;
}

/**
 * Fold cache statistics
 */
export interface FoldStats {
  /** Number of cached codepoints */
  size: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
}

/**
 * Build the codepoint-keyed override map, rejecting entries that would
 * break idempotence
 */
function compileOverrides(overrides: Readonly<Record<string, string>>): Map<number, string> {
  const compiled = new Map<number, string>();

  for (const [char, replacement] of Object.entries(overrides)) {
    const codePoints = Array.from(char);
    const codePoint = char.codePointAt(0);
    if (codePoints.length !== 1 || codePoint === undefined) {
      throw new Error(`Fold override key must be a single character: "${char}"`);
    }
    if (!ASCII_ONLY.test(replacement)) {
      throw new Error(`Fold override for "${char}" must be ASCII: "${replacement}"`);
    }
    compiled.set(codePoint, replacement);
  }

  return compiled;
}

/**
 * Memoizing codepoint → replacement table
 */
export class FoldTable {
  readonly #overrides: Map<number, string>;
  readonly #cache = new Map<number, string>();
  readonly #cacheEnabled: boolean;
  #hits = 0;
  #misses = 0;

  constructor(options: FoldTableOptions = {}) {
    this.#overrides = compileOverrides({ ...FOLD_OVERRIDES, ...options.overrides });
    this.#cacheEnabled = options.cache ?? true;
  }

  /**
   * Fold a single codepoint
   *
   * @throws RangeError if `codePoint` is not a Unicode codepoint
   */
  fold(codePoint: number): string {
    if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > MAX_CODE_POINT) {
      throw new RangeError(`Invalid codepoint: ${codePoint}`);
    }

    const cached = this.#cache.get(codePoint);
    if (cached !== undefined) {
      this.#hits++;
      return cached;
    }

    this.#misses++;
    const replacement = this.#resolve(codePoint);
    if (this.#cacheEnabled && !this.#cache.has(codePoint)) {
      this.#cache.set(codePoint, replacement);
    }
    return replacement;
  }

  /**
   * Fold every codepoint of `text`, preserving order and whitespace
   */
  foldText(text: string): string {
    let result = "";
    for (const char of text) {
      // for..of yields whole codepoints, so codePointAt(0) is always defined here
      result += this.fold(char.codePointAt(0) ?? 0);
    }
    return result;
  }

  stats(): FoldStats {
    const total = this.#hits + this.#misses;
    return {
      size: this.#cache.size,
      hits: this.#hits,
      misses: this.#misses,
      hitRate: total > 0 ? this.#hits / total : 0,
    };
  }

  #resolve(codePoint: number): string {
    const override = this.#overrides.get(codePoint);
    if (override !== undefined) {
      return override;
    }

    const char = String.fromCodePoint(codePoint);
    const decomposed = char.normalize("NFKD");
    if (decomposed === char) {
      return char;
    }

    for (const part of decomposed) {
      if (COMBINING_MARK.test(part)) continue;
      // Only the base character counts; later components are dropped
      const baseCodePoint = part.codePointAt(0) ?? codePoint;
      return this.#overrides.get(baseCodePoint) ?? part;
    }
    return char;
  }
}
