/**
 * Text matching helpers
 *
 * Questions and vocabularies are compared on a "plain" form: lower-cased,
 * accents stripped, whitespace collapsed. A term matches when it starts at a
 * word boundary ("collision" matches "collisions" but "sec" never matches
 * inside "intersection"). A term written with a trailing space must also end
 * on a word boundary ("ice " matches "ice" but not "icebreaker").
 */

/**
 * Lower-case, strip diacritics, unify apostrophes and collapse whitespace
 */
export function plainText(text: string): string {
  return text
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[’`]/g, "'")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileTerm(term: string): RegExp {
  const wholeWord = /\s$/.test(term);
  const core = escapeRegExp(plainText(term));
  return new RegExp(`(?<![a-z0-9])${core}${wholeWord ? "(?![a-z0-9])" : ""}`);
}

/**
 * Compiled vocabulary, matched against plain text
 */
export class TermMatcher {
  private readonly compiled: Array<{ term: string; pattern: RegExp }>;

  constructor(terms: readonly string[]) {
    this.compiled = terms.map((term) => ({ term: plainText(term), pattern: compileTerm(term) }));
  }

  /**
   * True when any term occurs in the (already plain) text
   */
  matches(plain: string): boolean {
    return this.compiled.some(({ pattern }) => pattern.test(plain));
  }

  /**
   * First term of the vocabulary found in the text, in vocabulary order
   */
  firstMatch(plain: string): string | undefined {
    return this.compiled.find(({ pattern }) => pattern.test(plain))?.term;
  }
}

/**
 * Case- and accent-insensitive substring test, used on record labels
 */
export function labelContains(label: string, fragments: readonly string[]): boolean {
  const plain = plainText(label);
  return fragments.some((fragment) => plain.includes(plainText(fragment)));
}
