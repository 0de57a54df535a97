/**
 * Word-by-word gloss (pratipadaartham) extraction
 *
 * The gloss field is a flat run of source-script words, each followed by its
 * English meaning and a comma:
 *
 *   'वीर्ये In prowess, विष्णुना सदृशः similar to Visnu,'
 *
 * Either side may span several words, so pairs are found by script rather
 * than by position.
 */

import { classifyToken } from "./script.js";

const PAIR_SEPARATOR = ",";

/**
 * Split a gloss field into word tokens and comma separators.
 * Commas attached to words become tokens of their own.
 *
 * @example
 * tokenizeGloss('वीर्ये In prowess,') // ['वीर्ये', 'In', 'prowess', ',']
 */
export function tokenizeGloss(field: string): string[] {
  return field.split(/\s+|(,)/).filter((token) => token !== undefined && token !== "");
}

/**
 * Extract the ordered word → meaning mapping from a gloss field.
 *
 * Consecutive source-script tokens form the key; the first meaning token
 * starts the value, which runs until a comma, the next source-script token
 * or the end of the field. Pairs with an empty key or an empty value are
 * dropped: a comma inside a meaning leaves its tail without a key, and that
 * tail is discarded rather than attached to the wrong word. A repeated key
 * keeps its first position and takes the last meaning.
 *
 * @param field - Flattened gloss text, possibly empty
 */
export function extractGlossary(field: string | null | undefined): Map<string, string> {
  const glossary = new Map<string, string>();
  if (!field) return glossary;

  let keyParts: string[] = [];
  let valueParts: string[] = [];

  const commit = () => {
    const key = keyParts.join(" ");
    const value = valueParts.join(" ");
    if (key && value) {
      glossary.set(key, value);
    }
    keyParts = [];
    valueParts = [];
  };

  for (const token of tokenizeGloss(field)) {
    if (token === PAIR_SEPARATOR) {
      commit();
      continue;
    }

    if (classifyToken(token) === "source") {
      // A source word after a meaning starts the next pair
      if (valueParts.length > 0) commit();
      keyParts.push(token);
    } else {
      valueParts.push(token);
    }
  }
  commit();

  return glossary;
}

/**
 * Read-only view of a glossary. Records hold one of these so that a cached
 * chapter cannot have its pairs changed through the underlying Map.
 */
export class Glossary implements ReadonlyMap<string, string> {
  readonly #pairs: Map<string, string>;

  constructor(pairs: Iterable<readonly [string, string]> = []) {
    this.#pairs = new Map(pairs);
  }

  get size(): number {
    return this.#pairs.size;
  }

  get(word: string): string | undefined {
    return this.#pairs.get(word);
  }

  has(word: string): boolean {
    return this.#pairs.has(word);
  }

  forEach(callback: (meaning: string, word: string, glossary: ReadonlyMap<string, string>) => void): void {
    for (const [word, meaning] of this.#pairs) {
      callback(meaning, word, this);
    }
  }

  entries() {
    return this.#pairs.entries();
  }

  keys() {
    return this.#pairs.keys();
  }

  values() {
    return this.#pairs.values();
  }

  [Symbol.iterator]() {
    return this.#pairs[Symbol.iterator]();
  }
}
