/**
 * Script classification for gloss tokens
 *
 * A gloss field mixes source-script words (Telugu or Devanagari) with English
 * meanings and has no markup separating the two, so every token is classified
 * by the Unicode script of its letters.
 */

/** Which side of a gloss pair a token belongs to */
export type TokenScript = "source" | "meaning";

// Letters and combining marks; punctuation, digits and symbols are not alphabetic
const ALPHABETIC = /[\p{L}\p{M}]/u;

// Latin letters, plus combining marks used by transliterations such as 'Viṣṇu'
const MEANING_ALPHABET = /[\p{Script=Latin}\p{Script=Inherited}]/u;

/**
 * Check whether a character belongs to the meaning language's alphabet.
 *
 * @param char - A single code point
 */
export function isMeaningChar(char: string): boolean {
  return MEANING_ALPHABET.test(char);
}

/**
 * Classify a whitespace-delimited token.
 * A token is meaning-language if and only if all of its alphabetic characters
 * are Latin; a token without letters ('-', '(2)') therefore counts as meaning.
 *
 * @example
 * classifyToken('prowess') // 'meaning'
 * classifyToken('వీర్యే') // 'source'
 * classifyToken('विष्णुना') // 'source'
 */
export function classifyToken(token: string): TokenScript {
  for (const char of token) {
    if (ALPHABETIC.test(char) && !isMeaningChar(char)) {
      return "source";
    }
  }
  return "meaning";
}

/**
 * Check whether a line has any content left once punctuation, whitespace and
 * the given extra glyphs are ignored.
 *
 * @param line - Line to inspect
 * @param ignored - Additional glyphs that do not count as content
 */
export function hasContent(line: string, ignored: readonly string[] = []): boolean {
  for (const char of line) {
    if (/[\s\p{P}]/u.test(char) || ignored.includes(char)) continue;
    return true;
  }
  return false;
}
