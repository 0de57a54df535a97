/**
 * Verse segmentation: split the lines of a verse block into the declared
 * verse number and the verse text.
 *
 * Verse ends are marked with a doubled danda around the dotted number,
 * e.g. '৷৷1.1.18৷৷' on Telugu pages or '।।1.1.18।।' / '॥1.1.18॥' on Devanagari ones.
 * The digits may be ASCII or native ('।।१.१.१८।।').
 */

import { hasContent } from "./script.js";
import type { VerseNumber } from "./types.js";

// Double dandas as they appear on the pages; the single danda '।' is sentence-internal
const WRAPPER = "(?:৷৷|।।|॥)";
const NUMBER = "(\\p{Nd}+\\.\\p{Nd}+\\.\\p{Nd}+)";
const DIGIT = /^\p{Nd}$/u;

const VERSE_MARKER = new RegExp(`${WRAPPER}\\s*${NUMBER}\\s*${WRAPPER}`, "u");
const VERSE_MARKER_GLOBAL = new RegExp(`\\s*${WRAPPER}\\s*${NUMBER}\\s*${WRAPPER}\\s*`, "gu");

/** Glyphs that never count as verse content on their own */
export const VERSE_PUNCTUATION: readonly string[] = ["।", "॥", "৷"];

/** Result of segmenting one verse block */
export interface VerseSegment {
  /** Dotted number from the marker, null when no line carries one */
  number: string | null;
  lines: string[];
  text: string;
}

// Decimal digits come in contiguous runs starting at zero
function digitValue(digit: string): number {
  let code = digit.codePointAt(0) ?? 0;
  let value = 0;
  while (DIGIT.test(String.fromCodePoint(code - 1))) {
    code--;
    value++;
  }
  return value % 10;
}

/**
 * Replace every decimal digit, in any script, with its ASCII form.
 *
 * @example
 * toAsciiDigits('१.१.१८') // '1.1.18'
 * toAsciiDigits('౨.౩') // '2.3'
 */
export function toAsciiDigits(text: string): string {
  return text.replace(/\p{Nd}/gu, (digit) => String(digitValue(digit)));
}

/**
 * Find the dotted verse number in a line, if the line carries a marker.
 * Native digits are returned in ASCII form.
 *
 * @example
 * findVerseMarker('రామో విగ్రహవాన్ ధర్మః ৷৷1.1.18৷৷') // '1.1.18'
 * findVerseMarker('रामः ।।१.१.१८।।') // '1.1.18'
 * findVerseMarker('no marker here') // null
 */
export function findVerseMarker(line: string): string | null {
  const match = VERSE_MARKER.exec(line);
  return match ? toAsciiDigits(match[1]) : null;
}

/**
 * Remove every verse marker (and the whitespace around it) from a line.
 */
export function stripVerseMarkers(line: string): string {
  return line.replace(VERSE_MARKER_GLOBAL, " ").trim();
}

/**
 * Split verse block lines into number and text.
 *
 * The marker is stripped from the line it sits on; the line itself and every
 * line before it stay part of the verse. Lines starting with '[' are summaries
 * and never reach the text. Lines left with nothing but punctuation after the
 * marker is removed are dropped.
 *
 * @param lines - Lines of the verse block, in page order
 */
export function segmentVerse(lines: readonly string[]): VerseSegment {
  let number: string | null = null;
  const kept: string[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    if (number === null) {
      number = findVerseMarker(line);
    }

    if (line.startsWith("[")) continue;

    const stripped = stripVerseMarkers(line);
    if (!hasContent(stripped, VERSE_PUNCTUATION)) continue;

    kept.push(stripped);
  }

  return { number, lines: kept, text: kept.join("\n") };
}

/**
 * Parse a dotted verse number into its three components.
 *
 * @returns The parsed number, or null unless all three parts are positive integers
 *
 * @example
 * parseVerseNumber('1.1.18') // { book: 1, chapter: 1, verse: 18 }
 * parseVerseNumber('1.0.3') // null
 */
export function parseVerseNumber(text: string): VerseNumber | null {
  const parts = toAsciiDigits(text).split(".");
  if (parts.length !== 3 || !parts.every((part) => /^\d+$/.test(part))) {
    return null;
  }

  const [book, chapter, verse] = parts.map((part) => parseInt(part, 10));
  if (book < 1 || chapter < 1 || verse < 1) {
    return null;
  }
  return { book, chapter, verse };
}

/**
 * Format a verse number in dotted form.
 */
export function formatVerseNumber(number: VerseNumber): string {
  return `${number.book}.${number.chapter}.${number.verse}`;
}
