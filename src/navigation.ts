/**
 * Moving between verses, across sarga boundaries
 */

import type { ReadingLanguage, ReadingPosition } from "./types.js";

/** Resolves the number of verses in a sarga, or null if it cannot be loaded */
export type ChapterLengthLookup = (book: number, chapter: number) => Promise<number | null>;

/**
 * Position of the verse before the given one.
 * The first verse of a sarga steps back to the last verse of the previous
 * sarga; there is nothing before the first sarga of a kanda.
 *
 * @param position - Current position (1-based verse)
 * @param lengthOf - Lookup for the previous sarga's verse count
 * @returns Previous position, or null if there is none or it cannot be resolved
 */
export async function previousPosition(
  position: ReadingPosition,
  lengthOf: ChapterLengthLookup,
): Promise<ReadingPosition | null> {
  const { book, chapter, verse } = position;
  if (verse > 1) {
    return { book, chapter, verse: verse - 1 };
  }
  if (chapter <= 1) {
    return null;
  }

  const previousLength = await lengthOf(book, chapter - 1);
  if (!previousLength) {
    return null;
  }
  return { book, chapter: chapter - 1, verse: previousLength };
}

/**
 * Position of the verse after the given one.
 * Past the last verse, reading continues at the first verse of the next sarga,
 * which is assumed to exist.
 *
 * @param position - Current position (1-based verse)
 * @param chapterLength - Number of verses in the current sarga
 */
export function nextPosition(position: ReadingPosition, chapterLength: number): ReadingPosition {
  const { book, chapter, verse } = position;
  if (verse < chapterLength) {
    return { book, chapter, verse: verse + 1 };
  }
  return { book, chapter: chapter + 1, verse: 1 };
}

/**
 * Reader path for a position.
 *
 * @example
 * readerPath('te', { book: 1, chapter: 2, verse: 3 }) // '/te/kanda/1/sarga/2/sloka/3'
 */
export function readerPath(language: ReadingLanguage, position: ReadingPosition): string {
  return `/${language}/kanda/${position.book}/sarga/${position.chapter}/sloka/${position.verse}`;
}

/**
 * Order positions by book, then chapter, then verse.
 */
export function comparePositions(a: ReadingPosition, b: ReadingPosition): number {
  return a.book - b.book || a.chapter - b.chapter || a.verse - b.verse;
}

/**
 * Format a position for display.
 *
 * @example
 * formatPosition({ book: 1, chapter: 2, verse: 3 }) // 'Kanda 1 Sarga 2 Sloka 3'
 */
export function formatPosition(position: ReadingPosition): string {
  return `Kanda ${position.book} Sarga ${position.chapter} Sloka ${position.verse}`;
}
