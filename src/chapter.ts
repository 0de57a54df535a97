/**
 * Verse record assembly and the chapter (sarga) collection
 */

import { IndexOutOfRangeError } from "./errors.js";
import { extractGlossary, Glossary } from "./gloss.js";
import { extractContentBlocks } from "./html.js";
import { parseVerseNumber, segmentVerse } from "./segment.js";
import type {
  BlockSection,
  ChapterKey,
  ChapterSnapshot,
  ContentBlock,
  ScriptLanguage,
  VerseIssue,
  VerseRecord,
  VerseSnapshot,
} from "./types.js";

/**
 * Collapse all whitespace runs into single spaces and trim.
 *
 * @example
 * normalizeWhitespace('  Rama,\n  the  son ') // 'Rama, the son'
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function freezeRecord(record: VerseRecord): VerseRecord {
  return Object.freeze({
    ...record,
    lines: Object.freeze([...record.lines]),
    glossary: new Glossary(record.glossary),
    issues: Object.freeze([...record.issues]),
  });
}

/**
 * Assemble one verse record from a content block.
 * Missing sub-sections fall back to empty values and are reported as issues;
 * nothing here throws.
 *
 * @param block - Content block taken from the page
 * @param position - 1-based position of the block on the page
 */
export function assembleVerse(block: ContentBlock, position: number): VerseRecord {
  const issues: VerseIssue[] = [];

  const missing: BlockSection[] = [];
  if (block.bodyLines === null) missing.push("body");
  if (block.glossText === null) missing.push("gloss");
  if (block.explanationText === null) missing.push("explanation");
  if (missing.length > 0) {
    issues.push({ kind: "MalformedBlock", missing });
  }

  const segment = segmentVerse(block.bodyLines ?? []);
  const number = segment.number === null ? null : parseVerseNumber(segment.number);
  if (number === null) {
    issues.push({ kind: "MissingVerseNumber" });
  }

  return freezeRecord({
    position,
    number,
    numberText: number === null ? null : segment.number,
    lines: segment.lines,
    text: segment.text,
    glossary: extractGlossary(block.glossText),
    explanation: normalizeWhitespace(block.explanationText ?? ""),
    issues,
  });
}

/**
 * One sarga of one kanda, as parsed from its listing page.
 * Records are in page order and never change after construction.
 */
export class Chapter {
  readonly book: number;
  readonly chapter: number;
  readonly language: ScriptLanguage;
  readonly records: readonly VerseRecord[];

  constructor(key: ChapterKey, records: readonly VerseRecord[]) {
    this.book = key.book;
    this.chapter = key.chapter;
    this.language = key.language;
    this.records = Object.freeze([...records]);
  }

  get key(): ChapterKey {
    return { book: this.book, chapter: this.chapter, language: this.language };
  }

  /**
   * Get the record at a 0-based position.
   *
   * @throws {IndexOutOfRangeError} If index is not in [0, length())
   */
  get(index: number): VerseRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
      throw new IndexOutOfRangeError(index, this.records.length);
    }
    return this.records[index];
  }

  length(): number {
    return this.records.length;
  }

  [Symbol.iterator](): Iterator<VerseRecord> {
    return this.records[Symbol.iterator]();
  }

  toString(): string {
    return `Chapter(book=${this.book}, chapter=${this.chapter}, language='${this.language}', verses=${this.length()})`;
  }
}

/**
 * Parse a sarga page into a chapter.
 * A page without verse blocks yields an empty chapter, not an error.
 *
 * @param page - Raw page HTML, or blocks already taken from it
 */
export function parseChapter(
  page: string | readonly ContentBlock[],
  book: number,
  chapter: number,
  language: ScriptLanguage,
): Chapter {
  const blocks = typeof page === "string" ? extractContentBlocks(page) : page;
  const records = blocks.map((block, i) => assembleVerse(block, i + 1));
  return new Chapter({ book, chapter, language }, records);
}

/**
 * Convert a chapter into its JSON form.
 */
export function toChapterSnapshot(chapter: Chapter): ChapterSnapshot {
  return {
    book: chapter.book,
    chapter: chapter.chapter,
    language: chapter.language,
    verses: chapter.records.map(
      (record): VerseSnapshot => ({
        position: record.position,
        numberText: record.numberText,
        lines: [...record.lines],
        glossary: [...record.glossary],
        explanation: record.explanation,
        issues: [...record.issues],
      }),
    ),
  };
}

/**
 * Rebuild a chapter from its JSON form.
 */
export function fromChapterSnapshot(snapshot: ChapterSnapshot): Chapter {
  const records = snapshot.verses.map((verse) =>
    freezeRecord({
      position: verse.position,
      number: verse.numberText === null ? null : parseVerseNumber(verse.numberText),
      numberText: verse.numberText,
      lines: [...verse.lines],
      text: verse.lines.join("\n"),
      glossary: new Map(verse.glossary),
      explanation: verse.explanation,
      issues: [...verse.issues],
    }),
  );
  return new Chapter(snapshot, records);
}
