/**
 * Shared type definitions for the reader
 */

/** Script a sarga page is fetched in: Telugu or Devanagari */
export type ScriptLanguage = "te" | "dv";

/** Language an explanation is read in: English original, Telugu, Telangana Telugu */
export type ReadingLanguage = "en" | "te" | "tg";

export const SCRIPT_LANGUAGES: readonly ScriptLanguage[] = ["te", "dv"];
export const READING_LANGUAGES: readonly ReadingLanguage[] = ["en", "te", "tg"];

/** Declared verse number, e.g. 1.1.18 (kanda, sarga, sloka) */
export interface VerseNumber {
  book: number;
  chapter: number;
  verse: number;
}

/** The three sub-sections of a verse block on the page */
export type BlockSection = "body" | "gloss" | "explanation";

/** Non-fatal problems found while assembling a single verse */
export type VerseIssue = { kind: "MalformedBlock"; missing: BlockSection[] } | { kind: "MissingVerseNumber" };

/** One verse, assembled from one content block */
export interface VerseRecord {
  /** 1-based position of the block on the page */
  readonly position: number;
  /** Number declared in the verse marker, null when absent */
  readonly number: VerseNumber | null;
  /** Dotted form of the declared number (e.g. '1.1.18') */
  readonly numberText: string | null;
  readonly lines: readonly string[];
  /** Verse lines joined with newlines */
  readonly text: string;
  /** Source-script word (or word group) to its meaning, in source order */
  readonly glossary: ReadonlyMap<string, string>;
  readonly explanation: string;
  readonly issues: readonly VerseIssue[];
}

/**
 * DOM-free view of one verse block.
 * A null field means the sub-section was missing from the block.
 */
export interface ContentBlock {
  bodyLines: string[] | null;
  glossText: string | null;
  explanationText: string | null;
}

/** Coordinates selecting one sarga page */
export interface ChapterKey {
  book: number;
  chapter: number;
  language: ScriptLanguage;
}

/** A place in the text where a reader can be: 1-based verse within a chapter */
export interface ReadingPosition {
  book: number;
  chapter: number;
  verse: number;
}

/** JSON form of a verse record */
export interface VerseSnapshot {
  position: number;
  numberText: string | null;
  lines: string[];
  glossary: [string, string][];
  explanation: string;
  issues: VerseIssue[];
}

/** JSON form of a chapter, written next to its markdown export */
export interface ChapterSnapshot {
  book: number;
  chapter: number;
  language: ScriptLanguage;
  verses: VerseSnapshot[];
}

/** Metadata for a single exported chapter */
export interface ChapterMeta {
  book: number;
  chapter: number;
  /** Number of verses found on the page */
  verseCount: number;
  /** Source URL of the page */
  url: string;
  /** Markdown filename (e.g., '1-001.md') */
  filename: string;
}

/** Metadata for an export run, stored in meta.json */
export interface ExportMeta {
  /** ISO timestamp when scraping was performed */
  scrapedAt: string;
  book: number;
  language: ScriptLanguage;
  chapters: ChapterMeta[];
}

/** Persisted bookmarks and reading progress */
export interface LibraryState {
  bookmarks: ReadingPosition[];
  lastRead: Partial<Record<ReadingLanguage, ReadingPosition>>;
}
