/**
 * Bookmarks and reading progress, persisted to library.json
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { comparePositions } from "./navigation.js";
import { READING_LANGUAGES, type LibraryState, type ReadingLanguage, type ReadingPosition } from "./types.js";
import { isMissingFile } from "./utils.js";

export const DEFAULT_LIBRARY_FILE = path.join("output", "library.json");

/** Result of library.json validation */
export type LibraryValidationResult = { isValid: true } | { isValid: false; error: string };

function isPosition(value: unknown): value is ReadingPosition {
  if (!value || typeof value !== "object") return false;
  const { book, chapter, verse } = value as Record<string, unknown>;
  return [book, chapter, verse].every((n) => typeof n === "number" && Number.isInteger(n) && n >= 1);
}

function isReadingLanguage(value: string): value is ReadingLanguage {
  return (READING_LANGUAGES as readonly string[]).includes(value);
}

/**
 * Validate the structure of library.json content.
 *
 * @example
 * validateLibraryState({ bookmarks: [], lastRead: {} }) // { isValid: true }
 * validateLibraryState({ lastRead: {} }) // { isValid: false, error: 'Missing or invalid field: bookmarks (expected array)' }
 */
export function validateLibraryState(data: unknown): LibraryValidationResult {
  if (!data || typeof data !== "object") {
    return { isValid: false, error: "library.json must be an object" };
  }

  const state = data as Record<string, unknown>;

  if (!Array.isArray(state.bookmarks)) {
    return { isValid: false, error: "Missing or invalid field: bookmarks (expected array)" };
  }
  for (let i = 0; i < state.bookmarks.length; i++) {
    if (!isPosition(state.bookmarks[i])) {
      return { isValid: false, error: `bookmarks[${i}] must have positive integer book, chapter and verse` };
    }
  }

  if (!state.lastRead || typeof state.lastRead !== "object" || Array.isArray(state.lastRead)) {
    return { isValid: false, error: "Missing or invalid field: lastRead (expected object)" };
  }
  for (const [language, position] of Object.entries(state.lastRead)) {
    if (!isReadingLanguage(language)) {
      return { isValid: false, error: `lastRead has unknown language: ${language}` };
    }
    if (!isPosition(position)) {
      return { isValid: false, error: `lastRead.${language} must have positive integer book, chapter and verse` };
    }
  }

  return { isValid: true };
}

function positionKey({ book, chapter, verse }: ReadingPosition): string {
  return `${book}.${chapter}.${verse}`;
}

function copyPosition({ book, chapter, verse }: ReadingPosition): ReadingPosition {
  return { book, chapter, verse };
}

/**
 * Bookmarked verses and the last position read in each reading language.
 * Changes stay in memory until save() is called.
 */
export class Library {
  private readonly bookmarks = new Map<string, ReadingPosition>();
  private readonly progress = new Map<ReadingLanguage, ReadingPosition>();

  constructor(
    readonly file: string = DEFAULT_LIBRARY_FILE,
    state?: LibraryState,
  ) {
    for (const position of state?.bookmarks ?? []) {
      this.bookmarks.set(positionKey(position), copyPosition(position));
    }
    for (const language of READING_LANGUAGES) {
      const position = state?.lastRead[language];
      if (position) this.progress.set(language, copyPosition(position));
    }
  }

  /**
   * Load the library from disk. A missing file yields an empty library.
   *
   * @throws {Error} If the file is not valid JSON or fails validation
   */
  static async load(file: string = DEFAULT_LIBRARY_FILE): Promise<Library> {
    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return new Library(file);
      throw error;
    }

    const data: unknown = JSON.parse(content);
    const validation = validateLibraryState(data);
    if (!validation.isValid) {
      throw new Error(`Invalid ${file}: ${validation.error}`);
    }
    return new Library(file, data as LibraryState);
  }

  /**
   * Flip the bookmark on a verse.
   *
   * @returns True if the verse is bookmarked afterwards
   */
  toggleBookmark(position: ReadingPosition): boolean {
    const key = positionKey(position);
    if (this.bookmarks.delete(key)) {
      return false;
    }
    this.bookmarks.set(key, copyPosition(position));
    return true;
  }

  isBookmarked(position: ReadingPosition): boolean {
    return this.bookmarks.has(positionKey(position));
  }

  /** Bookmarks in reading order */
  listBookmarks(): ReadingPosition[] {
    return [...this.bookmarks.values()].map(copyPosition).sort(comparePositions);
  }

  markRead(language: ReadingLanguage, position: ReadingPosition): void {
    this.progress.set(language, copyPosition(position));
  }

  lastRead(language: ReadingLanguage): ReadingPosition | null {
    const position = this.progress.get(language);
    return position ? copyPosition(position) : null;
  }

  toJSON(): LibraryState {
    const lastRead: LibraryState["lastRead"] = {};
    for (const [language, position] of this.progress) {
      lastRead[language] = copyPosition(position);
    }
    return { bookmarks: this.listBookmarks(), lastRead };
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, JSON.stringify(this.toJSON(), null, 2), "utf-8");
  }
}
