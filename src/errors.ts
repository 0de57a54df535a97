/**
 * Error classes surfaced to callers.
 * Per-verse problems are not errors: they are recorded as VerseIssue on the record.
 */

import type { ChapterKey } from "./types.js";

/** Positional access outside [0, length) */
export class IndexOutOfRangeError extends Error {
  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super(
      length === 0
        ? `Verse index ${index} out of range (chapter is empty)`
        : `Verse index ${index} out of range (0-${length - 1})`,
    );
    this.name = "IndexOutOfRangeError";
  }
}

/** The requested sarga does not exist (404, or a page with no verses) */
export class ChapterNotFoundError extends Error {
  constructor(public readonly key: ChapterKey) {
    super(`Sarga ${key.book}.${key.chapter} (${key.language}) not found`);
    this.name = "ChapterNotFoundError";
  }
}

/** Transient or unexpected failure while fetching a page */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "FetchError";
  }
}
