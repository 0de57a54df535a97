/**
 * Fetching sarga pages and loading them as parsed chapters
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ChapterCache } from "./cache.js";
import { type Chapter, fromChapterSnapshot, parseChapter } from "./chapter.js";
import { ChapterNotFoundError, FetchError } from "./errors.js";
import type { ChapterKey, ChapterSnapshot } from "./types.js";
import { chapterFilename, delay, isMissingFile, validateChapterSnapshot } from "./utils.js";

/** Listing page serving one sarga per query */
export const DEFAULT_SOURCE_URL = "https://www.valmiki.iitk.ac.in/sloka";

const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY = 1000; // ms, doubled on every further attempt
const REQUEST_TIMEOUT = 30000;

/** fetch-compatible function, injectable for tests */
export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export interface RetryOptions {
  /** Extra attempts after the first one */
  retries?: number;
  /** Delay before the first retry (ms) */
  retryDelay?: number;
  fetchImpl?: FetchFunction;
}

/**
 * Build the listing URL for a sarga.
 *
 * @example
 * buildChapterUrl({ book: 1, chapter: 2, language: 'te' })
 * // 'https://www.valmiki.iitk.ac.in/sloka?field_kanda_tid=1&language=te&field_sarga_value=2'
 */
export function buildChapterUrl(key: ChapterKey, source: string = DEFAULT_SOURCE_URL): string {
  return `${source}?field_kanda_tid=${key.book}&language=${key.language}&field_sarga_value=${key.chapter}`;
}

/**
 * Fetch a URL, retrying network errors and 5xx responses with exponential backoff.
 * Other responses (including 4xx) are returned as they are.
 *
 * @throws {FetchError} When every attempt fails with a network error
 */
export async function fetchWithRetry(url: string, options: RetryOptions = {}): Promise<Response> {
  const { retries = DEFAULT_RETRIES, retryDelay = DEFAULT_RETRY_DELAY, fetchImpl = fetch } = options;

  let lastError: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) {
      await delay(retryDelay * 2 ** (attempt - 1));
    }

    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT) });
      if (response.status < 500 || attempt === retries) {
        return response;
      }
    } catch (error) {
      lastError = error;
    }
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new FetchError(`Request failed: ${reason}`, url, undefined, lastError);
}

/** Returns the raw HTML of a sarga page */
export type PageFetcher = (key: ChapterKey) => Promise<string>;

/**
 * Fetch the raw HTML of a sarga page.
 *
 * @throws {ChapterNotFoundError} On 404
 * @throws {FetchError} On any other failure
 */
export async function fetchChapterHtml(
  key: ChapterKey,
  source: string = DEFAULT_SOURCE_URL,
  options: RetryOptions = {},
): Promise<string> {
  const url = buildChapterUrl(key, source);
  const response = await fetchWithRetry(url, options);

  if (response.status === 404) {
    throw new ChapterNotFoundError(key);
  }
  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), url, response.status);
  }
  return await response.text();
}

/**
 * Path of the JSON file the scrape command writes for a sarga.
 *
 * @example
 * chapterSnapshotPath({ book: 1, chapter: 7, language: 'te' }, 'output/chapters') // 'output/chapters/1-007.json'
 */
export function chapterSnapshotPath(key: ChapterKey, dir: string): string {
  return path.join(dir, chapterFilename(key.book, key.chapter).replace(/\.md$/, ".json"));
}

/**
 * Read a sarga saved by the scrape command.
 *
 * @param dir - Directory holding the saved chapters
 * @returns The chapter, or null when no file exists for this sarga in this script
 * @throws {Error} If the file is not a valid chapter snapshot
 */
export async function readChapterSnapshot(key: ChapterKey, dir: string): Promise<Chapter | null> {
  const file = chapterSnapshotPath(key, dir);

  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  const data: unknown = JSON.parse(content);
  const validation = validateChapterSnapshot(data);
  if (!validation.isValid) {
    throw new Error(`Invalid ${file}: ${validation.error}`);
  }

  const snapshot = data as ChapterSnapshot;
  // Files are named by kanda and sarga only; another script's scrape may have written this one
  if (snapshot.book !== key.book || snapshot.chapter !== key.chapter || snapshot.language !== key.language) {
    return null;
  }
  return fromChapterSnapshot(snapshot);
}

export interface LoadChapterOptions {
  cache?: ChapterCache;
  fetchPage?: PageFetcher;
  /** Directory of chapters saved by the scrape command, read before fetching */
  snapshotDir?: string;
}

/**
 * Load a parsed chapter: from the cache when present, then from a saved
 * snapshot when snapshotDir is given, otherwise by fetching and parsing its
 * page. Loaded chapters are added to the cache.
 *
 * @throws {ChapterNotFoundError} If the page does not exist or holds no verses
 * @throws {FetchError} If the page could not be fetched
 */
export async function loadChapter(key: ChapterKey, options: LoadChapterOptions = {}): Promise<Chapter> {
  const { cache, fetchPage = (k: ChapterKey) => fetchChapterHtml(k), snapshotDir } = options;

  const cached = cache?.get(key);
  if (cached) return cached;

  let chapter = snapshotDir ? await readChapterSnapshot(key, snapshotDir) : null;
  if (!chapter) {
    const html = await fetchPage(key);
    chapter = parseChapter(html, key.book, key.chapter, key.language);
  }
  if (chapter.length() === 0) {
    throw new ChapterNotFoundError(key);
  }

  cache?.set(chapter);
  return chapter;
}
