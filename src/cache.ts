/**
 * Explicit caches for parsed chapters and translated explanations.
 * Callers own the cache objects and pass them to the functions that use them.
 */

import type { Chapter } from "./chapter.js";
import type { ChapterKey, ReadingLanguage } from "./types.js";

/** Default number of chapters kept in memory */
export const DEFAULT_CHAPTER_CAPACITY = 128;

/** Default number of translated explanations kept in memory */
export const DEFAULT_TRANSLATION_CAPACITY = 4096;

/**
 * Map with a fixed capacity that evicts the least recently used entry.
 * Both get() and set() count as a use.
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, { value: V }>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    // Re-insert to move the entry to the most recent end
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): this {
    this.entries.delete(key);
    this.entries.set(key, { value });
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    return this;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): K[] {
    return [...this.entries.keys()];
  }
}

/**
 * Build the cache key for a chapter.
 *
 * @example
 * chapterCacheKey({ book: 1, chapter: 2, language: 'te' }) // '1:2:te'
 */
export function chapterCacheKey(key: ChapterKey): string {
  return `${key.book}:${key.chapter}:${key.language}`;
}

/** Parsed chapters keyed by (book, chapter, language) */
export class ChapterCache {
  private readonly cache: LruCache<string, Chapter>;

  constructor(capacity = DEFAULT_CHAPTER_CAPACITY) {
    this.cache = new LruCache(capacity);
  }

  get size(): number {
    return this.cache.size;
  }

  get(key: ChapterKey): Chapter | undefined {
    return this.cache.get(chapterCacheKey(key));
  }

  set(chapter: Chapter): void {
    this.cache.set(chapterCacheKey(chapter.key), chapter);
  }

  clear(): void {
    this.cache.clear();
  }
}

/** Translated explanations keyed by (language, source text) */
export class TranslationCache {
  private readonly cache: LruCache<string, string>;

  constructor(capacity = DEFAULT_TRANSLATION_CAPACITY) {
    this.cache = new LruCache(capacity);
  }

  get size(): number {
    return this.cache.size;
  }

  get(language: ReadingLanguage, sourceText: string): string | undefined {
    return this.cache.get(translationCacheKey(language, sourceText));
  }

  set(language: ReadingLanguage, sourceText: string, translated: string): void {
    this.cache.set(translationCacheKey(language, sourceText), translated);
  }
}

/**
 * Build the cache key for a translation.
 * The language code never contains a newline, so the split is unambiguous.
 */
export function translationCacheKey(language: ReadingLanguage, sourceText: string): string {
  return `${language}\n${sourceText}`;
}

/** Computes a translation of English text into a reading language */
export type TranslationProvider = (sourceText: string, language: ReadingLanguage) => Promise<string>;

export interface TranslateOptions {
  cache: TranslationCache;
  /** Without a provider, uncached text is returned untranslated */
  provider?: TranslationProvider;
}

/**
 * Get an explanation in the reading language: from the cache when present,
 * otherwise from the provider (and cached), otherwise the English text.
 *
 * @throws Whatever the provider throws; failures are not cached
 */
export async function translateExplanation(
  sourceText: string,
  language: ReadingLanguage,
  { cache, provider }: TranslateOptions,
): Promise<string> {
  if (language === "en" || !sourceText) return sourceText;

  const cached = cache.get(language, sourceText);
  if (cached !== undefined) return cached;

  if (!provider) return sourceText;

  const translated = await provider(sourceText, language);
  cache.set(language, sourceText, translated);
  return translated;
}
