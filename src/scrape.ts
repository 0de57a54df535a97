/**
 * Scrape the sargas of a kanda into markdown and JSON
 *
 * Usage: npm run scrape -- --book <k> [options]
 * Example: npm run scrape -- --book 1 --from 1 --to 5 --lang te
 *
 * Options:
 *   --book <k>          Kanda to scrape (required)
 *   --from <s>          First sarga (default: 1)
 *   --to <s>            Last sarga (default: until a sarga is not found)
 *   --lang te|dv        Script of the verse text (default: te)
 *   --delay ms          Delay between sargas (default: 1000)
 *   --source <url>      Listing page URL
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type Chapter, toChapterSnapshot } from "./chapter.js";
import { ChapterNotFoundError } from "./errors.js";
import {
  buildChapterUrl,
  chapterSnapshotPath,
  DEFAULT_SOURCE_URL,
  fetchChapterHtml,
  loadChapter,
  type PageFetcher,
} from "./fetcher.js";
import type { ChapterKey, ChapterMeta, ExportMeta, ScriptLanguage, VerseRecord } from "./types.js";
import { SCRIPT_LANGUAGES } from "./types.js";
import {
  chapterFilename,
  countVerses,
  delay,
  getChoiceArg,
  getNullableNumberArg,
  getNullableStringArg,
  getNumberArg,
  hasHelpFlag,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

export const OUTPUT_DIR = "output";
export const CHAPTERS_DIR = path.join(OUTPUT_DIR, "chapters");
export const META_FILE = path.join(OUTPUT_DIR, "meta.json");

const DEFAULT_CHAPTER_DELAY = 1000; // Delay between sargas (+ random 0-500ms)

// No kanda has more sargas than this
const MAX_CHAPTER = 300;

/** Configuration options for the scraper */
export interface ScraperOptions {
  /** Kanda to scrape, null when missing */
  book: number | null;
  /** First sarga */
  from: number;
  /** Last sarga, null to continue until one is not found */
  to: number | null;
  language: ScriptLanguage;
  /** Delay between scraping sargas (ms) */
  chapterDelay: number;
  source: string;
  /** Whether to show help and exit */
  showHelp: boolean;
}

/**
 * Print usage information for the scrape command.
 */
function showUsage(): void {
  console.log("Usage: npm run scrape -- --book <k> [options]");
  console.log("");
  console.log("Scrape the sargas of a kanda into markdown and JSON.");
  console.log("");
  console.log("Options:");
  console.log("  --book <k>           Kanda to scrape (required)");
  console.log("  --from <s>           First sarga (default: 1)");
  console.log("  --to <s>             Last sarga (default: until a sarga is not found)");
  console.log("  --lang te|dv         Script of the verse text (default: te)");
  console.log("  --delay <ms>         Delay between sargas (default: 1000)");
  console.log(`  --source <url>       Listing page URL (default: ${DEFAULT_SOURCE_URL})`);
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run scrape -- --book 1 --from 1 --to 5");
}

/**
 * Parse command line arguments for the scrape command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed scraper options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): ScraperOptions {
  return {
    book: getNullableNumberArg(args, "--book"),
    from: getNumberArg(args, "--from", 1),
    to: getNullableNumberArg(args, "--to"),
    language: getChoiceArg(args, "--lang", SCRIPT_LANGUAGES, "te"),
    chapterDelay: getNumberArg(args, "--delay", DEFAULT_CHAPTER_DELAY),
    source: getNullableStringArg(args, "--source") ?? DEFAULT_SOURCE_URL,
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Title of a sarga as used in headings and the table of contents.
 *
 * @example
 * chapterTitle(1, 2) // 'Kanda 1 Sarga 2'
 */
export function chapterTitle(book: number, chapter: number): string {
  return `Kanda ${book} Sarga ${chapter}`;
}

function verseHeading(record: VerseRecord): string {
  return record.numberText ?? `Sloka ${record.position}`;
}

/**
 * Render one verse as markdown: the verse as a block quote, then the
 * explanation, then the word-by-word glossary.
 */
export function renderVerseMarkdown(record: VerseRecord): string {
  const parts: string[] = [`## ${verseHeading(record)}`];

  if (record.lines.length > 0) {
    parts.push(record.lines.map((line) => `> ${line}`).join("  \n"));
  }
  if (record.explanation) {
    parts.push(record.explanation);
  }
  if (record.glossary.size > 0) {
    parts.push([...record.glossary].map(([word, meaning]) => `- **${word}**: ${meaning}`).join("\n"));
  }

  return parts.join("\n\n");
}

/**
 * Render a whole sarga as a markdown document.
 */
export function renderChapterMarkdown(chapter: Chapter): string {
  const parts = [`# ${chapterTitle(chapter.book, chapter.chapter)}`];
  for (const record of chapter) {
    parts.push(renderVerseMarkdown(record));
  }
  return `${parts.join("\n\n")}\n`;
}

/**
 * Fetch one sarga and write its markdown and JSON files.
 *
 * @throws {ChapterNotFoundError} If the sarga does not exist
 * @throws {FetchError} If the page could not be fetched
 */
export async function scrapeChapter(key: ChapterKey, source: string, fetchPage: PageFetcher): Promise<ChapterMeta> {
  const chapter = await loadChapter(key, { fetchPage });

  const filename = chapterFilename(key.book, key.chapter);
  await fs.writeFile(path.join(CHAPTERS_DIR, filename), renderChapterMarkdown(chapter), "utf-8");
  await fs.writeFile(
    chapterSnapshotPath(key, CHAPTERS_DIR),
    JSON.stringify(toChapterSnapshot(chapter), null, 2),
    "utf-8",
  );

  return {
    book: key.book,
    chapter: key.chapter,
    verseCount: chapter.length(),
    url: buildChapterUrl(key, source),
    filename,
  };
}

/** Result of a sarga scrape attempt */
export type ChapterResult =
  | { success: true; chapter: ChapterMeta }
  | { success: false; error: { chapter: number; url: string; message: string } };

/**
 * Scrape sargas in order until the range ends or a sarga is not found.
 * Fetch failures are recorded and do not stop the run.
 */
export async function scrapeChapters(
  options: Pick<ScraperOptions, "from" | "to" | "language" | "chapterDelay" | "source"> & { book: number },
  fetchPage: PageFetcher,
): Promise<ChapterResult[]> {
  const { book, from, language, chapterDelay, source } = options;
  const last = options.to ?? MAX_CHAPTER;
  const total = options.to === null ? undefined : last - from + 1;
  const results: ChapterResult[] = [];

  for (let chapter = from; chapter <= last; chapter++) {
    const key: ChapterKey = { book, chapter, language };
    const title = chapterTitle(book, chapter);
    const index = chapter - from;

    try {
      const meta = await scrapeChapter(key, source, fetchPage);
      results.push({ success: true, chapter: meta });
      if (total) {
        progressBar(index + 1, total, `${title} (${meta.verseCount} slokas)`);
      } else {
        console.log(`  [${index + 1}] ${title}: ${meta.verseCount} slokas`);
      }
    } catch (error) {
      if (error instanceof ChapterNotFoundError) {
        if (total) process.stdout.write("\n");
        console.log(`${title} not found, stopping.`);
        break;
      }
      const message = error instanceof Error ? error.message : String(error);
      results.push({ success: false, error: { chapter, url: buildChapterUrl(key, source), message } });
      if (total) {
        progressBar(index + 1, total, `FAILED: ${title}`);
      } else {
        console.log(`  [${index + 1}] FAILED: ${title}`);
      }
    }

    if (chapter < last) {
      await delay(chapterDelay + Math.random() * 500);
    }
  }

  return results;
}

/**
 * Print scrape summary and return exit code.
 */
function printScrapeSummary(chapters: ChapterMeta[], failedCount: number): number {
  console.log(`\nDone! Scraped ${chapters.length} sargas, ${countVerses(chapters)} slokas.`);
  return failedCount > 0 ? 1 : 0;
}

/**
 * Main entry point for the scraper.
 * Fetches each sarga of the range and writes chapters plus meta.json.
 *
 * @throws Exits with code 1 if arguments are invalid or any sarga failed
 */
export async function main(): Promise<void> {
  const options = parseArgs();
  const { book, from, to, language, source, showHelp } = options;

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  if (book === null || book < 1 || from < 1 || (to !== null && to < from)) {
    showUsage();
    process.exit(1);
  }

  const urlValidation = validateUrl(source);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(1);
  }

  await fs.mkdir(CHAPTERS_DIR, { recursive: true });

  const meta: ExportMeta = {
    scrapedAt: new Date().toISOString(),
    book,
    language,
    chapters: [],
  };

  console.log(`Scraping kanda ${book} from sarga ${from}${to === null ? "" : ` to ${to}`} (${language})...\n`);
  const results = await scrapeChapters({ ...options, book }, (key) => fetchChapterHtml(key, source));

  for (const result of results) {
    if (result.success) {
      meta.chapters.push(result.chapter);
    }
  }
  const failedChapters = results.flatMap((r) => (r.success ? [] : [r.error]));

  await fs.writeFile(META_FILE, JSON.stringify(meta, null, 2), "utf-8");
  console.log(`\nSaved metadata to ${META_FILE}`);

  const exitCode = printScrapeSummary(meta.chapters, failedChapters.length);

  if (failedChapters.length > 0) {
    console.log(`\nFailed sargas (${failedChapters.length}):`);
    for (const { chapter, message } of failedChapters) {
      console.log(`  [${chapter}] ${message}`);
    }
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Scraping");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
