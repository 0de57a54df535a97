/**
 * Read a sloka in the terminal, with bookmarks and reading progress
 *
 * Usage: npm run read -- <kanda> <sarga> <sloka> [options]
 * Example: npm run read -- 1 1 18 --lang te --bookmark
 *
 * Options:
 *   --lang en|te|tg     Language of the explanation (default: en)
 *   --script te|dv      Script of the verse text (default: te)
 *   --bookmark          Toggle the bookmark on this sloka
 *   --bookmarks         List bookmarked slokas
 *   --resume            Show where reading stopped
 *   --library <file>    Bookmark and progress file (default: output/library.json)
 *   --chapters <dir>    Sargas saved by scrape, read before fetching (default: output/chapters)
 */

import { ChapterCache, TranslationCache, translateExplanation, type TranslationProvider } from "./cache.js";
import { ChapterNotFoundError, FetchError } from "./errors.js";
import { loadChapter, type PageFetcher } from "./fetcher.js";
import { DEFAULT_LIBRARY_FILE, Library } from "./library.js";
import { formatPosition, nextPosition, previousPosition, readerPath } from "./navigation.js";
import { CHAPTERS_DIR } from "./scrape.js";
import { formatVerseNumber } from "./segment.js";
import type { ReadingLanguage, ReadingPosition, ScriptLanguage, VerseRecord } from "./types.js";
import { READING_LANGUAGES, SCRIPT_LANGUAGES } from "./types.js";
import {
  getChoiceArg,
  getPositionalArgs,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
} from "./utils.js";

/** Flags that take values, used for positional argument detection */
const READER_VALUE_FLAGS = ["--lang", "--script", "--library", "--chapters"];

export interface ReaderOptions {
  /** Requested position, null when positional arguments are missing or invalid */
  position: ReadingPosition | null;
  language: ReadingLanguage;
  script: ScriptLanguage;
  toggleBookmark: boolean;
  listBookmarks: boolean;
  resume: boolean;
  libraryFile: string;
  chaptersDir: string;
  showHelp: boolean;
}

/**
 * Print usage information for the read command.
 */
function showUsage(): void {
  console.log("Usage: npm run read -- <kanda> <sarga> <sloka> [options]");
  console.log("");
  console.log("Show a sloka with its meaning and word-by-word gloss.");
  console.log("");
  console.log("Options:");
  console.log("  --lang en|te|tg      Language of the explanation (default: en)");
  console.log("  --script te|dv       Script of the verse text (default: te)");
  console.log("  --bookmark           Toggle the bookmark on this sloka");
  console.log("  --bookmarks          List bookmarked slokas");
  console.log("  --resume             Show where reading stopped");
  console.log(`  --library <file>     Bookmark and progress file (default: ${DEFAULT_LIBRARY_FILE})`);
  console.log(`  --chapters <dir>     Sargas saved by scrape, read before fetching (default: ${CHAPTERS_DIR})`);
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run read -- 1 1 18 --lang te");
}

/**
 * Parse the three positional numbers of a reading position.
 *
 * @returns The position, or null unless there are three positive integers
 */
export function parsePosition(values: string[]): ReadingPosition | null {
  if (values.length !== 3 || !values.every((value) => /^\d+$/.test(value))) {
    return null;
  }
  const [book, chapter, verse] = values.map((value) => parseInt(value, 10));
  if (book < 1 || chapter < 1 || verse < 1) {
    return null;
  }
  return { book, chapter, verse };
}

/**
 * Parse command line arguments for the read command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): ReaderOptions {
  return {
    position: parsePosition(getPositionalArgs(args, READER_VALUE_FLAGS)),
    language: getChoiceArg(args, "--lang", READING_LANGUAGES, "en"),
    script: getChoiceArg(args, "--script", SCRIPT_LANGUAGES, "te"),
    toggleBookmark: hasFlag(args, "--bookmark"),
    listBookmarks: hasFlag(args, "--bookmarks"),
    resume: hasFlag(args, "--resume"),
    libraryFile: getStringArg(args, "--library", DEFAULT_LIBRARY_FILE),
    chaptersDir: getStringArg(args, "--chapters", CHAPTERS_DIR),
    showHelp: hasHelpFlag(args),
  };
}

/** Everything shown for one sloka */
export interface VerseView {
  position: ReadingPosition;
  record: VerseRecord;
  explanation: string;
  bookmarked: boolean;
  previous: ReadingPosition | null;
  next: ReadingPosition;
}

export interface ReadContext {
  library: Library;
  chapters: ChapterCache;
  translations: TranslationCache;
  fetchPage?: PageFetcher;
  translate?: TranslationProvider;
  /** Directory of sargas saved by scrape */
  snapshotDir?: string;
}

/**
 * Load a sloka, record it as the last one read and resolve its neighbours.
 *
 * @returns The view, or null if the sarga has fewer slokas than requested
 * @throws {ChapterNotFoundError} If the sarga does not exist
 * @throws {FetchError} If the sarga could not be fetched
 */
export async function readVerse(
  position: ReadingPosition,
  language: ReadingLanguage,
  script: ScriptLanguage,
  context: ReadContext,
): Promise<VerseView | null> {
  const { library, chapters, translations, fetchPage, translate, snapshotDir } = context;
  const chapter = await loadChapter(
    { book: position.book, chapter: position.chapter, language: script },
    { cache: chapters, fetchPage, snapshotDir },
  );

  if (position.verse > chapter.length()) {
    return null;
  }

  const record = chapter.get(position.verse - 1);
  const explanation = await translateExplanation(record.explanation, language, {
    cache: translations,
    provider: translate,
  });

  const previous = await previousPosition(position, async (book, previousChapter) => {
    try {
      const loaded = await loadChapter(
        { book, chapter: previousChapter, language: script },
        { cache: chapters, fetchPage, snapshotDir },
      );
      return loaded.length();
    } catch (error) {
      if (error instanceof ChapterNotFoundError || error instanceof FetchError) return null;
      throw error;
    }
  });

  library.markRead(language, position);

  return {
    position,
    record,
    explanation,
    bookmarked: library.isBookmarked(position),
    previous,
    next: nextPosition(position, chapter.length()),
  };
}

/**
 * Format a sloka view for the terminal.
 */
export function formatVerseView(view: VerseView, language: ReadingLanguage): string {
  const { record } = view;
  const lines: string[] = [];

  const heading = record.numberText ?? formatVerseNumber(view.position);
  lines.push(view.bookmarked ? `${heading} [bookmarked]` : heading);
  lines.push("");
  lines.push(...record.lines);

  if (view.explanation) {
    lines.push("");
    lines.push(view.explanation);
  }

  if (record.glossary.size > 0) {
    lines.push("");
    for (const [word, meaning] of record.glossary) {
      lines.push(`  ${word}: ${meaning}`);
    }
  }

  lines.push("");
  lines.push(`Previous: ${view.previous ? readerPath(language, view.previous) : "-"}`);
  lines.push(`Next:     ${readerPath(language, view.next)}`);

  return lines.join("\n");
}

/**
 * Format the bookmark list.
 */
export function formatBookmarks(bookmarks: ReadingPosition[], language: ReadingLanguage): string {
  if (bookmarks.length === 0) {
    return "No bookmarks yet";
  }
  return bookmarks.map((position) => `${formatPosition(position)}  ${readerPath(language, position)}`).join("\n");
}

/**
 * Main entry point for the reader.
 *
 * @throws Exits with code 1 on invalid arguments, missing slokas or fetch failures
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const library = await Library.load(options.libraryFile);

  // Keep bookmarks and progress when interrupted mid-fetch
  onInterrupt(() => library.save());

  if (options.listBookmarks) {
    console.log(formatBookmarks(library.listBookmarks(), options.language));
    return;
  }

  if (options.resume) {
    const last = library.lastRead(options.language);
    console.log(
      last ? `Continue reading: ${formatPosition(last)}  ${readerPath(options.language, last)}` : "No reading history yet",
    );
    return;
  }

  const { position } = options;
  if (!position) {
    showUsage();
    process.exit(1);
  }

  const context: ReadContext = {
    library,
    chapters: new ChapterCache(),
    translations: new TranslationCache(),
    snapshotDir: options.chaptersDir,
  };

  let exitCode = 0;
  try {
    const view = await readVerse(position, options.language, options.script, context);
    if (view) {
      // Only slokas that exist can be bookmarked
      if (options.toggleBookmark) {
        view.bookmarked = library.toggleBookmark(position);
        console.log(view.bookmarked ? "Bookmark added." : "Bookmark removed.");
      }
      console.log(formatVerseView(view, options.language));
    } else {
      console.error(`Error: ${formatPosition(position)} not found.`);
      exitCode = 1;
    }
  } catch (error) {
    if (!(error instanceof ChapterNotFoundError || error instanceof FetchError)) {
      throw error;
    }
    console.error(`Error: ${error.message}`);
    exitCode = 1;
  } finally {
    await library.save();
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Reading");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
