/**
 * Utility functions for the command-line tools
 * Extracted for testability
 */

import type { BlockSection, ChapterMeta, ScriptLanguage } from "./types.js";
import { SCRIPT_LANGUAGES } from "./types.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Scraping", "Merge")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error(`Cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Generate a markdown anchor from a heading title.
 * Matches the anchor generation used by GitHub/CommonMark style processors.
 *
 * @param title - Heading title to convert to anchor
 * @returns Anchor ID suitable for markdown links
 *
 * @example
 * generateAnchor('Kanda 1 Sarga 2') // 'kanda-1-sarga-2'
 * generateAnchor('బాలకాండ 1') // 'బాలకాండ-1'
 */
export function generateAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/ /g, "-")
    // Keep letters and marks of any script, digits, and hyphens
    .replace(/[^\p{L}\p{M}\p{N}-]/gu, "")
    .replace(/^-+|-+$/g, "");
}

/**
 * Zero-padded markdown filename for an exported sarga.
 *
 * @example
 * chapterFilename(1, 7) // '1-007.md'
 */
export function chapterFilename(book: number, chapter: number): string {
  return `${book}-${String(chapter).padStart(3, "0")}.md`;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--name')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--source')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      return args[i + 1];
    }
  }
  return null;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get a nullable number argument value from command line arguments.
 *
 * @returns The parsed number or null if the flag is absent or not numeric
 */
export function getNullableNumberArg(args: string[], flag: string): number | null {
  const value = getNullableStringArg(args, flag);
  if (value === null) return null;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? null : parsed;
}

/**
 * Get a string argument restricted to a set of choices.
 * Values outside the set fall back to the default.
 *
 * @example
 * getChoiceArg(['--lang', 'dv'], '--lang', ['te', 'dv'], 'te') // 'dv'
 * getChoiceArg(['--lang', 'xx'], '--lang', ['te', 'dv'], 'te') // 'te'
 */
export function getChoiceArg<T extends string>(args: string[], flag: string, choices: readonly T[], defaultValue: T): T {
  const value = getNullableStringArg(args, flag);
  return choices.find((choice) => choice === value) ?? defaultValue;
}

/**
 * Get all positional (non-flag) arguments.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns Non-flag arguments in order
 */
export function getPositionalArgs(args: string[], knownFlags: string[] = []): string[] {
  const positional: string[] = [];
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }
  return positional;
}

/**
 * Parse a script language code.
 *
 * @returns The language, or null if the code is not supported
 */
export function parseScriptLanguage(value: string): ScriptLanguage | null {
  return SCRIPT_LANGUAGES.find((language) => language === value) ?? null;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}

/** Result of meta.json validation */
export interface MetaValidationResult {
  isValid: boolean;
  error?: string;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

/**
 * Validate the structure of meta.json content.
 * Checks that all required fields exist and have correct types.
 *
 * @param data - Parsed JSON data to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateExportMeta({ scrapedAt: '...', book: 1, language: 'te', chapters: [] }) // { isValid: true }
 * validateExportMeta({ book: 1 }) // { isValid: false, error: 'Missing or invalid field: scrapedAt (expected string)' }
 */
export function validateExportMeta(data: unknown): MetaValidationResult {
  if (!data || typeof data !== "object") {
    return { isValid: false, error: "meta.json must be an object" };
  }

  const meta = data as Record<string, unknown>;

  if (typeof meta.scrapedAt !== "string") {
    return { isValid: false, error: "Missing or invalid field: scrapedAt (expected string)" };
  }

  if (!isPositiveInteger(meta.book)) {
    return { isValid: false, error: "Missing or invalid field: book (expected positive integer)" };
  }

  if (typeof meta.language !== "string" || parseScriptLanguage(meta.language) === null) {
    return { isValid: false, error: `Missing or invalid field: language (expected ${SCRIPT_LANGUAGES.join(" or ")})` };
  }

  if (!Array.isArray(meta.chapters)) {
    return { isValid: false, error: "Missing or invalid field: chapters (expected array)" };
  }

  for (let i = 0; i < meta.chapters.length; i++) {
    const chapter = meta.chapters[i] as Record<string, unknown>;
    if (!chapter || typeof chapter !== "object") {
      return { isValid: false, error: `chapters[${i}] must be an object` };
    }

    if (!isPositiveInteger(chapter.book)) {
      return { isValid: false, error: `chapters[${i}].book must be a positive integer` };
    }

    if (!isPositiveInteger(chapter.chapter)) {
      return { isValid: false, error: `chapters[${i}].chapter must be a positive integer` };
    }

    if (typeof chapter.verseCount !== "number") {
      return { isValid: false, error: `chapters[${i}].verseCount must be a number` };
    }

    if (typeof chapter.url !== "string") {
      return { isValid: false, error: `chapters[${i}].url must be a string` };
    }

    if (typeof chapter.filename !== "string") {
      return { isValid: false, error: `chapters[${i}].filename must be a string` };
    }
  }

  return { isValid: true };
}

const BLOCK_SECTIONS: readonly BlockSection[] = ["body", "gloss", "explanation"];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isVerseIssue(value: unknown): boolean {
  if (!value || typeof value !== "object") return false;
  const issue = value as Record<string, unknown>;
  if (issue.kind === "MissingVerseNumber") return true;
  return (
    issue.kind === "MalformedBlock" &&
    isStringArray(issue.missing) &&
    issue.missing.every((section) => (BLOCK_SECTIONS as readonly string[]).includes(section))
  );
}

/**
 * Validate the structure of a saved chapter (output/chapters/*.json).
 *
 * @example
 * validateChapterSnapshot({ book: 1, chapter: 2, language: 'te', verses: [] }) // { isValid: true }
 * validateChapterSnapshot({ book: 1, chapter: 2, language: 'te' }) // { isValid: false, error: 'Missing or invalid field: verses (expected array)' }
 */
export function validateChapterSnapshot(data: unknown): MetaValidationResult {
  if (!data || typeof data !== "object") {
    return { isValid: false, error: "chapter file must be an object" };
  }

  const snapshot = data as Record<string, unknown>;

  if (!isPositiveInteger(snapshot.book)) {
    return { isValid: false, error: "Missing or invalid field: book (expected positive integer)" };
  }

  if (!isPositiveInteger(snapshot.chapter)) {
    return { isValid: false, error: "Missing or invalid field: chapter (expected positive integer)" };
  }

  if (typeof snapshot.language !== "string" || parseScriptLanguage(snapshot.language) === null) {
    return { isValid: false, error: `Missing or invalid field: language (expected ${SCRIPT_LANGUAGES.join(" or ")})` };
  }

  if (!Array.isArray(snapshot.verses)) {
    return { isValid: false, error: "Missing or invalid field: verses (expected array)" };
  }

  for (let i = 0; i < snapshot.verses.length; i++) {
    const verse = snapshot.verses[i] as Record<string, unknown>;
    if (!verse || typeof verse !== "object") {
      return { isValid: false, error: `verses[${i}] must be an object` };
    }

    if (!isPositiveInteger(verse.position)) {
      return { isValid: false, error: `verses[${i}].position must be a positive integer` };
    }

    if (verse.numberText !== null && typeof verse.numberText !== "string") {
      return { isValid: false, error: `verses[${i}].numberText must be a string or null` };
    }

    if (!isStringArray(verse.lines)) {
      return { isValid: false, error: `verses[${i}].lines must be an array of strings` };
    }

    if (
      !Array.isArray(verse.glossary) ||
      !verse.glossary.every((pair) => isStringArray(pair) && pair.length === 2)
    ) {
      return { isValid: false, error: `verses[${i}].glossary must be an array of [word, meaning] pairs` };
    }

    if (typeof verse.explanation !== "string") {
      return { isValid: false, error: `verses[${i}].explanation must be a string` };
    }

    if (!Array.isArray(verse.issues) || !verse.issues.every(isVerseIssue)) {
      return { isValid: false, error: `verses[${i}].issues must be an array of verse issues` };
    }
  }

  return { isValid: true };
}

/**
 * Whether an fs error means the file does not exist.
 */
export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Sum verse counts over exported chapters.
 */
export function countVerses(chapters: ChapterMeta[]): number {
  return chapters.reduce((total, chapter) => total + chapter.verseCount, 0);
}
