/**
 * Merge exported sarga markdown files into a single document
 *
 * Usage: npm run merge [-- --name "Book Title"]
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CHAPTERS_DIR, chapterTitle, META_FILE, OUTPUT_DIR } from "./scrape.js";
import type { ChapterMeta, ExportMeta } from "./types.js";
import { countVerses, generateAnchor, setupSignalHandlers, validateExportMeta } from "./utils.js";

const OUTPUT_FILE = path.join(OUTPUT_DIR, "book.md");

const DEFAULT_NAME = "Valmiki Ramayana";

/**
 * Print usage information for the merge command.
 */
function showUsage(): void {
  console.log('Usage: npm run merge [-- --name "Book Title"]');
  console.log("");
  console.log("Merge scraped sargas into a single markdown document with TOC.");
  console.log("");
  console.log("Options:");
  console.log(`  --name <title>       Title for the document (default: "${DEFAULT_NAME}")`);
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log('  npm run merge -- --name "Bala Kanda"');
}

/**
 * Parse command line arguments for the merge command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed options with document name and help flag
 */
export function parseArgs(args: string[] = process.argv.slice(2)): { name: string; showHelp: boolean } {
  let name = DEFAULT_NAME;
  let showHelp = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--help" || args[i] === "-h") {
      showHelp = true;
    } else if (args[i] === "--name" && args[i + 1]) {
      name = args[i + 1];
      i++;
    }
  }

  return { name, showHelp };
}

/**
 * Demote every heading in a sarga document by one level, so the sarga
 * title becomes a section of the merged document.
 *
 * @param content - Markdown content of one sarga
 * @returns Content with headings one level deeper
 */
export function demoteHeadings(content: string): string {
  return content.replace(/^(#{1,5}) /gm, "#$1 ");
}

/**
 * Generate a table of contents entry for a sarga.
 * Creates a numbered markdown link with proper anchor.
 *
 * @param chapter - Sarga metadata
 * @returns Formatted TOC entry (e.g., '1. [Kanda 1 Sarga 1](#kanda-1-sarga-1) (77 slokas)')
 */
export function generateTocEntry(chapter: ChapterMeta): string {
  const title = chapterTitle(chapter.book, chapter.chapter);
  return `${chapter.chapter}. [${title}](#${generateAnchor(title)}) (${chapter.verseCount} slokas)`;
}

/**
 * Build the front matter of the merged document: title, source details and TOC.
 */
export function buildFrontMatter(name: string, meta: ExportMeta): string[] {
  const parts: string[] = [];

  parts.push(`# ${name}\n`);
  parts.push(`Kanda: ${meta.book}`);
  parts.push(`Script: ${meta.language}`);
  parts.push(`Date: ${new Date(meta.scrapedAt).toLocaleDateString()}`);
  parts.push(`Sargas: ${meta.chapters.length}`);
  parts.push(`Slokas: ${countVerses(meta.chapters)}`);
  parts.push("\n---\n");

  parts.push("## Table of Contents\n");
  for (const chapter of meta.chapters) {
    parts.push(generateTocEntry(chapter));
  }
  parts.push("\n---\n");

  return parts;
}

/**
 * Main entry point for the merge command.
 * Reads sarga files and metadata, then creates a merged book.md with TOC.
 *
 * @throws Exits with code 1 if meta.json is missing or has no sargas
 */
export async function main(): Promise<void> {
  const { name, showHelp } = parseArgs();

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  try {
    await fs.access(META_FILE);
  } catch {
    console.error(`Error: ${META_FILE} not found. Run 'npm run scrape' first.`);
    process.exit(1);
  }

  const metaContent = await fs.readFile(META_FILE, "utf-8");
  const parsedMeta: unknown = JSON.parse(metaContent);

  const validation = validateExportMeta(parsedMeta);
  if (!validation.isValid) {
    console.error(`Error: Invalid ${META_FILE}: ${validation.error}`);
    process.exit(1);
  }

  const meta = parsedMeta as ExportMeta;

  if (meta.chapters.length === 0) {
    console.error("Error: No sargas found in metadata.");
    process.exit(1);
  }

  console.log(`Merging ${meta.chapters.length} sargas...`);

  const parts = buildFrontMatter(name, meta);

  for (const chapter of meta.chapters) {
    const chapterPath = path.join(CHAPTERS_DIR, chapter.filename);

    try {
      const content = await fs.readFile(chapterPath, "utf-8");
      parts.push(demoteHeadings(content));
      parts.push("\n---\n");
      console.log(`  Added: ${chapter.filename}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`  Warning: Could not read ${chapter.filename} (${reason}), skipping.`);
    }
  }

  const merged = parts.join("\n");
  await fs.writeFile(OUTPUT_FILE, merged, "utf-8");

  const sizeKb = (Buffer.byteLength(merged, "utf-8") / 1024).toFixed(1);

  console.log(`\nMerged document saved to: ${OUTPUT_FILE} (${sizeKb} KB)`);
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Merge");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
