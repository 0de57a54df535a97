/**
 * Run full pipeline: scrape → merge
 *
 * Usage: npm run all -- --book <k> [options]
 */

import { execSync } from "node:child_process";

/**
 * Format duration in milliseconds to human-readable string
 * Exported for testing
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

export interface StepTiming {
  step: string;
  duration: number;
}

export interface PipelineOptions {
  book: string;
  from: string | null;
  to: string | null;
  language: string | null;
  name: string;
  delay: number;
}

/**
 * Parse command line arguments from an array
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): PipelineOptions {
  let book = "";
  let from: string | null = null;
  let to: string | null = null;
  let language: string | null = null;
  let name = "Valmiki Ramayana";
  let delay = 1000;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--book" && args[i + 1]) {
      book = args[i + 1];
      i++;
    } else if (args[i] === "--from" && args[i + 1]) {
      from = args[i + 1];
      i++;
    } else if (args[i] === "--to" && args[i + 1]) {
      to = args[i + 1];
      i++;
    } else if (args[i] === "--lang" && args[i + 1]) {
      language = args[i + 1];
      i++;
    } else if (args[i] === "--name" && args[i + 1]) {
      name = args[i + 1];
      i++;
    } else if (args[i] === "--delay" && args[i + 1]) {
      delay = parseInt(args[i + 1], 10);
      i++;
    }
  }

  return { book, from, to, language, name, delay };
}

/**
 * Build the scrape command for the pipeline options
 * Exported for testing
 */
export function buildScrapeCommand(options: PipelineOptions): string {
  let command = `npx tsx src/scrape.ts --book ${options.book} --delay ${options.delay}`;
  if (options.from) command += ` --from ${options.from}`;
  if (options.to) command += ` --to ${options.to}`;
  if (options.language) command += ` --lang ${options.language}`;
  return command;
}

/**
 * Run a shell command with description header and timing
 * Exported for testing
 */
export function run(command: string, description: string): StepTiming {
  console.log(`\n${"=".repeat(50)}`);
  console.log(`Step: ${description}`);
  console.log("=".repeat(50));

  const start = Date.now();
  execSync(command, { stdio: "inherit" });
  const duration = Date.now() - start;

  console.log(`\n  Completed in ${formatDuration(duration)}`);

  return { step: description, duration };
}

export async function main() {
  const options = parseArgs();

  if (!/^\d+$/.test(options.book)) {
    console.error("Usage: npm run all -- --book <k> [options]");
    console.error('Example: npm run all -- --book 1 --to 5 --name "Bala Kanda"');
    console.error("Options:");
    console.error("  --from <s>           First sarga (default: 1)");
    console.error("  --to <s>             Last sarga (default: until a sarga is not found)");
    console.error("  --lang te|dv         Script of the verse text (default: te)");
    console.error('  --name "title"       Document title (default: "Valmiki Ramayana")');
    console.error("  --delay ms           Delay between sargas (default: 1000)");
    process.exit(1);
  }

  console.log("Starting full pipeline...");
  console.log(`Kanda: ${options.book}`);
  console.log(`Document name: ${options.name}`);

  const pipelineStart = Date.now();
  const timings: StepTiming[] = [];

  try {
    timings.push(run(buildScrapeCommand(options), "Scraping sargas"));
    timings.push(run(`npx tsx src/merge.ts --name "${options.name}"`, "Merging sargas"));

    const totalDuration = Date.now() - pipelineStart;

    console.log("\n" + "=".repeat(50));
    console.log("Pipeline complete!");
    console.log("=".repeat(50));

    console.log("\nTiming Summary:");
    console.log("-".repeat(35));
    for (const { step, duration } of timings) {
      const stepName = step.padEnd(20);
      console.log(`  ${stepName} ${formatDuration(duration)}`);
    }
    console.log("-".repeat(35));
    console.log(`  ${"Total".padEnd(20)} ${formatDuration(totalDuration)}`);

    console.log("\nOutput files:");
    console.log("  - output/chapters/*.md    (individual sargas)");
    console.log("  - output/chapters/*.json  (parsed slokas)");
    console.log("  - output/meta.json        (metadata and sloka counts)");
    console.log("  - output/book.md          (merged document)");
  } catch (error) {
    console.error("\nPipeline failed:", error);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
