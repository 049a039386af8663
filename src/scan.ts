/**
 * Scan a content directory and write the ordered corpus
 *
 * Usage: npm run scan -- [content-root] [options]
 * Example: npm run scan -- content --drafts --format outline
 *
 * Options:
 *   --out <file>         Output file (default: output/corpus.json)
 *   --format <f>         json or outline (default: json)
 *   --drafts             Include draft records
 *   --concurrency <n>    Files read in parallel (default: 8)
 *   --timeout <ms>       Per-file read timeout (default: 5000)
 *   --pattern <glob>     Only scan paths matching the glob
 *   --lowercase          Lowercase collection ids
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { type AppConfig, loadConfig } from './config.js';
import { ScanFatalError, type ScanResult, scanCorpus } from './scanner.js';
import { formatOutline, serializeCorpus } from './serialize.js';
import type { ContentIssue, Corpus, VisibilityOptions } from './types.js';
import {
  formatDuration,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  plural,
  setupSignalHandlers,
} from './utils.js';

export type OutputFormat = 'json' | 'outline';

/** Options shared by the scan and watch commands */
export interface ScanCommandOptions {
  /** Content root directory */
  root: string;
  /** File the corpus is written to */
  outFile: string;
  /** Requested output format, validated by isOutputFormat */
  format: string;
  includeDrafts: boolean;
  concurrency: number;
  readTimeoutMs: number;
  pattern: string | null;
  lowercaseCollectionIds: boolean;
  defaultTemplate: string;
  /** Whether to show help and exit */
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
export const SCAN_VALUE_FLAGS = ['--out', '--format', '--concurrency', '--timeout', '--pattern'];

/**
 * Print usage information for the scan command.
 */
function showUsage(): void {
  console.log('Usage: npm run scan -- [content-root] [options]');
  console.log('');
  console.log('Scan day/chapter markdown files into an ordered corpus.');
  console.log('');
  console.log('Options:');
  console.log('  --out <file>         Output file (default: output/corpus.json)');
  console.log('  --format <f>         json or outline (default: json)');
  console.log('  --drafts             Include draft records');
  console.log('  --concurrency <n>    Files read in parallel (default: 8)');
  console.log('  --timeout <ms>       Per-file read timeout (default: 5000)');
  console.log('  --pattern <glob>     Only scan paths matching the glob');
  console.log('  --lowercase          Lowercase collection ids');
  console.log('  --help, -h           Show this help message');
  console.log('');
  console.log('Example:');
  console.log('  npm run scan -- content --pattern "day */chapter-*.md"');
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'outline';
}

/**
 * Replace the extension of an output path.
 *
 * @example
 * withExtension('output/corpus.json', '.md') // 'output/corpus.md'
 */
export function withExtension(file: string, extension: string): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

/**
 * Parse command line arguments for the scan command.
 * Flags override the environment configuration.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @param config - Environment configuration
 * @returns Parsed scan options
 */
export function parseArgs(args: string[] = process.argv.slice(2), config: AppConfig = loadConfig()): ScanCommandOptions {
  const format = getStringArg(args, '--format', 'json');
  const defaultOut = format === 'outline' ? withExtension(config.OUTPUT_FILE, '.md') : config.OUTPUT_FILE;

  return {
    root: getPositionalArg(args, SCAN_VALUE_FLAGS) || config.CONTENT_ROOT,
    outFile: getStringArg(args, '--out', defaultOut),
    format,
    includeDrafts: hasFlag(args, '--drafts') || config.INCLUDE_DRAFTS,
    concurrency: getNumberArg(args, '--concurrency', config.SCAN_CONCURRENCY),
    readTimeoutMs: getNumberArg(args, '--timeout', config.READ_TIMEOUT_MS),
    pattern: getNullableStringArg(args, '--pattern') ?? config.CONTENT_PATTERN ?? null,
    lowercaseCollectionIds: hasFlag(args, '--lowercase') || config.LOWERCASE_COLLECTION_IDS,
    defaultTemplate: config.DEFAULT_TEMPLATE,
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Check option values that parsing cannot reject on its own.
 *
 * @returns Error message, or null when the options are usable
 */
export function validateOptions(options: ScanCommandOptions): string | null {
  if (!isOutputFormat(options.format)) {
    return `Unknown format "${options.format}" (expected json or outline)`;
  }
  if (options.concurrency < 1) {
    return '--concurrency must be at least 1';
  }
  if (options.readTimeoutMs < 1) {
    return '--timeout must be at least 1';
  }
  return null;
}

/**
 * Format one per-file issue for the terminal.
 *
 * @example
 * formatIssue({ kind: 'MissingField', severity: 'error', path: 'day 1/chapter-3.md', message: 'missing required field "title"' })
 * // 'day 1/chapter-3.md: MissingField: missing required field "title" (file skipped)'
 */
export function formatIssue(issue: ContentIssue): string {
  const suffix = issue.severity === 'error' ? ' (file skipped)' : '';
  return `${issue.path}: ${issue.kind}: ${issue.message}${suffix}`;
}

/** Print every per-file issue as a warning */
export function printIssues(issues: readonly ContentIssue[]): void {
  for (const issue of issues) {
    console.warn(`  Warning: ${formatIssue(issue)}`);
  }
}

/** Render the corpus in the requested format */
export function renderCorpus(corpus: Corpus, format: OutputFormat, visibility: VisibilityOptions): string {
  return format === 'outline' ? formatOutline(corpus, visibility) : serializeCorpus(corpus, visibility);
}

/** Write output, creating its directory first */
export async function writeOutput(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf-8');
}

/**
 * Main entry point for the scan command.
 * Per-file problems are printed as warnings; only a fatal scan error exits non-zero.
 *
 * @throws Exits with code 1 on bad options or a fatal scan error
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const invalid = validateOptions(options);
  if (invalid) {
    console.error(`Error: ${invalid}`);
    process.exit(1);
  }

  const format: OutputFormat = options.format === 'outline' ? 'outline' : 'json';
  const visibility: VisibilityOptions = {
    includeDrafts: options.includeDrafts,
    defaultTemplate: options.defaultTemplate,
  };

  console.log(`Scanning ${options.root}...`);
  const start = Date.now();

  let result: ScanResult;
  try {
    result = await scanCorpus(options.root, {
      concurrency: options.concurrency,
      readTimeoutMs: options.readTimeoutMs,
      pattern: options.pattern,
      lowercaseCollectionIds: options.lowercaseCollectionIds,
    });
  } catch (error) {
    if (error instanceof ScanFatalError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const { corpus, report } = result;
  printIssues(report.issues);

  await writeOutput(options.outFile, renderCorpus(corpus, format, visibility));

  console.log(
    `\nScanned ${plural(report.scanned, 'file')} into ${plural(corpus.collections.length, 'collection')} ` +
      `(${plural(report.records, 'record')}, ${plural(report.issues.length, 'issue')}) ` +
      `in ${formatDuration(Date.now() - start)}`,
  );
  console.log(`Saved ${format} to ${options.outFile}`);
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers('Scan');
  main().catch((error) => {
    console.error('Error:', error);
    process.exit(1);
  });
}
