/**
 * Rescan a content directory on a schedule
 *
 * Usage: npm run watch -- [content-root] [options]
 *
 * Takes every scan option plus:
 *   --schedule <cron>   Rescan schedule (default: every 5 minutes)
 */

import cron from 'node-cron';
import { type AppConfig, loadConfig } from './config.js';
import {
  type OutputFormat,
  type ScanCommandOptions,
  parseArgs as parseScanArgs,
  printIssues,
  renderCorpus,
  validateOptions,
  writeOutput,
} from './scan.js';
import { ScanCancelledError, scanCorpus } from './scanner.js';
import { type CorpusSnapshot, CorpusStore } from './store.js';
import type { VisibilityOptions } from './types.js';
import { getStringArg, onInterrupt, plural, setupSignalHandlers } from './utils.js';

export interface WatchOptions extends ScanCommandOptions {
  /** node-cron expression */
  schedule: string;
}

/** Writes a snapshot whose digest differs from the last one written */
export type SnapshotPublisher = (snapshot: CorpusSnapshot) => Promise<void>;

/**
 * Print usage information for the watch command.
 */
function showUsage(): void {
  console.log('Usage: npm run watch -- [content-root] [options]');
  console.log('');
  console.log('Scan now, then rescan on a schedule and rewrite the output when it changes.');
  console.log('');
  console.log('Options:');
  console.log('  --schedule <cron>    Rescan schedule (default: "*/5 * * * *")');
  console.log('  All options of `npm run scan` are accepted.');
  console.log('  --help, -h           Show this help message');
}

/**
 * Parse command line arguments for the watch command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @param config - Environment configuration
 */
export function parseArgs(args: string[] = process.argv.slice(2), config: AppConfig = loadConfig()): WatchOptions {
  const scanArgs: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--schedule') {
      i++;
      continue;
    }
    scanArgs.push(args[i]);
  }

  return {
    ...parseScanArgs(scanArgs, config),
    schedule: getStringArg(args, '--schedule', config.RESCAN_SCHEDULE),
  };
}

/** Runs one rescan and publishes it when the output changed */
export type Rescan = () => Promise<CorpusSnapshot | null>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bind a store to a publisher. A snapshot is published unless its digest
 * matches the last one written successfully, so a failed write is retried
 * on the next rescan. The returned function never rejects.
 *
 * @returns Rescan resolving to the new snapshot, or null when the scan
 *   failed, was superseded, or could not be written
 */
export function createRescan(store: CorpusStore, publish: SnapshotPublisher): Rescan {
  let writtenDigest: string | null = null;

  return async () => {
    const previous = store.current();

    let snapshot: CorpusSnapshot;
    try {
      snapshot = await store.rescan();
    } catch (error) {
      if (error instanceof ScanCancelledError) {
        console.log('[WATCH] Scan superseded; keeping the current corpus');
        return null;
      }
      const kept = previous ? `generation ${previous.generation}` : 'no corpus yet';
      console.error(`[WATCH] Rescan failed: ${describeError(error)} (keeping ${kept})`);
      return null;
    }

    const { report } = snapshot;
    if (snapshot.digest === writtenDigest) {
      console.log(`[WATCH] No changes (generation ${snapshot.generation})`);
      return snapshot;
    }

    printIssues(report.issues);
    try {
      await publish(snapshot);
    } catch (error) {
      console.error(
        `[WATCH] Writing generation ${snapshot.generation} failed: ${describeError(error)} (retrying on the next rescan)`,
      );
      return null;
    }
    writtenDigest = snapshot.digest;

    console.log(
      `[WATCH] Published generation ${snapshot.generation}: ` +
        `${plural(report.records, 'record')} in ${plural(snapshot.corpus.collections.length, 'collection')}, ` +
        `${plural(report.issues.length, 'issue')}`,
    );
    return snapshot;
  };
}

/**
 * Main entry point for the watch command.
 *
 * @throws Exits with code 1 on bad options or an invalid schedule
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
  if (!cron.validate(options.schedule)) {
    console.error(`Error: Invalid schedule "${options.schedule}"`);
    process.exit(1);
  }

  const format: OutputFormat = options.format === 'outline' ? 'outline' : 'json';
  const visibility: VisibilityOptions = {
    includeDrafts: options.includeDrafts,
    defaultTemplate: options.defaultTemplate,
  };

  const store = new CorpusStore(
    (signal) =>
      scanCorpus(options.root, {
        concurrency: options.concurrency,
        readTimeoutMs: options.readTimeoutMs,
        pattern: options.pattern,
        lowercaseCollectionIds: options.lowercaseCollectionIds,
        signal,
      }),
    visibility,
  );
  console.log(`[WATCH] Watching ${options.root}. Schedule: ${options.schedule}`);

  const rescan = createRescan(store, (snapshot) =>
    writeOutput(options.outFile, renderCorpus(snapshot.corpus, format, visibility)),
  );

  // Run immediately at startup
  await rescan();

  const task = cron.schedule(options.schedule, async () => {
    await rescan();
  });

  onInterrupt(() => {
    task.stop();
    store.cancel();
  });
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers('Watch');
  main().catch((error) => {
    console.error('[WATCH] Fatal:', error);
    process.exit(1);
  });
}
