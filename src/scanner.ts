/**
 * Scan a content directory into a corpus
 *
 * Files are read and parsed on a bounded worker pool. Results are merged in
 * sorted path order, so grouping does not depend on which read finished first.
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { buildCollections } from './collections.js';
import { parseContentFile } from './frontmatter.js';
import { type HierarchyPosition, resolveHierarchy } from './hierarchy.js';
import { compareText } from './ordering.js';
import type { ContentIssue, ContentRecord, Corpus, ScanReport } from './types.js';
import { globToRegex } from './utils.js';

/** Reads one file; must honour the abort signal where it can */
export type FileReader = (filePath: string, signal: AbortSignal) => Promise<string>;

/** Configuration options for a scan */
export interface ScanOptions {
  /** Files read and parsed at the same time */
  concurrency: number;
  /** Per-file read budget (ms) */
  readTimeoutMs: number;
  /** Glob matched against root-relative POSIX paths */
  pattern: string | null;
  /** Lowercase collection ids */
  lowercaseCollectionIds: boolean;
  /** Cancels the scan; partial results are discarded */
  signal?: AbortSignal;
  /** File reader, replaceable in tests */
  readFile?: FileReader;
}

export interface ScanResult {
  corpus: Corpus;
  report: ScanReport;
}

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  concurrency: 8,
  readTimeoutMs: 5000,
  pattern: null,
  lowercaseCollectionIds: false,
};

const CONTENT_EXTENSION = '.md';
const SKIPPED_DIRECTORIES = new Set(['node_modules']);

/** The scan cannot produce a corpus at all */
export class ScanFatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanFatalError';
  }
}

/** The scan was aborted before it completed */
export class ScanCancelledError extends Error {
  constructor() {
    super('Scan cancelled');
    this.name = 'ScanCancelledError';
  }
}

/** A single file took longer than the read budget */
export class ReadTimeoutError extends Error {
  constructor(filePath: string, timeoutMs: number) {
    super(`Reading ${filePath} took longer than ${timeoutMs}ms`);
    this.name = 'ReadTimeoutError';
  }
}

const readUtf8: FileReader = (filePath, signal) => fs.readFile(filePath, { encoding: 'utf-8', signal });

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface Discovery {
  /** Root-relative POSIX paths, sorted */
  files: string[];
  /** Unreadable subdirectories */
  issues: ContentIssue[];
}

async function walk(root: string, relative: string, discovery: Discovery): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });
  } catch (error) {
    // Only the root itself is fatal
    if (relative === '') throw error;
    discovery.issues.push({ kind: 'ReadFailed', severity: 'error', path: relative, message: describeError(error) });
    return;
  }

  for (const entry of entries) {
    if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) continue;
    const entryPath = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      await walk(root, entryPath, discovery);
    } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === CONTENT_EXTENSION) {
      discovery.files.push(entryPath);
    }
  }
}

/**
 * Find content files below a root directory.
 * Dot-directories and node_modules are skipped.
 *
 * @param root - Content root directory
 * @param pattern - Optional glob over root-relative paths
 * @throws If the root directory cannot be listed
 */
export async function discoverContentFiles(root: string, pattern: string | null = null): Promise<Discovery> {
  const discovery: Discovery = { files: [], issues: [] };
  await walk(root, '', discovery);

  if (pattern) {
    const regex = globToRegex(pattern);
    discovery.files = discovery.files.filter((file) => regex.test(file));
  }
  discovery.files.sort(compareText);
  return discovery;
}

/**
 * Read a file, giving up after `timeoutMs`.
 * The reader's signal fires on timeout and on outer cancellation.
 */
export async function readWithTimeout(
  read: FileReader,
  filePath: string,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<string> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ReadTimeoutError(filePath, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([read(filePath, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

interface FileOutcome {
  record: ContentRecord | null;
  issues: ContentIssue[];
  /** Whether the file could be read at all */
  readable: boolean;
}

async function loadRecord(
  root: string,
  relativePath: string,
  position: HierarchyPosition,
  options: ScanOptions,
): Promise<FileOutcome> {
  const { signal } = options;
  if (signal?.aborted) throw new ScanCancelledError();

  let raw: string;
  try {
    raw = await readWithTimeout(
      options.readFile ?? readUtf8,
      path.join(root, ...relativePath.split('/')),
      options.readTimeoutMs,
      signal,
    );
  } catch (error) {
    if (signal?.aborted) throw new ScanCancelledError();
    const kind = error instanceof ReadTimeoutError ? 'ReadTimeout' : 'ReadFailed';
    return {
      record: null,
      issues: [{ kind, severity: 'error', path: relativePath, message: describeError(error) }],
      readable: false,
    };
  }

  const parsed = parseContentFile(raw);
  if (!parsed.success) {
    return { record: null, issues: [{ ...parsed.issue, path: relativePath }], readable: true };
  }

  const issues: ContentIssue[] = [];
  if (position.issue) {
    issues.push({ ...position.issue, path: relativePath });
  }
  for (const warning of parsed.warnings) {
    issues.push({ ...warning, path: relativePath });
  }

  return {
    record: {
      ...parsed.frontmatter,
      path: relativePath,
      collectionId: position.collectionId,
      itemIndex: position.itemIndex,
      slug: position.slug,
      dialect: parsed.dialect,
      ambiguousOrdering: false,
      body: parsed.body,
    },
    issues,
    readable: true,
  };
}

function compareIssues(a: ContentIssue, b: ContentIssue): number {
  return compareText(a.path, b.path) || compareText(a.kind, b.kind);
}

/**
 * Scan a content root into an ordered corpus plus a per-file report.
 * No single bad file stops the scan.
 *
 * @param root - Content root directory
 * @param overrides - Scan options; unspecified ones use DEFAULT_SCAN_OPTIONS
 * @throws {ScanFatalError} If the root cannot be listed or no file can be read
 * @throws {ScanCancelledError} If the signal aborts the scan
 */
export async function scanCorpus(root: string, overrides: Partial<ScanOptions> = {}): Promise<ScanResult> {
  const options: ScanOptions = { ...DEFAULT_SCAN_OPTIONS, ...overrides };
  if (options.signal?.aborted) throw new ScanCancelledError();

  let discovery: Discovery;
  try {
    discovery = await discoverContentFiles(root, options.pattern);
  } catch (error) {
    throw new ScanFatalError(`Cannot read content root ${root}: ${describeError(error)}`, { cause: error });
  }

  if (discovery.files.length === 0) {
    throw new ScanFatalError(`No ${CONTENT_EXTENSION} files found under ${root}`);
  }

  const hierarchyOptions = {
    lowercaseCollectionIds: options.lowercaseCollectionIds,
    rootName: path.basename(path.resolve(root)),
  };
  const positions = discovery.files.map((file) => resolveHierarchy(file, hierarchyOptions));

  const limit = pLimit(options.concurrency);
  const outcomes = await Promise.all(
    discovery.files.map((file, i) => limit(() => loadRecord(root, file, positions[i], options))),
  );

  if (options.signal?.aborted) throw new ScanCancelledError();

  if (!outcomes.some((outcome) => outcome.readable)) {
    throw new ScanFatalError(`None of the ${discovery.files.length} content files under ${root} could be read`);
  }

  const records: ContentRecord[] = [];
  const issues: ContentIssue[] = [...discovery.issues];
  for (const outcome of outcomes) {
    if (outcome.record) records.push(outcome.record);
    issues.push(...outcome.issues);
  }

  const knownCollectionIds = [...new Set(positions.map((position) => position.collectionId))];
  const built = buildCollections(records, knownCollectionIds);
  issues.push(...built.issues);

  return {
    corpus: built.corpus,
    report: {
      scanned: discovery.files.length,
      records: records.length,
      issues: issues.sort(compareIssues),
    },
  };
}
