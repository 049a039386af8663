/**
 * Public API: scan a day/chapter content tree into an ordered corpus
 */

export type {
  Collection,
  ContentIssue,
  ContentRecord,
  Corpus,
  Frontmatter,
  HeaderDialect,
  IssueKind,
  IssueSeverity,
  ScanReport,
  VisibilityOptions,
  VisibleEntry,
} from './types.js';

export { detectHeader, decodeFrontmatter, parseContentFile } from './frontmatter.js';
export type { HeaderDetection, IssueDraft, ParseResult } from './frontmatter.js';
export { extractItemIndex, normalizeCollectionId, resolveHierarchy } from './hierarchy.js';
export type { HierarchyOptions, HierarchyPosition } from './hierarchy.js';
export { buildCollections, compareCollectionIds } from './collections.js';
export { compareRecords, DEFAULT_VISIBILITY, orderCollection, sortRecords } from './ordering.js';
export { DEFAULT_TEMPLATE, majorityTemplate, resolveTemplate } from './templates.js';
export {
  DEFAULT_SCAN_OPTIONS,
  discoverContentFiles,
  ReadTimeoutError,
  ScanCancelledError,
  ScanFatalError,
  scanCorpus,
} from './scanner.js';
export type { FileReader, ScanOptions, ScanResult } from './scanner.js';
export { CorpusStore } from './store.js';
export type { CorpusScanner, CorpusSnapshot } from './store.js';
export { formatOutline, serializeCorpus, toCorpusDocument } from './serialize.js';
export type { CorpusDocument, SerializedCollection, SerializedEntry } from './serialize.js';
