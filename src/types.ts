/**
 * Shared type definitions for the content engine
 */

/** Frontmatter dialect, chosen by the opening delimiter */
export type HeaderDialect = 'toml' | 'yaml';

/** Per-file problem categories collected during a scan */
export type IssueKind =
  | 'UnrecognizedHeader'
  | 'MalformedHeader'
  | 'MissingField'
  | 'InvalidField'
  | 'InvalidDate'
  | 'UnindexableFilename'
  | 'AmbiguousOrdering'
  | 'ReadTimeout'
  | 'ReadFailed';

export type IssueSeverity = 'error' | 'warning';

/** A problem with one file. Errors drop the file, warnings keep it. */
export interface ContentIssue {
  kind: IssueKind;
  severity: IssueSeverity;
  /** Path relative to the content root */
  path: string;
  message: string;
}

/** Decoded frontmatter with defaults applied */
export interface Frontmatter {
  title: string;
  description: string;
  /** `YYYY-MM-DD`, a full ISO timestamp, or null */
  date: string | null;
  draft: boolean;
  weight: number;
  /** Explicit template, null when absent or blank */
  template: string | null;
  /** Unknown fields, kept as-is */
  extra: Record<string, unknown>;
}

/** One content file, fully resolved */
export interface ContentRecord extends Frontmatter {
  /** POSIX path relative to the content root */
  path: string;
  collectionId: string;
  /** First integer of the filename, null when there is none */
  itemIndex: number | null;
  /** Filename without extension */
  slug: string;
  dialect: HeaderDialect;
  /** Another record in the collection shares this itemIndex */
  ambiguousOrdering: boolean;
  body: string;
}

/** Records sharing a collectionId, in full order (drafts included) */
export interface Collection {
  id: string;
  records: readonly ContentRecord[];
}

/** All collections, ordered by the numeric part of their id */
export interface Corpus {
  collections: readonly Collection[];
}

/** A record's place in a visible sequence */
export interface VisibleEntry {
  /** Zero-based position in the sequence */
  position: number;
  /** Slug of the preceding entry */
  previous: string | null;
  /** Slug of the following entry */
  next: string | null;
  /** Resolved render template */
  template: string;
  record: ContentRecord;
}

/** Options controlling what consumers see */
export interface VisibilityOptions {
  /** Keep draft records (authoring preview) */
  includeDrafts: boolean;
  /** Template used when neither the record nor its siblings name one */
  defaultTemplate: string;
}

/** Per-scan report published next to the corpus */
export interface ScanReport {
  /** Number of content files discovered */
  scanned: number;
  /** Number of files that became records */
  records: number;
  issues: ContentIssue[];
}
