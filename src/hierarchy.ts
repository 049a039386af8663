/**
 * Derive a content file's place in the hierarchy from its path alone
 */

import * as path from 'path';
import type { IssueDraft } from './frontmatter.js';

/** Where a file sits, as told by its path */
export interface HierarchyPosition {
  /** Name of the immediate parent directory */
  collectionId: string;
  /** First integer in the filename, null when there is none */
  itemIndex: number | null;
  /** Filename without its extension */
  slug: string;
  /** Set when the filename carries no ordinal */
  issue?: IssueDraft;
}

export interface HierarchyOptions {
  /** Lowercase collection ids so `Day 1` and `day 1` group together */
  lowercaseCollectionIds: boolean;
  /** Name used for files lying directly in the content root */
  rootName: string;
}

/**
 * Normalize a directory name into a collection id.
 *
 * @example
 * normalizeCollectionId('  Day 13 ', true) // 'day 13'
 */
export function normalizeCollectionId(name: string, lowercase: boolean): string {
  const trimmed = name.trim();
  return lowercase ? trimmed.toLowerCase() : trimmed;
}

/**
 * Extract the first integer from a filename stem.
 *
 * @example
 * extractItemIndex('chapter-3') // 3
 * extractItemIndex('chapter-03-part-2') // 3
 * extractItemIndex('appendix') // null
 */
export function extractItemIndex(stem: string): number | null {
  const match = stem.match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}

/**
 * Resolve collection, ordinal and slug for a content file.
 * Never reads the file; the directory name is the grouping source of truth.
 *
 * @param relativePath - POSIX path relative to the content root
 */
export function resolveHierarchy(relativePath: string, options: HierarchyOptions): HierarchyPosition {
  const parent = path.posix.dirname(relativePath);
  const directory = parent === '.' ? options.rootName : path.posix.basename(parent);
  const slug = path.posix.basename(relativePath, path.posix.extname(relativePath));
  const itemIndex = extractItemIndex(slug);

  const position: HierarchyPosition = {
    collectionId: normalizeCollectionId(directory, options.lowercaseCollectionIds),
    itemIndex,
    slug,
  };

  if (itemIndex === null) {
    position.issue = {
      kind: 'UnindexableFilename',
      severity: 'warning',
      message: `no chapter number in "${slug}"; placed at the end of its collection by date`,
    };
  }

  return position;
}
