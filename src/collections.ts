/**
 * Group content records into ordered collections
 */

import { compareText, sortRecords } from './ordering.js';
import type { Collection, ContentIssue, ContentRecord, Corpus } from './types.js';

export interface BuildResult {
  corpus: Corpus;
  /** AmbiguousOrdering warnings, one per record sharing an index */
  issues: ContentIssue[];
}

/**
 * Order collection ids by their first integer, so `day 2` precedes `day 13`.
 * Ids without a number follow; remaining ties fall back to text order.
 */
export function compareCollectionIds(a: string, b: string): number {
  const aMatch = a.match(/\d+/);
  const bMatch = b.match(/\d+/);
  if (aMatch && bMatch) {
    const diff = parseInt(aMatch[0], 10) - parseInt(bMatch[0], 10);
    if (diff !== 0) return diff;
  } else if (aMatch) {
    return -1;
  } else if (bMatch) {
    return 1;
  }
  return compareText(a, b);
}

/**
 * Flag records that share an itemIndex inside one collection.
 * Flagged records are copies; the inputs are not mutated.
 */
function flagDuplicateIndices(records: readonly ContentRecord[], issues: ContentIssue[]): ContentRecord[] {
  const byIndex = new Map<number, ContentRecord[]>();
  for (const record of records) {
    if (record.itemIndex === null) continue;
    const group = byIndex.get(record.itemIndex) ?? [];
    group.push(record);
    byIndex.set(record.itemIndex, group);
  }

  const ambiguous = new Set<ContentRecord>();
  for (const [itemIndex, group] of byIndex) {
    if (group.length < 2) continue;
    for (const record of group) {
      ambiguous.add(record);
      const others = group.filter((other) => other !== record).map((other) => other.path);
      issues.push({
        kind: 'AmbiguousOrdering',
        severity: 'warning',
        path: record.path,
        message: `chapter number ${itemIndex} is shared with ${others.join(', ')}; ordered by date, then slug`,
      });
    }
  }

  return records.map((record) => (ambiguous.has(record) ? { ...record, ambiguousOrdering: true } : record));
}

/**
 * Group records by collection id and order everything deterministically.
 *
 * @param records - Successfully parsed records, in any order
 * @param knownCollectionIds - Collections to keep even when no record survived
 * @returns The corpus plus warnings for duplicate chapter numbers
 */
export function buildCollections(
  records: readonly ContentRecord[],
  knownCollectionIds: readonly string[] = [],
): BuildResult {
  const groups = new Map<string, ContentRecord[]>();
  for (const id of knownCollectionIds) {
    groups.set(id, []);
  }
  for (const record of records) {
    const group = groups.get(record.collectionId) ?? [];
    group.push(record);
    groups.set(record.collectionId, group);
  }

  const issues: ContentIssue[] = [];
  const ids = [...groups.keys()].sort(compareCollectionIds);
  const collections: Collection[] = ids.map((id) => ({
    id,
    records: flagDuplicateIndices(sortRecords(groups.get(id) ?? []), issues),
  }));

  return { corpus: { collections }, issues };
}
