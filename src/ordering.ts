/**
 * Visibility filtering and ordering of a collection
 */

import { DEFAULT_TEMPLATE, majorityTemplate } from './templates.js';
import type { Collection, ContentRecord, VisibilityOptions, VisibleEntry } from './types.js';

export const DEFAULT_VISIBILITY: VisibilityOptions = {
  includeDrafts: false,
  defaultTemplate: DEFAULT_TEMPLATE,
};

/** Code-unit comparison, independent of locale */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Dates are ISO strings, so text order is time order. Missing dates go last. */
function compareDates(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return compareText(a, b);
}

/**
 * Total order over records of one collection:
 * (weight, itemIndex, date, slug), then path.
 * Records without an itemIndex trail the others and order by date only.
 */
export function compareRecords(a: ContentRecord, b: ContentRecord): number {
  if (a.itemIndex === null || b.itemIndex === null) {
    if (a.itemIndex !== null) return -1;
    if (b.itemIndex !== null) return 1;
    return compareDates(a.date, b.date) || compareText(a.slug, b.slug) || compareText(a.path, b.path);
  }

  return (
    a.weight - b.weight ||
    a.itemIndex - b.itemIndex ||
    compareDates(a.date, b.date) ||
    compareText(a.slug, b.slug) ||
    compareText(a.path, b.path)
  );
}

/**
 * Sort records into their full collection order without filtering.
 *
 * @returns A new array; the input is left untouched
 */
export function sortRecords(records: readonly ContentRecord[]): ContentRecord[] {
  return [...records].sort(compareRecords);
}

/**
 * Produce the sequence consumers see for a collection.
 * Drafts are dropped unless requested, positions are zero-based and
 * previous/next link neighbouring slugs. Never fails; may be empty.
 *
 * @param collection - Collection to order
 * @param options - Draft visibility and template fallback
 */
export function orderCollection(
  collection: Collection,
  options: VisibilityOptions = DEFAULT_VISIBILITY,
): VisibleEntry[] {
  const visible = sortRecords(collection.records.filter((record) => options.includeDrafts || !record.draft));
  const fallback = majorityTemplate(collection.records) ?? options.defaultTemplate;

  return visible.map((record, position) => ({
    position,
    previous: position > 0 ? visible[position - 1].slug : null,
    next: position < visible.length - 1 ? visible[position + 1].slug : null,
    template: record.template || fallback,
    record,
  }));
}
