/**
 * Template resolution for content records
 */

import type { ContentRecord } from './types.js';

/** Template applied when nothing else names one */
export const DEFAULT_TEMPLATE = 'page.html';

/**
 * Find the template most records of a collection name explicitly.
 * Returns null when none names one, or when the top two are tied.
 *
 * @param records - Every record of the collection, drafts included
 */
export function majorityTemplate(records: readonly ContentRecord[]): string | null {
  const counts = new Map<string, number>();
  for (const record of records) {
    if (record.template) {
      counts.set(record.template, (counts.get(record.template) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  let tied = false;
  for (const [template, count] of counts) {
    if (count > bestCount) {
      best = template;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }

  return tied ? null : best;
}

/**
 * Pick the template for a record: its own, else its collection's
 * convention, else the default. Never fails.
 *
 * @example
 * resolveTemplate({ ...record, template: 'chapter.html' }, siblings) // 'chapter.html'
 */
export function resolveTemplate(
  record: ContentRecord,
  siblings: readonly ContentRecord[],
  defaultTemplate: string = DEFAULT_TEMPLATE,
): string {
  if (record.template) {
    return record.template;
  }
  return majorityTemplate(siblings) ?? defaultTemplate;
}
