/**
 * Serialize a corpus for downstream tools
 *
 * The JSON form carries no timestamps or machine-specific paths, so
 * identical content always produces identical bytes.
 */

import { DEFAULT_VISIBILITY, orderCollection } from './ordering.js';
import type { Corpus, VisibilityOptions, VisibleEntry } from './types.js';

/** One visible entry as written to corpus.json */
export interface SerializedEntry {
  position: number;
  previous: string | null;
  next: string | null;
  slug: string;
  path: string;
  itemIndex: number | null;
  title: string;
  description: string;
  date: string | null;
  draft: boolean;
  weight: number;
  template: string;
  ambiguousOrdering: boolean;
  /** Frontmatter fields without a built-in meaning */
  params: Record<string, unknown>;
  body: string;
}

export interface SerializedCollection {
  id: string;
  entries: SerializedEntry[];
}

/** Shape of corpus.json */
export interface CorpusDocument {
  includeDrafts: boolean;
  collections: SerializedCollection[];
}

function toSerializedEntry({ position, previous, next, template, record }: VisibleEntry): SerializedEntry {
  return {
    position,
    previous,
    next,
    slug: record.slug,
    path: record.path,
    itemIndex: record.itemIndex,
    title: record.title,
    description: record.description,
    date: record.date,
    draft: record.draft,
    weight: record.weight,
    template,
    ambiguousOrdering: record.ambiguousOrdering,
    params: record.extra,
    body: record.body,
  };
}

/**
 * Build the plain document behind corpus.json.
 *
 * @param corpus - Corpus to expose
 * @param options - Draft visibility and template fallback
 */
export function toCorpusDocument(corpus: Corpus, options: VisibilityOptions = DEFAULT_VISIBILITY): CorpusDocument {
  return {
    includeDrafts: options.includeDrafts,
    collections: corpus.collections.map((collection) => ({
      id: collection.id,
      entries: orderCollection(collection, options).map(toSerializedEntry),
    })),
  };
}

/**
 * Serialize a corpus to pretty-printed JSON ending in a newline.
 */
export function serializeCorpus(corpus: Corpus, options: VisibilityOptions = DEFAULT_VISIBILITY): string {
  return `${JSON.stringify(toCorpusDocument(corpus, options), null, 2)}\n`;
}

/**
 * Generate an outline entry for one visible record.
 * Creates a numbered markdown link to the source file.
 *
 * @example
 * generateOutlineEntry(entry) // '1. [Ownership](day%201/chapter-1.md)'
 */
export function generateOutlineEntry({ position, record }: VisibleEntry): string {
  const title = record.title.replace(/([[\]])/g, '\\$1');
  const draft = record.draft ? ' _(draft)_' : '';
  return `${position + 1}. [${title}](${encodeURI(record.path)})${draft}`;
}

/**
 * Render the corpus as a markdown table of contents.
 * Collections without visible entries keep their heading with a placeholder.
 *
 * @param corpus - Corpus to outline
 * @param options - Draft visibility and template fallback
 * @param heading - Document title
 */
export function formatOutline(
  corpus: Corpus,
  options: VisibilityOptions = DEFAULT_VISIBILITY,
  heading = 'Contents',
): string {
  const parts: string[] = [`# ${heading}`];

  for (const collection of corpus.collections) {
    parts.push('', `## ${collection.id}`, '');
    const entries = orderCollection(collection, options);
    if (entries.length === 0) {
      parts.push('_No content yet._');
      continue;
    }
    for (const entry of entries) {
      parts.push(generateOutlineEntry(entry));
    }
  }

  return `${parts.join('\n')}\n`;
}
