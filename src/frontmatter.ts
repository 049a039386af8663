/**
 * Frontmatter parsing for content files
 *
 * Files open with either a TOML block fenced by `+++` or a YAML block fenced
 * by `---`. The block is split off with gray-matter and its fields are
 * validated one at a time, so a bad optional field only costs a warning.
 */

import matter from 'gray-matter';
import * as yaml from 'js-yaml';
import { parse as parseToml, TomlDate } from 'smol-toml';
import { z } from 'zod';
import type { ContentIssue, Frontmatter, HeaderDialect } from './types.js';

/** An issue before the scanner attaches the file path */
export type IssueDraft = Omit<ContentIssue, 'path'>;

/** Header detection result, resolved once per file */
export type HeaderDetection =
  | { dialect: 'toml'; text: string }
  | { dialect: 'yaml'; text: string }
  | { dialect: 'unrecognized'; firstLine: string };

export type ParseResult =
  | { success: true; dialect: HeaderDialect; frontmatter: Frontmatter; body: string; warnings: IssueDraft[] }
  | { success: false; issue: IssueDraft };

export type DecodeResult =
  | { success: true; frontmatter: Frontmatter; warnings: IssueDraft[] }
  | { success: false; issue: IssueDraft };

const DELIMITERS: Record<HeaderDialect, string> = {
  toml: '+++',
  yaml: '---',
};

/** Fields with a meaning; everything else lands in `extra` */
export const KNOWN_FIELDS: ReadonlySet<string> = new Set(['title', 'description', 'date', 'draft', 'weight', 'template']);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Normalize a date to `YYYY-MM-DD`, or a full ISO timestamp when it carries
 * a time of day.
 */
export function formatDate(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

const dateSchema = z.union([z.instanceof(TomlDate), z.date(), z.string().trim()]).transform((value, ctx) => {
  if (value instanceof TomlDate) {
    // TOML local times carry no calendar day
    if (value.isTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'a time of day is not a date' });
      return z.NEVER;
    }
    return formatDate(new Date(value.getTime()));
  }
  if (value instanceof Date) {
    return formatDate(value);
  }
  if (ISO_DATE.test(value)) {
    // Reject impossible calendar days such as 2024-02-31
    const parsed = new Date(`${value}T00:00:00.000Z`);
    if (!Number.isNaN(parsed.getTime()) && formatDate(parsed) === value) {
      return value;
    }
  } else if (ISO_DATE_TIME.test(value)) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return formatDate(parsed);
    }
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not an ISO-8601 date` });
  return z.NEVER;
});

const titleSchema = z.string().trim().min(1);

/**
 * Find the opening delimiter on the first non-blank line.
 * A leading byte order mark is ignored and line endings are normalized.
 *
 * @example
 * detectHeader('+++\ntitle = "A"\n+++\n').dialect // 'toml'
 * detectHeader('# Heading').dialect // 'unrecognized'
 */
export function detectHeader(raw: string): HeaderDetection {
  const lines = raw.replace(/^\uFEFF/, '').split(/\r?\n/);
  const start = lines.findIndex((line) => line.trim() !== '');
  if (start === -1) {
    return { dialect: 'unrecognized', firstLine: '' };
  }

  const firstLine = lines[start].trim();
  for (const dialect of ['toml', 'yaml'] as const) {
    const delimiter = DELIMITERS[dialect];
    if (firstLine === delimiter) {
      return { dialect, text: [delimiter, ...lines.slice(start + 1)].join('\n') };
    }
  }
  return { dialect: 'unrecognized', firstLine };
}

function parseTomlHeader(input: string): object {
  return parseToml(input);
}

function parseYamlHeader(input: string): object {
  const parsed = yaml.load(input);
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('frontmatter must be a mapping of fields');
  }
  return parsed;
}

const MATTER_OPTIONS = {
  toml: { language: 'toml', delimiters: '+++', engines: { toml: parseTomlHeader } },
  yaml: { language: 'yaml', delimiters: '---', engines: { yaml: parseYamlHeader } },
};

function hasClosingDelimiter(text: string, delimiter: string): boolean {
  return text
    .split('\n')
    .slice(1)
    .some((line) => line.trimEnd() === delimiter);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message.split('\n')[0] : String(error);
}

function decodeOptional<T>(
  data: Record<string, unknown>,
  field: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  warnings: IssueDraft[],
): T {
  const value = data[field];
  if (value === undefined || value === null) {
    return fallback;
  }
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const reason = result.error.errors[0]?.message ?? 'invalid value';
  warnings.push({
    kind: field === 'date' ? 'InvalidDate' : 'InvalidField',
    severity: 'warning',
    message: `${field}: ${reason}; using ${JSON.stringify(fallback)}`,
  });
  return fallback;
}

/**
 * Validate a decoded frontmatter table and apply defaults.
 * Only a missing or unusable `title` fails the file.
 *
 * @param data - Table decoded from the header block
 */
export function decodeFrontmatter(data: Record<string, unknown>): DecodeResult {
  const rawTitle = data.title;
  if (rawTitle === undefined || rawTitle === null) {
    return { success: false, issue: { kind: 'MissingField', severity: 'error', message: 'missing required field "title"' } };
  }
  const title = titleSchema.safeParse(rawTitle);
  if (!title.success) {
    return typeof rawTitle === 'string'
      ? { success: false, issue: { kind: 'MissingField', severity: 'error', message: 'required field "title" is blank' } }
      : { success: false, issue: { kind: 'InvalidField', severity: 'error', message: 'title: expected a string' } };
  }

  const warnings: IssueDraft[] = [];

  if (data.description === undefined || data.description === null) {
    warnings.push({ kind: 'MissingField', severity: 'warning', message: 'missing field "description"' });
  }
  const description = decodeOptional(data, 'description', z.string(), '', warnings);
  const date = decodeOptional<string | null>(data, 'date', dateSchema, null, warnings);
  const draft = decodeOptional(data, 'draft', z.boolean(), false, warnings);
  const weight = decodeOptional(data, 'weight', z.number().int(), 0, warnings);
  const template = decodeOptional<string | null>(data, 'template', z.string().trim(), null, warnings);

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_FIELDS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    success: true,
    frontmatter: {
      title: title.data,
      description,
      date,
      draft,
      weight,
      template: template === '' ? null : template,
      extra,
    },
    warnings,
  };
}

/**
 * Split a content file into frontmatter and body.
 * Pure function of its input; never throws.
 *
 * @param raw - Full text of the file
 * @returns Decoded frontmatter and body, or the issue that rejected the file
 */
export function parseContentFile(raw: string): ParseResult {
  const header = detectHeader(raw);
  if (header.dialect === 'unrecognized') {
    const shown = header.firstLine ? `"${header.firstLine.slice(0, 40)}"` : 'an empty file';
    return {
      success: false,
      issue: {
        kind: 'UnrecognizedHeader',
        severity: 'error',
        message: `expected +++ or --- on the first non-blank line, found ${shown}`,
      },
    };
  }

  const delimiter = DELIMITERS[header.dialect];
  if (!hasClosingDelimiter(header.text, delimiter)) {
    return {
      success: false,
      issue: { kind: 'MalformedHeader', severity: 'error', message: `no closing ${delimiter} line` },
    };
  }

  let file: matter.GrayMatterFile<string>;
  try {
    file = matter(header.text, MATTER_OPTIONS[header.dialect]);
  } catch (error) {
    return {
      success: false,
      issue: {
        kind: 'MalformedHeader',
        severity: 'error',
        message: `invalid ${header.dialect.toUpperCase()} frontmatter: ${describeError(error)}`,
      },
    };
  }

  const data: Record<string, unknown> = file.data;
  const decoded = decodeFrontmatter(data);
  if (!decoded.success) {
    return decoded;
  }

  return {
    success: true,
    dialect: header.dialect,
    frontmatter: decoded.frontmatter,
    body: file.content,
    warnings: decoded.warnings,
  };
}
