import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

const flag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.toLowerCase() === 'true');

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Math.max(1, parseInt(v, 10) || parseInt(fallback, 10)));

const schema = z.object({
  CONTENT_ROOT: z.string().min(1).default('content'),
  OUTPUT_FILE: z.string().min(1).default('output/corpus.json'),
  CONTENT_PATTERN: z.string().min(1).optional(),
  SCAN_CONCURRENCY: positiveInt('8'),
  READ_TIMEOUT_MS: positiveInt('5000'),
  DEFAULT_TEMPLATE: z.string().min(1).default('page.html'),
  INCLUDE_DRAFTS: flag('false'),
  LOWERCASE_COLLECTION_IDS: flag('false'),
  RESCAN_SCHEDULE: z.string().default('*/5 * * * *'),
});

export type AppConfig = z.infer<typeof schema>;

/**
 * Validate environment settings and apply defaults.
 *
 * @param env - Variables to read (defaults to process.env, after .env is loaded)
 * @throws {Error} Listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const errs = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}
