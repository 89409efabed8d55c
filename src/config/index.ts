import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Input
  journalPath: z.string().min(1).default('./Journal.json'),

  // Text conversion
  pandocPath: z.string().min(1).default('pandoc'),
  headingShift: z.coerce.number().int().nonnegative().default(4),

  // Photo links are written relative to this directory
  imagesDir: z.string().min(1).default('./images'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    journalPath: env('JOURNAL_PATH'),
    pandocPath: env('PANDOC_PATH'),
    headingShift: env('HEADING_SHIFT'),
    imagesDir: env('IMAGES_DIR'),
    logLevel: env('LOG_LEVEL'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}
