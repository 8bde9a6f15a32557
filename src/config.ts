import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

// Load environment variables from .env file
dotenvConfig();

// Blank values in .env count as unset
const blankToUndefined = (val: unknown) => {
  if (typeof val === 'string' && val.trim().length === 0) {
    return undefined;
  }
  return val;
};

export const logLevels = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof logLevels)[number];

const envSchema = z.object({
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(logLevels).default('warn')),
  AUDIT_LOG_FILE: z.preprocess(blankToUndefined, z.string().min(1).optional()),
  DRIVE_PAGE_SIZE: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(1000).default(1000)
  ),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(): Config {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Environment validation failed:', result.error.format());
    process.exit(1);
  }
  return result.data;
}
