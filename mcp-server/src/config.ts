import * as path from 'path';
import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  WORD_FILES_PATH: z.string().trim().min(1).default('./word_files'),
  SOFFICE_PATH: z.string().trim().min(1).default('soffice'),
  CONVERSION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ServerConfig {
  /** Absolute root under which every document name is resolved. */
  wordFilesPath: string;
  sofficePath: string;
  conversionTimeoutMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return {
    wordFilesPath: path.resolve(parsed.data.WORD_FILES_PATH),
    sofficePath: parsed.data.SOFFICE_PATH,
    conversionTimeoutMs: parsed.data.CONVERSION_TIMEOUT_MS,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
