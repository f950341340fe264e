import * as path from 'path';
import { z } from 'zod';
import type { LogLevel } from '../services/logging/logger';
import type { WizardSettings } from '../domain/contracts';

const envSchema = z.object({
  WIZARD_API_PORT: z.string().default('8787').transform(Number).pipe(z.number().int().positive()),
  LOADER_SERVICE_URL: z.string().url().optional(),
  DATA_SOURCE: z.enum(['fixture', 'http']).default('fixture'),
  FIXTURES_DIR: z.string().optional(),
  IO_POOL_SIZE: z.string().default('4').transform(Number).pipe(z.number().int().positive()),
  FETCH_TIMEOUT_MS: z.string().default('0').transform(Number).pipe(z.number().int().nonnegative()),
  SESSION_TTL_MS: z.string().default('1800000').transform(Number).pipe(z.number().int().positive()),
  MAX_PREVIEW_ROWS: z.string().default('10000').transform(Number).pipe(z.number().int().positive()),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type DataSource = 'fixture' | 'http';

export interface AppConfig {
  port: number;
  loaderServiceUrl: string | null;
  dataSource: DataSource;
  fixturesDir: string;
  ioPoolSize: number;
  fetchTimeoutMs: number;
  sessionTtlMs: number;
  maxPreviewRows: number;
  logLevel: LogLevel;
}

export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  let parsed: z.infer<typeof envSchema>;
  try {
    parsed = envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }

  return {
    port: parsed.WIZARD_API_PORT,
    loaderServiceUrl: parsed.LOADER_SERVICE_URL ?? null,
    dataSource: parsed.DATA_SOURCE,
    fixturesDir: path.resolve(cwd, parsed.FIXTURES_DIR ?? 'fixtures'),
    ioPoolSize: parsed.IO_POOL_SIZE,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    sessionTtlMs: parsed.SESSION_TTL_MS,
    maxPreviewRows: parsed.MAX_PREVIEW_ROWS,
    logLevel: parsed.LOG_LEVEL,
  };
}

/** Settings saved from the web UI win over the environment. */
export function settingsDefaultsFrom(config: AppConfig): WizardSettings {
  return {
    loaderServiceUrl: config.loaderServiceUrl,
    defaultDropNaThreshold: 0,
    maxPreviewRows: config.maxPreviewRows,
  };
}
