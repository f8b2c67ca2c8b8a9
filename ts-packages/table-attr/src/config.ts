import { z } from 'zod';

export const LOG_LEVEL_ENV = 'PANDOC_TABLE_ATTR_LOG_LEVEL';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

// Schema definition - single source of truth
export const FilterConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
});

export type FilterConfig = z.infer<typeof FilterConfigSchema>;
export type LogLevel = FilterConfig['logLevel'];

export const DEFAULT_CONFIG: FilterConfig = {
  logLevel: 'warn',
};

export interface LoadedConfig {
  config: FilterConfig;
  /** Problems found while reading the environment, for the caller to log */
  warnings: string[];
}

/**
 * Read filter settings from the environment. Invalid values fall back to
 * the defaults and are reported in `warnings`.
 */
export function loadConfig(env: Record<string, string | undefined>): LoadedConfig {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw.trim() === '') {
    return { config: DEFAULT_CONFIG, warnings: [] };
  }

  const result = FilterConfigSchema.safeParse({ logLevel: raw.trim().toLowerCase() });
  if (result.success) {
    return { config: result.data, warnings: [] };
  }
  return {
    config: DEFAULT_CONFIG,
    warnings: [`Ignoring ${LOG_LEVEL_ENV}=${raw}: expected one of ${LOG_LEVELS.join(', ')}`],
  };
}
