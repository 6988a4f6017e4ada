import { config as loadEnv } from 'dotenv'

import { configSchema, type ToolbeltConfig } from './schema.js'

/** Parses comma-separated env values. */
export function parseCsv(input: string | undefined): string[] {
  if (!input) return []
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

/**
 * Reads configuration from `TOOLBELT_*` variables. Unset variables take the
 * schema defaults; malformed values throw a zod error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolbeltConfig {
  return configSchema.parse({
    logLevel: env.TOOLBELT_LOG_LEVEL || undefined,
    onDuplicate: env.TOOLBELT_ON_DUPLICATE || undefined,
    modules: parseCsv(env.TOOLBELT_MODULES)
  })
}

/** Loads `.env` (or `path`) into `process.env`, then reads configuration from it. */
export function loadConfigWithDotenv(path?: string): ToolbeltConfig {
  loadEnv(path ? { path } : undefined)
  return loadConfig()
}
