import { z } from 'zod'

import { LOG_LEVELS } from '../core/logger.js'

/**
 * Runtime configuration schema for the toolbelt and its CLI.
 */
export const configSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  // What registering an existing qualified name does: throw, or swap the record in place.
  onDuplicate: z.enum(['reject', 'replace']).default('reject'),
  // Tool modules the CLI imports before listing or calling.
  modules: z.array(z.string()).default([])
})

export type ToolbeltConfig = z.infer<typeof configSchema>
