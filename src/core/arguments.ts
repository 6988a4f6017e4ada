import { z } from 'zod/v4'

import type { ToolFailure, ToolRecord } from './types.js'

export type ArgumentCheck = { ok: true; input: Record<string, unknown> } | ToolFailure

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalid(record: ToolRecord, params: string[], detail: string): ToolFailure {
  return {
    ok: false,
    error: {
      kind: 'InvalidArguments',
      message: `invalid arguments for ${record.qualifiedName}: ${detail}`,
      tool: record.qualifiedName,
      params
    }
  }
}

/**
 * Checks a keyword bag against a tool's schema and returns the input the
 * tool will be called with (defaults applied, zod coercions run).
 */
export function checkArguments(record: ToolRecord, args: unknown): ArgumentCheck {
  const bag = args === undefined ? {} : args
  if (!isPlainObject(bag)) {
    return invalid(record, [], 'arguments must be an object of named parameters')
  }

  const unknown = Object.keys(bag).filter((name) => !Object.hasOwn(record.schema, name))
  if (unknown.length > 0) {
    return invalid(record, unknown, `unknown parameter(s) ${unknown.map((n) => `"${n}"`).join(', ')}`)
  }

  const missing = Object.entries(record.schema)
    .filter(([name, spec]) => spec.required && bag[name] === undefined)
    .map(([name]) => name)
  if (missing.length > 0) {
    return invalid(
      record,
      missing,
      `missing required parameter(s) ${missing.map((n) => `"${n}"`).join(', ')}`
    )
  }

  const parsed = z.object(record.inputShape).safeParse(bag)
  if (!parsed.success) {
    const params = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? '')))].filter(Boolean)
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    return invalid(record, params, detail)
  }

  const input: Record<string, unknown> = parsed.data
  return { ok: true, input }
}
