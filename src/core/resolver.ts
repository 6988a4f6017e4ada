import type { ToolRegistry } from './tool-registry.js'
import { QUALIFIER, type ToolFailure, type ToolRecord } from './types.js'

export type Resolution = { ok: true; record: ToolRecord } | ToolFailure

function notFound(name: string): ToolFailure {
  return { ok: false, error: { kind: 'NotFound', message: `unknown tool: ${name}` } }
}

/**
 * Maps a qualified (`group.tool`) or bare (`tool`) name to exactly one record.
 *
 * A bare name shared by tools in several groups is reported as
 * `AmbiguousName` with the colliding qualified names; it is never resolved
 * to one of them.
 */
export function resolveTool(registry: ToolRegistry, name: string): Resolution {
  if (!name) return notFound(name)

  if (name.includes(QUALIFIER)) {
    const record = registry.get(name)
    return record ? { ok: true, record } : notFound(name)
  }

  const matches = registry.byName(name)
  const [only] = matches
  if (matches.length === 1 && only) return { ok: true, record: only }
  if (matches.length === 0) return notFound(name)

  const candidates = matches.map((record) => record.qualifiedName)
  return {
    ok: false,
    error: {
      kind: 'AmbiguousName',
      message: `ambiguous tool name "${name}"; use one of: ${candidates.join(', ')}`,
      candidates
    }
  }
}
