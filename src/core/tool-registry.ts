import { DuplicateToolError } from './errors.js'
import type { DuplicatePolicy, Logger, ToolRecord } from './types.js'

/**
 * In-memory store of tool records keyed by qualified name.
 *
 * Written during startup, read-only afterwards. Records are frozen by the
 * caller before they reach the store.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolRecord>()

  constructor(
    private readonly onDuplicate: DuplicatePolicy = 'reject',
    private readonly logger?: Logger
  ) {}

  /**
   * Installs a record. An existing qualified name is rejected with
   * {@link DuplicateToolError} or, under the `replace` policy, swapped in place
   * so the listing order is unchanged.
   */
  register(record: ToolRecord): void {
    const existing = this.tools.get(record.qualifiedName)
    if (existing) {
      if (this.onDuplicate === 'reject') {
        throw new DuplicateToolError(record.qualifiedName, existing.source)
      }
      this.logger?.warn('tool.replaced', {
        tool: record.qualifiedName,
        previous: existing.source ?? 'unknown',
        current: record.source ?? 'unknown'
      })
    }
    this.tools.set(record.qualifiedName, record)
  }

  /** Gets a tool by qualified name. */
  get(qualifiedName: string): ToolRecord | undefined {
    return this.tools.get(qualifiedName)
  }

  has(qualifiedName: string): boolean {
    return this.tools.has(qualifiedName)
  }

  /** Every record with the given bare name, in registration order. */
  byName(name: string): ToolRecord[] {
    const matches: ToolRecord[] = []
    for (const record of this.tools.values()) {
      if (record.name === name) matches.push(record)
    }
    return matches
  }

  /**
   * Yields records in registration order, optionally limited to `groups`.
   * Each call starts a fresh pass.
   */
  *list(groups?: Iterable<string>): Generator<ToolRecord, void, undefined> {
    const wanted = groups ? new Set(groups) : undefined
    for (const record of this.tools.values()) {
      if (!wanted || wanted.has(record.group)) yield record
    }
  }

  get size(): number {
    return this.tools.size
  }
}
