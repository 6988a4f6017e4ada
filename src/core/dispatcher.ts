import { setImmediate as nextMacrotask } from 'node:timers/promises'

import { checkArguments } from './arguments.js'
import { errorMessage } from './errors.js'
import { resolveTool } from './resolver.js'
import type { ToolRegistry } from './tool-registry.js'
import type { Logger, ToolFailure, ToolRecord, ToolResult } from './types.js'

type Prepared = { ok: true; record: ToolRecord; input: Record<string, unknown> } | ToolFailure

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  )
}

function invoke(record: ToolRecord, input: Record<string, unknown>): unknown {
  return Reflect.apply(record.fn, undefined, [input])
}

/**
 * Resolves, validates and invokes tools, returning every outcome as a
 * {@link ToolResult}. Nothing a tool throws crosses this boundary.
 *
 * Two calling conventions share the resolve and validate steps:
 * - `execute` returns a promise. Sync tools run on a later macrotask so the
 *   caller's already-queued work goes first; once started they still hold the
 *   event loop until they return.
 * - `executeSync` returns directly. Async tools are not bridged: a thread
 *   cannot block on a promise it has to settle itself, so they come back as
 *   `ExecutionModeError` without being invoked.
 */
export class Dispatcher {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly logger: Logger
  ) {}

  async execute(name: string, args?: unknown): Promise<ToolResult> {
    const prepared = this.prepare(name, args)
    if (!prepared.ok) return this.reject(name, prepared)
    const { record, input } = prepared

    try {
      if (record.mode === 'sync') await nextMacrotask()
      const value: unknown = await invoke(record, input)
      return this.succeed(record, value)
    } catch (error) {
      return this.fail(record, error)
    }
  }

  executeSync(name: string, args?: unknown): ToolResult {
    const prepared = this.prepare(name, args)
    if (!prepared.ok) return this.reject(name, prepared)
    const { record, input } = prepared

    if (record.mode === 'async') {
      return this.modeError(record, `${record.qualifiedName} is async; call it with execute instead of executeSync`)
    }

    let value: unknown
    try {
      value = invoke(record, input)
    } catch (error) {
      return this.fail(record, error)
    }

    if (isThenable(value)) {
      void Promise.resolve(value).catch((error: unknown) => {
        this.logger.warn('tool.stray_rejection', {
          tool: record.qualifiedName,
          error: errorMessage(error)
        })
      })
      return this.modeError(
        record,
        `${record.qualifiedName} returned a promise from a sync registration; register it with mode 'async'`
      )
    }
    return this.succeed(record, value)
  }

  private prepare(name: string, args: unknown): Prepared {
    const resolution = resolveTool(this.registry, name)
    if (!resolution.ok) return resolution

    const { record } = resolution
    const checked = checkArguments(record, args)
    if (!checked.ok) return checked
    return { ok: true, record, input: checked.input }
  }

  private succeed(record: ToolRecord, value: unknown): ToolResult {
    const result: ToolResult = { ok: true, tool: record.qualifiedName, value }
    this.log(record, result)
    return result
  }

  private fail(record: ToolRecord, error: unknown): ToolResult {
    const result: ToolResult = {
      ok: false,
      error: { kind: 'ExecutionError', message: errorMessage(error), tool: record.qualifiedName }
    }
    this.log(record, result)
    return result
  }

  private modeError(record: ToolRecord, message: string): ToolResult {
    const result: ToolResult = {
      ok: false,
      error: { kind: 'ExecutionModeError', message, tool: record.qualifiedName }
    }
    this.log(record, result)
    return result
  }

  private reject(name: string, failure: ToolFailure): ToolFailure {
    this.logger.warn('tool.rejected', { tool: name, kind: failure.error.kind, error: failure.error.message })
    return failure
  }

  private log(record: ToolRecord, result: ToolResult): void {
    if (result.ok) {
      this.logger.info('tool.executed', { tool: record.qualifiedName, mode: record.mode })
    } else {
      this.logger.error('tool.failed', {
        tool: record.qualifiedName,
        kind: result.error.kind,
        error: result.error.message
      })
    }
  }
}
