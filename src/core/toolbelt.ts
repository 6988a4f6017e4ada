import { fileURLToPath } from 'node:url'
import { types } from 'node:util'

import type { z } from 'zod/v4'

import { loadConfig } from '../config/load.js'
import { Dispatcher } from './dispatcher.js'
import { ToolDefinitionError } from './errors.js'
import { createLogger } from './logger.js'
import { resolveTool, type Resolution } from './resolver.js'
import { inferSchema } from './schema.js'
import { ToolRegistry } from './tool-registry.js'
import {
  DEFAULT_GROUP,
  QUALIFIER,
  type DuplicatePolicy,
  type ExecutionMode,
  type Logger,
  type ParameterShape,
  type ToolListing,
  type ToolRecord,
  type ToolResult
} from './types.js'

export interface ToolOptions<S extends ParameterShape = ParameterShape> {
  /** Defaults to the function's own name. */
  name?: string
  /** Defaults to {@link DEFAULT_GROUP}. */
  group?: string
  description?: string
  /** zod schemas for each keyword argument. Omitted means the tool takes none. */
  parameters?: S
  /** Overrides detection, e.g. for plain functions that return promises. */
  mode?: ExecutionMode
}

export interface ToolbeltOptions {
  onDuplicate?: DuplicatePolicy
  logger?: Logger
}

/** Keyword bag a tool with shape `S` receives. */
export type ToolInput<S extends ParameterShape> = z.output<z.ZodObject<S>>

const thisFile = fileURLToPath(import.meta.url)

/** `file:line` of the first stack frame outside this module. */
function registrationSite(): string | undefined {
  const frames = new Error().stack?.split('\n').slice(1) ?? []
  for (const frame of frames) {
    const match = /\(?(\S+?):(\d+):\d+\)?$/.exec(frame.trim())
    const file = match?.[1]?.replace(/\?.*$/, '')
    if (!file || !match?.[2] || file.startsWith('node:')) continue
    const path = file.startsWith('file://') ? fileURLToPath(file) : file
    if (path === thisFile) continue
    return `${path}:${match[2]}`
  }
  return undefined
}

function checkIdentifier(kind: 'name' | 'group', value: string): void {
  if (!value) throw new ToolDefinitionError(`tool ${kind} must not be empty`)
  if (value.includes(QUALIFIER)) {
    throw new ToolDefinitionError(`tool ${kind} "${value}" must not contain "${QUALIFIER}"`)
  }
}

/**
 * A namespace of tools: registration, lookup, enumeration and execution.
 *
 * Populate it during startup, typically at module top level; afterwards it is
 * only read. The process-wide instance is {@link defaultToolbelt}.
 */
export class Toolbelt {
  private readonly registry: ToolRegistry
  private readonly dispatcher: Dispatcher
  private readonly logger: Logger

  constructor(options: ToolbeltOptions = {}) {
    this.logger = options.logger ?? createLogger()
    this.registry = new ToolRegistry(options.onDuplicate ?? 'reject', this.logger)
    this.dispatcher = new Dispatcher(this.registry, this.logger)
  }

  /**
   * Returns a decorator that registers a function as a tool and hands the
   * same function back, so it stays directly callable.
   *
   * ```ts
   * export const add = tool({ group: 'math', parameters: { a: z.number(), b: z.number() } })(
   *   function add({ a, b }) {
   *     return a + b
   *   }
   * )
   * ```
   *
   * The name defaults to `fn.name`. Bundlers that rename functions (esbuild
   * without `keepNames`) change that default; pass `name` explicitly there:
   *
   * ```ts
   * tool({ name: 'add', group: 'math', parameters: { a: z.number(), b: z.number() } })(({ a, b }) => a + b)
   * ```
   */
  tool<S extends ParameterShape = Record<never, never>>(
    options: ToolOptions<S> = {}
  ): <F extends (args: ToolInput<S>) => unknown>(fn: F) => F {
    return (fn) => {
      this.install(fn, options)
      return fn
    }
  }

  /** Looks up a tool by qualified or bare name. */
  resolve(name: string): Resolution {
    return resolveTool(this.registry, name)
  }

  has(qualifiedName: string): boolean {
    return this.registry.has(qualifiedName)
  }

  /** Lazily yields records in registration order, optionally for some groups only. */
  records(groups?: Iterable<string>): Generator<ToolRecord, void, undefined> {
    return this.registry.list(groups)
  }

  /** Schema listing consumed by vendor format adapters. */
  listTools(groups?: Iterable<string>): ToolListing[] {
    return Array.from(this.registry.list(groups), (record) => ({
      name: record.qualifiedName,
      description: record.description,
      parameters: record.schema
    }))
  }

  execute(name: string, args?: unknown): Promise<ToolResult> {
    return this.dispatcher.execute(name, args)
  }

  executeSync(name: string, args?: unknown): ToolResult {
    return this.dispatcher.executeSync(name, args)
  }

  private install(fn: (args: never) => unknown, options: ToolOptions<ParameterShape>): void {
    if (typeof fn !== 'function') {
      throw new ToolDefinitionError('tool() must decorate a function')
    }
    const name = options.name ?? fn.name
    const group = options.group ?? DEFAULT_GROUP
    checkIdentifier('name', name)
    checkIdentifier('group', group)

    const inputShape: ParameterShape = Object.freeze({ ...(options.parameters ?? {}) })
    const source = registrationSite()
    const record: ToolRecord = Object.freeze({
      name,
      group,
      qualifiedName: `${group}${QUALIFIER}${name}`,
      fn,
      mode: options.mode ?? (types.isAsyncFunction(fn) ? 'async' : 'sync'),
      description: options.description?.trim() ?? '',
      schema: inferSchema(inputShape),
      inputShape,
      ...(source ? { source } : {})
    })

    this.registry.register(record)
    this.logger.debug?.('tool.registered', {
      tool: record.qualifiedName,
      mode: record.mode,
      params: Object.keys(record.schema)
    })
  }
}

function defaultOptions(): ToolbeltOptions {
  const config = loadConfig()
  return {
    onDuplicate: config.onDuplicate,
    logger: createLogger(config.logLevel)
  }
}

/** Process-wide toolbelt behind the module-level helpers. */
export const defaultToolbelt = new Toolbelt(defaultOptions())

export function tool<S extends ParameterShape = Record<never, never>>(
  options: ToolOptions<S> = {}
): <F extends (args: ToolInput<S>) => unknown>(fn: F) => F {
  return defaultToolbelt.tool(options)
}

export function listTools(groups?: Iterable<string>): ToolListing[] {
  return defaultToolbelt.listTools(groups)
}

export function execute(name: string, args?: unknown): Promise<ToolResult> {
  return defaultToolbelt.execute(name, args)
}

export function executeSync(name: string, args?: unknown): ToolResult {
  return defaultToolbelt.executeSync(name, args)
}
