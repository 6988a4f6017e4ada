import type { z } from 'zod/v4'

/** Group used for tools registered without one. */
export const DEFAULT_GROUP = 'default'

/** Separator between group and bare name in a qualified tool name. */
export const QUALIFIER = '.'

export type ExecutionMode = 'sync' | 'async'

export type DuplicatePolicy = 'reject' | 'replace'

/** zod shape a tool author declares for its keyword arguments. */
export type ParameterShape = z.core.$ZodShape

export type EnumValue = string | number | boolean | null

/**
 * Closed vocabulary of parameter types, independent of zod.
 */
export type TypeKind =
  | { kind: 'string' }
  | { kind: 'integer' }
  | { kind: 'float' }
  | { kind: 'boolean' }
  | { kind: 'array'; items: TypeKind }
  | { kind: 'object'; values: TypeKind }
  | { kind: 'optional'; inner: TypeKind }
  | { kind: 'enum'; values: EnumValue[] }
  | { kind: 'any' }

export interface ParameterSpec {
  type: TypeKind
  /** True iff the parameter has no default value. */
  required: boolean
  /** Present only when the parameter declares an explicit default. */
  default?: unknown
  description: string
}

/** Ordered parameter name -> spec mapping (insertion order is declaration order). */
export type ParameterSchema = Readonly<Record<string, Readonly<ParameterSpec>>>

/**
 * Any function taking one keyword bag. The argument type is `never` so every
 * typed tool is assignable; the dispatcher calls it with validated input.
 */
export type ToolFunction = (args: never) => unknown

/**
 * Immutable record of one registered tool.
 */
export interface ToolRecord {
  readonly name: string
  readonly group: string
  readonly qualifiedName: string
  /** The original function, never wrapped. */
  readonly fn: ToolFunction
  readonly mode: ExecutionMode
  readonly description: string
  readonly schema: ParameterSchema
  /** zod shape the schema was inferred from; drives argument validation. */
  readonly inputShape: ParameterShape
  /** `file:line` of the registration site, when it could be determined. */
  readonly source?: string
}

/**
 * Stable enumeration entry handed to vendor format adapters.
 */
export interface ToolListing {
  name: string
  description: string
  parameters: ParameterSchema
}

export type ToolErrorKind =
  | 'NotFound'
  | 'AmbiguousName'
  | 'InvalidArguments'
  | 'ExecutionError'
  | 'ExecutionModeError'

export interface ToolError {
  kind: ToolErrorKind
  message: string
  /** Qualified name of the resolved tool, once resolution succeeded. */
  tool?: string
  /** Offending parameter names for `InvalidArguments`. */
  params?: string[]
  /** Colliding qualified names for `AmbiguousName`. */
  candidates?: string[]
}

export interface ToolSuccess<T = unknown> {
  ok: true
  tool: string
  value: T
}

export interface ToolFailure {
  ok: false
  error: ToolError
}

/** Envelope returned by both execution entry points. */
export type ToolResult<T = unknown> = ToolSuccess<T> | ToolFailure

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug?(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}
