import { z } from 'zod/v4'

import type { EnumValue, ParameterSchema, ParameterShape, ParameterSpec, TypeKind } from './types.js'

type AnySchema = z.core.$ZodType

const ANY: TypeKind = { kind: 'any' }

function isEnumValue(value: unknown): value is EnumValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value)
}

/** Returns the schema a transparent wrapper decorates, or undefined for leaf schemas. */
function innerOf(schema: AnySchema): AnySchema | undefined {
  if (schema instanceof z.ZodOptional) return schema.unwrap()
  if (schema instanceof z.ZodNullable) return schema.unwrap()
  if (schema instanceof z.ZodDefault) return schema.unwrap()
  if (schema instanceof z.ZodPrefault) return schema._zod.def.innerType
  if (schema instanceof z.ZodReadonly) return schema._zod.def.innerType
  if (schema instanceof z.ZodCatch) return schema._zod.def.innerType
  if (schema instanceof z.ZodPipe) return schema.in
  return undefined
}

/** Outermost `.describe()` text along the wrapper chain. */
function descriptionOf(schema: AnySchema): string {
  let current: AnySchema | undefined = schema
  while (current) {
    const text = z.globalRegistry.get(current)?.description
    if (text) return text
    current = innerOf(current)
  }
  return ''
}

function isNullish(schema: AnySchema): boolean {
  return schema instanceof z.ZodNull || schema instanceof z.ZodUndefined || schema instanceof z.ZodVoid
}

function inferUnion(options: readonly AnySchema[]): TypeKind {
  const present = options.filter((option) => !isNullish(option))
  const nullable = present.length < options.length

  let merged: TypeKind = ANY
  if (present.length === 1 && present[0]) {
    merged = inferType(present[0])
  } else if (present.length > 1) {
    const kinds = present.map(inferType)
    const values: EnumValue[] = []
    let allEnums = true
    for (const kind of kinds) {
      if (kind.kind === 'enum') values.push(...kind.values)
      else allEnums = false
    }
    if (allEnums) merged = { kind: 'enum', values: [...new Set(values)] }
  }

  if (!nullable || merged.kind === 'optional') return merged
  return { kind: 'optional', inner: merged }
}

/**
 * Maps a zod schema onto the closed {@link TypeKind} vocabulary.
 * Anything unrecognised becomes `any`.
 */
export function inferType(schema: AnySchema): TypeKind {
  if (schema instanceof z.ZodString) return { kind: 'string' }
  if (schema instanceof z.ZodNumber) return schema.isInt ? { kind: 'integer' } : { kind: 'float' }
  if (schema instanceof z.ZodBigInt) return { kind: 'integer' }
  if (schema instanceof z.ZodBoolean) return { kind: 'boolean' }
  if (schema instanceof z.ZodArray) return { kind: 'array', items: inferType(schema.element) }
  if (schema instanceof z.ZodTuple) return { kind: 'array', items: ANY }
  if (schema instanceof z.ZodRecord) return { kind: 'object', values: inferType(schema.valueType) }
  if (schema instanceof z.ZodObject) return { kind: 'object', values: ANY }
  if (schema instanceof z.ZodEnum) {
    return { kind: 'enum', values: schema.options.filter(isEnumValue) }
  }
  if (schema instanceof z.ZodLiteral) {
    return { kind: 'enum', values: [...schema.values].filter(isEnumValue) }
  }
  if (schema instanceof z.ZodUnion) return inferUnion(schema.options)
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = inferType(schema.unwrap())
    return inner.kind === 'optional' ? inner : { kind: 'optional', inner }
  }

  const inner = innerOf(schema)
  return inner ? inferType(inner) : ANY
}

// zod hands out shallow copies of a default, so nested values are shared
// with every call that falls back to it. The listing keeps its own copy.
function detachedDefault(value: unknown): { default?: unknown } {
  try {
    return { default: structuredClone(value) }
  } catch {
    // Not cloneable (functions, host objects): listed without a default.
    return {}
  }
}

function parameterSpec(schema: AnySchema): ParameterSpec {
  const description = descriptionOf(schema)

  if (schema instanceof z.ZodDefault || schema instanceof z.ZodPrefault) {
    const parsed = schema.safeParse(undefined)
    return {
      type: inferType(schema._zod.def.innerType),
      required: false,
      ...(parsed.success ? detachedDefault(parsed.data) : {}),
      description
    }
  }

  // `.optional()` carries an implicit `undefined` default.
  const required = schema._zod.optin !== 'optional'
  return { type: inferType(schema), required, description }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key))
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Derives the parameter schema of a tool from its zod shape.
 *
 * Inference is total: it never throws, so a malformed or exotic schema can
 * never block registration.
 */
export function inferSchema(shape: ParameterShape): ParameterSchema {
  const schema: Record<string, ParameterSpec> = {}
  for (const [name, field] of Object.entries(shape)) {
    try {
      schema[name] = parameterSpec(field)
    } catch {
      schema[name] = { type: ANY, required: true, description: '' }
    }
  }
  return deepFreeze(schema)
}

/** Plain JSON Schema fragment. */
export interface JsonSchema {
  type?: string
  items?: JsonSchema
  additionalProperties?: JsonSchema | boolean
  enum?: EnumValue[]
  nullable?: boolean
  description?: string
  default?: unknown
  properties?: Record<string, JsonSchema>
  required?: string[]
}

function kindToJsonSchema(type: TypeKind): JsonSchema {
  switch (type.kind) {
    case 'string':
    case 'integer':
    case 'boolean':
      return { type: type.kind }
    case 'float':
      return { type: 'number' }
    case 'array':
      return { type: 'array', items: kindToJsonSchema(type.items) }
    case 'object':
      return type.values.kind === 'any'
        ? { type: 'object' }
        : { type: 'object', additionalProperties: kindToJsonSchema(type.values) }
    case 'optional':
      return { ...kindToJsonSchema(type.inner), nullable: true }
    case 'enum':
      return { enum: [...type.values] }
    case 'any':
      return {}
  }
}

/**
 * Renders a parameter schema as a JSON Schema object, the raw shape format
 * adapters wrap into vendor tool descriptors.
 */
export function toJsonSchema(schema: ParameterSchema): JsonSchema {
  const properties: Record<string, JsonSchema> = {}
  const required: string[] = []

  for (const [name, spec] of Object.entries(schema)) {
    properties[name] = {
      ...kindToJsonSchema(spec.type),
      ...(spec.description ? { description: spec.description } : {}),
      ...('default' in spec ? { default: spec.default } : {})
    }
    if (spec.required) required.push(name)
  }

  return { type: 'object', properties, required }
}
