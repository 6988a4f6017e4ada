import { describe, expect, it } from 'vitest'
import { z } from 'zod/v4'

import { inferSchema, inferType, toJsonSchema } from '../src/core/schema.js'

describe('inferType', () => {
  it('maps primitives', () => {
    expect(inferType(z.string())).toEqual({ kind: 'string' })
    expect(inferType(z.number())).toEqual({ kind: 'float' })
    expect(inferType(z.number().int())).toEqual({ kind: 'integer' })
    expect(inferType(z.boolean())).toEqual({ kind: 'boolean' })
  })

  it('resolves containers recursively', () => {
    expect(inferType(z.array(z.array(z.string())))).toEqual({
      kind: 'array',
      items: { kind: 'array', items: { kind: 'string' } }
    })
    expect(inferType(z.record(z.string(), z.number()))).toEqual({
      kind: 'object',
      values: { kind: 'float' }
    })
    expect(inferType(z.object({ id: z.string() }))).toEqual({ kind: 'object', values: { kind: 'any' } })
  })

  it('maps optional and nullable wrappers to optional', () => {
    expect(inferType(z.string().nullable())).toEqual({ kind: 'optional', inner: { kind: 'string' } })
    expect(inferType(z.string().optional().nullable())).toEqual({
      kind: 'optional',
      inner: { kind: 'string' }
    })
  })

  it('maps enums, literals and literal unions to enum', () => {
    expect(inferType(z.enum(['fast', 'slow']))).toEqual({ kind: 'enum', values: ['fast', 'slow'] })
    expect(inferType(z.literal('only'))).toEqual({ kind: 'enum', values: ['only'] })
    expect(inferType(z.union([z.literal(1), z.literal(2), z.null()]))).toEqual({
      kind: 'optional',
      inner: { kind: 'enum', values: [1, 2] }
    })
  })

  it('collapses a union with one non-null member', () => {
    expect(inferType(z.union([z.string(), z.null()]))).toEqual({
      kind: 'optional',
      inner: { kind: 'string' }
    })
  })

  it('reads the input side of transforms', () => {
    expect(inferType(z.string().transform((s) => s.length))).toEqual({ kind: 'string' })
  })

  it('degrades unrecognised schemas to any', () => {
    expect(inferType(z.date())).toEqual({ kind: 'any' })
    expect(inferType(z.union([z.string(), z.number()]))).toEqual({ kind: 'any' })
    expect(inferType(z.custom<string>((value) => typeof value === 'string'))).toEqual({ kind: 'any' })
  })
})

describe('inferSchema', () => {
  const schema = inferSchema({
    query: z.string().describe('Search text'),
    limit: z.number().int().default(10),
    tags: z.array(z.string()).optional(),
    mode: z.enum(['fast', 'slow']).describe('Search mode')
  })

  it('keeps declaration order', () => {
    expect(Object.keys(schema)).toEqual(['query', 'limit', 'tags', 'mode'])
  })

  it('derives required, default and description per parameter', () => {
    expect(schema.query).toEqual({ type: { kind: 'string' }, required: true, description: 'Search text' })
    expect(schema.limit).toEqual({ type: { kind: 'integer' }, required: false, default: 10, description: '' })
    expect(schema.tags).toEqual({
      type: { kind: 'optional', inner: { kind: 'array', items: { kind: 'string' } } },
      required: false,
      description: ''
    })
    expect(schema.mode).toEqual({
      type: { kind: 'enum', values: ['fast', 'slow'] },
      required: true,
      description: 'Search mode'
    })
  })

  it('omits the default key when no default is declared', () => {
    expect(schema.tags && 'default' in schema.tags).toBe(false)
  })

  it('reads descriptions through wrappers', () => {
    const wrapped = inferSchema({ size: z.number().describe('Page size').default(20) })
    expect(wrapped.size?.description).toBe('Page size')
  })

  it('freezes the result', () => {
    expect(Object.isFrozen(schema)).toBe(true)
    expect(Object.isFrozen(schema.tags)).toBe(true)
    expect(Object.isFrozen(schema.mode?.type)).toBe(true)
  })

  it('returns an empty schema for an empty shape', () => {
    expect(inferSchema({})).toEqual({})
  })
})

describe('toJsonSchema', () => {
  it('renders a JSON Schema object', () => {
    const schema = inferSchema({
      a: z.number(),
      b: z.number().int().default(2).describe('Second operand'),
      labels: z.record(z.string(), z.string()).nullable(),
      kind: z.enum(['x', 'y'])
    })

    expect(toJsonSchema(schema)).toEqual({
      type: 'object',
      properties: {
        a: { type: 'number' },
        b: { type: 'integer', description: 'Second operand', default: 2 },
        labels: { type: 'object', additionalProperties: { type: 'string' }, nullable: true },
        kind: { enum: ['x', 'y'] }
      },
      required: ['a', 'labels', 'kind']
    })
  })
})
