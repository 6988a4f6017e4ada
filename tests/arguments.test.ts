import { describe, expect, it } from 'vitest'
import { z } from 'zod/v4'

import { checkArguments } from '../src/core/arguments.js'
import { inferSchema } from '../src/core/schema.js'
import type { ParameterShape, ToolRecord } from '../src/core/types.js'

function makeRecord(inputShape: ParameterShape): ToolRecord {
  return {
    name: 'calc',
    group: 'math',
    qualifiedName: 'math.calc',
    fn: () => 0,
    mode: 'sync',
    description: '',
    schema: inferSchema(inputShape),
    inputShape
  }
}

const record = makeRecord({
  a: z.number(),
  b: z.number().default(2),
  note: z.string().optional()
})

describe('checkArguments', () => {
  it('applies defaults and passes declared arguments through', () => {
    expect(checkArguments(record, { a: 1 })).toEqual({ ok: true, input: { a: 1, b: 2 } })
    expect(checkArguments(record, { a: 1, b: 5, note: 'x' })).toEqual({
      ok: true,
      input: { a: 1, b: 5, note: 'x' }
    })
  })

  it('names unknown parameters', () => {
    expect(checkArguments(record, { a: 1, c: 3, d: 4 })).toEqual({
      ok: false,
      error: {
        kind: 'InvalidArguments',
        message: 'invalid arguments for math.calc: unknown parameter(s) "c", "d"',
        tool: 'math.calc',
        params: ['c', 'd']
      }
    })
  })

  it('names missing required parameters, treating undefined as missing', () => {
    const expected = {
      ok: false,
      error: {
        kind: 'InvalidArguments',
        message: 'invalid arguments for math.calc: missing required parameter(s) "a"',
        tool: 'math.calc',
        params: ['a']
      }
    }
    expect(checkArguments(record, {})).toEqual(expected)
    expect(checkArguments(record, undefined)).toEqual(expected)
    expect(checkArguments(record, { a: undefined })).toEqual(expected)
  })

  it('rejects non-object argument bags', () => {
    for (const bag of [[1, 2], 'a=1', 42, null]) {
      expect(checkArguments(record, bag)).toEqual({
        ok: false,
        error: {
          kind: 'InvalidArguments',
          message: 'invalid arguments for math.calc: arguments must be an object of named parameters',
          tool: 'math.calc',
          params: []
        }
      })
    }
  })

  it('names parameters whose values fail the shape check', () => {
    const result = checkArguments(record, { a: 1, b: 'two', note: 3 })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidArguments')
      expect(result.error.params).toEqual(['b', 'note'])
      expect(result.error.message.startsWith('invalid arguments for math.calc: b: ')).toBe(true)
    }
  })

  it('accepts an empty bag for tools without parameters', () => {
    expect(checkArguments(makeRecord({}), undefined)).toEqual({ ok: true, input: {} })
  })
})
