import { mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { loadConfig, loadConfigWithDotenv, parseCsv } from '../src/config/load.js'

describe('loadConfig', () => {
  afterEach(() => {
    delete process.env.TOOLBELT_MODULES
    delete process.env.TOOLBELT_ON_DUPLICATE
  })

  it('applies defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      onDuplicate: 'reject',
      modules: []
    })
  })

  it('reads TOOLBELT_ variables', () => {
    expect(
      loadConfig({
        TOOLBELT_LOG_LEVEL: 'warn',
        TOOLBELT_ON_DUPLICATE: 'replace',
        TOOLBELT_MODULES: './tools/math.js, ./tools/text.js,'
      })
    ).toEqual({
      logLevel: 'warn',
      onDuplicate: 'replace',
      modules: ['./tools/math.js', './tools/text.js']
    })
  })

  it('treats empty strings as unset', () => {
    expect(loadConfig({ TOOLBELT_LOG_LEVEL: '', TOOLBELT_ON_DUPLICATE: '' })).toMatchObject({
      logLevel: 'info',
      onDuplicate: 'reject'
    })
    expect(loadConfig({ TOOLBELT_MODULES: ' , ' }).modules).toEqual([])
  })

  it('rejects malformed values', () => {
    expect(() => loadConfig({ TOOLBELT_ON_DUPLICATE: 'ignore' })).toThrow()
    expect(() => loadConfig({ TOOLBELT_LOG_LEVEL: 'verbose' })).toThrow()
  })

  it('loads a dotenv file into the environment first', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'toolbelt-test-'))
    const path = join(dir, '.env')
    await writeFile(path, 'TOOLBELT_MODULES=./from-dotenv.js\nTOOLBELT_ON_DUPLICATE=replace\n', 'utf-8')

    const config = loadConfigWithDotenv(path)
    expect(config.modules).toEqual(['./from-dotenv.js'])
    expect(config.onDuplicate).toBe('replace')
  })
})

describe('parseCsv', () => {
  it('splits, trims and drops empty entries', () => {
    expect(parseCsv(' a, b ,,c ')).toEqual(['a', 'b', 'c'])
    expect(parseCsv(undefined)).toEqual([])
  })
})
