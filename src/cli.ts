import * as path from 'node:path'
import type { Writable } from 'node:stream'
import { pathToFileURL } from 'node:url'

import type { ToolbeltConfig } from './config/schema.js'
import { errorMessage } from './core/errors.js'
import { toJsonSchema } from './core/schema.js'
import type { Toolbelt } from './core/toolbelt.js'
import type { Logger } from './core/types.js'

export interface CliContext {
  toolbelt: Toolbelt
  config: ToolbeltConfig
  logger: Logger
  output: Writable
  cwd?: string
}

const USAGE = [
  'usage: toolbelt <command>',
  '',
  '  list [group...]          list tools with their parameter schemas',
  '  schema [group...]        list tools with JSON Schema parameters',
  '  call <name> [json-args]  execute a tool and print the result envelope',
  '',
  'Tool modules are loaded from TOOLBELT_MODULES (comma-separated).'
].join('\n')

/** Module specifier for `import()`: relative and absolute paths become file URLs. */
export function moduleSpecifier(entry: string, cwd: string): string {
  if (entry.startsWith('.') || path.isAbsolute(entry)) {
    return pathToFileURL(path.resolve(cwd, entry)).href
  }
  return entry
}

async function loadModules(ctx: CliContext): Promise<void> {
  const cwd = ctx.cwd ?? process.cwd()
  for (const entry of ctx.config.modules) {
    await import(moduleSpecifier(entry, cwd))
    ctx.logger.debug?.('cli.module_loaded', { module: entry })
  }
}

function print(output: Writable, value: unknown): void {
  output.write(`${JSON.stringify(value, null, 2)}\n`)
}

function parseArgs(raw: string | undefined): { ok: true; args: unknown } | { ok: false; message: string } {
  if (raw === undefined || raw.trim() === '') return { ok: true, args: {} }
  try {
    return { ok: true, args: JSON.parse(raw) }
  } catch (error) {
    return { ok: false, message: `arguments are not valid JSON: ${errorMessage(error)}` }
  }
}

/**
 * Runs one CLI command and resolves to the process exit code.
 * 0 on success, 1 when a tool call fails, 2 on usage errors.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const [command, ...rest] = argv

  if (!command || command === 'help' || command === '--help') {
    ctx.output.write(`${USAGE}\n`)
    return command ? 0 : 2
  }

  await loadModules(ctx)

  switch (command) {
    case 'list': {
      print(ctx.output, ctx.toolbelt.listTools(rest.length > 0 ? rest : undefined))
      return 0
    }
    case 'schema': {
      const listing = ctx.toolbelt.listTools(rest.length > 0 ? rest : undefined)
      print(
        ctx.output,
        listing.map((entry) => ({ ...entry, parameters: toJsonSchema(entry.parameters) }))
      )
      return 0
    }
    case 'call': {
      const [name, raw] = rest
      if (!name) {
        ctx.output.write(`${USAGE}\n`)
        return 2
      }
      const parsed = parseArgs(raw)
      if (!parsed.ok) {
        ctx.logger.error('cli.bad_arguments', { tool: name, error: parsed.message })
        ctx.output.write(`${parsed.message}\n`)
        return 2
      }
      const result = await ctx.toolbelt.execute(name, parsed.args)
      print(ctx.output, result)
      return result.ok ? 0 : 1
    }
    default:
      ctx.output.write(`unknown command: ${command}\n${USAGE}\n`)
      return 2
  }
}
