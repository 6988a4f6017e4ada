import { transformWithEsbuild } from 'vite'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  // Tool names default to `fn.name`; esbuild would otherwise rename
  // `const add = tool()(function add() {})` to `add2`. Vite's built-in
  // esbuild plugin always forces `keepNames: false`, so TypeScript is
  // transformed here instead, with `keepNames` on.
  esbuild: false,
  plugins: [
    {
      name: 'toolbelt:esbuild-keep-names',
      enforce: 'pre',
      async transform(code, id) {
        if (!/\.[mc]?ts$/.test(id.split('?')[0])) return null
        const result = await transformWithEsbuild(code, id, {
          loader: 'ts',
          target: 'esnext',
          keepNames: true,
          sourcemap: true
        })
        return { code: result.code, map: JSON.stringify(result.map) }
      }
    }
  ],
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      TOOLBELT_LOG_LEVEL: 'silent'
    }
  }
})
