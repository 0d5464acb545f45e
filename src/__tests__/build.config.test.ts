import { describe, it, expect } from 'vitest'
import fs from 'node:fs'
import { fileURLToPath } from 'node:url'

function readJson(name: string): unknown {
  return JSON.parse(fs.readFileSync(fileURLToPath(new URL(`../../${name}`, import.meta.url)), 'utf8'))
}

describe('build configuration', () => {
  it('type-checks without emitting and builds into dist through its own config', () => {
    expect(readJson('tsconfig.json')).toMatchObject({ compilerOptions: { noEmit: true } })
    expect(readJson('tsconfig.json')).not.toHaveProperty('compilerOptions.outDir')
    expect(readJson('tsconfig.build.json')).toMatchObject({
      extends: './tsconfig.json',
      compilerOptions: { noEmit: false, outDir: 'dist' },
      exclude: ['**/__tests__/**', 'dist'],
    })
    expect(readJson('package.json')).toMatchObject({
      scripts: { build: 'tsc -p tsconfig.build.json', typecheck: 'tsc --noEmit' },
    })
  })
})
