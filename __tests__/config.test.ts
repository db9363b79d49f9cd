import { afterAll, describe, expect, it } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { DEFAULT_OPTIONS, loadLoaderConfig, parseLoaderConfig, resolveOptions } from '../src/core/config'
import { setConsoleOutput } from '../src/core/logger'

setConsoleOutput(false)

describe('resolveOptions', () => {
  it('should fill every option from the defaults', () => {
    expect(resolveOptions()).toEqual({ strictExtensionSeeds: false, validateRoomOrder: true, compileCode: true, logDir: '' })
  })

  it('should keep the options given', () => {
    expect(resolveOptions({ strictExtensionSeeds: true, logDir: 'logs' })).toEqual({
      ...DEFAULT_OPTIONS,
      strictExtensionSeeds: true,
      logDir: 'logs',
    })
  })
})

describe('parseLoaderConfig', () => {
  it('should return defaults for anything but an object', () => {
    expect(parseLoaderConfig(null)).toEqual(DEFAULT_OPTIONS)
    expect(parseLoaderConfig([true])).toEqual(DEFAULT_OPTIONS)
    expect(parseLoaderConfig('strict')).toEqual(DEFAULT_OPTIONS)
  })

  it('should ignore fields of the wrong type', () => {
    expect(parseLoaderConfig({ strictExtensionSeeds: 'yes', compileCode: false, logDir: 5 })).toEqual({
      ...DEFAULT_OPTIONS,
      compileCode: false,
    })
  })
})

describe('loadLoaderConfig', () => {
  const dir = mkdtempSync(join(tmpdir(), 'gm8-config-'))

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should return defaults when the file is missing', () => {
    expect(loadLoaderConfig(join(dir, 'none.json'))).toEqual(DEFAULT_OPTIONS)
  })

  it('should read a config file', () => {
    const path = join(dir, 'loader.json')
    writeFileSync(path, JSON.stringify({ validateRoomOrder: false }))
    expect(loadLoaderConfig(path)).toEqual({ ...DEFAULT_OPTIONS, validateRoomOrder: false })
  })

  it('should return defaults for malformed JSON', () => {
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{ "strictExtensionSeeds": ')
    expect(loadLoaderConfig(path)).toEqual(DEFAULT_OPTIONS)
  })
})
