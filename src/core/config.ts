/**
 * Loader options.
 * Read from an optional JSON file; anything missing or mistyped falls back
 * to the defaults.
 */

import { readFileSync, existsSync } from 'fs'
import { warn } from './logger'

export interface LoaderOptions {
  /** Abort on an extension seed that needs a second correction (default: warn and continue). */
  strictExtensionSeeds: boolean
  /** Check that every room-order entry names an existing room. */
  validateRoomOrder: boolean
  /** Compile registered code after decoding. */
  compileCode: boolean
  /** Directory for gm8-loader.log; empty for console only. */
  logDir: string
}

export const DEFAULT_OPTIONS: LoaderOptions = {
  strictExtensionSeeds: false,
  validateRoomOrder: true,
  compileCode: true,
  logDir: '',
}

function bool(v: unknown, fallback: boolean): boolean {
  return typeof v === 'boolean' ? v : fallback
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function resolveOptions(partial: Partial<LoaderOptions> = {}): LoaderOptions {
  return {
    strictExtensionSeeds: bool(partial.strictExtensionSeeds, DEFAULT_OPTIONS.strictExtensionSeeds),
    validateRoomOrder: bool(partial.validateRoomOrder, DEFAULT_OPTIONS.validateRoomOrder),
    compileCode: bool(partial.compileCode, DEFAULT_OPTIONS.compileCode),
    logDir: typeof partial.logDir === 'string' ? partial.logDir : DEFAULT_OPTIONS.logDir,
  }
}

/** Parse a config object field by field. */
export function parseLoaderConfig(raw: unknown): LoaderOptions {
  if (!isRecord(raw)) return { ...DEFAULT_OPTIONS }
  return {
    strictExtensionSeeds: bool(raw.strictExtensionSeeds, DEFAULT_OPTIONS.strictExtensionSeeds),
    validateRoomOrder: bool(raw.validateRoomOrder, DEFAULT_OPTIONS.validateRoomOrder),
    compileCode: bool(raw.compileCode, DEFAULT_OPTIONS.compileCode),
    logDir: typeof raw.logDir === 'string' ? raw.logDir : DEFAULT_OPTIONS.logDir,
  }
}

export function loadLoaderConfig(path: string): LoaderOptions {
  if (!existsSync(path)) return { ...DEFAULT_OPTIONS }
  try {
    return parseLoaderConfig(JSON.parse(readFileSync(path, 'utf-8')))
  } catch (e) {
    warn(`Ignoring unreadable config ${path}: ${e instanceof Error ? e.message : String(e)}`)
    return { ...DEFAULT_OPTIONS }
  }
}
