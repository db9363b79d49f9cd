/**
 * GameMaker 8.0 / 8.1 executable loader
 *
 * The game data is appended to a stock runner executable. Layout:
 *   "MZ" executable header
 *   GM8.0: u32 1234321 at offset 2,000,000
 *   GM8.1: marker pair near 3,800,004, then the GM8.1 stream cipher
 *   u32 version, zlib settings block
 *   u32 + bytes, u32 + bytes   (D3D wrapper, unused)
 *   substitution-cipher header and encrypted span
 *   u32 n, (n + 6) garbage dwords
 *   asset categories (see asset-deserializer.ts)
 */

import { readFileSync } from 'fs';
import { Cursor } from './cursor';
import { BlockInflator } from './block-inflator';
import { decryptGm81 } from './gm81-cipher';
import { decryptDataBlock } from './data-cipher';
import { readSettings } from './settings';
import { deserializeAssets } from './asset-deserializer';
import type { DecodeContext } from './asset-deserializer';
import { resolveIdentities } from './identity-resolver';
import type { CodeRegistry, ImageStore } from './collaborators';
import type { GameData } from './assets';
import { GameRevision } from './assets';
import type { LoaderOptions } from './config';
import { resolveOptions } from './config';
import { FormatError, IoError, LoadError } from './errors';
import { error, initLogger, log } from './logger';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MIN_FILE_SIZE = 0x1b;

export const GM80_HEADER_OFFSET = 2_000_000;
export const GM80_MAGIC = 1234321;
/** Bytes between the end of the GM8.0 magic and the settings version word */
const GM80_HEADER_TAIL = 8;

export const GM81_SCAN_OFFSET = 3_800_004;
export const GM81_SCAN_WORDS = 1024;
/** Bytes between the GM8.1 seed words and the settings version word */
const GM81_HEADER_TAIL = 16;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoaderCollaborators {
  code: CodeRegistry;
  images: ImageStore;
}

export interface RevisionMarker {
  revision: GameRevision;
  /** Offset just past the revision marker */
  offset: number;
}

/** Options `decodeGame` acts on; logging is set up by `loadGame`. */
export type DecodeOptions = Omit<LoaderOptions, 'logDir'>;

export type LoadResult = { ok: true; game: GameData } | { ok: false; error: LoadError };

// ---------------------------------------------------------------------------
// Revision detection
// ---------------------------------------------------------------------------

function isGm81First(word: number): boolean {
  return (word & 0xff00ff00) >>> 0 === 0xf7000000;
}

function isGm81Second(word: number): boolean {
  return (word & 0x00ff00ff) === 0x00140067;
}

/** Find the revision header. Throws FormatError when the file is not a GM8 game. */
export function findRevision(data: Buffer): RevisionMarker {
  if (data.length < MIN_FILE_SIZE) {
    throw new FormatError(`File too small to be an executable (${data.length} bytes)`);
  }
  if (data[0] !== 0x4d || data[1] !== 0x5a) {
    throw new FormatError('Missing "MZ" executable signature', 0);
  }

  if (data.length >= GM80_HEADER_OFFSET + 4 && data.readUInt32LE(GM80_HEADER_OFFSET) === GM80_MAGIC) {
    return { revision: GameRevision.GM80, offset: GM80_HEADER_OFFSET + 4 };
  }

  let pos = GM81_SCAN_OFFSET;
  for (let i = 0; i < GM81_SCAN_WORDS && pos + 8 <= data.length; i++, pos += 4) {
    if (isGm81First(data.readUInt32LE(pos)) && isGm81Second(data.readUInt32LE(pos + 4))) {
      return { revision: GameRevision.GM81, offset: pos + 8 };
    }
  }

  throw new FormatError('No GameMaker 8.0 or 8.1 header found');
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decode a game held in memory. The input is copied, since both cipher
 * layers work in place. Throws a LoadError subclass on any failure.
 */
export function decodeGame(
  input: Uint8Array,
  deps: LoaderCollaborators,
  options: Partial<DecodeOptions> = {},
): GameData {
  const opts = resolveOptions(options);
  const data = Buffer.from(input);
  const { revision, offset } = findRevision(data);
  log(`Detected GameMaker ${revision === GameRevision.GM81 ? '8.1' : '8.0'} (${data.length} bytes)`);

  const cursor = new Cursor(data, offset);
  if (revision === GameRevision.GM81) {
    decryptGm81(cursor);
    cursor.skip(GM81_HEADER_TAIL);
  } else {
    cursor.skip(GM80_HEADER_TAIL);
  }

  const inflator = new BlockInflator();

  cursor.skip(4);
  const settings = readSettings(new Cursor(inflator.inflate(cursor)), inflator, revision);

  // D3D wrapper: two length-prefixed blobs
  cursor.skip(cursor.readU32());
  cursor.skip(cursor.readU32());

  decryptDataBlock(cursor);
  cursor.skip((cursor.readU32() + 6) * 4);

  const ctx: DecodeContext = {
    revision,
    inflator,
    code: deps.code,
    images: deps.images,
    strictExtensionSeeds: opts.strictExtensionSeeds,
  };
  const assets = deserializeAssets(cursor, ctx);

  resolveIdentities(assets, deps.code, {
    validateRoomOrder: opts.validateRoomOrder,
    compileCode: opts.compileCode,
  });

  const s = inflator.stats;
  log(`Inflated ${s.blocks} blocks (${s.compressedBytes} -> ${s.inflatedBytes} bytes)`);

  return { revision, settings, ...assets };
}

function readGameFile(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (err) {
    throw new IoError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}

/**
 * Load a game from a file path or an in-memory buffer. Never throws a
 * LoadError: the first failure comes back as `{ ok: false, error }`.
 * A non-empty `logDir` opens the log file before decoding.
 */
export function loadGame(
  source: string | Uint8Array,
  deps: LoaderCollaborators,
  options: Partial<LoaderOptions> = {},
): LoadResult {
  const opts = resolveOptions(options);
  if (opts.logDir) initLogger(opts.logDir);

  try {
    const data = typeof source === 'string' ? readGameFile(source) : source;
    return { ok: true, game: decodeGame(data, deps, opts) };
  } catch (err) {
    if (err instanceof LoadError) {
      error(`Load failed (${err.kind})`, err);
      return { ok: false, error: err };
    }
    throw err;
  }
}
