/**
 * Load failures.
 *
 * Every error raised while decoding a game is terminal: the loader never
 * retries and never hands back a partially populated asset table.
 */

export type LoadErrorKind =
  | 'IoError'
  | 'FormatError'
  | 'TruncatedInput'
  | 'CorruptBlock'
  | 'CompileError';

export class LoadError extends Error {
  public readonly kind: LoadErrorKind;
  /** Byte offset in the buffer being read when the error was raised, if known. */
  public readonly offset: number | undefined;

  constructor(kind: LoadErrorKind, message: string, offset?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.offset = offset;
  }
}

/** The game file could not be read from disk. */
export class IoError extends LoadError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IoError', message, undefined, options);
  }
}

/** Not a GameMaker 8 executable, or a section that violates the format. */
export class FormatError extends LoadError {
  constructor(message: string, offset?: number) {
    super('FormatError', message, offset);
  }
}

export class TruncatedInputError extends LoadError {
  public readonly wanted: number;

  constructor(offset: number, wanted: number, length: number) {
    super(
      'TruncatedInput',
      `Read of ${wanted} bytes at offset ${offset} runs past end of data (${length} bytes)`,
      offset,
    );
    this.wanted = wanted;
  }
}

/** Inflate failure, or a typed field whose size disagrees with its header. */
export class CorruptBlockError extends LoadError {
  constructor(message: string, offset?: number, options?: { cause?: unknown }) {
    super('CorruptBlock', message, offset, options);
  }
}

export class CompileError extends LoadError {
  /** Human-readable asset name, e.g. `script "scr_move"`. */
  public readonly asset: string;

  constructor(asset: string, message: string) {
    super('CompileError', `Failed to compile ${asset}: ${message}`);
    this.asset = asset;
  }
}
