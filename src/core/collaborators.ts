/**
 * Contracts with the parts of the runner that live outside the loader:
 * the code compiler (scripts, actions, creation code) and the texture
 * store (sprite frames, backgrounds, font bitmaps).
 *
 * The in-memory implementations back the CLI and the tests.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Opaque id returned by a CodeRegistry. */
export type CodeHandle = number;

/** Opaque id returned by an ImageStore. */
export type ImageHandle = number;

export type CompileResult = { ok: true } | { ok: false; message: string };

export interface CodeRegistry {
  /** Register a block of statements. `source` carries its exact length. */
  registerCode(source: Uint8Array, label: string): CodeHandle;
  /** Register a single expression (trigger conditions, action arguments). */
  registerExpression(source: Uint8Array, label: string): CodeHandle;
  compile(handle: CodeHandle): CompileResult;
}

export interface ImageStore {
  makeImage(width: number, height: number, originX: number, originY: number, rgba: Uint8Array): ImageHandle;
}

// ---------------------------------------------------------------------------
// In-memory code registry
// ---------------------------------------------------------------------------

export interface RegisteredCode {
  handle: CodeHandle;
  kind: 'code' | 'expression';
  label: string;
  source: Buffer;
  compiled: boolean;
}

/**
 * Keeps registered source text. `compile` marks the entry and records the
 * order in which handles were compiled; it has no language to check.
 */
export class SourceCodeRegistry implements CodeRegistry {
  private readonly entries: RegisteredCode[] = [];
  public readonly compileOrder: CodeHandle[] = [];

  registerCode(source: Uint8Array, label: string): CodeHandle {
    return this.add('code', source, label);
  }

  registerExpression(source: Uint8Array, label: string): CodeHandle {
    return this.add('expression', source, label);
  }

  compile(handle: CodeHandle): CompileResult {
    const entry = this.entries[handle];
    if (!entry) return { ok: false, message: `unknown code handle ${handle}` };
    entry.compiled = true;
    this.compileOrder.push(handle);
    return { ok: true };
  }

  get(handle: CodeHandle): RegisteredCode | undefined {
    return this.entries[handle];
  }

  /** Source text of a handle, decoded as latin1. */
  text(handle: CodeHandle): string {
    return this.entries[handle]?.source.toString('latin1') ?? '';
  }

  get size(): number {
    return this.entries.length;
  }

  private add(kind: RegisteredCode['kind'], source: Uint8Array, label: string): CodeHandle {
    const handle = this.entries.length;
    this.entries.push({ handle, kind, label, source: Buffer.from(source), compiled: false });
    return handle;
  }
}

// ---------------------------------------------------------------------------
// In-memory image store
// ---------------------------------------------------------------------------

export interface StoredImage {
  width: number;
  height: number;
  originX: number;
  originY: number;
  pixels: Uint8Array;
}

export class MemoryImageStore implements ImageStore {
  public readonly images: StoredImage[] = [];

  makeImage(width: number, height: number, originX: number, originY: number, rgba: Uint8Array): ImageHandle {
    if (rgba.length !== width * height * 4) {
      throw new RangeError(`Image ${width}x${height} needs ${width * height * 4} bytes, got ${rgba.length}`);
    }
    this.images.push({ width, height, originX, originY, pixels: Uint8Array.from(rgba) });
    return this.images.length - 1;
  }

  get(handle: ImageHandle): StoredImage | undefined {
    return this.images[handle];
  }

  /** Total bytes of pixel data held. */
  get byteSize(): number {
    let n = 0;
    for (const img of this.images) n += img.pixels.length;
    return n;
  }
}
