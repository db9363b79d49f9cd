/**
 * GameMaker 8 asset categories
 *
 * After the data layer is decrypted the container holds, in this order:
 *   Extensions, Triggers, Constants, Sounds, Sprites, Backgrounds, Paths,
 *   Scripts, Fonts, Timelines, Objects, Rooms, last instance/tile ids,
 *   Included files, Game information, library init code, Room order.
 *
 * Each category opens with a u32 version and a u32 count. Per-asset
 * categories then hold `count` zlib blocks; each block starts with a u32
 * "exists" word, zero meaning the id is reserved but empty.
 */

import { Cursor } from './cursor';
import type { BlockInflator } from './block-inflator';
import type { CodeRegistry, ImageStore } from './collaborators';
import type {
  AssetTables,
  Background,
  CollisionMap,
  Constant,
  EventTable,
  Extension,
  ExtensionConstant,
  ExtensionFile,
  ExtensionFunction,
  Font,
  FontGlyph,
  GameInfo,
  GameObject,
  IncludeFile,
  Path,
  PathPoint,
  Room,
  RoomBackground,
  RoomInstance,
  RoomTile,
  RoomView,
  Script,
  Slot,
  Sound,
  Sprite,
  Timeline,
  Trigger,
  CodeAction,
} from './assets';
import { EVENT_CATEGORY_COUNT, EXTENSION_ARG_SLOTS, GameRevision } from './assets';
import { readActionList } from './actions';
import { decryptExtensionPayload } from './extension-cipher';
import { expandAlpha, swapRedBlue } from './pixels';
import { CorruptBlockError, TruncatedInputError } from './errors';
import { log } from './logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DecodeContext {
  revision: GameRevision;
  inflator: BlockInflator;
  code: CodeRegistry;
  images: ImageStore;
  /** Abort on extension seeds that need a second correction instead of warning. */
  strictExtensionSeeds: boolean;
}

export interface DecodedAssets extends AssetTables {
  lastInstanceId: number;
  lastTileId: number;
  info: GameInfo;
  roomOrder: number[];
}

export type RecordReader<T> = (c: Cursor, ctx: DecodeContext) => T;

const END_OF_EVENTS = 0xffffffff;
const GLYPH_COUNT = 256;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Fail before allocating for a table the remaining bytes cannot hold. */
function requireBytes(c: Cursor, count: number): void {
  if (count > c.remaining) {
    throw new TruncatedInputError(c.position, count, c.length);
  }
}

/**
 * Read the exists word and, when set, the record. A placeholder consumes
 * exactly the one word.
 */
export function readSlot<T>(c: Cursor, ctx: DecodeContext, reader: RecordReader<T>): Slot<T> {
  if (!c.readBool()) return null;
  return reader(c, ctx);
}

function readBlockCategory<T>(
  cursor: Cursor,
  ctx: DecodeContext,
  name: string,
  reader: RecordReader<T>,
): Slot<T>[] {
  cursor.skip(4);
  const count = cursor.readU32();
  const table: Slot<T>[] = [];
  for (let i = 0; i < count; i++) {
    const block = ctx.inflator.inflate(cursor);
    table.push(readSlot(new Cursor(block), ctx, reader));
  }
  const empty = table.filter(a => a === null).length;
  log(`${name}: ${count}${empty ? ` (${empty} empty)` : ''}`);
  return table;
}

// ---------------------------------------------------------------------------
// Extensions and constants (stored directly in the data stream)
// ---------------------------------------------------------------------------

function readExtensionFunction(c: Cursor): ExtensionFunction {
  c.skip(4);
  const name = c.readString();
  const externalName = c.readString();
  const convention = c.readU32();
  c.skip(4);
  const argCount = c.readU32();
  const argTypes: number[] = [];
  for (let i = 0; i < EXTENSION_ARG_SLOTS; i++) argTypes.push(c.readU32());
  const returnType = c.readU32();
  return { name, externalName, convention, argCount, argTypes, returnType };
}

function readExtensionConstant(c: Cursor): ExtensionConstant {
  c.skip(4);
  return { name: c.readString(), value: c.readString() };
}

export function readExtension(c: Cursor, ctx: DecodeContext): Extension {
  c.skip(4);
  const name = c.readString();
  const folderName = c.readString();

  const fileCount = c.readU32();
  const files: ExtensionFile[] = [];
  for (let i = 0; i < fileCount; i++) {
    c.skip(4);
    const fileName = c.readString();
    const kind = c.readU32();
    const initializer = c.readString();
    const finalizer = c.readString();

    const functions: ExtensionFunction[] = [];
    const fnCount = c.readU32();
    for (let j = 0; j < fnCount; j++) functions.push(readExtensionFunction(c));

    const constants: ExtensionConstant[] = [];
    const constCount = c.readU32();
    for (let j = 0; j < constCount; j++) constants.push(readExtensionConstant(c));

    files.push({ fileName, kind, initializer, finalizer, functions, constants, data: Buffer.alloc(0) });
  }

  // One scrambled payload holds a zlib block per file.
  const payloadStart = c.position;
  const payload = c.readByteString();
  if (payload.length > 0) {
    const pc = new Cursor(payload);
    decryptExtensionPayload(pc, payload.length, ctx.strictExtensionSeeds);
    for (const file of files) {
      file.data = ctx.inflator.inflate(pc);
    }
  } else if (files.length > 0) {
    throw new CorruptBlockError(`Extension "${name}" lists ${files.length} files but has no payload`, payloadStart);
  }

  return { name, folderName, files };
}

function readConstant(c: Cursor): Constant {
  return { name: c.readString(), value: c.readString() };
}

// ---------------------------------------------------------------------------
// Per-asset records (each read from its own inflated block)
// ---------------------------------------------------------------------------

export const readTrigger: RecordReader<Trigger> = (c, ctx) => {
  c.skip(4);
  const name = c.readString();
  const condition = ctx.code.registerExpression(c.readByteString(), `trigger "${name}"`);
  const checkMoment = c.readU32();
  const constantName = c.readString();
  return { name, condition, checkMoment, constantName };
};

export const readSound: RecordReader<Sound> = c => {
  const name = c.readString();
  c.skip(4);
  const kind = c.readU32();
  const fileType = c.readString();
  const fileName = c.readString();
  const data = c.readBool() ? Buffer.from(c.readByteString()) : null;
  const effects = c.readU32();
  const volume = c.readF64();
  const pan = c.readF64();
  const preload = c.readBool();
  return { name, kind, fileType, fileName, data, effects, volume, pan, preload };
};

function readCollisionMap(c: Cursor): CollisionMap {
  c.skip(4);
  const width = c.readU32();
  const height = c.readU32();
  const left = c.readU32();
  const right = c.readU32();
  const bottom = c.readU32();
  const top = c.readU32();

  const cells = width * height;
  requireBytes(c, cells * 4);
  const mask = new Uint8Array(cells);
  for (let i = 0; i < cells; i++) {
    mask[i] = c.readU32() !== 0 ? 1 : 0;
  }
  return { width, height, left, right, bottom, top, mask };
}

export const readSprite: RecordReader<Sprite> = (c, ctx) => {
  const name = c.readString();
  c.skip(4);
  const originX = c.readI32();
  const originY = c.readI32();

  const frameCount = c.readU32();
  if (frameCount === 0) {
    return { name, originX, originY, width: 1, height: 1, frames: [], separateCollision: false, collisionMaps: [] };
  }

  const frames: number[] = [];
  let width = 0;
  let height = 0;
  for (let i = 0; i < frameCount; i++) {
    c.skip(4);
    const w = c.readU32();
    const h = c.readU32();
    const at = c.position;
    const len = c.readU32();
    if (len !== w * h * 4) {
      throw new CorruptBlockError(`Sprite "${name}" frame ${i}: ${len} bytes of pixels for ${w}x${h}`, at);
    }
    const pixels = swapRedBlue(c.readBytes(len));
    frames.push(ctx.images.makeImage(w, h, originX, originY, pixels));
    if (i === 0) {
      width = w;
      height = h;
    }
  }

  const separateCollision = c.readBool();
  const collisionMaps: CollisionMap[] = [];
  const mapCount = separateCollision ? frameCount : 1;
  for (let i = 0; i < mapCount; i++) collisionMaps.push(readCollisionMap(c));

  return { name, originX, originY, width, height, frames, separateCollision, collisionMaps };
};

export const readBackground: RecordReader<Background> = (c, ctx) => {
  const name = c.readString();
  c.skip(8);
  const width = c.readU32();
  const height = c.readU32();

  let image: number | null = null;
  if (width > 0 && height > 0) {
    const at = c.position;
    const len = c.readU32();
    if (len !== width * height * 4) {
      throw new CorruptBlockError(`Background "${name}": ${len} bytes of pixels for ${width}x${height}`, at);
    }
    image = ctx.images.makeImage(width, height, 0, 0, swapRedBlue(c.readBytes(len)));
  }
  return { name, width, height, image };
};

export const readPath: RecordReader<Path> = c => {
  const name = c.readString();
  c.skip(4);
  const kind = c.readU32();
  const closed = c.readBool();
  const precision = c.readU32();
  const count = c.readU32();
  requireBytes(c, count * 24);
  const points: PathPoint[] = [];
  for (let i = 0; i < count; i++) {
    points.push({ x: c.readF64(), y: c.readF64(), speed: c.readF64() });
  }
  return { name, kind, closed, precision, points };
};

export const readScript: RecordReader<Script> = (c, ctx) => {
  const name = c.readString();
  c.skip(4);
  const code = ctx.code.registerCode(c.readByteString(), `script "${name}"`);
  return { name, code };
};

export const readFont: RecordReader<Font> = (c, ctx) => {
  const name = c.readString();
  c.skip(4);
  const fontName = c.readString();
  const size = c.readU32();
  const bold = c.readBool();
  const italic = c.readBool();
  let rangeBegin = c.readU32();
  const rangeEnd = c.readU32();

  let charset = 0;
  let antialias = 0;
  if (ctx.revision === GameRevision.GM81) {
    charset = (rangeBegin >>> 24) & 0xff;
    antialias = (rangeBegin >>> 16) & 0xff;
    rangeBegin &= 0xffff;
  }

  const glyphs: FontGlyph[] = [];
  for (let i = 0; i < GLYPH_COUNT; i++) {
    glyphs.push({
      x: c.readU32(),
      y: c.readU32(),
      width: c.readU32(),
      height: c.readU32(),
      shift: c.readU32(),
      offset: c.readU32(),
    });
  }

  const bitmapWidth = c.readU32();
  const bitmapHeight = c.readU32();
  const at = c.position;
  const len = c.readU32();
  if (len !== bitmapWidth * bitmapHeight) {
    throw new CorruptBlockError(`Font "${name}": ${len} bytes of alpha for ${bitmapWidth}x${bitmapHeight}`, at);
  }
  const image = ctx.images.makeImage(bitmapWidth, bitmapHeight, 0, 0, expandAlpha(c.readBytes(len)));

  return { name, fontName, size, bold, italic, rangeBegin, rangeEnd, charset, antialias, glyphs, bitmapWidth, bitmapHeight, image };
};

export const readTimeline: RecordReader<Timeline> = (c, ctx) => {
  const name = c.readString();
  c.skip(4);
  const count = c.readU32();
  const moments = new Map<number, CodeAction[]>();
  for (let i = 0; i < count; i++) {
    const at = c.position;
    const index = c.readU32();
    if (moments.has(index)) {
      throw new CorruptBlockError(`Timeline "${name}" has moment ${index} twice`, at);
    }
    moments.set(index, readActionList(c, ctx.code, `timeline "${name}" moment ${index}`));
  }
  return { name, moments };
};

export const readObject: RecordReader<GameObject> = (c, ctx) => {
  const name = c.readString();
  c.skip(4);
  const spriteIndex = c.readRef();
  const solid = c.readBool();
  const visible = c.readBool();
  const depth = c.readI32();
  const persistent = c.readBool();
  const parentIndex = c.readRef();
  const maskIndex = c.readRef();

  // Highest event category index (11); the count is fixed.
  c.skip(4);

  const events: EventTable = [];
  for (let category = 0; category < EVENT_CATEGORY_COUNT; category++) {
    const table = new Map<number, CodeAction[]>();
    for (;;) {
      const at = c.position;
      const sub = c.readU32();
      if (sub === END_OF_EVENTS) break;
      if (table.has(sub)) {
        throw new CorruptBlockError(`Object "${name}" defines event ${category}:${sub} twice`, at);
      }
      table.set(sub, readActionList(c, ctx.code, `object "${name}" event ${category}:${sub}`));
    }
    events.push(table);
  }

  return {
    name,
    spriteIndex,
    solid,
    visible,
    depth,
    persistent,
    parentIndex,
    maskIndex,
    events,
    identities: [],
    descendants: [],
    resolvedEvents: [],
  };
};

function readRoomBackground(c: Cursor): RoomBackground {
  return {
    visible: c.readBool(),
    foreground: c.readBool(),
    backgroundIndex: c.readRef(),
    x: c.readI32(),
    y: c.readI32(),
    tileHorizontal: c.readBool(),
    tileVertical: c.readBool(),
    hSpeed: c.readI32(),
    vSpeed: c.readI32(),
    stretch: c.readBool(),
  };
}

function readRoomView(c: Cursor): RoomView {
  return {
    visible: c.readBool(),
    viewX: c.readI32(),
    viewY: c.readI32(),
    viewW: c.readU32(),
    viewH: c.readU32(),
    portX: c.readI32(),
    portY: c.readI32(),
    portW: c.readU32(),
    portH: c.readU32(),
    hBorder: c.readI32(),
    vBorder: c.readI32(),
    hSpeed: c.readI32(),
    vSpeed: c.readI32(),
    follow: c.readRef(),
  };
}

function readRoomTile(c: Cursor): RoomTile {
  return {
    x: c.readI32(),
    y: c.readI32(),
    backgroundIndex: c.readRef(),
    tileX: c.readU32(),
    tileY: c.readU32(),
    width: c.readU32(),
    height: c.readU32(),
    depth: c.readI32(),
    id: c.readU32(),
  };
}

export const readRoom: RecordReader<Room> = (c, ctx) => {
  const name = c.readString();
  c.skip(4);
  const caption = c.readString();
  const width = c.readU32();
  const height = c.readU32();
  const speed = c.readU32();
  const persistent = c.readBool();
  const backgroundColour = c.readU32();
  const drawBackgroundColour = c.readBool();
  const creationCode = ctx.code.registerCode(c.readByteString(), `room "${name}" creation code`);

  const backgrounds: RoomBackground[] = [];
  const bgCount = c.readU32();
  for (let i = 0; i < bgCount; i++) backgrounds.push(readRoomBackground(c));

  const enableViews = c.readBool();
  const views: RoomView[] = [];
  const viewCount = c.readU32();
  for (let i = 0; i < viewCount; i++) views.push(readRoomView(c));

  const instances: RoomInstance[] = [];
  const instanceCount = c.readU32();
  for (let i = 0; i < instanceCount; i++) {
    const x = c.readI32();
    const y = c.readI32();
    const objectIndex = c.readRef();
    const id = c.readU32();
    const code = ctx.code.registerCode(c.readByteString(), `room "${name}" instance ${id} creation code`);
    instances.push({ x, y, objectIndex, id, creationCode: code });
  }

  const tiles: RoomTile[] = [];
  const tileCount = c.readU32();
  requireBytes(c, tileCount * 36);
  for (let i = 0; i < tileCount; i++) tiles.push(readRoomTile(c));

  return {
    name,
    caption,
    width,
    height,
    speed,
    persistent,
    backgroundColour,
    drawBackgroundColour,
    creationCode,
    backgrounds,
    enableViews,
    views,
    instances,
    tiles,
  };
};

export const readIncludeFile: RecordReader<IncludeFile> = c => {
  c.skip(4);
  const fileName = c.readString();
  const sourcePath = c.readString();
  const dataExists = c.readBool();
  const originalSize = c.readU32();
  const storedInExe = c.readBool();
  const data = dataExists && storedInExe ? Buffer.from(c.readByteString()) : null;
  const exportFlags = c.readU32();
  const exportFolder = c.readString();
  const overwrite = c.readBool();
  const freeMemory = c.readBool();
  const removeAtGameEnd = c.readBool();
  return { fileName, sourcePath, originalSize, data, exportFlags, exportFolder, overwrite, freeMemory, removeAtGameEnd };
};

export function readGameInfo(c: Cursor): GameInfo {
  return {
    backgroundColour: c.readU32(),
    separateWindow: c.readBool(),
    caption: c.readString(),
    left: c.readI32(),
    top: c.readI32(),
    width: c.readU32(),
    height: c.readU32(),
    showBorder: c.readBool(),
    allowWindowResize: c.readBool(),
    onTop: c.readBool(),
    freezeGame: c.readBool(),
    info: c.readString(),
  };
}

// ---------------------------------------------------------------------------
// Whole sequence
// ---------------------------------------------------------------------------

/**
 * Decode every category from the decrypted data stream. The cursor must
 * sit at the Extensions header.
 */
export function deserializeAssets(cursor: Cursor, ctx: DecodeContext): DecodedAssets {
  cursor.skip(4);
  const extCount = cursor.readU32();
  const extensions: Extension[] = [];
  for (let i = 0; i < extCount; i++) extensions.push(readExtension(cursor, ctx));
  log(`Extensions: ${extCount}`);

  const triggers = readBlockCategory(cursor, ctx, 'Triggers', readTrigger);

  cursor.skip(4);
  const constCount = cursor.readU32();
  const constants: Constant[] = [];
  for (let i = 0; i < constCount; i++) constants.push(readConstant(cursor));
  log(`Constants: ${constCount}`);

  const sounds = readBlockCategory(cursor, ctx, 'Sounds', readSound);
  const sprites = readBlockCategory(cursor, ctx, 'Sprites', readSprite);
  const backgrounds = readBlockCategory(cursor, ctx, 'Backgrounds', readBackground);
  const paths = readBlockCategory(cursor, ctx, 'Paths', readPath);
  const scripts = readBlockCategory(cursor, ctx, 'Scripts', readScript);
  const fonts = readBlockCategory(cursor, ctx, 'Fonts', readFont);
  const timelines = readBlockCategory(cursor, ctx, 'Timelines', readTimeline);
  const objects = readBlockCategory(cursor, ctx, 'Objects', readObject);
  const rooms = readBlockCategory(cursor, ctx, 'Rooms', readRoom);

  const lastInstanceId = cursor.readU32();
  const lastTileId = cursor.readU32();

  const includeFiles = readBlockCategory(cursor, ctx, 'Included files', readIncludeFile);

  cursor.skip(4);
  const info = readGameInfo(new Cursor(ctx.inflator.inflate(cursor)));

  // Library initialisation code, one length-prefixed string per library.
  cursor.skip(4);
  const libCount = cursor.readU32();
  for (let i = 0; i < libCount; i++) cursor.skip(cursor.readU32());
  log(`Skipped ${libCount} library init sections`);

  cursor.skip(4);
  const orderCount = cursor.readU32();
  requireBytes(cursor, orderCount * 4);
  const roomOrder: number[] = [];
  for (let i = 0; i < orderCount; i++) roomOrder.push(cursor.readU32());
  log(`Room order: ${orderCount}`);

  return {
    extensions,
    triggers,
    constants,
    sounds,
    sprites,
    backgrounds,
    paths,
    scripts,
    fonts,
    timelines,
    objects,
    rooms,
    includeFiles,
    lastInstanceId,
    lastTileId,
    info,
    roomOrder,
  };
}
