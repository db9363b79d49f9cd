/**
 * Game settings block (the first zlib block after the revision header).
 *
 * 23 fixed u32 fields, the loading-bar and custom load-image flags with
 * their optional image blocks, then the error-handling fields. The images
 * are inflated to validate them and dropped.
 */

import type { Cursor } from './cursor';
import type { BlockInflator } from './block-inflator';
import type { GameSettings } from './assets';
import { GameRevision } from './assets';
import { log } from './logger';

export function readSettings(cursor: Cursor, inflator: BlockInflator, revision: GameRevision): GameSettings {
  const fullscreen = cursor.readBool();
  const interpolate = cursor.readBool();
  const drawBorder = !cursor.readBool();
  const displayCursor = cursor.readBool();
  const scaling = cursor.readI32();
  const allowWindowResize = cursor.readBool();
  const onTop = cursor.readBool();
  const colourOutsideRoom = cursor.readU32();
  const setResolution = cursor.readBool();
  const colourDepth = cursor.readU32();
  const resolution = cursor.readU32();
  const frequency = cursor.readU32();
  const showButtons = !cursor.readBool();
  const vsync = cursor.readBool();
  const disableScreen = cursor.readBool();
  const letF4 = cursor.readBool();
  const letF1 = cursor.readBool();
  const letEsc = cursor.readBool();
  const letF5 = cursor.readBool();
  const letF9 = cursor.readBool();
  const treatCloseAsEsc = cursor.readBool();
  const priority = cursor.readU32();
  const freeze = cursor.readBool();

  const loadingBar = cursor.readU32();
  if (loadingBar !== 0) {
    if (cursor.readBool()) {
      const back = inflator.inflate(cursor);
      log(`Loading bar background image: ${back.length} bytes (discarded)`);
    }
    if (cursor.readBool()) {
      const front = inflator.inflate(cursor);
      log(`Loading bar foreground image: ${front.length} bytes (discarded)`);
    }
  }

  const customLoadImage = cursor.readBool();
  if (customLoadImage) {
    const bmp = inflator.inflate(cursor);
    log(`Custom load image: ${bmp.length} bytes (discarded)`);
  }

  const transparent = cursor.readBool();
  const translucency = cursor.readU32();
  const scaleProgressBar = cursor.readBool();
  const errorDisplay = cursor.readBool();
  const errorLog = cursor.readBool();
  const errorAbort = cursor.readBool();

  // GM8.1 packs two flags into this word; GM8.0 only has "treat as zero".
  const uninit = cursor.readU32();
  const treatAsZero = revision === GameRevision.GM81 ? (uninit & 1) !== 0 : uninit !== 0;
  const errorOnUninitialization = revision === GameRevision.GM81 ? (uninit & 2) !== 0 : true;

  return {
    fullscreen,
    interpolate,
    drawBorder,
    displayCursor,
    scaling,
    allowWindowResize,
    onTop,
    colourOutsideRoom,
    setResolution,
    colourDepth,
    resolution,
    frequency,
    showButtons,
    vsync,
    disableScreen,
    letF4,
    letF1,
    letEsc,
    letF5,
    letF9,
    treatCloseAsEsc,
    priority,
    freeze,
    loadingBar,
    customLoadImage,
    transparent,
    translucency,
    scaleProgressBar,
    errorDisplay,
    errorLog,
    errorAbort,
    treatAsZero,
    errorOnUninitialization,
  };
}
