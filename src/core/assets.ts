/**
 * Decoded GameMaker 8 asset model.
 *
 * Asset tables are indexed by the id other assets use to refer to them.
 * A `null` slot is a reserved id whose asset was deleted in the editor.
 * Cross-references that may be absent are `number | null`.
 */

import type { CodeHandle, ImageHandle } from './collaborators';

// ---------------------------------------------------------------------------
// Revisions
// ---------------------------------------------------------------------------

export const GameRevision = {
  GM80: 800,
  GM81: 810,
} as const;

export type GameRevision = (typeof GameRevision)[keyof typeof GameRevision];

export type Slot<T> = T | null;

// ---------------------------------------------------------------------------
// Settings and game information
// ---------------------------------------------------------------------------

export interface GameSettings {
  fullscreen: boolean;
  interpolate: boolean;
  drawBorder: boolean;
  displayCursor: boolean;
  /** >0 fixed percentage, 0 keep aspect ratio, <0 full scale */
  scaling: number;
  allowWindowResize: boolean;
  onTop: boolean;
  colourOutsideRoom: number;
  setResolution: boolean;
  colourDepth: number;
  resolution: number;
  frequency: number;
  showButtons: boolean;
  vsync: boolean;
  disableScreen: boolean;
  letF4: boolean;
  letF1: boolean;
  letEsc: boolean;
  letF5: boolean;
  letF9: boolean;
  treatCloseAsEsc: boolean;
  priority: number;
  freeze: boolean;
  /** 0 none, 1 default bar, 2 custom images */
  loadingBar: number;
  customLoadImage: boolean;
  transparent: boolean;
  translucency: number;
  scaleProgressBar: boolean;
  errorDisplay: boolean;
  errorLog: boolean;
  errorAbort: boolean;
  treatAsZero: boolean;
  errorOnUninitialization: boolean;
}

/** The F1 help window. */
export interface GameInfo {
  backgroundColour: number;
  separateWindow: boolean;
  caption: string;
  left: number;
  top: number;
  width: number;
  height: number;
  showBorder: boolean;
  allowWindowResize: boolean;
  onTop: boolean;
  freezeGame: boolean;
  /** RTF source */
  info: string;
}

// ---------------------------------------------------------------------------
// Extensions and constants
// ---------------------------------------------------------------------------

export const EXTENSION_ARG_SLOTS = 17;

export interface ExtensionFunction {
  name: string;
  externalName: string;
  /** 2 = stdcall, 12 = cdecl */
  convention: number;
  argCount: number;
  /** One entry per slot; 1 = string, 2 = real */
  argTypes: number[];
  returnType: number;
}

export interface ExtensionConstant {
  name: string;
  value: string;
}

export interface ExtensionFile {
  fileName: string;
  /** 1 dll, 2 gml, 3 action library, 4 other */
  kind: number;
  initializer: string;
  finalizer: string;
  functions: ExtensionFunction[];
  constants: ExtensionConstant[];
  data: Buffer;
}

export interface Extension {
  name: string;
  folderName: string;
  files: ExtensionFile[];
}

export interface Constant {
  name: string;
  value: string;
}

export interface Trigger {
  name: string;
  condition: CodeHandle;
  /** 0 begin step, 1 step, 2 end step */
  checkMoment: number;
  constantName: string;
}

// ---------------------------------------------------------------------------
// Media
// ---------------------------------------------------------------------------

export interface Sound {
  name: string;
  /** 0 normal, 1 background music, 2 3D, 3 multimedia player */
  kind: number;
  fileType: string;
  fileName: string;
  data: Buffer | null;
  effects: number;
  volume: number;
  pan: number;
  preload: boolean;
}

export interface CollisionMap {
  width: number;
  height: number;
  left: number;
  right: number;
  bottom: number;
  top: number;
  /** width * height cells, row-major, 1 = solid */
  mask: Uint8Array;
}

export interface Sprite {
  name: string;
  originX: number;
  originY: number;
  /** Size of frame 0, or 1x1 for a sprite without frames. */
  width: number;
  height: number;
  frames: ImageHandle[];
  separateCollision: boolean;
  /** One map per frame when separateCollision, otherwise one shared map. */
  collisionMaps: CollisionMap[];
}

export interface Background {
  name: string;
  width: number;
  height: number;
  image: ImageHandle | null;
}

export interface PathPoint {
  x: number;
  y: number;
  speed: number;
}

export interface Path {
  name: string;
  /** 0 straight, 1 smooth */
  kind: number;
  closed: boolean;
  precision: number;
  points: PathPoint[];
}

export interface Script {
  name: string;
  code: CodeHandle;
}

export interface FontGlyph {
  x: number;
  y: number;
  width: number;
  height: number;
  shift: number;
  offset: number;
}

export interface Font {
  name: string;
  fontName: string;
  size: number;
  bold: boolean;
  italic: boolean;
  rangeBegin: number;
  rangeEnd: number;
  /** GM8.1 only, 0 otherwise */
  charset: number;
  /** GM8.1 only, 0 otherwise */
  antialias: number;
  /** Glyph boxes for characters 0-255 in the bitmap */
  glyphs: FontGlyph[];
  bitmapWidth: number;
  bitmapHeight: number;
  image: ImageHandle;
}

// ---------------------------------------------------------------------------
// Actions, timelines, objects
// ---------------------------------------------------------------------------

export const ActionKind = {
  Normal: 0,
  BeginGroup: 1,
  EndGroup: 2,
  Else: 3,
  Exit: 4,
  Repeat: 5,
  Variable: 6,
  Code: 7,
} as const;

export const ExecutionType = {
  None: 0,
  Function: 1,
  Code: 2,
} as const;

export const ArgumentType = {
  Expression: 0,
  String: 1,
  Both: 2,
  Boolean: 3,
  Menu: 4,
} as const;

/** appliesTo values other than an object index */
export const APPLIES_TO_SELF = -1;
export const APPLIES_TO_OTHER = -2;

export interface CodeAction {
  libraryId: number;
  actionId: number;
  kind: number;
  canBeRelative: boolean;
  isQuestion: boolean;
  appliesToSomething: boolean;
  executionType: number;
  functionName: string;
  functionCode: Buffer;
  argumentCount: number;
  argumentTypes: number[];
  appliesTo: number;
  isRelative: boolean;
  arguments: Buffer[];
  invertCondition: boolean;
  /** Statements registered for a code action or a code-executed library action */
  code: CodeHandle | null;
  /** Registered expression per argument slot, null for literal arguments */
  argumentHandles: (CodeHandle | null)[];
}

export interface Timeline {
  name: string;
  /** moment (step number) -> actions */
  moments: Map<number, CodeAction[]>;
}

export const EventCategory = {
  Create: 0,
  Destroy: 1,
  Alarm: 2,
  Step: 3,
  Collision: 4,
  Keyboard: 5,
  Mouse: 6,
  Other: 7,
  Draw: 8,
  KeyPress: 9,
  KeyRelease: 10,
  Trigger: 11,
} as const;

export const EVENT_CATEGORY_COUNT = 12;

export const EVENT_CATEGORY_NAMES = Object.keys(EventCategory);

/** One map per event category: event sub-index -> actions. */
export type EventTable = Map<number, CodeAction[]>[];

export interface ResolvedEvent {
  /** The object (this one or an ancestor) whose event this is. */
  objectIndex: number;
  actions: CodeAction[];
}

export interface GameObject {
  name: string;
  spriteIndex: number | null;
  solid: boolean;
  visible: boolean;
  depth: number;
  persistent: boolean;
  parentIndex: number | null;
  maskIndex: number | null;
  events: EventTable;
  // Filled by the identity resolver after every category is loaded.
  /** This object's index followed by its ancestors, nearest first. */
  identities: number[];
  /** Objects that have this one in their identity chain, itself excluded. */
  descendants: number[];
  /** Own events plus inherited ones, per category. */
  resolvedEvents: Map<number, ResolvedEvent>[];
}

// ---------------------------------------------------------------------------
// Rooms
// ---------------------------------------------------------------------------

export interface RoomBackground {
  visible: boolean;
  foreground: boolean;
  backgroundIndex: number | null;
  x: number;
  y: number;
  tileHorizontal: boolean;
  tileVertical: boolean;
  hSpeed: number;
  vSpeed: number;
  stretch: boolean;
}

export interface RoomView {
  visible: boolean;
  viewX: number;
  viewY: number;
  viewW: number;
  viewH: number;
  portX: number;
  portY: number;
  portW: number;
  portH: number;
  hBorder: number;
  vBorder: number;
  hSpeed: number;
  vSpeed: number;
  /** Object to follow */
  follow: number | null;
}

export interface RoomInstance {
  x: number;
  y: number;
  objectIndex: number | null;
  id: number;
  creationCode: CodeHandle;
}

export interface RoomTile {
  x: number;
  y: number;
  backgroundIndex: number | null;
  tileX: number;
  tileY: number;
  width: number;
  height: number;
  depth: number;
  id: number;
}

export interface Room {
  name: string;
  caption: string;
  width: number;
  height: number;
  speed: number;
  persistent: boolean;
  backgroundColour: number;
  drawBackgroundColour: boolean;
  creationCode: CodeHandle;
  backgrounds: RoomBackground[];
  enableViews: boolean;
  views: RoomView[];
  instances: RoomInstance[];
  tiles: RoomTile[];
}

// ---------------------------------------------------------------------------
// Included files
// ---------------------------------------------------------------------------

export interface IncludeFile {
  fileName: string;
  sourcePath: string;
  originalSize: number;
  /** Embedded file contents, null when the file is not stored in the executable. */
  data: Buffer | null;
  /** 0 don't export, 1 temp directory, 2 working directory, 3 exportFolder */
  exportFlags: number;
  exportFolder: string;
  overwrite: boolean;
  freeMemory: boolean;
  removeAtGameEnd: boolean;
}

// ---------------------------------------------------------------------------
// Whole game
// ---------------------------------------------------------------------------

export interface AssetTables {
  extensions: Extension[];
  triggers: Slot<Trigger>[];
  constants: Constant[];
  sounds: Slot<Sound>[];
  sprites: Slot<Sprite>[];
  backgrounds: Slot<Background>[];
  paths: Slot<Path>[];
  scripts: Slot<Script>[];
  fonts: Slot<Font>[];
  timelines: Slot<Timeline>[];
  objects: Slot<GameObject>[];
  rooms: Slot<Room>[];
  includeFiles: Slot<IncludeFile>[];
}

export type AssetCategory = keyof AssetTables;

export interface GameData extends AssetTables {
  revision: GameRevision;
  settings: GameSettings;
  lastInstanceId: number;
  lastTileId: number;
  info: GameInfo;
  /** Room ids in play order; the first is the starting room. */
  roomOrder: number[];
}
