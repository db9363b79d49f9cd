export { loadGame, decodeGame, findRevision } from './core/game-loader';
export type { DecodeOptions, LoadResult, LoaderCollaborators, RevisionMarker } from './core/game-loader';
export * from './core/assets';
export * from './core/errors';
export { Cursor } from './core/cursor';
export { BlockInflator } from './core/block-inflator';
export { crc32 } from './core/crc32';
export { SourceCodeRegistry, MemoryImageStore } from './core/collaborators';
export type {
  CodeHandle,
  CodeRegistry,
  CompileResult,
  ImageHandle,
  ImageStore,
  RegisteredCode,
  StoredImage,
} from './core/collaborators';
export { DEFAULT_OPTIONS, loadLoaderConfig, parseLoaderConfig, resolveOptions } from './core/config';
export type { LoaderOptions } from './core/config';
export { initLogger, setConsoleOutput, getLogPath } from './core/logger';
