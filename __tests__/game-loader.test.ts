import { afterAll, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { decodeGame, findRevision, loadGame } from '../src/core/game-loader';
import type { LoadResult } from '../src/core/game-loader';
import { MemoryImageStore, SourceCodeRegistry } from '../src/core/collaborators';
import type { ImageStore } from '../src/core/collaborators';
import { EventCategory, GameRevision } from '../src/core/assets';
import type { LoadError } from '../src/core/errors';
import { FormatError } from '../src/core/errors';
import { getLogPath, setConsoleOutput } from '../src/core/logger';
import type { GameParts } from './helpers/container-builder';
import {
  GM80_PREFIX,
  GM81_PREFIX,
  IDENTITY_TABLE,
  buildGm80,
  buildGm81,
  codeAction,
  extensionRecord,
  objectRecord,
  roomRecord,
  scriptRecord,
  settingsRecord,
  spriteRecord,
  triggerRecord,
} from './helpers/container-builder';

setConsoleOutput(false);

function collaborators() {
  return { code: new SourceCodeRegistry(), images: new MemoryImageStore() };
}

function failure(result: LoadResult): LoadError {
  if (result.ok) throw new Error('expected the load to fail');
  return result.error;
}

const SAMPLE: GameParts = {
  settings: settingsRecord({ fullscreen: true }),
  extensions: [extensionRecord('ext_util', [{ fileName: 'util.dll', data: Buffer.from('dll image') }])],
  triggers: [triggerRecord('trg_never', 'false')],
  constants: [['LIVES', '3']],
  sprites: [
    spriteRecord('spr_empty', []),
    spriteRecord('spr_dot', [{ width: 1, height: 1, pixels: Uint8Array.from([10, 20, 30, 255]) }]),
  ],
  scripts: [scriptRecord('scr_init', 'lives = 3')],
  objects: [
    objectRecord('obj_base', { sprite: 0, events: [[EventCategory.Create, 0, [codeAction('hp = 1')]]] }),
    objectRecord('obj_player', { sprite: 1, parent: 0 }),
  ],
  rooms: [null, roomRecord('rm_main', { code: 'init()', instances: [{ x: 32, y: 48, object: 1, id: 100001 }] })],
  lastInstanceId: 100001,
  roomOrder: [1],
};

describe('findRevision', () => {
  it('should reject a file smaller than an executable header', () => {
    expect(() => findRevision(Buffer.from('MZ'))).toThrow(/too small/);
  });

  it('should reject a file without the MZ signature', () => {
    expect(() => findRevision(Buffer.alloc(64))).toThrow(/MZ/);
  });

  it('should reject an executable without a game header', () => {
    const data = Buffer.alloc(1024);
    data.write('MZ');
    expect(() => findRevision(data)).toThrow(FormatError);
  });

  it('should find the GM8.0 magic', () => {
    const data = Buffer.alloc(GM80_PREFIX + 4);
    data.write('MZ');
    data.writeUInt32LE(1234321, GM80_PREFIX);
    expect(findRevision(data)).toEqual({ revision: GameRevision.GM80, offset: GM80_PREFIX + 4 });
  });

  it('should scan for the GM8.1 marker pair by masked match', () => {
    const at = GM81_PREFIX + 40;
    const data = Buffer.alloc(at + 8);
    data.write('MZ');
    data.writeUInt32LE(0xf7aa00bb, at);
    data.writeUInt32LE(0x12145667, at + 4);
    expect(findRevision(data)).toEqual({ revision: GameRevision.GM81, offset: at + 8 });
  });

  it('should not match a first marker word without its partner', () => {
    const data = Buffer.alloc(GM81_PREFIX + 16);
    data.write('MZ');
    data.writeUInt32LE(0xf7000000, GM81_PREFIX);
    data.writeUInt32LE(0x00150067, GM81_PREFIX + 4);
    expect(() => findRevision(data)).toThrow(/No GameMaker/);
  });

  it('should stop scanning after 1024 words', () => {
    const at = GM81_PREFIX + 1024 * 4;
    const data = Buffer.alloc(at + 8);
    data.write('MZ');
    data.writeUInt32LE(0xf7000000, at);
    data.writeUInt32LE(0x00140067, at + 4);
    expect(() => findRevision(data)).toThrow(FormatError);
  });
});

describe('decodeGame', () => {
  it('should decode a GM8.0 game end to end', () => {
    const { code, images } = collaborators();
    const game = decodeGame(buildGm80(SAMPLE), { code, images });

    expect(game.revision).toBe(GameRevision.GM80);
    expect(game.settings.fullscreen).toBe(true);
    expect(game.extensions[0].files[0].data.toString()).toBe('dll image');
    expect(game.constants).toEqual([{ name: 'LIVES', value: '3' }]);
    expect(game.sprites[0]?.width).toBe(1);
    expect(game.sprites[0]?.height).toBe(1);
    expect([...images.images[0].pixels]).toEqual([30, 20, 10, 255]);
    expect(game.objects[0]?.spriteIndex).toBe(0);
    expect(game.objects[1]?.identities).toEqual([1, 0]);
    expect(game.objects[1]?.resolvedEvents[EventCategory.Create].get(0)?.objectIndex).toBe(0);
    expect(game.objects[0]?.descendants).toEqual([1]);
    expect(game.rooms[0]).toBeNull();
    expect(game.rooms[1]?.instances[0]).toMatchObject({ x: 32, y: 48, objectIndex: 1, id: 100001 });
    expect(game.roomOrder).toEqual([1]);
    expect(game.lastInstanceId).toBe(100001);
  });

  it('should compile code in category order', () => {
    const { code, images } = collaborators();
    decodeGame(buildGm80(SAMPLE), { code, images });
    // trigger 0, script 1, obj_base create 2, room code 3, instance code 4
    expect(code.compileOrder).toEqual([1, 2, 0, 3, 4]);
    expect(code.text(3)).toBe('init()');
  });

  it('should leave the input buffer untouched', () => {
    const file = buildGm80(SAMPLE);
    const copy = Buffer.from(file);
    decodeGame(file, collaborators());
    expect(file.equals(copy)).toBe(true);
  });

  it('should decode a GM8.1 game through the stream cipher', () => {
    const { code, images } = collaborators();
    const file = buildGm81({
      settings: settingsRecord({ uninit: 2 }),
      scripts: [scriptRecord('scr_hello', 'show_message("hi")')],
    });
    const game = decodeGame(file, { code, images });

    expect(game.revision).toBe(GameRevision.GM81);
    expect(game.settings.treatAsZero).toBe(false);
    expect(game.settings.errorOnUninitialization).toBe(true);
    expect(game.scripts[0]?.name).toBe('scr_hello');
    expect(code.text(0)).toBe('show_message("hi")');
  });

  it('should decode with a negative key seed and no garbage tables', () => {
    const file = buildGm81(SAMPLE, { keySeed: -5, seed1: 7, swapTable: IDENTITY_TABLE, garbage1: 0, garbage2: 0 });
    const game = decodeGame(file, collaborators());
    expect(game.objects[1]?.name).toBe('obj_player');
    expect(game.roomOrder).toEqual([1]);
  });

  it('should fail on a seed anomaly only in strict mode', () => {
    const file = buildGm80({ extensions: [extensionRecord('ext', [{ fileName: 'a.dll', data: Buffer.from('ok') }], -200)] });
    expect(decodeGame(file, collaborators()).extensions[0].files[0].data.toString()).toBe('ok');
    expect(() => decodeGame(file, collaborators(), { strictExtensionSeeds: true })).toThrow(FormatError);
  });

  it('should honour the room order option', () => {
    const file = buildGm80({ rooms: [roomRecord('rm')], roomOrder: [3] });
    expect(() => decodeGame(file, collaborators())).toThrow(/room 3, which does not exist/);
    expect(decodeGame(file, collaborators(), { validateRoomOrder: false }).roomOrder).toEqual([3]);
  });

  it('should skip compilation when disabled', () => {
    const { code, images } = collaborators();
    decodeGame(buildGm80(SAMPLE), { code, images }, { compileCode: false });
    expect(code.compileOrder).toEqual([]);
    expect(code.size).toBe(5);
  });
});

describe('loadGame', () => {
  const dir = mkdtempSync(join(tmpdir(), 'gm8-loader-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a game from a file', () => {
    const path = join(dir, 'game.exe');
    writeFileSync(path, buildGm80(SAMPLE));
    const result = loadGame(path, collaborators());
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.game.scripts[0]?.name).toBe('scr_init');
  });

  it('should open the log file in logDir itself', () => {
    const logDir = join(dir, 'logs-here');
    const result = loadGame(buildGm80(SAMPLE), collaborators(), { logDir });
    expect(result.ok).toBe(true);
    expect(getLogPath()).toBe(join(logDir, 'gm8-loader.log'));
  });

  it('should report a missing file as an IoError', () => {
    const err = failure(loadGame(join(dir, 'missing.exe'), collaborators()));
    expect(err.kind).toBe('IoError');
    expect(err.message).toContain('missing.exe');
  });

  it('should report a non-executable as a FormatError', () => {
    expect(failure(loadGame(Buffer.alloc(100), collaborators())).kind).toBe('FormatError');
  });

  it('should report a cut-off file as truncated', () => {
    const file = buildGm80(SAMPLE);
    expect(failure(loadGame(file.subarray(0, file.length - 50), collaborators())).kind).toBe('TruncatedInput');
  });

  it('should report a damaged zlib block with its offset', () => {
    const file = buildGm80(SAMPLE);
    // magic, 8 header bytes, version word, then the settings block length
    const blockAt = GM80_PREFIX + 4 + 8 + 4;
    file[blockAt + 4] = 0;
    const err = failure(loadGame(file, collaborators()));
    expect(err.kind).toBe('CorruptBlock');
    expect(err.offset).toBe(blockAt);
  });

  it('should report a compile failure', () => {
    const code = new SourceCodeRegistry();
    code.compile = handle => (handle === 1 ? { ok: false, message: 'bad' } : { ok: true });
    const err = failure(loadGame(buildGm80(SAMPLE), { code, images: new MemoryImageStore() }));
    expect(err.kind).toBe('CompileError');
    expect(err.message).toBe('Failed to compile script "scr_init": bad');
  });

  it('should rethrow errors from collaborators', () => {
    const images: ImageStore = {
      makeImage() {
        throw new Error('store full');
      },
    };
    expect(() => loadGame(buildGm80(SAMPLE), { code: new SourceCodeRegistry(), images })).toThrow('store full');
  });
});
