#!/usr/bin/env npx tsx
/**
 * gm8-loader CLI — headless tool for inspecting GameMaker 8 executables
 *
 * Usage:
 *   npx tsx scripts/cli.ts [--config <file.json>] [--quiet] <command> [args...]
 *
 * Commands:
 *   info <game.exe>                 Revision, settings summary, asset counts
 *   assets <game.exe> [category]    List assets (all categories or one)
 *   objects <game.exe>              Objects with parents and event counts
 *   rooms <game.exe>                Rooms with instances and tiles
 *   settings <game.exe>             Full settings block
 *   gameinfo <game.exe>             Game information (F1 window)
 *   extensions <game.exe>           Extensions, files, functions
 *   hexdump <game.exe> <offset> [rows]  Raw bytes of the file
 *   crc <text>                      CRC-32 of a string (and the GM8.1 key hash)
 */

import { readFileSync } from 'fs';
import { resolve, basename } from 'path';
import { loadGame } from '../src/core/game-loader';
import { SourceCodeRegistry, MemoryImageStore } from '../src/core/collaborators';
import { loadLoaderConfig, DEFAULT_OPTIONS } from '../src/core/config';
import type { LoaderOptions } from '../src/core/config';
import { setConsoleOutput } from '../src/core/logger';
import { crc32 } from '../src/core/crc32';
import { gm81Seed2 } from '../src/core/gm81-cipher';
import type { AssetCategory, GameData, IncludeFile, Slot } from '../src/core/assets';
import { EVENT_CATEGORY_NAMES } from '../src/core/assets';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CATEGORIES: AssetCategory[] = [
  'extensions',
  'triggers',
  'constants',
  'sounds',
  'sprites',
  'backgrounds',
  'paths',
  'scripts',
  'fonts',
  'timelines',
  'objects',
  'rooms',
  'includeFiles',
];

function isCategory(name: string): name is AssetCategory {
  return CATEGORIES.some(c => c === name);
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function hex(n: number, width = 8): string {
  return `0x${(n >>> 0).toString(16).padStart(width, '0')}`;
}

function hexdump(data: Buffer, start: number, maxRows = 16): void {
  const rows = Math.min(maxRows, Math.ceil((data.length - start) / 16));
  for (let row = 0; row < rows; row++) {
    const off = start + row * 16;
    const bytes = data.subarray(off, Math.min(off + 16, data.length));
    const cells: string[] = [];
    for (let i = 0; i < 16; i++) {
      cells.push(i < bytes.length ? bytes[i].toString(16).padStart(2, '0') : '  ');
    }
    let ascii = '';
    for (const b of bytes) {
      ascii += (b >= 0x20 && b <= 0x7e) ? String.fromCharCode(b) : '.';
    }
    console.log(`  ${off.toString(16).padStart(8, '0')}  ${cells.slice(0, 8).join(' ')}  ${cells.slice(8).join(' ')}  |${ascii}|`);
  }
}

function die(msg: string): never {
  console.error(`Error: ${msg}`);
  process.exit(1);
}

function countSlots(table: Slot<unknown>[]): string {
  const used = table.filter(a => a !== null).length;
  return used === table.length ? `${used}` : `${used} (+${table.length - used} empty)`;
}

function load(filepath: string, options: LoaderOptions): { game: GameData; code: SourceCodeRegistry; images: MemoryImageStore } {
  const code = new SourceCodeRegistry();
  const images = new MemoryImageStore();
  const result = loadGame(filepath, { code, images }, options);
  if (!result.ok) die(`${result.error.kind}: ${result.error.message}`);
  return { game: result.game, code, images };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdInfo(filepath: string, options: LoaderOptions): void {
  const { game, code, images } = load(filepath, options);

  console.log(`\n=== ${basename(filepath)} ===\n`);
  console.log(`  Revision:         GameMaker ${game.revision === 810 ? '8.1' : '8.0'}`);
  console.log(`  Caption:          ${game.info.caption}`);
  console.log(`  Start room:       ${game.roomOrder.length ? game.roomOrder[0] : '(none)'}`);
  console.log(`  Last ids:         instance=${game.lastInstanceId} tile=${game.lastTileId}`);
  console.log(`  Fullscreen:       ${game.settings.fullscreen}`);
  console.log(`  Code handles:     ${code.size}`);
  console.log(`  Images:           ${images.images.length} (${formatSize(images.byteSize)})`);

  console.log(`\nAssets:`);
  for (const cat of CATEGORIES) {
    const table = game[cat];
    const label = cat === 'extensions' || cat === 'constants' ? `${table.length}` : countSlots(table);
    console.log(`  ${cat.padEnd(16)} ${label}`);
  }
}

function cmdAssets(filepath: string, category: string | undefined, options: LoaderOptions): void {
  if (category && !isCategory(category)) die(`Unknown category "${category}" (one of ${CATEGORIES.join(', ')})`);
  const { game } = load(filepath, options);

  for (const cat of CATEGORIES) {
    if (category && cat !== category) continue;
    const table: Slot<{ name: string } | IncludeFile>[] = game[cat];
    console.log(`\n[${cat}] ${table.length}`);
    table.forEach((asset, id) => {
      const label = asset ? ('name' in asset ? asset.name : asset.fileName) : '(empty)';
      console.log(`  ${String(id).padStart(5)}  ${label}`);
    });
  }
}

function cmdObjects(filepath: string, options: LoaderOptions): void {
  const { game } = load(filepath, options);
  console.log(`\n=== Objects: ${game.objects.length} ===\n`);

  game.objects.forEach((obj, id) => {
    if (!obj) return;
    const sprite = obj.spriteIndex !== null ? game.sprites[obj.spriteIndex]?.name ?? `#${obj.spriteIndex}` : '-';
    const chain = obj.identities.slice(1).map(i => game.objects[i]?.name ?? `#${i}`);
    console.log(`  [${id}] ${obj.name}  sprite=${sprite} depth=${obj.depth}${obj.solid ? ' solid' : ''}${obj.persistent ? ' persistent' : ''}`);
    if (chain.length) console.log(`        parents: ${chain.join(' -> ')}`);
    obj.resolvedEvents.forEach((events, cat) => {
      if (events.size === 0) return;
      const subs = [...events.entries()].map(([sub, ev]) => (ev.objectIndex === id ? `${sub}` : `${sub}*`));
      console.log(`        ${EVENT_CATEGORY_NAMES[cat].padEnd(10)} ${subs.join(', ')}`);
    });
  });
}

function cmdRooms(filepath: string, options: LoaderOptions): void {
  const { game } = load(filepath, options);
  console.log(`\n=== Rooms (play order: ${game.roomOrder.join(', ')}) ===\n`);

  game.rooms.forEach((room, id) => {
    if (!room) return;
    console.log(`  [${id}] ${room.name} "${room.caption}" ${room.width}x${room.height} speed=${room.speed}`);
    console.log(`        backgrounds=${room.backgrounds.length} views=${room.views.length}${room.enableViews ? ' (enabled)' : ''}`);
    console.log(`        instances=${room.instances.length} tiles=${room.tiles.length}`);
    for (const inst of room.instances.slice(0, 10)) {
      const obj = inst.objectIndex !== null ? game.objects[inst.objectIndex]?.name ?? `#${inst.objectIndex}` : '-';
      console.log(`          #${inst.id} ${obj} at (${inst.x}, ${inst.y})`);
    }
    if (room.instances.length > 10) console.log(`          ... ${room.instances.length - 10} more`);
  });
}

function cmdSettings(filepath: string, options: LoaderOptions): void {
  const { game } = load(filepath, options);
  console.log(`\n=== Settings ===\n`);
  for (const [key, value] of Object.entries(game.settings)) {
    console.log(`  ${key.padEnd(24)} ${value}`);
  }
}

function cmdGameInfo(filepath: string, options: LoaderOptions): void {
  const { game } = load(filepath, options);
  const i = game.info;
  console.log(`\n=== Game information ===\n`);
  console.log(`  Caption:    ${i.caption}`);
  console.log(`  Window:     ${i.left},${i.top} ${i.width}x${i.height}${i.separateWindow ? ' (separate)' : ''}`);
  console.log(`  Background: ${hex(i.backgroundColour, 6)}`);
  console.log(`\n${i.info}`);
}

function cmdExtensions(filepath: string, options: LoaderOptions): void {
  const { game } = load(filepath, options);
  for (const ext of game.extensions) {
    console.log(`\n[${ext.name}] folder=${ext.folderName}`);
    for (const file of ext.files) {
      console.log(`  ${file.fileName} kind=${file.kind} ${formatSize(file.data.length)}`);
      for (const fn of file.functions) {
        console.log(`    ${fn.name}(${fn.argCount}) -> ${fn.externalName}`);
      }
      for (const c of file.constants) {
        console.log(`    ${c.name} = ${c.value}`);
      }
    }
  }
}

function cmdHexdump(filepath: string, offset: number, rows: number): void {
  const data = readFileSync(filepath);
  if (offset < 0 || offset >= data.length) die(`Offset ${offset} outside file (${data.length} bytes)`);
  hexdump(data, offset, rows);
}

function cmdCrc(text: string): void {
  console.log(`  crc32("${text}") = ${hex(crc32(Buffer.from(text, 'latin1')))}`);
  const seed = Number(text);
  if (Number.isInteger(seed)) {
    console.log(`  GM8.1 key hash for seed ${seed} = ${hex(gm81Seed2(seed))}`);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

const argv = process.argv.slice(2);
let options: LoaderOptions = { ...DEFAULT_OPTIONS };

const configAt = argv.indexOf('--config');
if (configAt !== -1) {
  const path = argv[configAt + 1];
  if (!path) die('--config needs a file');
  options = loadLoaderConfig(resolve(path));
  argv.splice(configAt, 2);
}
const quietAt = argv.indexOf('--quiet');
if (quietAt !== -1) {
  setConsoleOutput(false);
  argv.splice(quietAt, 1);
}

const [command, ...args] = argv;

if (!command) {
  console.log(`
gm8-loader CLI — inspect GameMaker 8.0 / 8.1 executables

Usage: npx tsx scripts/cli.ts [--config <file.json>] [--quiet] <command> [args...]

Commands:
  info <game.exe>                   Revision, summary, asset counts
  assets <game.exe> [category]      List assets by id
  objects <game.exe>                Objects, parents, events (* = inherited)
  rooms <game.exe>                  Rooms, instances, tiles
  settings <game.exe>               Settings block
  gameinfo <game.exe>               Game information text
  extensions <game.exe>             Extension packages
  hexdump <game.exe> <offset> [rows]  Raw bytes
  crc <text>                        CRC-32 / GM8.1 key hash
`);
  process.exit(0);
}

try {
  switch (command) {
    case 'info':
      if (!args[0]) die('Usage: info <game.exe>');
      cmdInfo(resolve(args[0]), options);
      break;

    case 'assets':
      if (!args[0]) die('Usage: assets <game.exe> [category]');
      cmdAssets(resolve(args[0]), args[1], options);
      break;

    case 'objects':
      if (!args[0]) die('Usage: objects <game.exe>');
      cmdObjects(resolve(args[0]), options);
      break;

    case 'rooms':
      if (!args[0]) die('Usage: rooms <game.exe>');
      cmdRooms(resolve(args[0]), options);
      break;

    case 'settings':
      if (!args[0]) die('Usage: settings <game.exe>');
      cmdSettings(resolve(args[0]), options);
      break;

    case 'gameinfo':
      if (!args[0]) die('Usage: gameinfo <game.exe>');
      cmdGameInfo(resolve(args[0]), options);
      break;

    case 'extensions':
      if (!args[0]) die('Usage: extensions <game.exe>');
      cmdExtensions(resolve(args[0]), options);
      break;

    case 'hexdump':
      if (!args[0] || !args[1]) die('Usage: hexdump <game.exe> <offset> [rows]');
      cmdHexdump(resolve(args[0]), parseInt(args[1]), args[2] ? parseInt(args[2]) : 16);
      break;

    case 'crc':
      if (args[0] === undefined) die('Usage: crc <text>');
      cmdCrc(args[0]);
      break;

    default:
      die(`Unknown command: ${command}`);
  }
} catch (e) {
  console.error(`\nFATAL: ${e}`);
  if (e instanceof Error && e.stack) {
    console.error(e.stack);
  }
  process.exit(1);
}
