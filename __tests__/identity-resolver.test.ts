import { describe, expect, it } from 'vitest'
import {
  compileAllCode,
  compileObjectIdentities,
  resolveIdentities,
  validateRoomOrder,
} from '../src/core/identity-resolver'
import { deserializeAssets } from '../src/core/asset-deserializer'
import type { DecodedAssets } from '../src/core/asset-deserializer'
import { BlockInflator } from '../src/core/block-inflator'
import { MemoryImageStore, SourceCodeRegistry } from '../src/core/collaborators'
import type { CodeHandle, CompileResult } from '../src/core/collaborators'
import { Cursor } from '../src/core/cursor'
import type { CodeAction, EventTable, GameObject, Room, Slot } from '../src/core/assets'
import { EVENT_CATEGORY_COUNT, EventCategory, GameRevision } from '../src/core/assets'
import { CompileError, CorruptBlockError, FormatError } from '../src/core/errors'
import { setConsoleOutput } from '../src/core/logger'
import type { GameParts } from './helpers/container-builder'
import {
  assetStream,
  codeAction,
  objectRecord,
  roomRecord,
  scriptRecord,
  timelineRecord,
  triggerRecord,
} from './helpers/container-builder'

setConsoleOutput(false)

function events(defs: [number, number][] = []): EventTable {
  const table: EventTable = []
  for (let i = 0; i < EVENT_CATEGORY_COUNT; i++) table.push(new Map<number, CodeAction[]>())
  for (const [category, sub] of defs) table[category].set(sub, [])
  return table
}

function object(name: string, parentIndex: number | null, defs: [number, number][] = []): GameObject {
  return {
    name,
    spriteIndex: null,
    solid: false,
    visible: true,
    depth: 0,
    persistent: false,
    parentIndex,
    maskIndex: null,
    events: events(defs),
    identities: [],
    descendants: [],
    resolvedEvents: [],
  }
}

function decode(parts: GameParts, code: SourceCodeRegistry): DecodedAssets {
  return deserializeAssets(new Cursor(assetStream(parts).toBuffer()), {
    revision: GameRevision.GM80,
    inflator: new BlockInflator(),
    code,
    images: new MemoryImageStore(),
    strictExtensionSeeds: false,
  })
}

class RejectingRegistry extends SourceCodeRegistry {
  constructor(private readonly reject: CodeHandle) {
    super()
  }

  compile(handle: CodeHandle): CompileResult {
    if (handle === this.reject) return { ok: false, message: 'unexpected token' }
    return super.compile(handle)
  }
}

describe('compileObjectIdentities', () => {
  it('should list each object and its ancestors nearest first', () => {
    const objects: Slot<GameObject>[] = [object('base', null), object('enemy', 0), object('boss', 1), null]
    compileObjectIdentities(objects)
    expect(objects[2]?.identities).toEqual([2, 1, 0])
    expect(objects[1]?.identities).toEqual([1, 0])
    expect(objects[0]?.identities).toEqual([0])
  })

  it('should record descendants on every ancestor', () => {
    const objects: Slot<GameObject>[] = [object('base', null), object('enemy', 0), object('boss', 1), object('other', null)]
    compileObjectIdentities(objects)
    expect(objects[0]?.descendants).toEqual([1, 2])
    expect(objects[1]?.descendants).toEqual([2])
    expect(objects[3]?.descendants).toEqual([])
  })

  it('should accept a parent stored after its child', () => {
    const objects: Slot<GameObject>[] = [object('child', 1), object('parent', null)]
    compileObjectIdentities(objects)
    expect(objects[0]?.identities).toEqual([0, 1])
  })

  it('should prefer the nearest definition of an event', () => {
    const objects: Slot<GameObject>[] = [
      object('base', null, [[EventCategory.Create, 0], [EventCategory.Step, 0]]),
      object('enemy', 0, [[EventCategory.Create, 0]]),
      object('boss', 1, [[EventCategory.Alarm, 1]]),
    ]
    compileObjectIdentities(objects)
    const boss = objects[2]
    expect(boss?.resolvedEvents).toHaveLength(EVENT_CATEGORY_COUNT)
    expect(boss?.resolvedEvents[EventCategory.Create].get(0)?.objectIndex).toBe(1)
    expect(boss?.resolvedEvents[EventCategory.Step].get(0)?.objectIndex).toBe(0)
    expect(boss?.resolvedEvents[EventCategory.Alarm].get(1)?.objectIndex).toBe(2)
    expect(objects[0]?.resolvedEvents[EventCategory.Alarm].size).toBe(0)
  })

  it('should reject a parent index past the table', () => {
    const objects: Slot<GameObject>[] = [object('orphan', 7)]
    expect(() => compileObjectIdentities(objects)).toThrow(CorruptBlockError)
  })

  it('should reject a parent that is an empty slot', () => {
    const objects: Slot<GameObject>[] = [null, object('orphan', 0)]
    expect(() => compileObjectIdentities(objects)).toThrow(/inherits from object 0, which does not exist/)
  })

  it('should reject a parent cycle', () => {
    const objects: Slot<GameObject>[] = [object('a', 1), object('b', 0)]
    expect(() => compileObjectIdentities(objects)).toThrow(/parent cycle/)
  })
})

describe('validateRoomOrder', () => {
  const room: Room = {
    name: 'rm',
    caption: '',
    width: 640,
    height: 480,
    speed: 30,
    persistent: false,
    backgroundColour: 0,
    drawBackgroundColour: true,
    creationCode: 0,
    backgrounds: [],
    enableViews: false,
    views: [],
    instances: [],
    tiles: [],
  }

  it('should accept an order naming existing rooms', () => {
    expect(() => validateRoomOrder([1, 0], [room, room])).not.toThrow()
  })

  it('should accept an empty order when there are no rooms', () => {
    expect(() => validateRoomOrder([], [null])).not.toThrow()
  })

  it('should reject an empty order when rooms exist', () => {
    expect(() => validateRoomOrder([], [room])).toThrow(FormatError)
  })

  it('should reject an order naming a missing room', () => {
    expect(() => validateRoomOrder([0, 1], [room, null])).toThrow(/room 1, which does not exist/)
    expect(() => validateRoomOrder([5], [room])).toThrow(FormatError)
  })
})

describe('compileAllCode', () => {
  const parts: GameParts = {
    triggers: [triggerRecord('trg', 'true')],
    scripts: [scriptRecord('scr', 'return 0')],
    timelines: [timelineRecord('tl', [[10, [codeAction('m10')]], [2, [codeAction('m2')]]])],
    objects: [
      objectRecord('obj', {
        events: [
          [EventCategory.Create, 0, [codeAction('create')]],
          [EventCategory.Step, 0, [codeAction('step')]],
        ],
      }),
    ],
    rooms: [roomRecord('rm', { code: 'rc', instances: [{ x: 0, y: 0, object: 0, id: 100001, code: 'ic' }] })],
    roomOrder: [0],
  }

  it('should compile scripts, timelines, objects, triggers, then rooms', () => {
    const code = new SourceCodeRegistry()
    const assets = decode(parts, code)
    // registration order: trg 0, scr 1, m10 2, m2 3, create 4, step 5, rc 6, ic 7
    expect(compileAllCode(assets, code)).toBe(8)
    expect(code.compileOrder).toEqual([1, 3, 2, 4, 5, 0, 6, 7])
  })

  it('should stop at the first failure with the owning asset', () => {
    const code = new RejectingRegistry(3)
    const assets = decode(parts, code)
    let caught: unknown
    try {
      compileAllCode(assets, code)
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(CompileError)
    expect(caught).toMatchObject({
      kind: 'CompileError',
      asset: 'timeline "tl" moment 2',
      message: 'Failed to compile timeline "tl" moment 2: unexpected token',
    })
    expect(code.compileOrder).toEqual([1])
  })
})

describe('resolveIdentities', () => {
  it('should skip compilation when disabled', () => {
    const code = new SourceCodeRegistry()
    const assets = decode({ scripts: [scriptRecord('scr', 'x')], objects: [objectRecord('a'), objectRecord('b', { parent: 0 })] }, code)
    resolveIdentities(assets, code, { validateRoomOrder: true, compileCode: false })
    expect(code.compileOrder).toEqual([])
    expect(assets.objects[1]?.identities).toEqual([1, 0])
  })

  it('should skip the room order check when disabled', () => {
    const code = new SourceCodeRegistry()
    const assets = decode({ rooms: [roomRecord('rm')], roomOrder: [] }, code)
    expect(() => resolveIdentities(assets, code, { validateRoomOrder: true, compileCode: true })).toThrow(FormatError)
    expect(() => resolveIdentities(assets, code, { validateRoomOrder: false, compileCode: true })).not.toThrow()
  })
})
