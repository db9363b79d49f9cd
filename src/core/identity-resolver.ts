/**
 * Post-load pass: object inheritance, room order checks, and compiling
 * every registered code handle.
 *
 * Runs once all categories are decoded, since parents may come after
 * their children and code may name any asset.
 */

import type { CodeHandle, CodeRegistry } from './collaborators'
import type { CodeAction, GameObject, ResolvedEvent, Room, Slot } from './assets'
import { EVENT_CATEGORY_COUNT } from './assets'
import type { DecodedAssets } from './asset-deserializer'
import { actionHandles } from './actions'
import { CompileError, CorruptBlockError, FormatError } from './errors'
import { log } from './logger'

export interface ResolveOptions {
  validateRoomOrder: boolean
  compileCode: boolean
}

// ---- Object identities ----

function ancestorChain(objects: Slot<GameObject>[], index: number, obj: GameObject): number[] {
  const chain = [index]
  const seen = new Set(chain)
  let parent = obj.parentIndex
  while (parent !== null) {
    const p = objects[parent]
    if (parent >= objects.length || !p) {
      throw new CorruptBlockError(`Object "${obj.name}" inherits from object ${parent}, which does not exist`)
    }
    if (seen.has(parent)) {
      throw new CorruptBlockError(`Object "${obj.name}" has a parent cycle through "${p.name}"`)
    }
    chain.push(parent)
    seen.add(parent)
    parent = p.parentIndex
  }
  return chain
}

/**
 * Fill `identities`, `descendants` and `resolvedEvents` on every object.
 * An object's own event wins over a parent's for the same sub-index.
 */
export function compileObjectIdentities(objects: Slot<GameObject>[]): void {
  for (let i = 0; i < objects.length; i++) {
    const obj = objects[i]
    if (!obj) continue
    obj.identities = ancestorChain(objects, i, obj)
    obj.descendants = []
  }

  for (let i = 0; i < objects.length; i++) {
    const obj = objects[i]
    if (!obj) continue
    for (const ancestor of obj.identities.slice(1)) {
      objects[ancestor]?.descendants.push(i)
    }

    const resolved: Map<number, ResolvedEvent>[] = []
    for (let category = 0; category < EVENT_CATEGORY_COUNT; category++) {
      const table = new Map<number, ResolvedEvent>()
      for (const owner of obj.identities) {
        const events = objects[owner]?.events[category]
        if (!events) continue
        for (const [sub, actions] of events) {
          if (!table.has(sub)) table.set(sub, { objectIndex: owner, actions })
        }
      }
      resolved.push(table)
    }
    obj.resolvedEvents = resolved
  }
}

// ---- Room order ----

export function validateRoomOrder(roomOrder: number[], rooms: Slot<Room>[]): void {
  if (roomOrder.length === 0 && rooms.some(r => r !== null)) {
    throw new FormatError('Room order is empty')
  }
  for (const id of roomOrder) {
    if (!rooms[id]) throw new FormatError(`Room order names room ${id}, which does not exist`)
  }
}

// ---- Code compilation ----

function compileHandle(code: CodeRegistry, handle: CodeHandle, asset: string): void {
  const result = code.compile(handle)
  if (!result.ok) throw new CompileError(asset, result.message)
}

function compileActions(code: CodeRegistry, actions: CodeAction[], asset: string): number {
  let n = 0
  for (const action of actions) {
    for (const handle of actionHandles(action)) {
      compileHandle(code, handle, asset)
      n++
    }
  }
  return n
}

function sortedEntries<V>(map: Map<number, V>): [number, V][] {
  return [...map.entries()].sort((a, b) => a[0] - b[0])
}

/**
 * Compile in category order: scripts, timelines, objects, triggers,
 * rooms (creation code, then each instance). Stops at the first failure.
 */
export function compileAllCode(assets: DecodedAssets, code: CodeRegistry): number {
  let n = 0

  for (const script of assets.scripts) {
    if (!script) continue
    compileHandle(code, script.code, `script "${script.name}"`)
    n++
  }

  for (const timeline of assets.timelines) {
    if (!timeline) continue
    for (const [moment, actions] of sortedEntries(timeline.moments)) {
      n += compileActions(code, actions, `timeline "${timeline.name}" moment ${moment}`)
    }
  }

  for (const obj of assets.objects) {
    if (!obj) continue
    obj.events.forEach((table, category) => {
      for (const [sub, actions] of sortedEntries(table)) {
        n += compileActions(code, actions, `object "${obj.name}" event ${category}:${sub}`)
      }
    })
  }

  for (const trigger of assets.triggers) {
    if (!trigger) continue
    compileHandle(code, trigger.condition, `trigger "${trigger.name}"`)
    n++
  }

  for (const room of assets.rooms) {
    if (!room) continue
    compileHandle(code, room.creationCode, `room "${room.name}" creation code`)
    n++
    for (const inst of room.instances) {
      compileHandle(code, inst.creationCode, `room "${room.name}" instance ${inst.id}`)
      n++
    }
  }

  return n
}

export function resolveIdentities(assets: DecodedAssets, code: CodeRegistry, options: ResolveOptions): void {
  compileObjectIdentities(assets.objects)
  log('Compiled object identities')

  if (options.validateRoomOrder) validateRoomOrder(assets.roomOrder, assets.rooms)

  if (options.compileCode) {
    const n = compileAllCode(assets, code)
    log(`Compiled ${n} code handles`)
  }
}
