/**
 * Drag-and-drop action lists (object events and timeline moments).
 *
 * Action layout:
 *   u32     version (440)
 *   u32     library id
 *   u32     action id
 *   u32     kind (see ActionKind)
 *   u32     can be relative
 *   u32     is question
 *   u32     applies to something
 *   u32     execution type (see ExecutionType)
 *   string  function name
 *   string  function code
 *   u32     argument count
 *   u32     n, then n argument types
 *   i32     applies to (-1 self, -2 other, else object index)
 *   u32     relative
 *   u32     n, then n argument strings
 *   u32     invert condition ("NOT")
 */

import type { Cursor } from './cursor';
import type { CodeRegistry } from './collaborators';
import type { CodeAction } from './assets';
import { ActionKind, ArgumentType, ExecutionType } from './assets';
import { CorruptBlockError } from './errors';

/** Both type and argument tables always have 8 slots in files written by GM8. */
const MAX_ARGUMENT_SLOTS = 8;

function readSlotCount(cursor: Cursor, what: string): number {
  const at = cursor.position;
  const n = cursor.readU32();
  if (n > MAX_ARGUMENT_SLOTS) {
    throw new CorruptBlockError(`Action ${what} table has ${n} slots (max ${MAX_ARGUMENT_SLOTS})`, at);
  }
  return n;
}

/**
 * Read one action and register its code with `code`. `label` names the
 * owner for compile errors, e.g. `object "obj_player" event 3:0`.
 */
export function readAction(cursor: Cursor, code: CodeRegistry, label: string): CodeAction {
  cursor.skip(4);
  const libraryId = cursor.readU32();
  const actionId = cursor.readU32();
  const kind = cursor.readU32();
  const canBeRelative = cursor.readBool();
  const isQuestion = cursor.readBool();
  const appliesToSomething = cursor.readBool();
  const executionType = cursor.readU32();
  const functionName = cursor.readString();
  const functionCode = cursor.readByteString();

  const argumentCount = cursor.readU32();
  const typeSlots = readSlotCount(cursor, 'argument type');
  const argumentTypes: number[] = [];
  for (let i = 0; i < typeSlots; i++) argumentTypes.push(cursor.readU32());

  const appliesTo = cursor.readI32();
  const isRelative = cursor.readBool();

  const argSlots = readSlotCount(cursor, 'argument');
  const args: Buffer[] = [];
  for (let i = 0; i < argSlots; i++) args.push(cursor.readByteString());

  const invertCondition = cursor.readBool();

  if (argumentCount > Math.min(typeSlots, argSlots)) {
    throw new CorruptBlockError(
      `Action ${libraryId}:${actionId} uses ${argumentCount} arguments but has ${Math.min(typeSlots, argSlots)} slots`,
      cursor.position,
    );
  }

  let handle: number | null = null;
  const argumentHandles: (number | null)[] = args.map(() => null);

  if (kind === ActionKind.Code) {
    // The code editor action keeps its statements in argument 0.
    handle = code.registerCode(args[0] ?? Buffer.alloc(0), label);
  } else {
    if (executionType === ExecutionType.Code) {
      handle = code.registerCode(functionCode, label);
    }
    for (let i = 0; i < argumentCount; i++) {
      if (argumentTypes[i] === ArgumentType.Expression) {
        argumentHandles[i] = code.registerExpression(args[i], `${label} argument ${i}`);
      }
    }
  }

  return {
    libraryId,
    actionId,
    kind,
    canBeRelative,
    isQuestion,
    appliesToSomething,
    executionType,
    functionName,
    functionCode,
    argumentCount,
    argumentTypes,
    appliesTo,
    isRelative,
    arguments: args,
    invertCondition,
    code: handle,
    argumentHandles,
  };
}

/** u32 version, u32 count, then `count` actions. */
export function readActionList(cursor: Cursor, code: CodeRegistry, label: string): CodeAction[] {
  cursor.skip(4);
  const count = cursor.readU32();
  const actions: CodeAction[] = [];
  for (let i = 0; i < count; i++) {
    actions.push(readAction(cursor, code, label));
  }
  return actions;
}

/** Every code handle an action holds, statements first. */
export function actionHandles(action: CodeAction): number[] {
  const out: number[] = [];
  if (action.code !== null) out.push(action.code);
  for (const h of action.argumentHandles) {
    if (h !== null) out.push(h);
  }
  return out;
}
