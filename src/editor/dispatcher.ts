import { isDigit } from "./chars.js";
import {
  backspaceCommandLine,
  emptyCommandLine,
  insertIntoCommandLine,
  moveCommandCursor,
  parseCommand,
  type ParsedCommand,
} from "./command.js";
import {
  getHints,
  normalMap,
  resolveSequence,
  stepKey,
  type NormalActionId,
} from "./keymap.js";
import {
  isPrintable,
  KEY_SEQUENCE_LIMIT,
  type DispatchState,
  type Key,
  type Pending,
} from "./state.js";

export type NormalAction = { type: NormalActionId };

export type InsertAction =
  | { type: "insert.char"; ch: string }
  | { type: "insert.tab" }
  | { type: "insert.newline" }
  | { type: "insert.backspace" }
  | { type: "insert.left" }
  | { type: "insert.right" }
  | { type: "insert.up" }
  | { type: "insert.down" }
  | { type: "insert.leave" };

export type CommandAction =
  | { type: "command.begin" }
  | { type: "command.cancel" }
  | { type: "command.run"; command: ParsedCommand; text: string };

export type Action = NormalAction | InsertAction | CommandAction;

export type Transition = {
  state: DispatchState;
  actions: Action[];
};

const NO_PENDING: Pending = { kind: "none" };

function stay(state: DispatchState): Transition {
  return { state, actions: [] };
}

function clearPending(state: DispatchState): Transition {
  return stay({ ...state, pending: NO_PENDING, repeat: 1 });
}

/**
 * One keystroke: (state, key) -> (next state, actions to apply in order).
 * Pure; the editor owns the document and applies the actions.
 */
export function dispatch(state: DispatchState, key: Key): Transition {
  switch (state.mode) {
    case "EXITING":
      return stay(state);
    case "NORMAL":
      return dispatchNormal(state, key);
    case "INSERT":
      return dispatchInsert(state, key);
    case "COMMAND_COLLECT":
      return dispatchCommandLine(state, key);
    case "COMMAND_EXECUTE":
      // the previous command was never completed
      return dispatch(finishCommand(state, false), key);
  }
}

/** Leaves COMMAND_EXECUTE once the editor has run the command. */
export function finishCommand(state: DispatchState, exit: boolean): DispatchState {
  return {
    ...state,
    mode: exit ? "EXITING" : "NORMAL",
    commandLine: emptyCommandLine(),
  };
}

function dispatchNormal(state: DispatchState, key: Key): Transition {
  const pending = state.pending;

  if (pending.kind === "count") {
    if (isDigit(key)) {
      const digits = pending.digits + key;
      if (digits.length > KEY_SEQUENCE_LIMIT) return clearPending(state);
      return stay({ ...state, pending: { kind: "count", digits } });
    }
    if (key === "escape") return clearPending(state);
    // the key that ends the count runs with it
    const repeat = Number.parseInt(pending.digits, 10);
    return dispatchNormal({ ...state, pending: NO_PENDING, repeat }, key);
  }

  if (pending.kind === "prefix") {
    const node = resolveSequence(normalMap, pending.keys);
    const next = key === "escape" || node === null ? null : stepKey(node, key);
    if (next === null) return clearPending(state);
    if (next.kind === "group") {
      const keys = [...pending.keys, key];
      if (keys.length > KEY_SEQUENCE_LIMIT) return clearPending(state);
      return stay({ ...state, pending: { kind: "prefix", keys } });
    }
    return {
      state: { ...state, pending: NO_PENDING, repeat: 1 },
      actions: [{ type: next.actionId }],
    };
  }

  if (isDigit(key) && key !== "0") {
    return stay({ ...state, pending: { kind: "count", digits: key } });
  }

  if (key === ":") {
    return {
      state: {
        ...state,
        mode: "COMMAND_COLLECT",
        repeat: 1,
        commandLine: emptyCommandLine(),
      },
      actions: [{ type: "command.begin" }],
    };
  }

  const node = stepKey(normalMap, key);
  if (node === null) return stay({ ...state, repeat: 1 });
  if (node.kind === "group") {
    // counts only apply to single-key commands
    return stay({ ...state, pending: { kind: "prefix", keys: [key] }, repeat: 1 });
  }

  const times = node.repeatable ? state.repeat : 1;
  const actions: Action[] = [];
  for (let i = 0; i < times; i++) actions.push({ type: node.actionId });
  const entersInsert = node.actionId === "mode.insert" || node.actionId === "mode.append";
  return {
    state: { ...state, mode: entersInsert ? "INSERT" : "NORMAL", repeat: 1 },
    actions,
  };
}

function dispatchInsert(state: DispatchState, key: Key): Transition {
  switch (key) {
    case "escape":
      return { state: { ...state, mode: "NORMAL" }, actions: [{ type: "insert.leave" }] };
    case "enter":
      return { state, actions: [{ type: "insert.newline" }] };
    case "backspace":
      return { state, actions: [{ type: "insert.backspace" }] };
    case "tab":
      return { state, actions: [{ type: "insert.tab" }] };
    case "left":
      return { state, actions: [{ type: "insert.left" }] };
    case "right":
      return { state, actions: [{ type: "insert.right" }] };
    case "up":
      return { state, actions: [{ type: "insert.up" }] };
    case "down":
      return { state, actions: [{ type: "insert.down" }] };
    default:
      if (!isPrintable(key)) return stay(state);
      return { state, actions: [{ type: "insert.char", ch: key }] };
  }
}

function dispatchCommandLine(state: DispatchState, key: Key): Transition {
  const line = state.commandLine;
  switch (key) {
    case "enter":
      return executeCommand(state);
    case "escape":
      return {
        state: { ...state, mode: "NORMAL", commandLine: emptyCommandLine() },
        actions: [{ type: "command.cancel" }],
      };
    case "backspace":
      return stay({ ...state, commandLine: backspaceCommandLine(line) });
    case "left":
      return stay({ ...state, commandLine: moveCommandCursor(line, -1) });
    case "right":
      return stay({ ...state, commandLine: moveCommandCursor(line, 1) });
    default:
      if (!isPrintable(key)) return stay(state);
      return stay({ ...state, commandLine: insertIntoCommandLine(line, key) });
  }
}

function executeCommand(state: DispatchState): Transition {
  const text = state.commandLine.text;
  return {
    state: { ...state, mode: "COMMAND_EXECUTE", commandLine: emptyCommandLine() },
    actions: [{ type: "command.run", command: parseCommand(text), text }],
  };
}

/** Pending keys as typed, for the status line. */
export function pendingKeys(state: DispatchState): string {
  switch (state.pending.kind) {
    case "none":
      return "";
    case "count":
      return state.pending.digits;
    case "prefix":
      return state.pending.keys.join("");
  }
}

/** Completions of the pending prefix, empty when none is armed. */
export function pendingHints(
  state: DispatchState,
): Array<{ key: string; title: string; kind: "group" | "cmd" }> {
  if (state.pending.kind !== "prefix") return [];
  const node = resolveSequence(normalMap, state.pending.keys);
  return node === null ? [] : getHints(node);
}
