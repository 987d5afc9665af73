/**
 * Chord input state machine.
 *
 * Two states: idle and armed. The prefix key arms the machine; the next key
 * (or the timeout) disarms it. Every transition is a pure function returning
 * the next state plus a list of effects for the store to apply, so the
 * machine runs the same under Ink and under test.
 */

import {
  type ChordBindings,
  type Command,
  type ViewName,
  armedText,
  helpText,
} from "./keymap.js";
import { type KeyEvent, describeKey, matchesChord } from "./keys.js";

export type ChordState = Readonly<{
  armed: boolean;
  /** Bumped on every arming so a late timeout can tell it is stale. */
  generation: number;
}>;

export type ChordEffect =
  | Readonly<{ type: "status"; text: string }>
  | Readonly<{ type: "schedule-timeout"; generation: number; delayMs: number }>
  | Readonly<{ type: "cancel-timeout" }>
  | Readonly<{ type: "command"; command: Command }>
  | Readonly<{ type: "forward"; event: KeyEvent }>
  | Readonly<{ type: "log"; message: string }>;

export type ChordStep = Readonly<{
  state: ChordState;
  effects: readonly ChordEffect[];
}>;

export type ChordContext = Readonly<{ view: ViewName }>;

export function createChordState(): ChordState {
  return { armed: false, generation: 0 };
}

function disarm(state: ChordState, bindings: ChordBindings, reason: string): ChordStep {
  return {
    state: { armed: false, generation: state.generation },
    effects: [
      { type: "cancel-timeout" },
      { type: "status", text: helpText(bindings) },
      { type: "log", message: `Cleared chord indicator (${reason})` },
    ],
  };
}

export function stepChord(
  state: ChordState,
  event: KeyEvent,
  context: ChordContext,
  bindings: ChordBindings
): ChordStep {
  const received: ChordEffect = { type: "log", message: `Key event: ${describeKey(event)}` };

  if (matchesChord(event, bindings.interrupt)) {
    const cleared = state.armed ? disarm(state, bindings, "interrupt") : { state, effects: [] };
    return {
      state: cleared.state,
      effects: [received, ...cleared.effects, { type: "command", command: "interrupt" }],
    };
  }

  if (state.armed) {
    const cleared = disarm(state, bindings, `next key ${JSON.stringify(event.code)}`);
    if (event.code.toLowerCase() === bindings.quitKey) {
      return {
        state: cleared.state,
        effects: [received, ...cleared.effects, { type: "command", command: "quit" }],
      };
    }
    // any other key is swallowed, shortcuts included
    return { state: cleared.state, effects: [received, ...cleared.effects] };
  }

  if (matchesChord(event, bindings.prefix)) {
    const text = armedText(bindings);
    const generation = state.generation + 1;
    return {
      state: { armed: true, generation },
      effects: [
        received,
        { type: "status", text },
        { type: "schedule-timeout", generation, delayMs: bindings.timeoutMs },
        { type: "log", message: `Show chord indicator: ${text}` },
      ],
    };
  }

  if (context.view === "menu" && !event.ctrl && !event.meta) {
    const command = bindings.shortcuts.get(event.code);
    if (command) {
      return { state, effects: [received, { type: "command", command }] };
    }
  }

  return { state, effects: [received, { type: "forward", event }] };
}

/** Timeout callback. Ignores timers that belong to an earlier arming. */
export function expireChord(
  state: ChordState,
  generation: number,
  bindings: ChordBindings
): ChordStep {
  if (!state.armed || state.generation !== generation) {
    return { state, effects: [] };
  }
  return {
    state: { armed: false, generation: state.generation },
    effects: [
      { type: "status", text: helpText(bindings) },
      { type: "log", message: "Cleared chord indicator (timeout)" },
    ],
  };
}
