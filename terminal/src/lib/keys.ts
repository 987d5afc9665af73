/**
 * Key events as the rest of the terminal sees them.
 *
 * Ink hands `useInput` an `(input, key)` pair; `toKeyEvent` flattens that into
 * a single value with a symbolic `code` so the chord machine and the views
 * never touch Ink types.
 */

import type { Key } from "ink";

export type KeyEvent = Readonly<{
  /** Symbolic name: "x", "enter", "escape", "backspace", "up", ... */
  code: string;
  /** Literal input as delivered by the terminal. */
  raw: string;
  isPrintable: boolean;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}>;

/** A modifier+letter combination, e.g. Ctrl+X. */
export type KeyChord = Readonly<{
  letter: string;
  ctrl: boolean;
  meta: boolean;
  /** The C0 control character a terminal sends for ctrl+letter, if any. */
  controlChar: string | null;
  label: string;
}>;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

// ctrl+h/i/j/m send the same bytes as backspace, tab, newline and enter
const RESERVED_CTRL_LETTERS = new Set(["h", "i", "j", "m"]);

const NAMED_KEYS: ReadonlyArray<[keyof Key, string]> = [
  ["return", "enter"],
  ["escape", "escape"],
  ["backspace", "backspace"],
  // most terminals send DEL for the backspace key, which Ink reports as delete
  ["delete", "backspace"],
  ["tab", "tab"],
  ["upArrow", "up"],
  ["downArrow", "down"],
  ["leftArrow", "left"],
  ["rightArrow", "right"],
  ["pageUp", "pageup"],
  ["pageDown", "pagedown"],
];

export function toKeyEvent(input: string, key: Partial<Key>): KeyEvent {
  const ctrl = key.ctrl === true;
  const meta = key.meta === true;
  const shift = key.shift === true;

  for (const [flag, code] of NAMED_KEYS) {
    if (key[flag] === true) {
      return { code, raw: input, isPrintable: false, ctrl, meta, shift };
    }
  }

  const isPrintable = input.length > 0 && !ctrl && !meta && !CONTROL_CHARS.test(input);
  return { code: input, raw: input, isPrintable, ctrl, meta, shift };
}

function controlCharFor(letter: string): string | null {
  const code = letter.toLowerCase().charCodeAt(0);
  if (letter.length !== 1 || code < 97 || code > 122) {
    return null;
  }
  return String.fromCharCode(code - 96);
}

/**
 * Parse a chord description such as "ctrl+x" or "alt+k".
 * Returns null when the text does not name exactly one letter, or names a
 * ctrl+letter a terminal cannot tell apart from an editing key.
 */
export function parseKeyChord(text: string): KeyChord | null {
  const parts = text
    .toLowerCase()
    .split("+")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  const letter = parts.pop();
  if (!letter || letter.length !== 1) {
    return null;
  }

  let ctrl = false;
  let meta = false;
  for (const modifier of parts) {
    if (modifier === "ctrl" || modifier === "control") {
      ctrl = true;
    } else if (modifier === "alt" || modifier === "meta") {
      meta = true;
    } else {
      return null;
    }
  }

  if (ctrl && !meta && RESERVED_CTRL_LETTERS.has(letter)) {
    return null;
  }

  const label = [ctrl ? "Ctrl" : null, meta ? "Alt" : null, letter.toUpperCase()]
    .filter((p): p is string => p !== null)
    .join("+");

  return {
    letter,
    ctrl,
    meta,
    controlChar: ctrl && !meta ? controlCharFor(letter) : null,
    label,
  };
}

/** True when the event is the chord, by modifier flags or by raw control character. */
export function matchesChord(event: KeyEvent, chord: KeyChord): boolean {
  if (chord.controlChar !== null && event.raw === chord.controlChar) {
    return true;
  }
  return (
    event.code.toLowerCase() === chord.letter &&
    event.ctrl === chord.ctrl &&
    event.meta === chord.meta
  );
}

export function describeKey(event: KeyEvent): string {
  return `key=${JSON.stringify(event.code)}, raw=${JSON.stringify(event.raw)}, ctrl=${event.ctrl}, meta=${event.meta}, shift=${event.shift}`;
}
