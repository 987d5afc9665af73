/**
 * Key binding definitions for the launcher.
 *
 * All keyboard shortcuts are defined here so the menu, the status bar and the
 * chord machine read them from a single location.
 */

import { type KeyChord, parseKeyChord } from "./keys.js";

export type ViewName = "menu" | "form";

export type Command = "open-form" | "quit" | "interrupt";

export interface KeyBinding {
  key: string;
  label: string;
  description: string;
}

export interface LauncherEntry {
  key: string;
  name: string;
  description: string;
  command: Command;
}

/** Screens reachable from the launcher menu with a single key. */
export const launcherEntries: LauncherEntry[] = [
  {
    key: "f",
    name: "Form",
    description: "Open form to run functions and view output",
    command: "open-form",
  },
];

export type ChordBindings = Readonly<{
  prefix: KeyChord;
  /** Letter that quits when it follows the prefix. */
  quitKey: string;
  /** Chord that interrupts from any state (Ctrl+C). */
  interrupt: KeyChord;
  timeoutMs: number;
  /** Direct shortcuts, honored only while the menu is the active view. */
  shortcuts: ReadonlyMap<string, Command>;
}>;

export const DEFAULT_CHORD_TIMEOUT_MS = 3_000;
export const DEFAULT_PREFIX = "ctrl+x";
export const DEFAULT_QUIT_KEY = "q";

function requireChord(text: string): KeyChord {
  const chord = parseKeyChord(text);
  if (!chord) {
    throw new Error(`invalid key chord: ${text}`);
  }
  return chord;
}

function sameChord(a: KeyChord, b: KeyChord): boolean {
  return a.letter === b.letter && a.ctrl === b.ctrl && a.meta === b.meta;
}

/** Unusable prefixes (unparseable, or the interrupt chord) fall back to Ctrl+X. */
function prefixOrDefault(text: string | undefined, interrupt: KeyChord): KeyChord {
  const chord = text === undefined ? null : parseKeyChord(text);
  if (!chord || sameChord(chord, interrupt)) {
    return requireChord(DEFAULT_PREFIX);
  }
  return chord;
}

function quitKeyOrDefault(text: string | undefined): string {
  const key = (text ?? "").trim().toLowerCase();
  return /^[a-z]$/.test(key) ? key : DEFAULT_QUIT_KEY;
}

export function createChordBindings(
  opts: { prefix?: string; quitKey?: string; timeoutMs?: number } = {}
): ChordBindings {
  const shortcuts = new Map<string, Command>(
    launcherEntries.map((entry): [string, Command] => [entry.key, entry.command])
  );

  const interrupt = requireChord("ctrl+c");

  return {
    prefix: prefixOrDefault(opts.prefix, interrupt),
    quitKey: quitKeyOrDefault(opts.quitKey),
    interrupt,
    timeoutMs: opts.timeoutMs ?? DEFAULT_CHORD_TIMEOUT_MS,
    shortcuts,
  };
}

export function helpText(bindings: ChordBindings): string {
  return `${bindings.prefix.label} then <key> activates commands`;
}

export function armedText(bindings: ChordBindings): string {
  return `Chord: ${bindings.prefix.label} — waiting for next key`;
}

/** Global bindings shown in the menu. */
export function globalKeys(bindings: ChordBindings): KeyBinding[] {
  return [
    {
      key: `${bindings.prefix.letter} ${bindings.quitKey}`,
      label: `${bindings.prefix.label} ${bindings.quitKey}`,
      description: "Quit the application",
    },
    { key: "ctrl+c", label: "Ctrl+C", description: "Cancel and exit" },
  ];
}

/** Bindings active inside the form view. */
export const formKeys: KeyBinding[] = [
  { key: "type", label: "Type", description: "Edit input" },
  { key: "enter", label: "Enter", description: "Run" },
  { key: "backspace", label: "Bksp", description: "Delete last character" },
  { key: "esc", label: "Esc", description: "Back to launcher" },
];
