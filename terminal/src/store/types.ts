import type { StoreApi } from "zustand/vanilla";
import type { ChordState } from "../lib/chord.js";
import type { EventSink } from "../lib/event-log.js";
import type { FormInput, FormTransform } from "../lib/form.js";
import type { ChordBindings } from "../lib/keymap.js";
import type { KeyEvent } from "../lib/keys.js";
import type { CancellableTimer } from "../lib/timer.js";
import type { BodySlot } from "../lib/views.js";

// ── Store slices ──────────────────────────────────────────────────

export type ViewSlice = {
  /** The body slot: launcher menu or the active form. */
  body: BodySlot;
  openForm(): void;
  closeForm(): void;
};

export type ChordSlice = {
  chord: ChordState;
  /** What the status surface currently shows. */
  statusText: string;
  bindings: ChordBindings;
  handleKey(event: KeyEvent): void;
  expireChord(generation: number): void;
};

export type FormSlice = {
  editForm(input: FormInput): void;
  submitForm(): Promise<void>;
};

// ── Combined store ────────────────────────────────────────────────

export type TerminalStore = ViewSlice & ChordSlice & FormSlice;

export type TerminalStoreApi = StoreApi<TerminalStore>;

export type TerminalOptions = {
  bindings?: ChordBindings;
  transform?: FormTransform;
  eventLog?: EventSink;
  timer?: CancellableTimer;
  onQuit?: () => void;
  onInterrupt?: () => void;
  now?: () => Date;
};
