/**
 * Zustand store, the single source of truth for the launcher.
 *
 * The store is the adapter between Ink and the pure chord/view/form logic:
 * key events go in through `handleKey`, and the effects returned by the
 * chord machine are applied here (status writes, timer, commands, forwarding).
 * One store is created per app instance so tests never share state.
 */

import { createStore } from "zustand/vanilla";
import { errorMessage } from "../../../sdk/typescript/src/errors.js";
import {
  type ChordEffect,
  createChordState,
  expireChord,
  stepChord,
} from "../lib/chord.js";
import { type EventSink, silentEventLog } from "../lib/event-log.js";
import {
  type OutputEntry,
  appendText,
  beginSubmit,
  completeSubmit,
  deleteLast,
  resolveFormInput,
  runFunction,
} from "../lib/form.js";
import { type Command, createChordBindings, helpText } from "../lib/keymap.js";
import type { KeyEvent } from "../lib/keys.js";
import { createStatusSurface } from "../lib/status-surface.js";
import { CancellableTimer } from "../lib/timer.js";
import { closeForm, currentView, menuSlot, openForm } from "../lib/views.js";
import type { TerminalOptions, TerminalStore, TerminalStoreApi } from "./types.js";

export function createTerminalStore(options: TerminalOptions = {}): TerminalStoreApi {
  const bindings = options.bindings ?? createChordBindings();
  const now = options.now ?? (() => new Date());
  const transform = options.transform ?? ((value: string) => runFunction(value, now()));
  const eventLog: EventSink = options.eventLog ?? silentEventLog;
  const timer = options.timer ?? new CancellableTimer();

  let sessionSeq = 0;
  let entrySeq = 0;

  return createStore<TerminalStore>()((set, get) => {
    const status = createStatusSurface({
      read: () => get().statusText,
      commit: (text) => set({ statusText: text }),
      onError: (err) => eventLog.write(`Status update failed: ${errorMessage(err)}`),
    });

    function runCommand(command: Command): void {
      switch (command) {
        case "open-form":
          get().openForm();
          return;
        case "quit":
          eventLog.write("Quit requested");
          options.onQuit?.();
          return;
        case "interrupt":
          eventLog.write("Interrupted by user");
          options.onInterrupt?.();
          return;
      }
    }

    function forward(event: KeyEvent): void {
      // the menu has no keys of its own beyond the shortcuts
      if (get().body.kind !== "form") {
        return;
      }
      get().editForm(resolveFormInput(event));
    }

    function apply(effects: readonly ChordEffect[]): void {
      for (const effect of effects) {
        switch (effect.type) {
          case "status":
            status.write(effect.text);
            break;
          case "schedule-timeout":
            timer.schedule(effect.delayMs, () => get().expireChord(effect.generation));
            break;
          case "cancel-timeout":
            timer.cancel();
            break;
          case "command":
            runCommand(effect.command);
            break;
          case "forward":
            forward(effect.event);
            break;
          case "log":
            eventLog.write(effect.message);
            break;
        }
      }
    }

    return {
      // ── Views ─────────────────────────────────────────────────────
      body: menuSlot(),

      openForm() {
        const { body } = get();
        const next = openForm(body, sessionSeq + 1);
        if (next === body) {
          return;
        }
        sessionSeq += 1;
        set({ body: next });
        eventLog.write("Opened form view");
      },

      closeForm() {
        const { body } = get();
        const next = closeForm(body);
        if (next === body) {
          return;
        }
        set({ body: next });
        eventLog.write("Closed form view, restored menu");
      },

      // ── Chord ─────────────────────────────────────────────────────
      chord: createChordState(),
      statusText: helpText(bindings),
      bindings,

      handleKey(event) {
        const state = get();
        const step = stepChord(state.chord, event, { view: currentView(state.body) }, bindings);
        if (step.state !== state.chord) {
          set({ chord: step.state });
        }
        apply(step.effects);
      },

      expireChord(generation) {
        const state = get();
        const step = expireChord(state.chord, generation, bindings);
        if (step.state !== state.chord) {
          set({ chord: step.state });
        }
        apply(step.effects);
      },

      // ── Form ──────────────────────────────────────────────────────
      editForm(input) {
        const { body } = get();
        if (body.kind !== "form") {
          return;
        }
        switch (input.type) {
          case "append":
            set({ body: { kind: "form", form: appendText(body.form, input.text) } });
            return;
          case "backspace":
            set({ body: { kind: "form", form: deleteLast(body.form) } });
            return;
          case "submit":
            // submitForm reports transform failures itself and never rejects
            void get().submitForm();
            return;
          case "escape":
            get().closeForm();
            return;
          case "ignore":
            return;
        }
      },

      async submitForm() {
        const { body } = get();
        if (body.kind !== "form") {
          return;
        }
        const { form, value } = beginSubmit(body.form);
        set({ body: { kind: "form", form } });

        let text: string;
        let failed = false;
        try {
          // run on a later tick, off the key path
          text = await Promise.resolve().then(() => transform(value));
        } catch (err) {
          text = `Error: ${errorMessage(err)}`;
          failed = true;
        }

        entrySeq += 1;
        const entry: OutputEntry = {
          id: entrySeq,
          input: value,
          text,
          at: now().toISOString(),
          failed,
        };

        const current = get().body;
        if (current.kind !== "form" || current.form.sessionId !== form.sessionId) {
          eventLog.write("Dropped result for a closed form");
          return;
        }
        set({ body: { kind: "form", form: completeSubmit(current.form, entry) } });
      },
    };
  });
}

export { TerminalProvider, useTerminal } from "./provider.js";
export type { TerminalOptions, TerminalStore, TerminalStoreApi } from "./types.js";
