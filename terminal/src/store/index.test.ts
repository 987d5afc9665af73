import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Key } from "ink";
import { createChordBindings } from "../lib/keymap.js";
import { toKeyEvent } from "../lib/keys.js";
import { type TerminalOptions, createTerminalStore } from "./index.js";

const HELP = "Ctrl+X then <key> activates commands";
const ARMED = "Chord: Ctrl+X — waiting for next key";
const NOW = "2026-01-02T03:04:05.000Z";

function setup(overrides: TerminalOptions = {}) {
  const lines: string[] = [];
  const onQuit = vi.fn();
  const onInterrupt = vi.fn();
  const store = createTerminalStore({
    eventLog: { write: (message) => lines.push(message) },
    onQuit,
    onInterrupt,
    now: () => new Date(NOW),
    ...overrides,
  });
  const press = (input: string, key: Partial<Key> = {}) =>
    store.getState().handleKey(toKeyEvent(input, key));
  const type = (text: string) => {
    for (const ch of text) {
      press(ch);
    }
  };
  const form = () => {
    const { body } = store.getState();
    if (body.kind !== "form") {
      throw new Error("form is not open");
    }
    return body.form;
  };
  return { store, lines, onQuit, onInterrupt, press, type, form };
}

async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("chord handling", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts idle on the menu with the help text", () => {
    const { store } = setup();
    expect(store.getState().statusText).toBe(HELP);
    expect(store.getState().body).toEqual({ kind: "menu" });
  });

  it("shows the chord indicator until the timeout clears it", () => {
    const { store, press, lines } = setup();
    press("x", { ctrl: true });
    expect(store.getState().statusText).toBe(ARMED);

    vi.advanceTimersByTime(2999);
    expect(store.getState().chord.armed).toBe(true);

    vi.advanceTimersByTime(1);
    expect(store.getState().chord.armed).toBe(false);
    expect(store.getState().statusText).toBe(HELP);
    expect(lines).toContain("Cleared chord indicator (timeout)");
  });

  it("quits on Ctrl+X q and cancels the timeout", () => {
    const { store, press, onQuit, lines } = setup();
    press("x", { ctrl: true });
    press("q");

    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(store.getState().statusText).toBe(HELP);
    expect(lines).toContain("Quit requested");

    vi.advanceTimersByTime(10_000);
    expect(lines).not.toContain("Cleared chord indicator (timeout)");
  });

  it("swallows a shortcut pressed after the prefix", () => {
    const { store, press, onQuit } = setup();
    press("x", { ctrl: true });
    press("f");

    expect(store.getState().body.kind).toBe("menu");
    expect(onQuit).not.toHaveBeenCalled();
  });

  it("does not let an earlier timeout clear a later arming", () => {
    const { store, press } = setup();
    press("x", { ctrl: true });
    vi.advanceTimersByTime(2000);
    press("z");
    press("x", { ctrl: true });

    vi.advanceTimersByTime(2000);
    expect(store.getState().chord).toEqual({ armed: true, generation: 2 });

    vi.advanceTimersByTime(1000);
    expect(store.getState().chord.armed).toBe(false);
  });

  it("quits from inside the form", () => {
    const { press, onQuit, form } = setup();
    press("f");
    press("x", { ctrl: true });
    press("q");

    expect(onQuit).toHaveBeenCalledTimes(1);
    expect(form().inputBuffer).toBe("");
  });

  it("still quits with q when the configured quit key is unusable", () => {
    const { press, onQuit } = setup({ bindings: createChordBindings({ quitKey: "quit" }) });
    press("x", { ctrl: true });
    press("q");
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it("interrupts on Ctrl+C", () => {
    const { store, press, onInterrupt, lines } = setup();
    press("x", { ctrl: true });
    press("c", { ctrl: true });

    expect(onInterrupt).toHaveBeenCalledTimes(1);
    expect(store.getState().chord.armed).toBe(false);
    expect(lines).toContain("Interrupted by user");
  });
});

describe("views", () => {
  it("opens the form with f and ignores a second open", () => {
    const { store, press, lines } = setup();
    press("f");
    const body = store.getState().body;
    store.getState().openForm();

    expect(store.getState().body).toBe(body);
    expect(lines.filter((l) => l === "Opened form view")).toHaveLength(1);
  });

  it("treats f as text once the form is open", () => {
    const { press, form } = setup();
    press("f");
    press("f");
    expect(form().inputBuffer).toBe("f");
  });

  it("closing from the menu is a no-op", () => {
    const { store, lines } = setup();
    store.getState().closeForm();
    expect(store.getState().body).toEqual({ kind: "menu" });
    expect(lines).toEqual([]);
  });

  it("returns to the menu on Esc and reopens empty", async () => {
    const { store, press, type, form } = setup();
    press("f");
    type("abc");
    press("", { return: true });
    await flushPromises();
    type("zz");
    press("", { escape: true });
    expect(store.getState().body).toEqual({ kind: "menu" });

    press("f");
    expect(form()).toEqual({ sessionId: 2, inputBuffer: "", outputLog: [], pending: 0 });
  });
});

describe("form submission", () => {
  it("edits the buffer and records the result", async () => {
    const { press, type, form } = setup();
    press("f");
    type("abc");
    press("", { backspace: true });
    expect(form().inputBuffer).toBe("ab");

    press("", { return: true });
    expect(form().inputBuffer).toBe("");
    expect(form().pending).toBe(1);

    await flushPromises();
    expect(form().pending).toBe(0);
    expect(form().outputLog).toEqual([
      {
        id: 1,
        input: "ab",
        text: `Result: ab\nProcessed at ${NOW}`,
        at: NOW,
        failed: false,
      },
    ]);
  });

  it("submits an empty buffer", async () => {
    const { press, form } = setup();
    press("f");
    press("", { return: true });
    await flushPromises();
    expect(form().outputLog[0].text).toBe(`Result: \nProcessed at ${NOW}`);
  });

  it("records a failed transform as an error entry", async () => {
    const { press, type, form } = setup({
      transform: () => {
        throw new Error("boom");
      },
    });
    press("f");
    type("x");
    press("", { return: true });
    await flushPromises();

    expect(form().outputLog).toEqual([
      { id: 1, input: "x", text: "Error: boom", at: NOW, failed: true },
    ]);
  });

  it("drops a result that arrives after the form closed", async () => {
    const pending = deferred<string>();
    const { press, type, form, lines } = setup({ transform: () => pending.promise });
    press("f");
    type("slow");
    press("", { return: true });
    press("", { escape: true });
    press("f");

    pending.resolve("late");
    await flushPromises();

    expect(form().sessionId).toBe(2);
    expect(form().outputLog).toEqual([]);
    expect(lines).toContain("Dropped result for a closed form");
  });
});
