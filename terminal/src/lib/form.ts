/**
 * Form view state: a one-line input buffer and an append-only output log.
 */

import type { KeyEvent } from "./keys.js";

export type OutputEntry = Readonly<{
  id: number;
  input: string;
  text: string;
  /** ISO-8601 UTC timestamp of completion. */
  at: string;
  failed: boolean;
}>;

export type FormState = Readonly<{
  sessionId: number;
  inputBuffer: string;
  outputLog: readonly OutputEntry[];
  /** Submissions whose transform has not completed yet. */
  pending: number;
}>;

/** Runs on submit. May be synchronous or return a promise. */
export type FormTransform = (value: string) => string | Promise<string>;

export type FormInput =
  | Readonly<{ type: "append"; text: string }>
  | Readonly<{ type: "backspace" }>
  | Readonly<{ type: "submit" }>
  | Readonly<{ type: "escape" }>
  | Readonly<{ type: "ignore" }>;

export function createFormState(sessionId: number): FormState {
  return { sessionId, inputBuffer: "", outputLog: [], pending: 0 };
}

export function resolveFormInput(event: KeyEvent): FormInput {
  switch (event.code) {
    case "escape":
      return { type: "escape" };
    case "enter":
      return { type: "submit" };
    case "backspace":
      return { type: "backspace" };
    default:
      return event.isPrintable ? { type: "append", text: event.raw } : { type: "ignore" };
  }
}

export function appendText(form: FormState, text: string): FormState {
  return { ...form, inputBuffer: form.inputBuffer + text };
}

export function deleteLast(form: FormState): FormState {
  if (form.inputBuffer.length === 0) {
    return form;
  }
  // drop a whole code point so surrogate pairs are not split
  const chars = Array.from(form.inputBuffer);
  chars.pop();
  return { ...form, inputBuffer: chars.join("") };
}

/** Clear the buffer and mark one submission in flight. */
export function beginSubmit(form: FormState): { form: FormState; value: string } {
  return {
    form: { ...form, inputBuffer: "", pending: form.pending + 1 },
    value: form.inputBuffer,
  };
}

export function completeSubmit(form: FormState, entry: OutputEntry): FormState {
  return {
    ...form,
    outputLog: [...form.outputLog, entry],
    pending: Math.max(0, form.pending - 1),
  };
}

/** Default transform: echoes the value with a processing timestamp. */
export function runFunction(value: string, now: Date = new Date()): string {
  return `Result: ${value}\nProcessed at ${now.toISOString()}`;
}
