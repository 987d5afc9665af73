/**
 * View manager for the body slot.
 *
 * The slot holds exactly one view. Both transitions return the input slot
 * unchanged when there is nothing to do, so callers can detect a no-op by
 * identity and write the new slot in one update.
 */

import { type FormState, createFormState } from "./form.js";
import type { ViewName } from "./keymap.js";

export type BodySlot =
  | Readonly<{ kind: "menu" }>
  | Readonly<{ kind: "form"; form: FormState }>;

export function menuSlot(): BodySlot {
  return { kind: "menu" };
}

export function currentView(slot: BodySlot): ViewName {
  return slot.kind;
}

export function openForm(slot: BodySlot, sessionId: number): BodySlot {
  if (slot.kind === "form") {
    return slot;
  }
  return { kind: "form", form: createFormState(sessionId) };
}

export function closeForm(slot: BodySlot): BodySlot {
  if (slot.kind === "menu") {
    return slot;
  }
  return menuSlot();
}
