/**
 * Feeds every Ink key press into the store's chord machine.
 *
 * The hook does no dispatching of its own: the store decides whether a key
 * arms a chord, runs a shortcut or goes to the active view.
 */

import { useInput } from "ink";
import { toKeyEvent } from "../lib/keys.js";
import { useTerminal } from "../store/index.js";

export function useKeybinds(): void {
  const handleKey = useTerminal((s) => s.handleKey);

  useInput((input, key) => {
    handleKey(toKeyEvent(input, key));
  });
}
