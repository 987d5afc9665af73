import { type ReactNode, createContext, useContext } from "react";
import { useStore } from "zustand";
import type { TerminalStore, TerminalStoreApi } from "./types.js";

const TerminalContext = createContext<TerminalStoreApi | null>(null);

export function TerminalProvider({
  store,
  children,
}: {
  store: TerminalStoreApi;
  children: ReactNode;
}) {
  return <TerminalContext.Provider value={store}>{children}</TerminalContext.Provider>;
}

export function useTerminal<T>(selector: (s: TerminalStore) => T): T {
  const store = useContext(TerminalContext);
  if (!store) {
    throw new Error("useTerminal must be used inside <TerminalProvider>");
  }
  return useStore(store, selector);
}
