import { createContext, useContext, type ReactNode } from "react";
import type { AppConfig } from "@/lib/config";
import { useStore } from "@/store/useStore";

export type StoreValue = ReturnType<typeof useStore>;

const StoreContext = createContext<StoreValue | null>(null);

/** Owns the app state for one configuration; pages read it through useStoreContext. */
export function StoreProvider({ config, children }: { config: AppConfig; children: ReactNode }) {
  return <StoreContext.Provider value={useStore(config)}>{children}</StoreContext.Provider>;
}

export function useStoreContext(): StoreValue {
  const store = useContext(StoreContext);
  if (!store) throw new Error("useStoreContext called outside <StoreProvider>");
  return store;
}
