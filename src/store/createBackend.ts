import type { AppConfig } from "@/lib/config";
import { createSupabaseClient } from "@/lib/supabase";
import { isSessionActive } from "@/lib/auth/session";
import type { AuthSession } from "@/types";
import type { Backend } from "@/store/backend";
import { createLocalBackend, MemoryStorage, type KeyValueStorage } from "@/store/localBackend";
import { createSupabaseBackend } from "@/store/supabaseBackend";

function browserStorage(): KeyValueStorage {
  if (typeof window !== "undefined" && window.localStorage) return window.localStorage;
  console.warn("[Entrenos] localStorage unavailable; data will not survive a reload.");
  return new MemoryStorage();
}

/**
 * Pick the storage adapter for the configured backend.
 * The per-login backend needs an active session and returns null without one.
 */
export function createBackend(config: AppConfig, session: AuthSession | null): Backend | null {
  switch (config.backend) {
    case "local":
      return createLocalBackend(browserStorage());
    case "supabase":
      return createSupabaseBackend(createSupabaseClient(config), "supabase");
    case "supabase-auth":
      if (!isSessionActive(session)) return null;
      return createSupabaseBackend(createSupabaseClient(config, session), "supabase-auth");
  }
}
