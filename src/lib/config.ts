import { ConfigError } from "@/lib/errors";
import type { BackendKind } from "@/store/backend";

export interface AppConfig {
  backend: BackendKind;
  supabaseUrl: string | null;
  supabaseAnonKey: string | null;
  /** Only the per-login Supabase backend shows the email code gate. */
  requiresLogin: boolean;
}

const BACKENDS: readonly BackendKind[] = ["supabase-auth", "supabase", "local"];

function isBackendKind(v: string): v is BackendKind {
  return BACKENDS.some((b) => b === v);
}

function readString(env: Record<string, unknown>, name: string): string | null {
  const v = env[name];
  return typeof v === "string" && v.trim() ? v.trim() : null;
}

/** Build config from Vite env vars (VITE_BACKEND, VITE_SUPABASE_URL, VITE_SUPABASE_ANON_KEY). */
export function readConfig(env: Record<string, unknown>): AppConfig {
  const supabaseUrl = readString(env, "VITE_SUPABASE_URL");
  const supabaseAnonKey = readString(env, "VITE_SUPABASE_ANON_KEY");
  const requested = readString(env, "VITE_BACKEND");

  let backend: BackendKind;
  if (requested == null) {
    backend = supabaseUrl && supabaseAnonKey ? "supabase-auth" : "local";
  } else if (isBackendKind(requested)) {
    backend = requested;
  } else {
    throw new ConfigError(`VITE_BACKEND must be one of ${BACKENDS.join(", ")} (got "${requested}")`);
  }

  if (backend !== "local" && (!supabaseUrl || !supabaseAnonKey)) {
    throw new ConfigError(`VITE_SUPABASE_URL and VITE_SUPABASE_ANON_KEY are required for the ${backend} backend`);
  }

  return { backend, supabaseUrl, supabaseAnonKey, requiresLogin: backend === "supabase-auth" };
}
