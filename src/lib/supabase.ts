import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "@/lib/config";
import { BackendUnavailable, ConfigError } from "@/lib/errors";
import type { AuthSession } from "@/types";

/**
 * Client for one caller. With a session, every request carries its access token (row-level security);
 * without one it talks as the anon role. The client never persists or refreshes a session on its own:
 * the app holds the AuthSession and builds a new client when it changes.
 */
export function createSupabaseClient(config: AppConfig, session?: AuthSession | null): SupabaseClient {
  if (!config.supabaseUrl || !config.supabaseAnonKey) throw new ConfigError("Supabase not configured");
  return createClient(config.supabaseUrl, config.supabaseAnonKey, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: session ? { headers: { Authorization: `Bearer ${session.accessToken}` } } : undefined,
  });
}

type QueryResult = { data: unknown; error: { message: string } | null };

/** Await a query; a returned `error` or a rejected request both surface as BackendUnavailable. */
export async function runQuery(operation: string, query: PromiseLike<QueryResult>): Promise<unknown> {
  let result: QueryResult;
  try {
    result = await query;
  } catch (e) {
    console.error(`[Entrenos] ${operation} failed:`, e);
    throw new BackendUnavailable(operation, e);
  }
  if (result.error) {
    console.error(`[Entrenos] ${operation} failed:`, result.error.message, result.error);
    throw new BackendUnavailable(operation, result.error);
  }
  return result.data;
}
