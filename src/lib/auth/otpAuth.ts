import { isAuthApiError, type SupabaseClient } from "@supabase/supabase-js";
import type { AuthSession } from "@/types";
import { BackendUnavailable, ValidationError, describeError } from "@/lib/errors";
import { runQuery } from "@/lib/supabase";
import { canonicalEmail, isSessionActive, toAuthSession } from "@/lib/auth/session";

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function requireEmail(raw: string): string {
  const email = raw.trim();
  if (!email) throw new ValidationError("email", "Escribe tu correo.");
  if (!EMAIL_RE.test(email)) throw new ValidationError("email", `Correo inválido: ${email}`);
  return email;
}

/**
 * Step 1 of login: check the allow-list, then send a one-time code.
 * `{ allowed: false }` means the address is not on the list and no code was sent.
 */
export async function requestLoginCode(client: SupabaseClient, rawEmail: string): Promise<{ allowed: boolean }> {
  const email = requireEmail(rawEmail);
  const data = await runQuery("auth.isAllowed", client.rpc("is_allowed", { email_input: canonicalEmail(email) }));
  if (!data) return { allowed: false };

  const { error } = await client.auth.signInWithOtp({ email, options: { shouldCreateUser: true } });
  if (error) {
    console.error("[Entrenos] Failed to send login code:", error.message, error);
    throw new BackendUnavailable("auth.signInWithOtp", error);
  }
  return { allowed: true };
}

/** Step 2 of login: exchange the emailed code for a session. */
export async function verifyLoginCode(client: SupabaseClient, rawEmail: string, rawCode: string): Promise<AuthSession> {
  const email = requireEmail(rawEmail);
  const token = rawCode.trim();
  if (!token) throw new ValidationError("code", "Escribe el código recibido.");

  const { data, error } = await client.auth.verifyOtp({ email, token, type: "email" });
  if (error) {
    if (isAuthApiError(error)) throw new ValidationError("code", "Código incorrecto o vencido.");
    console.error("[Entrenos] Failed to verify login code:", error.message, error);
    throw new BackendUnavailable("auth.verifyOtp", error);
  }
  const session = toAuthSession(data.session, email);
  if (!session) throw new ValidationError("code", "Código incorrecto o vencido.");
  return session;
}

/** Logout always succeeds locally; a failed server-side sign-out is only logged. */
export async function signOut(client: SupabaseClient): Promise<void> {
  try {
    const { error } = await client.auth.signOut();
    if (error) console.warn("[Entrenos] Sign-out request failed:", error.message);
  } catch (e) {
    console.warn("[Entrenos] Sign-out request failed:", e);
  }
}

/**
 * True when the signed-in address is in admin_emails.
 * A failed lookup throws BackendUnavailable instead of reading as "not an admin".
 */
export async function isCurrentAdmin(client: SupabaseClient, session: AuthSession | null): Promise<boolean> {
  if (!isSessionActive(session)) return false;
  const data = await runQuery(
    "auth.isCurrentAdmin",
    client.from("admin_emails").select("email").eq("email", canonicalEmail(session.email))
  );
  return Array.isArray(data) && data.length > 0;
}

export type AdminAccess = { kind: "admin" } | { kind: "denied" } | { kind: "error"; message: string };

/** Admin check for the UI: a failed lookup is reported as an error, never as "denied". */
export async function resolveAdminAccess(client: SupabaseClient, session: AuthSession | null): Promise<AdminAccess> {
  try {
    return (await isCurrentAdmin(client, session)) ? { kind: "admin" } : { kind: "denied" };
  } catch (e) {
    return { kind: "error", message: describeError(e) };
  }
}
