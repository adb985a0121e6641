import type { AuthSession } from "@/types";

/** Sessions this close to expiry count as expired. */
const EXPIRY_MARGIN_SECONDS = 30;

export function isSessionActive(session: AuthSession | null, nowMs: number = Date.now()): session is AuthSession {
  if (!session || !session.accessToken) return false;
  return session.expiresAt - EXPIRY_MARGIN_SECONDS > nowMs / 1000;
}

/** Map the auth server's session payload to the app's AuthSession; null when a field is missing. */
export function toAuthSession(
  payload: { access_token?: string; refresh_token?: string; expires_at?: number; expires_in?: number; user?: { email?: string } | null } | null,
  fallbackEmail: string,
  nowMs: number = Date.now()
): AuthSession | null {
  if (!payload?.access_token) return null;
  const expiresAt = payload.expires_at ?? Math.floor(nowMs / 1000) + (payload.expires_in ?? 3600);
  return {
    accessToken: payload.access_token,
    refreshToken: payload.refresh_token ?? "",
    email: payload.user?.email ?? fallbackEmail,
    expiresAt,
  };
}

/** Allow-list comparisons are on the trimmed, lower-cased address. */
export function canonicalEmail(raw: string): string {
  return raw.trim().toLowerCase();
}
