import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type { AuthSession, HistoryRow, MonthlyRollup, PaymentStatus, Session } from "@/types";
import type { AppConfig } from "@/lib/config";
import { ValidationError, describeError } from "@/lib/errors";
import { createSupabaseClient } from "@/lib/supabase";
import { isSessionActive } from "@/lib/auth/session";
import { resolveAdminAccess, signOut, type AdminAccess } from "@/lib/auth/otpAuth";
import { createRequestGate } from "@/lib/requestGate";
import { monthlyRollup } from "@/lib/aggregation/rollup";
import { clientHistory } from "@/lib/aggregation/history";
import { composeTimestamp, monthRange } from "@/utils/months";
import { createBackend } from "@/store/createBackend";
import type { Backend } from "@/store/backend";

export interface Period {
  year: number;
  month: number;
}

function currentPeriod(): Period {
  const today = new Date();
  return { year: today.getFullYear(), month: today.getMonth() + 1 };
}

/**
 * App state: the auth session (per-login backend only), the selected month and its rollup.
 * Nothing derived is cached across actions; every write is followed by a fresh rollup from storage.
 */
export function useStore(config: AppConfig) {
  const [session, setSession] = useState<AuthSession | null>(null);
  const [period, setPeriod] = useState<Period>(currentPeriod);
  const [rollup, setRollup] = useState<MonthlyRollup | null>(null);
  const [clients, setClients] = useState<string[]>([]);
  const [adminAccess, setAdminAccess] = useState<AdminAccess>({ kind: "denied" });
  const [loaded, setLoaded] = useState(false);
  const [loadError, setLoadError] = useState<string | null>(null);

  const backend = useMemo(() => createBackend(config, session), [config, session]);
  const signedIn = !config.requiresLogin || isSessionActive(session);
  const reloadGate = useRef(createRequestGate());

  const requireBackend = useCallback((): Backend => {
    if (!backend || (config.requiresLogin && !isSessionActive(session))) {
      setSession(null);
      throw new ValidationError("session", "Tu sesión venció. Inicia sesión de nuevo.");
    }
    return backend;
  }, [backend, config.requiresLogin, session]);

  const reload = useCallback(async () => {
    const isCurrent = reloadGate.current.begin();
    setLoadError(null);
    if (!backend) {
      setRollup(null);
      setClients([]);
      setLoaded(true);
      return;
    }
    try {
      const [nextRollup, nextClients] = await Promise.all([
        monthlyRollup(backend, period.year, period.month),
        backend.sessions.listDistinctClients(),
      ]);
      if (!isCurrent()) return;
      setRollup(nextRollup);
      setClients(nextClients);
    } catch (e) {
      if (!isCurrent()) return;
      setLoadError(describeError(e));
      setRollup(null);
    }
    setLoaded(true);
  }, [backend, period]);

  useEffect(() => {
    void reload();
  }, [reload]);

  useEffect(() => {
    if (config.backend !== "supabase-auth" || !isSessionActive(session)) {
      setAdminAccess({ kind: "denied" });
      return;
    }
    let cancelled = false;
    void resolveAdminAccess(createSupabaseClient(config, session), session).then((access) => {
      if (!cancelled) setAdminAccess(access);
    });
    return () => {
      cancelled = true;
    };
  }, [config, session]);

  const login = useCallback((next: AuthSession) => {
    setSession(next);
  }, []);

  const logout = useCallback(async () => {
    if (config.backend === "supabase-auth" && session) {
      await signOut(createSupabaseClient(config, session));
    }
    setSession(null);
    setRollup(null);
    setClients([]);
  }, [config, session]);

  const addSession = useCallback(
    async (client: string, dateKey: string, time: string, amount: number): Promise<Session> => {
      const created = await requireBackend().sessions.add(client, composeTimestamp(dateKey, time), amount);
      await reload();
      return created;
    },
    [requireBackend, reload]
  );

  const deleteSession = useCallback(
    async (id: number): Promise<void> => {
      await requireBackend().sessions.delete(id);
      await reload();
    },
    [requireBackend, reload]
  );

  const getPayment = useCallback(
    (client: string, year: number, month: number): Promise<PaymentStatus> => requireBackend().ledger.get(client, year, month),
    [requireBackend]
  );

  const setPayment = useCallback(
    async (client: string, year: number, month: number, paid: boolean, paidOn: string | null): Promise<void> => {
      await requireBackend().ledger.upsert(client, year, month, paid, paidOn);
      await reload();
    },
    [requireBackend, reload]
  );

  const monthSessions = useCallback(
    (year: number, month: number): Promise<Session[]> => {
      const { start, end } = monthRange(year, month);
      return requireBackend().sessions.listBetween(start, end);
    },
    [requireBackend]
  );

  const loadHistory = useCallback(
    (client: string): Promise<HistoryRow[]> => clientHistory(requireBackend(), client),
    [requireBackend]
  );

  return {
    config,
    session,
    signedIn,
    adminAccess,
    period,
    setPeriod,
    rollup,
    clients,
    loaded,
    loadError,
    reload,
    login,
    logout,
    addSession,
    deleteSession,
    getPayment,
    setPayment,
    monthSessions,
    loadHistory,
  };
}
