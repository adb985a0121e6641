import type { ClientTotals, MonthlyRollup, MonthlyRollupRow, PaymentLabel, Session } from "@/types";
import type { Backend } from "@/store/backend";
import { normalizeClient } from "@/utils/clientName";
import { monthRange } from "@/utils/months";

export const paymentLabel = (paid: boolean): PaymentLabel => (paid ? "Pagado" : "Pendiente");

/** One entry per normalized client, sorted by name. Names are normalized again here because stores may hold legacy rows. */
export function groupByClient(sessions: Session[]): ClientTotals[] {
  const byClient = new Map<string, ClientTotals>();
  for (const s of sessions) {
    const client = normalizeClient(s.client);
    const entry = byClient.get(client) ?? { client, classes: 0, total: 0 };
    entry.classes += 1;
    entry.total += s.amount;
    byClient.set(client, entry);
  }
  return [...byClient.values()].sort((a, b) => (a.client < b.client ? -1 : a.client > b.client ? 1 : 0));
}

/** Sum of one client's amounts within a session list. */
export function clientMonthTotal(sessions: Session[], client: string): number {
  const name = normalizeClient(client);
  return sessions.filter((s) => normalizeClient(s.client) === name).reduce((sum, s) => sum + s.amount, 0);
}

/**
 * Per-client classes and totals for one month, each with its ledger status.
 * Sessions first, then one ledger lookup per client; a client without a ledger row is "Pendiente".
 */
export async function monthlyRollup(backend: Backend, year: number, month: number): Promise<MonthlyRollup> {
  const { start, end } = monthRange(year, month);
  const sessions = await backend.sessions.listBetween(start, end);
  const rows: MonthlyRollupRow[] = [];
  for (const totals of groupByClient(sessions)) {
    const { paid } = await backend.ledger.get(totals.client, year, month);
    rows.push({ ...totals, status: paymentLabel(paid) });
  }
  return {
    year,
    month,
    rows,
    totalClasses: sessions.length,
    totalAmount: sessions.reduce((sum, s) => sum + s.amount, 0),
    sessions,
  };
}
