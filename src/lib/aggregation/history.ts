import type { HistoryRow, MonthAggregate, MonthlyPayment, Session } from "@/types";
import type { Backend } from "@/store/backend";
import { normalizeClient } from "@/utils/clientName";
import { monthLabel, parseTimestampText } from "@/utils/months";
import { paymentLabel } from "@/lib/aggregation/rollup";
import { preferPayment } from "@/store/rows";

const keyOf = (client: string, year: number, month: number) => `${client}|${year}|${month}`;

function compareAggregates(a: MonthAggregate, b: MonthAggregate): number {
  if (a.client !== b.client) return a.client < b.client ? -1 : 1;
  if (a.year !== b.year) return a.year - b.year;
  return a.month - b.month;
}

/**
 * Sparse (client, year, month) rollup: a month shows up only when it has at least one session.
 * With `client`, only that client's sessions are counted.
 */
export function aggregateByMonth(sessions: Session[], client?: string): MonthAggregate[] {
  const only = client != null ? normalizeClient(client) : null;
  const groups = new Map<string, MonthAggregate>();
  for (const s of sessions) {
    const name = normalizeClient(s.client);
    if (only != null && name !== only) continue;
    const { year, month } = parseTimestampText(s.timestamp);
    const key = keyOf(name, year, month);
    const entry = groups.get(key) ?? { client: name, year, month, classes: 0, total: 0 };
    entry.classes += 1;
    entry.total += s.amount;
    groups.set(key, entry);
  }
  return [...groups.values()].sort(compareAggregates);
}

/**
 * Left join of aggregates with ledger rows on (normalized client, year, month).
 * Every aggregate appears once; ledger rows without activity are dropped; a missing row reads as unpaid.
 * Rows that collide after normalization are resolved as the ledger's own `get` does (see preferPayment).
 */
export function mergeWithPayments(aggregates: MonthAggregate[], payments: MonthlyPayment[]): HistoryRow[] {
  const ledger = new Map<string, MonthlyPayment>();
  for (const p of payments) {
    const key = keyOf(normalizeClient(p.client), p.year, p.month);
    const existing = ledger.get(key);
    if (!existing || preferPayment(p, existing)) ledger.set(key, p);
  }
  return aggregates.map((agg) => {
    const row = ledger.get(keyOf(agg.client, agg.year, agg.month));
    const paid = row?.paid ?? false;
    return {
      ...agg,
      label: monthLabel(agg.year, agg.month),
      paid,
      status: paymentLabel(paid),
      paidOn: paid ? row?.paidOn ?? null : null,
    };
  });
}

/** Month-by-month history for one client, ascending by (year, month). */
export async function clientHistory(backend: Backend, client: string): Promise<HistoryRow[]> {
  const sessions = await backend.sessions.listAll();
  const payments = await backend.ledger.listAll();
  return mergeWithPayments(aggregateByMonth(sessions, client), payments);
}
