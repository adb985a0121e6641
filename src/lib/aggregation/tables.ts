import type { HistoryRow, MonthlyRollupRow, PaymentLabel, Session } from "@/types";
import { formatMoney } from "@/utils/money";
import { dateKeyOf, timeOfDayOf } from "@/utils/months";

/** Shown in "Fecha pago mes" when a month has no recorded payment date. */
export const NO_DATE = "—";

export interface RollupTableRow {
  Cliente: string;
  Clases: number;
  Monto: string;
  "Estado mes": PaymentLabel;
}

export interface HistoryTableRow {
  Mes: string;
  Clases: number;
  Monto: string;
  "Estado mes": PaymentLabel;
  "Fecha pago mes": string;
}

export interface SessionTableRow {
  "N°": number;
  Cliente: string;
  Fecha: string;
  Hora: string;
  Valor: string;
  id: number;
}

export const ROLLUP_COLUMNS = ["Cliente", "Clases", "Monto", "Estado mes"] as const;
export const HISTORY_COLUMNS = ["Mes", "Clases", "Monto", "Estado mes", "Fecha pago mes"] as const;
export const SESSION_COLUMNS = ["N°", "Cliente", "Fecha", "Hora", "Valor"] as const;

export function toRollupTable(rows: MonthlyRollupRow[]): RollupTableRow[] {
  return rows.map((r) => ({ Cliente: r.client, Clases: r.classes, Monto: formatMoney(r.total), "Estado mes": r.status }));
}

export function toHistoryTable(rows: HistoryRow[]): HistoryTableRow[] {
  return rows.map((r) => ({
    Mes: r.label,
    Clases: r.classes,
    Monto: formatMoney(r.total),
    "Estado mes": r.status,
    "Fecha pago mes": r.paidOn ?? NO_DATE,
  }));
}

/** Numbered month listing; `id` is kept for the delete picker. */
export function toMonthSessionTable(sessions: Session[]): SessionTableRow[] {
  return sessions.map((s, i) => ({
    "N°": i + 1,
    Cliente: s.client,
    Fecha: dateKeyOf(s.timestamp),
    Hora: timeOfDayOf(s.timestamp),
    Valor: formatMoney(s.amount),
    id: s.id,
  }));
}

/** "N° 1 — Juan Pérez — 2025-03-01 09:00 — $30.000" */
export function sessionOptionLabel(row: SessionTableRow): string {
  return `N° ${row["N°"]} — ${row.Cliente} — ${row.Fecha} ${row.Hora} — ${row.Valor}`;
}
