/** One billable class. `timestamp` is naive local time as `YYYY-MM-DD HH:MM:SS`. */
export interface Session {
  id: number;
  client: string;
  timestamp: string;
  amount: number;
}

/** Sparse per-month payment row. Absent row means unpaid. */
export interface MonthlyPayment {
  client: string;
  year: number;
  month: number;
  paid: boolean;
  /** YYYY-MM-DD; always null while unpaid. */
  paidOn: string | null;
  /** Stored under a spelling the normalizer would change (rows written before normalization). */
  legacy: boolean;
}

export interface PaymentStatus {
  paid: boolean;
  paidOn: string | null;
}

export type PaymentLabel = "Pagado" | "Pendiente";

export interface ClientTotals {
  client: string;
  classes: number;
  total: number;
}

export interface MonthlyRollupRow extends ClientTotals {
  status: PaymentLabel;
}

export interface MonthlyRollup {
  year: number;
  month: number;
  rows: MonthlyRollupRow[];
  totalClasses: number;
  totalAmount: number;
  /** Sessions of the month, ascending by timestamp. */
  sessions: Session[];
}

export interface MonthAggregate extends ClientTotals {
  year: number;
  month: number;
}

export interface HistoryRow extends MonthAggregate {
  label: string;
  paid: boolean;
  status: PaymentLabel;
  paidOn: string | null;
}

export interface CalendarEntry {
  id: number;
  client: string;
  /** HH:MM */
  time: string;
  amount: number;
}

export type CalendarCell =
  | { inMonth: false }
  | { inMonth: true; day: number; dateKey: string; entries: CalendarEntry[]; total: number };

/** Issued by a verified login code; dropped at logout or expiry. */
export interface AuthSession {
  accessToken: string;
  refreshToken: string;
  email: string;
  /** Epoch seconds. */
  expiresAt: number;
}

export interface AllowedEmail {
  email: string;
  createdAt: string | null;
  createdBy: string | null;
}
