import type { MonthlyPayment, PaymentStatus, Session } from "@/types";

export type BackendKind = "supabase-auth" | "supabase" | "local";

/** Append-only log of billable classes. */
export interface SessionStore {
  /** Normalizes the client and validates before writing; resolves with the stored row. */
  add(client: string, timestamp: Date, amount: number): Promise<Session>;
  /** Missing ids are a no-op. */
  delete(id: number): Promise<void>;
  /** Half-open [start, end), ascending by timestamp. */
  listBetween(start: Date, end: Date): Promise<Session[]>;
  /** Normalized, unique, sorted. */
  listDistinctClients(): Promise<string[]>;
  listAll(): Promise<Session[]>;
}

/** Sparse (client, year, month) -> paid status table. */
export interface PaymentLedger {
  /** Never creates a row; absent reads as unpaid. */
  get(client: string, year: number, month: number): Promise<PaymentStatus>;
  /** Insert-or-replace on (client, year, month). paidOn is dropped when paid is false. */
  upsert(client: string, year: number, month: number, paid: boolean, paidOn: string | null): Promise<void>;
  listAll(): Promise<MonthlyPayment[]>;
}

export interface Backend {
  kind: BackendKind;
  sessions: SessionStore;
  ledger: PaymentLedger;
}

export const UNPAID: PaymentStatus = Object.freeze({ paid: false, paidOn: null });
