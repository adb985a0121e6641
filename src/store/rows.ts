import { z } from "zod";
import type { MonthlyPayment, PaymentStatus, Session } from "@/types";
import { BackendUnavailable, ValidationError } from "@/lib/errors";
import { normalizeClient } from "@/utils/clientName";
import { assertYearMonth, canonicalTimestampText, isDateKey, toTimestampText } from "@/utils/months";

/** A session row as the app writes it. */
export const sessionInsertSchema = z.object({
  client: z.string(),
  ts: z.string(),
  amount: z.number(),
});
export type SessionInsert = z.infer<typeof sessionInsertSchema>;

/** A ledger row as the app writes it. */
export const paymentUpsertSchema = z.object({
  client: z.string(),
  year: z.number().int(),
  month: z.number().int(),
  paid: z.boolean(),
  paid_on: z.string().nullable(),
});
export type PaymentUpsert = z.infer<typeof paymentUpsertSchema>;

/** Shared write-path checks for every backend. Throws before anything is persisted. */
export function prepareSession(client: string, timestamp: Date, amount: number): SessionInsert {
  const name = normalizeClient(client);
  if (!name) throw new ValidationError("client", "Por favor, escribe o selecciona el nombre del cliente.");
  const value = Number(amount);
  if (!Number.isFinite(value)) throw new ValidationError("amount", "El valor de la clase debe ser un número.");
  if (value < 0) throw new ValidationError("amount", "El valor de la clase no puede ser negativo.");
  return { client: name, ts: toTimestampText(timestamp), amount: value };
}

export function preparePayment(
  client: string,
  year: number,
  month: number,
  paid: boolean,
  paidOn: string | null
): PaymentUpsert {
  const name = normalizeClient(client);
  if (!name) throw new ValidationError("client", "Selecciona un cliente.");
  assertYearMonth(year, month);
  // An unpaid month never keeps a paid-on date.
  const date = paid ? paidOn : null;
  if (date != null && !isDateKey(date)) throw new ValidationError("paidOn", `Fecha de pago inválida: ${date}`);
  return { client: name, year, month, paid, paid_on: date };
}

function canonicalOrNull(text: string): string | null {
  try {
    return canonicalTimestampText(text);
  } catch (e) {
    if (e instanceof ValidationError) return null;
    throw e;
  }
}

const storedClient = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const storedTimestamp = z.string().transform((text, ctx) => {
  const canonical = canonicalOrNull(text);
  if (canonical == null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Marca de tiempo inválida: ${text}` });
    return z.NEVER;
  }
  return canonical;
});

/** Session row read back from any store; legacy client spellings are normalized and ISO timestamps made canonical. */
export const sessionRowSchema = z
  .object({
    id: z.coerce.number().int(),
    client: storedClient,
    ts: storedTimestamp,
    amount: z.coerce.number().finite(),
  })
  .transform(
    (r): Session => ({ id: r.id, client: normalizeClient(r.client), timestamp: r.ts, amount: r.amount })
  );

export const clientRowSchema = z.object({ client: storedClient }).transform((r) => normalizeClient(r.client));

export const paymentRowSchema = z
  .object({
    client: storedClient,
    year: z.coerce.number().int(),
    month: z.coerce.number().int(),
    paid: z
      .union([z.boolean(), z.number()])
      .nullish()
      .transform((v) => Boolean(v)),
    paid_on: z.string().nullish(),
  })
  .transform((r): MonthlyPayment => {
    const client = normalizeClient(r.client);
    return {
      client,
      year: r.year,
      month: r.month,
      paid: r.paid,
      paidOn: r.paid && r.paid_on ? r.paid_on.slice(0, 10) : null,
      legacy: client !== r.client,
    };
  });

/**
 * Validate untyped rows (a query result or stored JSON). A single object counts as one row, null as none.
 * Rows that do not match the schema fail the whole read with BackendUnavailable.
 */
export function parseRows<S extends z.ZodTypeAny>(operation: string, schema: S, data: unknown): z.output<S>[] {
  const rows: unknown[] = data == null ? [] : Array.isArray(data) ? data : [data];
  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    console.error(`[Entrenos] ${operation} returned unexpected rows:`, parsed.error.issues);
    throw new BackendUnavailable(operation, parsed.error);
  }
  return parsed.data;
}

/**
 * Whether `candidate` should replace `current` when both resolve to one (client, year, month).
 * A row already stored under the normalized name is the app's latest write and wins over legacy spellings.
 * Between legacy rows a paid one wins, then the later paid-on date.
 */
export function preferPayment(candidate: MonthlyPayment, current: MonthlyPayment): boolean {
  if (candidate.legacy !== current.legacy) return !candidate.legacy;
  if (candidate.paid !== current.paid) return candidate.paid;
  return (candidate.paidOn ?? "") > (current.paidOn ?? "");
}

export function pickPayment(rows: MonthlyPayment[]): MonthlyPayment | undefined {
  let best: MonthlyPayment | undefined;
  for (const row of rows) {
    if (!best || preferPayment(row, best)) best = row;
  }
  return best;
}

export function toPaymentStatus(row: MonthlyPayment | undefined): PaymentStatus {
  return row ? { paid: row.paid, paidOn: row.paidOn } : { paid: false, paidOn: null };
}

export function byTimestamp(a: Session, b: Session): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  return a.id - b.id;
}

export function distinctSorted(names: string[]): string[] {
  return [...new Set(names.filter((n) => n.length > 0))].sort();
}
