import { z } from "zod";
import type { MonthlyPayment, PaymentStatus, Session } from "@/types";
import { BackendUnavailable } from "@/lib/errors";
import { normalizeClient } from "@/utils/clientName";
import { toTimestampText } from "@/utils/months";
import type { Backend, PaymentLedger, SessionStore } from "@/store/backend";
import {
  byTimestamp,
  distinctSorted,
  parseRows,
  paymentRowSchema,
  paymentUpsertSchema,
  pickPayment,
  preparePayment,
  prepareSession,
  sessionInsertSchema,
  sessionRowSchema,
  toPaymentStatus,
  type PaymentUpsert,
  type SessionInsert,
} from "@/store/rows";

export const STORAGE_KEY = "entrenos_data";

/** The subset of the Web Storage API the local backend needs. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

type StoredSession = SessionInsert & { id: number };

interface StoredDocument {
  nextId: number;
  sessions: StoredSession[];
  payments: PaymentUpsert[];
}

const documentSchema = z.object({
  nextId: z.number().int().optional(),
  sessions: z.array(sessionInsertSchema.extend({ id: z.number().int() })),
  payments: z.array(paymentUpsertSchema),
});

const emptyDocument = (): StoredDocument => ({ nextId: 1, sessions: [], payments: [] });

function parseDocument(raw: string): StoredDocument {
  const parsed = documentSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) throw parsed.error;
  const { sessions, payments } = parsed.data;
  const maxId = sessions.reduce((m, s) => Math.max(m, s.id), 0);
  const stored = parsed.data.nextId ?? 0;
  return { nextId: stored > maxId ? stored : maxId + 1, sessions, payments };
}

/**
 * Embedded single-document store (browser localStorage in the app).
 * Each write is a synchronous read-modify-write, so it cannot interleave with another write in the same page.
 */
export function createLocalBackend(storage: KeyValueStorage, key: string = STORAGE_KEY): Backend {
  const read = (operation: string): StoredDocument => {
    try {
      const raw = storage.getItem(key);
      return raw ? parseDocument(raw) : emptyDocument();
    } catch (e) {
      console.error(`[Entrenos] Local store read failed (${operation}):`, e);
      throw new BackendUnavailable(operation, e);
    }
  };

  const write = (operation: string, doc: StoredDocument): void => {
    try {
      storage.setItem(key, JSON.stringify(doc));
    } catch (e) {
      console.error(`[Entrenos] Local store write failed (${operation}):`, e);
      throw new BackendUnavailable(operation, e);
    }
  };

  const readSessions = (operation: string): Session[] =>
    parseRows(operation, sessionRowSchema, read(operation).sessions).sort(byTimestamp);

  const readPayments = (operation: string): MonthlyPayment[] => parseRows(operation, paymentRowSchema, read(operation).payments);

  const sessions: SessionStore = {
    async add(client, timestamp, amount) {
      const row = prepareSession(client, timestamp, amount);
      const doc = read("sessions.add");
      const stored: StoredSession = { id: doc.nextId, ...row };
      write("sessions.add", { ...doc, nextId: doc.nextId + 1, sessions: [...doc.sessions, stored] });
      return { id: stored.id, client: stored.client, timestamp: stored.ts, amount: stored.amount };
    },

    async delete(id) {
      const doc = read("sessions.delete");
      const remaining = doc.sessions.filter((s) => s.id !== id);
      if (remaining.length === doc.sessions.length) return;
      write("sessions.delete", { ...doc, sessions: remaining });
    },

    async listBetween(start, end) {
      const from = toTimestampText(start);
      const to = toTimestampText(end);
      return readSessions("sessions.listBetween").filter((s) => s.timestamp >= from && s.timestamp < to);
    },

    async listDistinctClients() {
      return distinctSorted(readSessions("sessions.listDistinctClients").map((s) => s.client));
    },

    async listAll(): Promise<Session[]> {
      return readSessions("sessions.listAll");
    },
  };

  const ledger: PaymentLedger = {
    async get(client, year, month): Promise<PaymentStatus> {
      const name = normalizeClient(client);
      const matches = readPayments("ledger.get").filter((p) => p.client === name && p.year === year && p.month === month);
      return toPaymentStatus(pickPayment(matches));
    },

    async upsert(client, year, month, paid, paidOn) {
      const row = preparePayment(client, year, month, paid, paidOn);
      const doc = read("ledger.upsert");
      // Legacy spellings of the same key are replaced too.
      const others = doc.payments.filter(
        (p) => !(normalizeClient(p.client) === row.client && p.year === row.year && p.month === row.month)
      );
      write("ledger.upsert", { ...doc, payments: [...others, row] });
    },

    async listAll(): Promise<MonthlyPayment[]> {
      return readPayments("ledger.listAll");
    },
  };

  return { kind: "local", sessions, ledger };
}

/** In-memory storage for tests and for environments without window.localStorage. */
export class MemoryStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }
}
