import type { SupabaseClient } from "@supabase/supabase-js";
import type { MonthlyPayment, PaymentStatus, Session } from "@/types";
import { BackendUnavailable, ValidationError } from "@/lib/errors";
import { runQuery as run } from "@/lib/supabase";
import { normalizeClient } from "@/utils/clientName";
import { assertYearMonth, toTimestampText } from "@/utils/months";
import type { Backend, BackendKind, PaymentLedger, SessionStore } from "@/store/backend";
import {
  byTimestamp,
  clientRowSchema,
  distinctSorted,
  parseRows,
  paymentRowSchema,
  pickPayment,
  preparePayment,
  prepareSession,
  sessionRowSchema,
  toPaymentStatus,
} from "@/store/rows";

const SESSION_COLUMNS = "id, client, ts, amount";
const PAYMENT_COLUMNS = "client, year, month, paid, paid_on";

/**
 * Tables: sessions(id, client, ts, amount) and monthly_payments(client, year, month, paid, paid_on)
 * with a unique key on (client, year, month). See supabase/schema.sql.
 */
export function createSupabaseBackend(client: SupabaseClient, kind: BackendKind = "supabase"): Backend {
  const sessions: SessionStore = {
    async add(name, timestamp, amount) {
      const row = prepareSession(name, timestamp, amount);
      const data = await run("sessions.add", client.from("sessions").insert(row).select(SESSION_COLUMNS).single());
      const [created] = parseRows("sessions.add", sessionRowSchema, data);
      if (!created) throw new BackendUnavailable("sessions.add", new Error("insert returned no row"));
      return created;
    },

    async delete(id) {
      if (!Number.isInteger(id)) throw new ValidationError("id", `Registro inválido: ${id}`);
      await run("sessions.delete", client.from("sessions").delete().eq("id", id));
    },

    async listBetween(start, end) {
      const data = await run(
        "sessions.listBetween",
        client
          .from("sessions")
          .select(SESSION_COLUMNS)
          .gte("ts", toTimestampText(start))
          .lt("ts", toTimestampText(end))
          .order("ts", { ascending: true })
      );
      return parseRows("sessions.listBetween", sessionRowSchema, data).sort(byTimestamp);
    },

    async listDistinctClients() {
      const data = await run("sessions.listDistinctClients", client.from("sessions").select("client"));
      return distinctSorted(parseRows("sessions.listDistinctClients", clientRowSchema, data));
    },

    async listAll(): Promise<Session[]> {
      const data = await run("sessions.listAll", client.from("sessions").select(SESSION_COLUMNS).order("ts", { ascending: true }));
      return parseRows("sessions.listAll", sessionRowSchema, data).sort(byTimestamp);
    },
  };

  const ledger: PaymentLedger = {
    // Fetches the whole month: rows written before normalization may hold another spelling of the client.
    async get(name, year, month): Promise<PaymentStatus> {
      assertYearMonth(year, month);
      const data = await run(
        "ledger.get",
        client.from("monthly_payments").select(PAYMENT_COLUMNS).eq("year", year).eq("month", month)
      );
      const wanted = normalizeClient(name);
      const matches = parseRows("ledger.get", paymentRowSchema, data).filter((p) => p.client === wanted);
      return toPaymentStatus(pickPayment(matches));
    },

    async upsert(name, year, month, paid, paidOn) {
      const row = preparePayment(name, year, month, paid, paidOn);
      await run("ledger.upsert", client.from("monthly_payments").upsert(row, { onConflict: "client,year,month" }));
    },

    async listAll(): Promise<MonthlyPayment[]> {
      const data = await run("ledger.listAll", client.from("monthly_payments").select(PAYMENT_COLUMNS));
      return parseRows("ledger.listAll", paymentRowSchema, data);
    },
  };

  return { kind, sessions, ledger };
}
