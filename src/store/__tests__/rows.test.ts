import { describe, expect, it, vi } from "vitest";
import type { MonthlyPayment } from "@/types";
import { BackendUnavailable, ValidationError } from "@/lib/errors";
import {
  byTimestamp,
  clientRowSchema,
  distinctSorted,
  parseRows,
  paymentRowSchema,
  pickPayment,
  preferPayment,
  preparePayment,
  prepareSession,
  sessionRowSchema,
  toPaymentStatus,
} from "@/store/rows";

describe("prepareSession", () => {
  it("normalizes and serializes a valid class", () => {
    expect(prepareSession("ana  lopez", new Date(2025, 2, 1, 9, 5, 7), 30000)).toEqual({
      client: "Ana Lopez",
      ts: "2025-03-01 09:05:07",
      amount: 30000,
    });
  });

  it("accepts a free class", () => {
    expect(prepareSession("Ana", new Date(2025, 2, 1, 9, 0), 0).amount).toBe(0);
  });

  it("names the offending field", () => {
    let error: unknown = null;
    try {
      prepareSession("Ana", new Date(2025, 2, 1, 9, 0), -500);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: "amount" });
  });
});

describe("preparePayment", () => {
  it("keeps the paid-on date only while paid", () => {
    expect(preparePayment("ana", 2025, 3, true, "2025-03-20")).toEqual({
      client: "Ana",
      year: 2025,
      month: 3,
      paid: true,
      paid_on: "2025-03-20",
    });
    expect(preparePayment("ana", 2025, 3, false, "2025-03-20").paid_on).toBeNull();
  });

  it("rejects month 0 and an impossible date", () => {
    expect(() => preparePayment("Ana", 2025, 0, false, null)).toThrow(ValidationError);
    expect(() => preparePayment("Ana", 2025, 3, true, "2025-02-30")).toThrow(ValidationError);
  });
});

describe("parseRows", () => {
  it("normalizes legacy client names and ISO timestamps", () => {
    const rows = parseRows("sessions.listBetween", sessionRowSchema, [
      { id: 7, client: "JUAN  PÉREZ", ts: "2025-03-01T09:00:00+00:00", amount: "30000" },
    ]);
    expect(rows).toEqual([{ id: 7, client: "Juan Pérez", timestamp: "2025-03-01 09:00:00", amount: 30000 }]);
  });

  it("never reports a paid-on date for an unpaid row", () => {
    const [unpaid, paid] = parseRows("ledger.listAll", paymentRowSchema, [
      { client: "ana", year: 2025, month: 3, paid: false, paid_on: "2025-03-20" },
      { client: "Ana", year: 2025, month: 4, paid: true, paid_on: "2025-04-20T00:00:00" },
    ]);
    expect(unpaid).toEqual({ client: "Ana", year: 2025, month: 3, paid: false, paidOn: null, legacy: true });
    expect(paid).toEqual({ client: "Ana", year: 2025, month: 4, paid: true, paidOn: "2025-04-20", legacy: false });
  });

  it("treats a single object as one row and null as none", () => {
    expect(parseRows("sessions.listDistinctClients", clientRowSchema, { client: "maria" })).toEqual(["Maria"]);
    expect(parseRows("sessions.listDistinctClients", clientRowSchema, null)).toEqual([]);
  });

  it("fails the whole read on a malformed row", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    let error: unknown = null;
    try {
      parseRows("sessions.listBetween", sessionRowSchema, [
        { id: 1, client: "Ana", ts: "2025-03-01 09:00:00", amount: 1 },
        { id: 2, client: "Ana", ts: "not a date", amount: 1 },
      ]);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({ operation: "sessions.listBetween" });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});

describe("pickPayment", () => {
  const row = (client: string, paid: boolean, paidOn: string | null, legacy: boolean): MonthlyPayment => ({
    client,
    year: 2025,
    month: 3,
    paid,
    paidOn,
    legacy,
  });

  it("prefers the row stored under the normalized name over a legacy spelling", () => {
    const canonical = row("Ana-maría", false, null, false);
    const legacy = row("Ana-maría", true, "2025-03-20", true);
    expect(pickPayment([legacy, canonical])).toBe(canonical);
    expect(pickPayment([canonical, legacy])).toBe(canonical);
    expect(preferPayment(legacy, canonical)).toBe(false);
  });

  it("breaks ties between legacy rows by paid, then the later date", () => {
    const unpaid = row("Ana", false, null, true);
    const early = row("Ana", true, "2025-03-02", true);
    const late = row("Ana", true, "2025-03-28", true);
    expect(pickPayment([unpaid, late, early])).toBe(late);
  });

  it("reports unpaid when nothing matches", () => {
    expect(toPaymentStatus(pickPayment([]))).toEqual({ paid: false, paidOn: null });
  });
});

describe("ordering", () => {
  it("orders by timestamp then id", () => {
    const a = { id: 2, client: "A", timestamp: "2025-03-01 09:00:00", amount: 1 };
    const b = { id: 1, client: "B", timestamp: "2025-03-01 09:00:00", amount: 1 };
    const c = { id: 3, client: "C", timestamp: "2025-02-01 09:00:00", amount: 1 };
    expect([a, b, c].sort(byTimestamp).map((s) => s.id)).toEqual([3, 1, 2]);
  });

  it("dedupes and drops empty names", () => {
    expect(distinctSorted(["Maria", "", "Ana", "Maria"])).toEqual(["Ana", "Maria"]);
  });
});
