import { afterEach, describe, expect, it, vi } from "vitest";
import { BackendUnavailable, ValidationError } from "@/lib/errors";
import { monthRange } from "@/utils/months";
import { createSupabaseBackend } from "@/store/supabaseBackend";
import { stubSupabase, type StubReply } from "@/lib/__tests__/supabaseStub";

afterEach(() => {
  vi.restoreAllMocks();
});

const ok = (body: unknown): StubReply => ({ status: 200, body });

describe("supabase session store", () => {
  it("queries a half-open window ordered by timestamp", async () => {
    const { client, requests } = stubSupabase(() =>
      ok([
        { id: 2, client: "ana", ts: "2025-03-02T10:00:00", amount: 30000 },
        { id: 1, client: "Ana", ts: "2025-03-01 09:00:00", amount: 25000 },
      ])
    );
    const { start, end } = monthRange(2025, 3);
    const sessions = await createSupabaseBackend(client).sessions.listBetween(start, end);

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request.method).toBe("GET");
    expect(request.path).toBe("sessions");
    expect(request.url.searchParams.get("select")).toBe("id,client,ts,amount");
    expect(request.url.searchParams.getAll("ts")).toEqual(["gte.2025-03-01 00:00:00", "lt.2025-04-01 00:00:00"]);
    expect(request.url.searchParams.get("order")).toBe("ts.asc");
    expect(sessions).toEqual([
      { id: 1, client: "Ana", timestamp: "2025-03-01 09:00:00", amount: 25000 },
      { id: 2, client: "Ana", timestamp: "2025-03-02 10:00:00", amount: 30000 },
    ]);
  });

  it("inserts the normalized row and returns the stored session", async () => {
    const { client, requests } = stubSupabase((request) =>
      request.method === "POST" ? { status: 201, body: { id: 11, client: "Juan Pérez", ts: "2025-03-01 09:00:00", amount: 30000 } } : ok([])
    );
    const created = await createSupabaseBackend(client).sessions.add("  juan   pérez", new Date(2025, 2, 1, 9, 0), 30000);

    expect(created).toEqual({ id: 11, client: "Juan Pérez", timestamp: "2025-03-01 09:00:00", amount: 30000 });
    expect(requests[0].body).toEqual({ client: "Juan Pérez", ts: "2025-03-01 09:00:00", amount: 30000 });
    expect(requests[0].prefer).toContain("return=representation");
  });

  it("reports an insert that returns no row", async () => {
    const { client } = stubSupabase(() => ({ status: 201, body: null }));
    await expect(createSupabaseBackend(client).sessions.add("Ana", new Date(2025, 2, 1, 9, 0), 100)).rejects.toThrow(
      "sessions.add failed: insert returned no row"
    );
  });

  it("validates before sending anything", async () => {
    const { client, requests } = stubSupabase(() => ok([]));
    const backend = createSupabaseBackend(client);
    await expect(backend.sessions.add("Ana", new Date(2025, 2, 1, 9, 0), -1)).rejects.toBeInstanceOf(ValidationError);
    await expect(backend.sessions.delete(1.5)).rejects.toBeInstanceOf(ValidationError);
    expect(requests).toEqual([]);
  });

  it("deletes by id", async () => {
    const { client, requests } = stubSupabase(() => ({ status: 204 }));
    await createSupabaseBackend(client).sessions.delete(7);
    expect(requests[0].method).toBe("DELETE");
    expect(requests[0].url.searchParams.get("id")).toBe("eq.7");
  });

  it("lists distinct normalized clients", async () => {
    const { client } = stubSupabase(() => ok([{ client: "maria" }, { client: "Ana" }, { client: "MARIA" }, { client: null }]));
    expect(await createSupabaseBackend(client).sessions.listDistinctClients()).toEqual(["Ana", "Maria"]);
  });

  it("turns an error response into BackendUnavailable", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    const { client } = stubSupabase(() => ({ status: 400, body: { message: "permission denied", code: "42501" } }));
    await expect(createSupabaseBackend(client).sessions.listAll()).rejects.toThrow("sessions.listAll failed: permission denied");
    expect(log).toHaveBeenCalled();
  });

  it("rejects rows of the wrong shape", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { client } = stubSupabase(() => ok([{ id: 1, client: "Ana", ts: "yesterday", amount: 1 }]));
    await expect(createSupabaseBackend(client).sessions.listAll()).rejects.toBeInstanceOf(BackendUnavailable);
  });
});

describe("supabase payment ledger", () => {
  it("upserts on the (client, year, month) key and drops the date of an unpaid month", async () => {
    const { client, requests } = stubSupabase(() => ({ status: 201 }));
    await createSupabaseBackend(client).ledger.upsert("ana", 2025, 3, false, "2025-03-20");

    const [request] = requests;
    expect(request.method).toBe("POST");
    expect(request.path).toBe("monthly_payments");
    expect(request.url.searchParams.get("on_conflict")).toBe("client,year,month");
    expect(request.prefer).toContain("resolution=merge-duplicates");
    expect(request.body).toEqual({ client: "Ana", year: 2025, month: 3, paid: false, paid_on: null });
  });

  it("reads a month without a row as unpaid", async () => {
    const { client, requests } = stubSupabase(() => ok([{ client: "Maria", year: 2025, month: 3, paid: true, paid_on: "2025-03-02" }]));
    expect(await createSupabaseBackend(client).ledger.get("Ana", 2025, 3)).toEqual({ paid: false, paidOn: null });
    expect(requests[0].url.searchParams.get("year")).toBe("eq.2025");
    expect(requests[0].url.searchParams.get("month")).toBe("eq.3");
  });

  it("prefers the row under the normalized name over a legacy spelling", async () => {
    const { client } = stubSupabase(() =>
      ok([
        { client: "Ana-María", year: 2025, month: 3, paid: true, paid_on: "2025-03-20" },
        { client: "Ana-maría", year: 2025, month: 3, paid: false, paid_on: null },
      ])
    );
    expect(await createSupabaseBackend(client).ledger.get("ana-maría", 2025, 3)).toEqual({ paid: false, paidOn: null });
  });

  it("lists every row with its legacy flag", async () => {
    const { client } = stubSupabase(() => ok([{ client: "JUAN PÉREZ", year: 2025, month: 3, paid: 1, paid_on: "2025-03-20T00:00:00" }]));
    expect(await createSupabaseBackend(client).ledger.listAll()).toEqual([
      { client: "Juan Pérez", year: 2025, month: 3, paid: true, paidOn: "2025-03-20", legacy: true },
    ]);
  });
});
