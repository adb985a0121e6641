import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export interface RecordedRequest {
  method: string;
  url: URL;
  /** Table or RPC path under /rest/v1. */
  path: string;
  prefer: string | null;
  body: unknown;
}

export interface StubReply {
  status: number;
  /** Serialized as JSON; omitted means an empty body. */
  body?: unknown;
}

/**
 * A real Supabase client whose HTTP calls go to `reply` instead of the network.
 * Every request is recorded so a test can assert the PostgREST query the client built.
 */
export function stubSupabase(reply: (request: RecordedRequest) => StubReply): {
  client: SupabaseClient;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetchStub = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const headers = new Headers(init?.headers);
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url,
      path: url.pathname.replace(/^\/rest\/v1\//, ""),
      prefer: headers.get("Prefer"),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);
    const { status, body } = reply(request);
    return new Response(body === undefined ? null : JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
  };

  const client = createClient("https://example.supabase.co", "test-anon-key", {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: { fetch: fetchStub },
  });
  return { client, requests };
}
