import { describe, expect, it } from "vitest";
import { readConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";

const supabaseEnv = {
  VITE_SUPABASE_URL: "https://example.supabase.co",
  VITE_SUPABASE_ANON_KEY: "test-anon-key",
};

describe("readConfig", () => {
  it("falls back to the local backend without Supabase settings", () => {
    expect(readConfig({})).toEqual({ backend: "local", supabaseUrl: null, supabaseAnonKey: null, requiresLogin: false });
  });

  it("defaults to the per-login backend when Supabase is configured", () => {
    expect(readConfig(supabaseEnv)).toEqual({
      backend: "supabase-auth",
      supabaseUrl: "https://example.supabase.co",
      supabaseAnonKey: "test-anon-key",
      requiresLogin: true,
    });
  });

  it("honours an explicit backend", () => {
    expect(readConfig({ ...supabaseEnv, VITE_BACKEND: " supabase " })).toMatchObject({ backend: "supabase", requiresLogin: false });
    expect(readConfig({ ...supabaseEnv, VITE_BACKEND: "local" }).backend).toBe("local");
  });

  it("rejects an unknown backend", () => {
    expect(() => readConfig({ VITE_BACKEND: "mysql" })).toThrow(ConfigError);
  });

  it("requires both Supabase settings for a Supabase backend", () => {
    expect(() => readConfig({ VITE_BACKEND: "supabase", VITE_SUPABASE_URL: "https://example.supabase.co" })).toThrow(ConfigError);
    expect(() => readConfig({ VITE_BACKEND: "supabase-auth", VITE_SUPABASE_ANON_KEY: "  " })).toThrow(ConfigError);
  });
});
