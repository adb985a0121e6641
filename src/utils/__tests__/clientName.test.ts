import { describe, it, expect } from "vitest";
import { normalizeClient } from "@/utils/clientName";

describe("normalizeClient", () => {
  it("collapses whitespace runs and title-cases each word", () => {
    expect(normalizeClient("juan pérez")).toBe("Juan Pérez");
    expect(normalizeClient("  Juan   Pérez  ")).toBe("Juan Pérez");
    expect(normalizeClient("ANA\tLOPEZ\n")).toBe("Ana Lopez");
    expect(normalizeClient("maría josé  DE LA  cruz")).toBe("María José De La Cruz");
  });

  it("treats names differing only in case and spacing as the same client", () => {
    expect(normalizeClient("ana  lopez")).toBe(normalizeClient("Ana Lopez"));
  });

  it("capitalizes per whitespace token only", () => {
    expect(normalizeClient("o'neil mcdonald-smith")).toBe("O'neil Mcdonald-smith");
  });

  it("returns an empty string for absent or blank input", () => {
    expect(normalizeClient("")).toBe("");
    expect(normalizeClient("   \t ")).toBe("");
    expect(normalizeClient(null)).toBe("");
    expect(normalizeClient(undefined)).toBe("");
  });

  it("leaves a leading ß lower-case", () => {
    expect(normalizeClient("ßara")).toBe("ßara");
    expect(normalizeClient("STRAßE")).toBe("Straße");
  });

  it("is idempotent and never leaves double or edge spaces", () => {
    const samples = [
      "juan pérez",
      "  Juan   Pérez ",
      "ÁLVARO gómez",
      "ßen  ß",
      "x",
      "  ",
      "élodie\n\nmartin",
      "İstanbul ışık",
      "ǆemal",
      "123 abc",
    ];
    for (const s of samples) {
      const once = normalizeClient(s);
      expect(normalizeClient(once)).toBe(once);
      expect(once).not.toContain("  ");
      expect(once).toBe(once.trim());
    }
  });
});
