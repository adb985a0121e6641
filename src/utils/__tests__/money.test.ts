import { describe, it, expect } from "vitest";
import { formatMoney } from "@/utils/money";

describe("formatMoney", () => {
  it("rounds to whole units", () => {
    expect(formatMoney(29999.6)).toBe("$30.000");
    expect(formatMoney(30000.4)).toBe("$30.000");
    expect(formatMoney(999.5)).toBe("$1.000");
  });

  it("groups thousands with periods", () => {
    expect(formatMoney(0)).toBe("$0");
    expect(formatMoney(850)).toBe("$850");
    expect(formatMoney(55000)).toBe("$55.000");
    expect(formatMoney(1234567)).toBe("$1.234.567");
  });

  it("renders non-finite values as text", () => {
    expect(formatMoney(Number.NaN)).toBe("NaN");
  });
});
