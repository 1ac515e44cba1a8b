import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { SaleConfigSchema, loadSaleConfig } from "../src/config.js";

const ENV = {
  SALE_START: "1000000",
  SALE_END: "1001000",
  SALE_CAPACITY: "1000",
  SALE_MAX_CONTRIBUTION: "100",
  SALE_RATE: "5",
  SALE_ADMINISTRATOR: "admin",
  VESTING_UNLOCK_DATE: "1002000",
};

function failingPaths(env: Record<string, string | undefined>): string[] {
  const result = SaleConfigSchema.safeParse(env);
  return result.success ? [] : result.error.issues.map((issue) => issue.path.join("."));
}

describe("loadSaleConfig", () => {
  it("parses amounts as bigint and applies defaults", () => {
    const config = loadSaleConfig(ENV);

    expect(config).toEqual({
      SALE_START: 1_000_000,
      SALE_END: 1_001_000,
      SALE_CAPACITY: 1000n,
      SALE_MIN_CONTRIBUTION: 1n,
      SALE_MAX_CONTRIBUTION: 100n,
      SALE_RATE: 5n,
      SALE_ADMINISTRATOR_RATE: 0n,
      SALE_BONUS_PERCENT: 0,
      SALE_ADMINISTRATOR: "admin",
      SALE_ACCOUNT: "sale",
      VESTING_UNLOCK_DATE: 1_002_000,
      VESTING_INTERVAL_SECONDS: 2_592_000,
      VESTING_INTERVALS: 4,
      LOG_LEVEL: "info",
      NODE_ENV: "development",
    });
  });

  it("keeps amounts beyond the float range exact", () => {
    const config = loadSaleConfig({ ...ENV, SALE_CAPACITY: "123456789012345678901234567890" });

    expect(config.SALE_CAPACITY).toBe(123456789012345678901234567890n);
  });

  it("throws a ZodError for missing variables", () => {
    const rest = { ...ENV, SALE_RATE: undefined };

    expect(() => loadSaleConfig(rest)).toThrow(ZodError);
    expect(failingPaths(rest)).toEqual(["SALE_RATE"]);
  });

  it.each(["-1", "1.5", "01", "ten", ""])("rejects amount %j", (value) => {
    expect(failingPaths({ ...ENV, SALE_CAPACITY: value })).toEqual(["SALE_CAPACITY"]);
  });

  it("rejects a bonus above 100 percent", () => {
    expect(failingPaths({ ...ENV, SALE_BONUS_PERCENT: "101" })).toEqual(["SALE_BONUS_PERCENT"]);
  });

  it("checks fields against each other", () => {
    expect(failingPaths({ ...ENV, SALE_END: "1000000" })).toEqual(["SALE_END"]);
    expect(failingPaths({ ...ENV, SALE_MIN_CONTRIBUTION: "101" })).toEqual([
      "SALE_MAX_CONTRIBUTION",
    ]);
    expect(failingPaths({ ...ENV, SALE_RATE: "0", SALE_CAPACITY: "0" })).toEqual([
      "SALE_CAPACITY",
      "SALE_RATE",
    ]);
    expect(failingPaths({ ...ENV, VESTING_UNLOCK_DATE: "999999" })).toEqual([
      "VESTING_UNLOCK_DATE",
    ]);
  });
});
