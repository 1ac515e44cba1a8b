import { describe, it, expect } from "vitest";
import pino from "pino";
import { runWalkthrough } from "../src/walkthrough.js";

describe("runWalkthrough", () => {
  it("runs a sale from configuration to fully vested", async () => {
    const lines: string[] = [];

    const summary = await runWalkthrough({
      print: (line) => lines.push(line),
      logger: pino({ level: "silent" }),
    });

    expect(summary).toEqual({
      status: "finalized",
      totalRaised: "50",
      events: 17,
      integrityValid: true,
      balances: {
        alice: "50",
        bob: "200",
        erin: "1000",
        operator: "250",
        sale: "0",
      },
    });
    expect(lines.some((line) => line.includes("carol rejected: NOT_AUTHORIZED"))).toBe(true);
  });

  it("takes sale terms from the environment", async () => {
    const summary = await runWalkthrough({
      env: { SALE_RATE: "10", SALE_ADMINISTRATOR_RATE: "0" },
      print: () => undefined,
      logger: pino({ level: "silent" }),
    });

    expect(summary.balances).toEqual({
      alice: "100",
      bob: "400",
      erin: "1000",
      operator: "0",
      sale: "0",
    });
  });
});
