import { describe, it, expect } from "vitest";
import { AllowlistOracle } from "../src/allowlist-oracle.js";
import { caught } from "./helpers.js";

describe("AllowlistOracle", () => {
  it("authorizes initial and added accounts", () => {
    const oracle = new AllowlistOracle("owner", ["alice"]);

    oracle.add("owner", "bob");
    oracle.addMany("owner", ["carol", "dave"]);

    expect(oracle.isAuthorized("alice")).toBe(true);
    expect(oracle.isAuthorized("dave")).toBe(true);
    expect(oracle.isAuthorized("erin")).toBe(false);
    expect(oracle.size).toBe(4);
  });

  it("removes accounts", () => {
    const oracle = new AllowlistOracle("owner", ["alice"]);

    expect(oracle.remove("owner", "alice")).toBe(true);
    expect(oracle.remove("owner", "alice")).toBe(false);
    expect(oracle.isAuthorized("alice")).toBe(false);
  });

  it("only the owner may edit", () => {
    const oracle = new AllowlistOracle("owner");

    expect(caught(() => oracle.add("alice", "alice"))).toMatchObject({ code: "UNAUTHORIZED" });
    expect(caught(() => oracle.remove("alice", "bob"))).toMatchObject({ code: "UNAUTHORIZED" });
    expect(oracle.accounts()).toEqual([]);
  });

  it("addMany adds nothing when one id is invalid", () => {
    const oracle = new AllowlistOracle("owner");

    expect(caught(() => oracle.addMany("owner", ["alice", ""]))).toMatchObject({
      code: "INVALID_ACCOUNT",
    });
    expect(oracle.size).toBe(0);
  });
});
