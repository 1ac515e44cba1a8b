/**
 * Tests for AdminCapability — single administrator, two-step transfer.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AdminCapability } from "../src/admin-capability.js";
import { AccessError } from "../src/types.js";

describe("AdminCapability", () => {
  let cap: AdminCapability;

  beforeEach(() => {
    cap = new AdminCapability("admin");
  });

  describe("construction", () => {
    it("rejects an empty administrator", () => {
      expect(() => new AdminCapability("")).toThrow(AccessError);
    });
  });

  describe("assert", () => {
    it("passes for the administrator", () => {
      expect(() => cap.assert("admin")).not.toThrow();
    });

    it("throws UNAUTHORIZED for anyone else", () => {
      expect(() => cap.assert("mallory", "finalize")).toThrow(
        "'mallory' is not authorized to finalize",
      );
    });
  });

  describe("transfer", () => {
    it("hands over only after the nominee accepts", () => {
      cap.propose("admin", "bob");
      expect(cap.admin).toBe("admin");
      expect(cap.pending).toBe("bob");

      cap.accept("bob");
      expect(cap.admin).toBe("bob");
      expect(cap.pending).toBeUndefined();
      expect(cap.isAdmin("admin")).toBe(false);
    });

    it("only the administrator can propose", () => {
      expect(() => cap.propose("bob", "bob")).toThrow(AccessError);
    });

    it("only the nominee can accept", () => {
      cap.propose("admin", "bob");
      expect(() => cap.accept("carol")).toThrow(/not the proposed administrator/);
      expect(cap.admin).toBe("admin");
    });

    it("throws NO_PENDING_TRANSFER when nothing was proposed", () => {
      let caught: unknown;
      try {
        cap.accept("bob");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(AccessError);
      expect(caught).toMatchObject({ code: "NO_PENDING_TRANSFER" });
    });

    it("cancel clears the proposal", () => {
      cap.propose("admin", "bob");
      cap.cancel("admin");
      expect(cap.pending).toBeUndefined();
      expect(() => cap.accept("bob")).toThrow(AccessError);
    });

    it("rejects an empty nominee", () => {
      expect(() => cap.propose("admin", " ")).toThrow(/non-empty/);
    });
  });
});
