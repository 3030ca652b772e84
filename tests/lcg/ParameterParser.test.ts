import { parseIntegerField, parseLcgInput } from "@/lcg";
import type { LcgInputText } from "@/types";
import { describe, expect, it } from "vitest";

const VALID: LcgInputText = { modulus: "10", multiplier: "7", increment: "7", seed: "0" };

describe("ParameterParser", () => {
  describe("parseIntegerField", () => {
    it("should accept surrounding whitespace and a sign", () => {
      expect(parseIntegerField("  42 ")).toEqual({ ok: true, value: 42 });
      expect(parseIntegerField("+3")).toEqual({ ok: true, value: 3 });
      expect(parseIntegerField("-17")).toEqual({ ok: true, value: -17 });
      expect(parseIntegerField("007")).toEqual({ ok: true, value: 7 });
    });

    it("should reject text that is not a decimal integer", () => {
      for (const text of ["", "  ", "1.5", "1e3", "0x10", "abc", "- 3", "3-"]) {
        expect(parseIntegerField(text)).toEqual({ ok: false, reason: "not_integer" });
      }
    });

    it("should accept the safe integer bounds", () => {
      expect(parseIntegerField("9007199254740991")).toEqual({
        ok: true,
        value: Number.MAX_SAFE_INTEGER,
      });
      expect(parseIntegerField("-9007199254740991")).toEqual({
        ok: true,
        value: Number.MIN_SAFE_INTEGER,
      });
    });

    it("should separate 64-bit values beyond the safe range from overflow", () => {
      expect(parseIntegerField("-9007199254740992")).toEqual({
        ok: false,
        reason: "out_of_range",
        negative: true,
      });
      expect(parseIntegerField("9223372036854775807")).toEqual({
        ok: false,
        reason: "out_of_range",
        negative: false,
      });
      expect(parseIntegerField("9223372036854775808")).toEqual({
        ok: false,
        reason: "not_integer",
      });
      expect(parseIntegerField("-9223372036854775809")).toEqual({
        ok: false,
        reason: "not_integer",
      });
    });
  });

  describe("parseLcgInput", () => {
    it("should parse valid input", () => {
      expect(parseLcgInput(VALID)).toEqual({
        ok: true,
        params: { modulus: 10, multiplier: 7, increment: 7, seed: 0 },
      });
    });

    it("should keep negative values as typed", () => {
      const result = parseLcgInput({ modulus: " 5 ", multiplier: "+3", increment: "-2", seed: "-3" });
      expect(result).toEqual({
        ok: true,
        params: { modulus: 5, multiplier: 3, increment: -2, seed: -3 },
      });
    });

    it("should require a positive modulus", () => {
      for (const modulus of ["0", "-4", "abc", ""]) {
        expect(parseLcgInput({ ...VALID, modulus })).toEqual({
          ok: false,
          field: "modulus",
          message: "Modulus (m) must be a positive integer.",
        });
      }
    });

    it("should name the invalid field", () => {
      expect(parseLcgInput({ ...VALID, multiplier: "1.5" })).toEqual({
        ok: false,
        field: "multiplier",
        message: "Multiplier (a) must be an integer.",
      });
      expect(parseLcgInput({ ...VALID, increment: "x" })).toEqual({
        ok: false,
        field: "increment",
        message: "Increment (c) must be an integer.",
      });
      expect(parseLcgInput({ ...VALID, seed: "" })).toEqual({
        ok: false,
        field: "seed",
        message: "Seed must be an integer.",
      });
    });

    it("should report the first invalid field", () => {
      const result = parseLcgInput({ modulus: "0", multiplier: "7", increment: "7", seed: "x" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.field).toBe("modulus");
      }
    });

    it("should explain values outside the safe integer range", () => {
      expect(parseLcgInput({ ...VALID, multiplier: "9223372036854775807" })).toEqual({
        ok: false,
        field: "multiplier",
        message: "Multiplier (a) must be between -9007199254740991 and 9007199254740991.",
      });
    });

    it("should call a large negative modulus not positive", () => {
      expect(parseLcgInput({ ...VALID, modulus: "-99999999999999999" })).toEqual({
        ok: false,
        field: "modulus",
        message: "Modulus (m) must be a positive integer.",
      });
      expect(parseLcgInput({ ...VALID, modulus: "99999999999999999" })).toEqual({
        ok: false,
        field: "modulus",
        message: "Modulus (m) must be between -9007199254740991 and 9007199254740991.",
      });
    });

    it("should keep the range message for other negative fields", () => {
      expect(parseLcgInput({ ...VALID, seed: "-99999999999999999" })).toEqual({
        ok: false,
        field: "seed",
        message: "Seed must be between -9007199254740991 and 9007199254740991.",
      });
    });

    it("should treat 64-bit overflow as not an integer", () => {
      expect(parseLcgInput({ ...VALID, seed: "9223372036854775808" })).toEqual({
        ok: false,
        field: "seed",
        message: "Seed must be an integer.",
      });
    });
  });
});
