/**
 * Unit tests for guard utilities
 */

import { describe, it, expect } from "@jest/globals";
import {
  ensureRecord,
  ensureArray,
  ensureString,
  parsePositiveInt,
  isNonEmptyString,
  isRecord,
} from "../src/lib/guards";

describe("Guard Utilities", () => {
  describe("ensureRecord", () => {
    it("should return object when valid", () => {
      const obj = { foo: "bar" };
      expect(ensureRecord(obj, "test")).toBe(obj);
    });

    it("should throw on null", () => {
      expect(() => ensureRecord(null, "test")).toThrow(
        "Expected object for test, got null/undefined",
      );
    });

    it("should throw on arrays and primitives", () => {
      expect(() => ensureRecord([1], "test")).toThrow("Expected object for test, got array");
      expect(() => ensureRecord(123, "test")).toThrow("Expected object for test, got number");
    });
  });

  describe("ensureArray", () => {
    it("should return array when valid", () => {
      const arr = [1, 2, 3];
      expect(ensureArray(arr, "test")).toBe(arr);
    });

    it("should throw on non-array", () => {
      expect(() => ensureArray(undefined, "Records")).toThrow(
        "Expected array for Records, got null/undefined",
      );
      expect(() => ensureArray({ foo: "bar" }, "Records")).toThrow(
        "Expected array for Records, got object",
      );
    });
  });

  describe("ensureString", () => {
    it("should return non-empty strings", () => {
      expect(ensureString("calls/call1.mp4", "key")).toBe("calls/call1.mp4");
    });

    it("should reject blank strings and non-strings", () => {
      expect(() => ensureString("   ", "key")).toThrow(
        "Expected non-empty string for key, got empty string",
      );
      expect(() => ensureString(42, "key")).toThrow(
        "Expected non-empty string for key, got number",
      );
    });
  });

  describe("parsePositiveInt", () => {
    it("should parse digits", () => {
      expect(parsePositiveInt("5000")).toBe(5000);
      expect(parsePositiveInt(" 12 ")).toBe(12);
    });

    it("should return null for zero, negatives, decimals and junk", () => {
      expect(parsePositiveInt("0")).toBeNull();
      expect(parsePositiveInt("-5")).toBeNull();
      expect(parsePositiveInt("1.5")).toBeNull();
      expect(parsePositiveInt("ten")).toBeNull();
      expect(parsePositiveInt(undefined)).toBeNull();
    });
  });

  describe("type guards", () => {
    it("isNonEmptyString", () => {
      expect(isNonEmptyString("a")).toBe(true);
      expect(isNonEmptyString("")).toBe(false);
      expect(isNonEmptyString(" ")).toBe(false);
      expect(isNonEmptyString(null)).toBe(false);
    });

    it("isRecord", () => {
      expect(isRecord({})).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
    });
  });
});
