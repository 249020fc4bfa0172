import { describe, expect, it } from "vitest";
import { numberOrNull, roundTo, stringOrNull } from "../guards.js";

describe("roundTo", () => {
  it("rounds half away from zero", () => {
    expect(roundTo(0.125, 2)).toBe(0.13);
    expect(roundTo(-1.5, 0)).toBe(-2);
    expect(roundTo(1293.4400545, 2)).toBe(1293.44);
  });

  it("gives the same result when applied twice", () => {
    const once = roundTo(2 / 3, 2);
    expect(roundTo(once, 2)).toBe(once);
  });
});

describe("numberOrNull", () => {
  it("keeps finite numbers only", () => {
    expect(numberOrNull(0)).toBe(0);
    expect(numberOrNull(Number.NaN)).toBeNull();
    expect(numberOrNull("12")).toBeNull();
    expect(numberOrNull(null)).toBeNull();
  });
});

describe("stringOrNull", () => {
  it("trims and drops blank strings", () => {
    expect(stringOrNull(" AMX123  ")).toBe("AMX123");
    expect(stringOrNull("   ")).toBeNull();
    expect(stringOrNull(42)).toBeNull();
  });
});
