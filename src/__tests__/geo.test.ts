import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors.js";
import { assertCoordinate, durationHours, EARTH_RADIUS_KM, greatCircleDistanceKm } from "../geo.js";

const mexicoCity = { lat: 19.4326, lon: -99.1332 };
const cancun = { lat: 21.0417, lon: -86.8515 };

describe("greatCircleDistanceKm()", () => {
  it("measures Mexico City to Cancún", () => {
    expect(greatCircleDistanceKm(mexicoCity, cancun)).toBeCloseTo(1293.44, 2);
  });

  it("is symmetric", () => {
    expect(greatCircleDistanceKm(cancun, mexicoCity)).toBeCloseTo(greatCircleDistanceKm(mexicoCity, cancun), 9);
  });

  it("returns a quarter circumference along the equator", () => {
    expect(greatCircleDistanceKm({ lat: 0, lon: 0 }, { lat: 0, lon: 90 })).toBeCloseTo((Math.PI / 2) * EARTH_RADIUS_KM, 6);
  });

  it("clamps the arccos argument for antipodal points", () => {
    const d = greatCircleDistanceKm({ lat: 0, lon: 0 }, { lat: 0, lon: 180 });
    expect(Number.isNaN(d)).toBe(false);
    expect(d).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
  });

  it("returns exactly 0 from a point to itself", () => {
    const points = [
      { lat: 90, lon: 0 },
      { lat: -90, lon: 180 },
      { lat: 0, lon: 180 },
      { lat: 0, lon: -180 },
      { lat: 45.5, lon: -179.9 },
      mexicoCity,
    ];
    for (const p of points) {
      expect(greatCircleDistanceKm(p, { ...p })).toBe(0);
    }
  });
});

describe("durationHours()", () => {
  it("converts whole and half hours", () => {
    expect(durationHours(3600)).toBe(1);
    expect(durationHours(5400)).toBe(1.5);
  });

  it("rounds to two decimals", () => {
    expect(durationHours(1000)).toBe(0.28);
    expect(durationHours(900)).toBe(0.25);
    expect(durationHours(86399)).toBe(24);
  });
});

describe("assertCoordinate()", () => {
  it("returns valid coordinates unchanged", () => {
    expect(assertCoordinate({ lat: -90, lon: 180 })).toEqual({ lat: -90, lon: 180 });
  });

  it("rejects latitudes outside [-90, 90]", () => {
    expect(() => assertCoordinate({ lat: 90.5, lon: 0 }, 7)).toThrow(ValidationError);
  });

  it("rejects longitudes outside [-180, 180]", () => {
    expect(() => assertCoordinate({ lat: 0, lon: -180.1 })).toThrow("Longitude -180.1 outside [-180, 180]");
  });

  it("rejects missing and non-numeric values", () => {
    expect(() => assertCoordinate({ lat: null, lon: 0 })).toThrow("Latitude null outside [-90, 90]");
    expect(() => assertCoordinate({ lat: 10, lon: "12" })).toThrow(ValidationError);
    expect(() => assertCoordinate({ lat: Number.NaN, lon: 0 })).toThrow(ValidationError);
  });

  it("carries the row id", () => {
    let caught: unknown;
    try {
      assertCoordinate({ lat: 100, lon: 0 }, 42);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ name: "ValidationError", rowId: 42 });
  });
});
