import { describe, test, expect } from "vitest";
import { ValidationError } from "../errors.js";
import {
  INVALID_COORDINATES_MESSAGE,
  INVALID_RADIUS_MESSAGE,
  parseCoordinates,
  parseQuery,
  runQuery,
} from "../query.js";
import { createRecordStore } from "../records.js";
import { makeBat, makeHerp } from "./test-utils.js";

describe("parseCoordinates", () => {
  test("lat, lng with surrounding spaces", () => {
    expect(parseCoordinates(" -40.298 , 175.754 ")).toEqual({ lat: -40.298, lng: 175.754 });
  });

  test.each([
    "",
    "-40.298",
    "-40.298, 175.754, 3",
    "abc, 175",
    "-40.298,",
    ", 175",
    "91, 0",
    "0, -180.5",
    "0x1A, 0",
    "0, 0b1",
    "1_0, 5",
    "1e1, 5",
    "Infinity, 0",
    "-40.298, 175.754abc",
  ])("rejects %j", (text) => {
    expect(parseCoordinates(text)).toBeUndefined();
  });

  test("accepts signed and fraction-only decimals", () => {
    expect(parseCoordinates("+40.5, -.25")).toEqual({ lat: 40.5, lng: -0.25 });
    expect(parseCoordinates("12., 3")).toEqual({ lat: 12, lng: 3 });
  });

  test("accepts the boundary values", () => {
    expect(parseCoordinates("-90, 180")).toEqual({ lat: -90, lng: 180 });
  });
});

describe("parseQuery", () => {
  test("valid input", () => {
    expect(parseQuery({ coords: "-40.298, 175.754", radius: 25 })).toEqual({
      origin: { lat: -40.298, lng: 175.754 },
      radiusKm: 25,
    });
  });

  test("radius may be submitted as text", () => {
    expect(parseQuery({ coords: "0, 0", radius: " 7 " }).radiusKm).toBe(7);
  });

  test("invalid coordinates keep the submitted values", () => {
    let caught: unknown;
    try {
      parseQuery({ coords: "here", radius: 5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ message: INVALID_COORDINATES_MESSAGE, coords: "here", radius: "5" });
  });

  test.each([0, 51, 2.5, Number.NaN])("radius %s is rejected", (radius) => {
    expect(() => parseQuery({ coords: "0, 0", radius })).toThrow(INVALID_RADIUS_MESSAGE);
  });

  test("radius text that is not a number is rejected", () => {
    expect(() => parseQuery({ coords: "0, 0", radius: "ten" })).toThrow(INVALID_RADIUS_MESSAGE);
  });

  test("radius bounds are inclusive", () => {
    expect(parseQuery({ coords: "0, 0", radius: 1 }).radiusKm).toBe(1);
    expect(parseQuery({ coords: "0, 0", radius: 50 }).radiusKm).toBe(50);
  });
});

describe("runQuery", () => {
  test("summarizes both datasets for the same query", () => {
    const store = createRecordStore({ bats: [makeBat()], herps: [makeHerp()], threatStatus: [] });
    const result = runQuery(store, { origin: { lat: 0, lng: 0 }, radiusKm: 3 });
    expect(result.bats.radiusKm).toBe(3);
    expect(result.bats.counts.totalEvents).toBe(1);
    expect(result.herps.kind).toBe("found");
    expect(result.herps.uniqueSpeciesCount).toBe(1);
  });
});
