import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import {
  createLocation,
  isValidTimeZone,
  validateCoordinates,
} from "../src/location.js";

describe("createLocation", () => {
  it("returns a frozen, trimmed location", () => {
    const location = createLocation({
      name: "  Medellín ",
      latitude: 6.244,
      longitude: -75.581,
      timezone: "America/Bogota",
    });

    expect(location).toEqual({
      name: "Medellín",
      latitude: 6.244,
      longitude: -75.581,
      timezone: "America/Bogota",
    });
    expect(Object.isFrozen(location)).toBe(true);
  });

  it("accepts the coordinate bounds themselves", () => {
    expect(() => validateCoordinates(90, 180)).not.toThrow();
    expect(() => validateCoordinates(-90, -180)).not.toThrow();
  });

  it.each([
    [90.0001, 0, "Latitude must be between -90 and 90, got 90.0001"],
    [-91, 0, "Latitude must be between -90 and 90, got -91"],
    [0, 180.5, "Longitude must be between -180 and 180, got 180.5"],
    [0, Number.NaN, "Longitude must be between -180 and 180, got NaN"],
  ])("rejects lat=%s lon=%s", (latitude, longitude, message) => {
    expect(() =>
      createLocation({ name: "Somewhere", latitude, longitude, timezone: "UTC" })
    ).toThrow(new ValidationError(message));
  });

  it("rejects an empty name and an unknown timezone", () => {
    expect(() =>
      createLocation({ name: " ", latitude: 0, longitude: 0, timezone: "UTC" })
    ).toThrow(ValidationError);
    expect(() =>
      createLocation({
        name: "Nowhere",
        latitude: 0,
        longitude: 0,
        timezone: "Mars/Olympus_Mons",
      })
    ).toThrow('Unknown timezone "Mars/Olympus_Mons"');
  });
});

describe("isValidTimeZone", () => {
  it("recognizes IANA identifiers", () => {
    expect(isValidTimeZone("Europe/London")).toBe(true);
    expect(isValidTimeZone("UTC")).toBe(true);
    expect(isValidTimeZone("")).toBe(false);
    expect(isValidTimeZone("Not/AZone")).toBe(false);
  });
});
