import { ValidationError } from "./errors.js";
import type { LocationConfig } from "./types.js";

export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim().length === 0) {
    return false;
  }
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function validateCoordinates(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ValidationError(
      `Latitude must be between -90 and 90, got ${latitude}`
    );
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ValidationError(
      `Longitude must be between -180 and 180, got ${longitude}`
    );
  }
}

/** Throws `ValidationError` for any field that violates the location contract. */
export function validateLocation(location: LocationConfig): void {
  if (location.name.trim().length === 0) {
    throw new ValidationError("Location name must not be empty");
  }
  validateCoordinates(location.latitude, location.longitude);
  if (!isValidTimeZone(location.timezone)) {
    throw new ValidationError(`Unknown timezone "${location.timezone}"`);
  }
}

export function createLocation(fields: LocationConfig): LocationConfig {
  const location: LocationConfig = {
    name: fields.name.trim(),
    latitude: fields.latitude,
    longitude: fields.longitude,
    timezone: fields.timezone.trim(),
  };
  validateLocation(location);
  return Object.freeze(location);
}
