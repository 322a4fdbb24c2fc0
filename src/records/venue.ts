// Venue input and its mapping onto address and coordinate records
import { InvalidFormatError } from "../errors.js";
import {
  ADDRESS_COLLECTION,
  type AddressFields,
  type AddressRecord,
  type GeoCoordinates,
} from "../models/records.js";

export type OsmElementType = "node" | "way" | "relation";

/** A place picked by the user, shaped after OpenStreetMap elements. */
export interface Venue {
  name: string;
  latitude: number | string;
  longitude: number | string;
  elementType?: OsmElementType;
  elementId?: number | string;
  /** Explicit link for the venue; otherwise derived from the OSM element */
  url?: string;
  address?: AddressFields;
  tags?: Record<string, string>;
  category?: string;
  categoryGroup?: string;
  icon?: string;
}

export const DEFAULT_VENUE_ICON = "📍";

export function venueUrlFor(venue: Venue): string {
  if (venue.url) {
    return venue.url;
  }
  if (venue.elementType && venue.elementId !== undefined) {
    return `https://www.openstreetmap.org/${venue.elementType}/${venue.elementId}`;
  }
  const { latitude, longitude } = buildCoordinates(venue);
  return `https://www.openstreetmap.org/?mlat=${latitude}&mlon=${longitude}`;
}

export function venueIconFor(venue: Venue): string {
  return venue.icon || DEFAULT_VENUE_ICON;
}

export function venueCategoryFor(venue: Venue): string | undefined {
  const tags = venue.tags ?? {};
  return venue.category || tags["amenity"] || tags["shop"] ||
    tags["leisure"] || tags["tourism"];
}

/**
 * Validates coordinates and renders them as decimal strings.
 * Throws InvalidFormatError for NaN or out-of-range values.
 */
export function buildCoordinates(venue: Venue): GeoCoordinates {
  const latitude = typeof venue.latitude === "string"
    ? parseFloat(venue.latitude)
    : venue.latitude;
  const longitude = typeof venue.longitude === "string"
    ? parseFloat(venue.longitude)
    : venue.longitude;

  if (
    !Number.isFinite(latitude) || !Number.isFinite(longitude) ||
    Math.abs(latitude) > 90 || Math.abs(longitude) > 180
  ) {
    throw new InvalidFormatError(
      `Invalid coordinates: ${venue.latitude}, ${venue.longitude}`,
    );
  }

  return { latitude: toDecimalString(latitude), longitude: toDecimalString(longitude) };
}

// Number#toString switches to exponent form below 1e-6
function toDecimalString(value: number): string {
  const text = value.toString();
  const match = /^(-?)(\d)(?:\.(\d+))?e-(\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, sign, lead, fraction = "", exponent] = match;
  return `${sign}0.${"0".repeat(Number(exponent) - 1)}${lead}${fraction}`;
}

/**
 * Builds the address record from explicit address fields, falling back to
 * OSM `addr:*` tags. A locality equal to the venue name is dropped.
 */
export function buildAddressRecord(venue: Venue): AddressRecord {
  const tags = venue.tags ?? {};
  const explicit = venue.address ?? {};

  const fields: AddressFields = {
    name: explicit.name || venue.name || undefined,
    street: explicit.street || streetFromTags(tags),
    locality: explicit.locality || tags["addr:city"] || tags["addr:locality"],
    region: explicit.region || tags["addr:state"] || tags["addr:region"],
    country: explicit.country || tags["addr:country"] ||
      tags["addr:country_code"],
    postalCode: explicit.postalCode || tags["addr:postcode"],
  };

  if (fields.locality && fields.locality === fields.name) {
    fields.locality = undefined;
  }

  const record: AddressRecord = { $type: ADDRESS_COLLECTION };
  for (const key of ADDRESS_KEYS) {
    const value = fields[key]?.trim();
    if (value) {
      record[key] = value;
    }
  }
  return record;
}

const ADDRESS_KEYS = [
  "name",
  "street",
  "locality",
  "region",
  "country",
  "postalCode",
] as const satisfies ReadonlyArray<keyof AddressFields>;

function streetFromTags(tags: Record<string, string>): string | undefined {
  const street = tags["addr:street"];
  const houseNumber = tags["addr:housenumber"];
  if (street && houseNumber) {
    return `${street} ${houseNumber}`;
  }
  return street;
}
