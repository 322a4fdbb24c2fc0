/**
 * Decodes repository record values by their `$type`.
 *
 * Known schemas (address, check-in, post) are validated with zod and come
 * back as typed records. Anything else is kept as opaque DAG-CBOR bytes so
 * callers can still hash or forward it without guessing at its shape.
 */

import { z } from "zod";
import { InvalidFormatError } from "../errors.js";
import {
  LINK_FEATURE,
  MENTION_FEATURE,
  TAG_FEATURE,
} from "../models/facets.js";
import {
  ADDRESS_COLLECTION,
  type AddressRecord,
  CHECKIN_COLLECTION,
  type CheckinRecord,
  POST_COLLECTION,
  type PostRecord,
} from "../models/records.js";
import { encodeRecord } from "./content-hash.js";

const decimalString = z.string().regex(
  /^-?\d+(\.\d+)?$/,
  "must be a decimal string",
);

export const strongRefSchema = z.object({
  uri: z.string().startsWith("at://"),
  cid: z.string().min(1),
});

export const addressRecordSchema = z.object({
  $type: z.literal(ADDRESS_COLLECTION),
  name: z.string().optional(),
  street: z.string().optional(),
  locality: z.string().optional(),
  region: z.string().optional(),
  country: z.string().optional(),
  postalCode: z.string().optional(),
});

export const checkinRecordSchema = z.object({
  $type: z.literal(CHECKIN_COLLECTION),
  text: z.string().max(3000),
  createdAt: z.string().datetime({ offset: true }),
  addressRef: strongRefSchema,
  coordinates: z.object({
    latitude: decimalString,
    longitude: decimalString,
  }),
  category: z.string().optional(),
  categoryGroup: z.string().optional(),
  categoryIcon: z.string().optional(),
});

const byteSliceSchema = z.object({
  byteStart: z.number().int().nonnegative(),
  byteEnd: z.number().int().nonnegative(),
});

const postFacetFeatureSchema = z.discriminatedUnion("$type", [
  z.object({ $type: z.literal(LINK_FEATURE), uri: z.string() }),
  z.object({ $type: z.literal(MENTION_FEATURE), did: z.string() }),
  z.object({ $type: z.literal(TAG_FEATURE), tag: z.string() }),
]);

export const postRecordSchema = z.object({
  $type: z.literal(POST_COLLECTION),
  text: z.string(),
  createdAt: z.string(),
  facets: z.array(z.object({
    index: byteSliceSchema,
    features: z.array(postFacetFeatureSchema),
  })).optional(),
  langs: z.array(z.string()).optional(),
});

const knownRecordSchema = z.discriminatedUnion("$type", [
  addressRecordSchema,
  checkinRecordSchema,
  postRecordSchema,
]);

const KNOWN_TYPES: ReadonlySet<string> = new Set([
  ADDRESS_COLLECTION,
  CHECKIN_COLLECTION,
  POST_COLLECTION,
]);

export type DecodedRecord =
  | { kind: "address"; record: AddressRecord }
  | { kind: "checkin"; record: CheckinRecord }
  | { kind: "post"; record: PostRecord }
  | { kind: "unknown"; type?: string; bytes: Uint8Array };

export function decodeRecord(value: unknown): DecodedRecord {
  const type = readType(value);

  if (type === undefined || !KNOWN_TYPES.has(type)) {
    return { kind: "unknown", type, bytes: encodeOpaque(value) };
  }

  const parsed = knownRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidFormatError(
      `Invalid ${type} record: ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }

  const record = parsed.data;
  switch (record.$type) {
    case ADDRESS_COLLECTION:
      return { kind: "address", record };
    case CHECKIN_COLLECTION:
      return { kind: "checkin", record };
    case POST_COLLECTION:
      return { kind: "post", record };
  }
}

export function decodeAddressRecord(value: unknown): AddressRecord {
  const decoded = decodeRecord(value);
  if (decoded.kind !== "address") {
    throw new InvalidFormatError(
      `Expected ${ADDRESS_COLLECTION}, got ${describe(decoded)}`,
    );
  }
  return decoded.record;
}

export function decodeCheckinRecord(value: unknown): CheckinRecord {
  const decoded = decodeRecord(value);
  if (decoded.kind !== "checkin") {
    throw new InvalidFormatError(
      `Expected ${CHECKIN_COLLECTION}, got ${describe(decoded)}`,
    );
  }
  return decoded.record;
}

function encodeOpaque(value: unknown): Uint8Array {
  try {
    return encodeRecord(value);
  } catch (error) {
    throw new InvalidFormatError("Record value cannot be encoded as DAG-CBOR", {
      cause: error,
    });
  }
}

function readType(value: unknown): string | undefined {
  if (value !== null && typeof value === "object" && "$type" in value) {
    return typeof value.$type === "string" ? value.$type : undefined;
  }
  return undefined;
}

function describe(decoded: DecodedRecord): string {
  return decoded.kind === "unknown"
    ? decoded.type ?? "untyped record"
    : decoded.record.$type;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
