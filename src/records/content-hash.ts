// Content hashes (CIDs) for repository records and StrongRef validation.
// Records hash as CIDv1, dag-cbor codec, sha2-256 over the canonical encoding.
import * as dagCbor from "@ipld/dag-cbor";
import { AtUri } from "@atproto/syntax";
import { CID } from "multiformats/cid";
import { sha256 } from "multiformats/hashes/sha2";
import { IntegrityError } from "../errors.js";
import type { StrongRef } from "../models/records.js";

/**
 * Converts a JSON record value into the IPLD data model: `{ $link }` becomes
 * a CID, `{ $bytes }` becomes bytes, and undefined properties are dropped
 * (dag-cbor cannot encode them).
 */
export function jsonToIpld(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(jsonToIpld);
  }

  if (value === null || typeof value !== "object") {
    return value;
  }

  const entries = Object.entries(value).filter(([, v]) => v !== undefined);

  if (entries.length === 1) {
    const [key, inner] = entries[0];
    if (key === "$link" && typeof inner === "string") {
      return CID.parse(inner);
    }
    if (key === "$bytes" && typeof inner === "string") {
      return new Uint8Array(Buffer.from(inner, "base64"));
    }
  }

  return Object.fromEntries(entries.map(([k, v]) => [k, jsonToIpld(v)]));
}

export function encodeRecord(value: unknown): Uint8Array {
  return dagCbor.encode(jsonToIpld(value));
}

export async function cidForRecord(value: unknown): Promise<string> {
  const digest = await sha256.digest(encodeRecord(value));
  return CID.create(1, dagCbor.code, digest).toString();
}

export function isValidCid(cid: string): boolean {
  try {
    CID.parse(cid);
    return true;
  } catch {
    return false;
  }
}

export interface RecordLocation {
  repo: string;
  collection: string;
  rkey: string;
}

export function parseRecordUri(uri: string): RecordLocation | null {
  try {
    const parsed = new AtUri(uri);
    if (!parsed.collection || !parsed.rkey) {
      return null;
    }
    return { repo: parsed.host, collection: parsed.collection, rkey: parsed.rkey };
  } catch {
    return null;
  }
}

/**
 * Checks a StrongRef returned by the PDS: the uri must name a record in the
 * expected collection (and repo, when given) and the cid must parse.
 */
export function assertStrongRef(
  value: unknown,
  expected: { collection: string; repo?: string },
): { ref: StrongRef; location: RecordLocation } {
  if (value === null || typeof value !== "object") {
    throw new IntegrityError("StrongRef is not an object");
  }

  const uri = "uri" in value ? value.uri : undefined;
  const cid = "cid" in value ? value.cid : undefined;
  if (typeof uri !== "string" || typeof cid !== "string") {
    throw new IntegrityError("StrongRef requires string uri and cid");
  }

  const location = parseRecordUri(uri);
  if (!location) {
    throw new IntegrityError(`Invalid AT URI in StrongRef: ${uri}`);
  }
  if (location.collection !== expected.collection) {
    throw new IntegrityError(
      `StrongRef points at ${location.collection}, expected ${expected.collection}`,
    );
  }
  if (expected.repo && location.repo !== expected.repo) {
    throw new IntegrityError(
      `StrongRef points at repo ${location.repo}, expected ${expected.repo}`,
    );
  }
  if (!isValidCid(cid)) {
    throw new IntegrityError(`Invalid CID in StrongRef: ${cid}`);
  }

  return { ref: { uri, cid }, location };
}
