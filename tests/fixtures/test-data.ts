// Test fixtures for check-in core tests
import type { CheckinCoreConfig } from "../../src/config.js";
import type { Credential } from "../../src/models/credentials.js";
import type { Venue } from "../../src/records/venue.js";

export const TEST_DID = "did:plc:testuser123";
export const OTHER_DID = "did:plc:otheruser456";

// Fixed clock shared by fixtures: 2024-07-04T10:30:00Z
export const NOW = new Date("2024-07-04T10:30:00.000Z");

export function inSeconds(seconds: number, from: Date = NOW): string {
  return new Date(from.getTime() + seconds * 1000).toISOString();
}

export function testCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    handle: "alice.bsky.social",
    accountId: TEST_DID,
    accessToken: "test-access-token",
    refreshToken: "test-refresh-token",
    sessionId: "test-session",
    pdsUrl: "https://pds.test",
    expiresAt: inSeconds(2 * 60 * 60),
    ...overrides,
  };
}

export const testConfig: CheckinCoreConfig = {
  pdsUrl: "https://pds.test",
  authBaseUrl: "https://auth.test",
  publicApiUrl: "https://pds.test",
  plcDirectoryUrl: "https://plc.test",
  defaultCheckinMessage: "Checked in here!",
  refreshThresholdSeconds: 300,
  resumeValidationIntervalSeconds: 300,
  tokenLifetimeSeconds: 4 * 60 * 60,
  requestTimeoutMs: 5_000,
  userAgent: "CheckinCoreTests/1.0",
  verifyContentHashLocally: true,
  crossPostByDefault: false,
};

export const coffeeShop: Venue = {
  name: "Joe's Coffee Shop",
  latitude: 40.7128,
  longitude: -74.006,
  elementType: "node",
  elementId: 123456,
  tags: {
    amenity: "cafe",
    "addr:street": "Broadway",
    "addr:housenumber": "123",
    "addr:city": "New York",
    "addr:state": "NY",
    "addr:country": "US",
    "addr:postcode": "10001",
  },
  categoryGroup: "food_and_drink",
  icon: "☕",
};

export const climbingGym: Venue = {
  name: "Boulder Hall",
  latitude: "52.3676",
  longitude: "4.9041",
  elementType: "way",
  elementId: "987654",
  address: { locality: "Amsterdam", country: "NL" },
  category: "climbing",
  categoryGroup: "sports",
  icon: "🧗",
};
