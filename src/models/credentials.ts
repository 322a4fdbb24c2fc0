// Authentication credentials for the author's account

export interface Credential {
  /** Handle, e.g. "alice.bsky.social" */
  readonly handle: string;
  /** Account DID; also the repo id for record writes */
  readonly accountId: string;
  readonly accessToken: string;
  readonly refreshToken?: string;
  /** Backend session id used by cookie-authenticated endpoints */
  readonly sessionId?: string;
  /** PDS hosting the account's repository, when known */
  readonly pdsUrl?: string;
  /** ISO 8601 expiry of the access token */
  readonly expiresAt: string;
}

/** True when the token expires within `thresholdSeconds` of `now`. */
export function isNearExpiry(
  credential: Credential,
  thresholdSeconds: number,
  now: Date = new Date(),
): boolean {
  const expiresAt = Date.parse(credential.expiresAt);
  if (Number.isNaN(expiresAt)) {
    return true;
  }
  return expiresAt - now.getTime() < thresholdSeconds * 1000;
}

export function hasRequiredFields(credential: Credential): boolean {
  return credential.handle.length > 0 &&
    credential.accessToken.length > 0 &&
    credential.accountId.length > 0;
}

export function freezeCredential(credential: Credential): Credential {
  return Object.freeze({ ...credential });
}
