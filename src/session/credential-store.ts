// Credential store interface for the signed-in account
// Enables dependency injection and easy testing; platforms plug in a keychain

import { type Credential, freezeCredential } from "../models/credentials.js";

export interface CredentialStore {
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
  clear(): Promise<void>;
}

export class InMemoryCredentialStore implements CredentialStore {
  private credential: Credential | null;

  constructor(initial: Credential | null = null) {
    this.credential = initial ? freezeCredential(initial) : null;
  }

  load(): Promise<Credential | null> {
    return Promise.resolve(this.credential);
  }

  save(credential: Credential): Promise<void> {
    this.credential = freezeCredential(credential);
    return Promise.resolve();
  }

  clear(): Promise<void> {
    this.credential = null;
    return Promise.resolve();
  }

  // Helper methods for testing
  get current(): Credential | null {
    return this.credential;
  }
}
