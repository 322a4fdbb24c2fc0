// Scripted SessionApi for SessionManager tests
import type { Credential } from "../../src/models/credentials.js";
import type { SessionApi } from "../../src/session/session-api.js";

type Step = (credential: Credential) => Promise<Credential>;

export class FakeSessionApi implements SessionApi {
  validateCalls = 0;
  refreshCalls = 0;
  validate: Step = (credential) => Promise.resolve(credential);
  refresh: Step = () => Promise.reject(new Error("refresh not scripted"));

  validateSession(credential: Credential): Promise<Credential> {
    this.validateCalls++;
    return this.validate(credential);
  }

  refreshTokens(credential: Credential): Promise<Credential> {
    this.refreshCalls++;
    return this.refresh(credential);
  }
}
