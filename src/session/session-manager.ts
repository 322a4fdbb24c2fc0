/**
 * Credential lifecycle for the signed-in account.
 *
 * The session is a single state value that is only ever replaced whole:
 *
 *   unauthenticated ──load/signIn──▶ valid ──near expiry──▶ expired
 *         ▲                            ▲                      │
 *         │                            └──── refresh ok ──────┤
 *         └──────────── refresh failed / signOut ◀────────────┘
 *
 * While a refresh is running the state is `refreshing` and carries the
 * in-flight promise, so concurrent callers wait on the same refresh.
 */

import type { CheckinCoreConfig } from "../config.js";
import {
  MissingCredentialsError,
  NotAuthenticatedError,
} from "../errors.js";
import {
  type Credential,
  freezeCredential,
  hasRequiredFields,
  isNearExpiry,
} from "../models/credentials.js";
import { consoleLogger, type Logger } from "../utils/logger.js";
import type { CredentialStore } from "./credential-store.js";
import type { SessionApi } from "./session-api.js";

export type SessionState =
  | { status: "unauthenticated" }
  | { status: "valid"; credential: Credential }
  | { status: "expired"; credential: Credential }
  | {
    status: "refreshing";
    credential: Credential;
    refresh: Promise<Credential>;
  };

export type SessionStatus = SessionState["status"];

export type SessionListener = (state: SessionState) => void;

/** What record writers need from a session. */
export interface CredentialProvider {
  getValidCredentials(): Promise<Credential>;
}

export interface SessionManagerOptions {
  store: CredentialStore;
  api: SessionApi;
  config: Pick<
    CheckinCoreConfig,
    "refreshThresholdSeconds" | "resumeValidationIntervalSeconds"
  >;
  logger?: Logger;
  clock?: () => Date;
}

const UNAUTHENTICATED: SessionState = { status: "unauthenticated" };

export class SessionManager implements CredentialProvider {
  private current: SessionState = UNAUTHENTICATED;
  // Bumped on sign-in/sign-out so late refresh results are discarded
  private epoch = 0;
  private lastValidatedAt: Date | null = null;
  // Store writes run one at a time, in the order they were issued
  private storeWrites: Promise<void> = Promise.resolve();
  private readonly listeners = new Set<SessionListener>();
  private readonly store: CredentialStore;
  private readonly api: SessionApi;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: SessionManagerOptions) {
    this.store = options.store;
    this.api = options.api;
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): SessionState {
    return this.current;
  }

  get isAuthenticated(): boolean {
    return this.current.status !== "unauthenticated";
  }

  get handle(): string | undefined {
    return this.current.status === "unauthenticated"
      ? undefined
      : this.current.credential.handle;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async loadStoredCredentials(): Promise<SessionStatus> {
    const epoch = this.epoch;
    let stored: Credential | null;
    try {
      stored = await this.store.load();
    } catch (error) {
      this.logger.error("❌ [Session] Failed to load stored credentials", error);
      if (epoch === this.epoch) {
        this.setState(UNAUTHENTICATED);
      }
      return this.current.status;
    }
    if (epoch !== this.epoch) {
      return this.current.status;
    }

    if (!stored || !hasRequiredFields(stored)) {
      this.logger.info("[Session] No stored credentials");
      this.setState(UNAUTHENTICATED);
      return this.current.status;
    }

    const credential = freezeCredential(stored);
    if (this.nearExpiry(credential)) {
      this.logger.info(`⏰ [Session] Stored token for @${credential.handle} is expiring`);
      this.setState({ status: "expired", credential });
    } else {
      this.logger.info(`✅ [Session] Loaded credentials for @${credential.handle}`);
      this.setState({ status: "valid", credential });
    }
    return this.current.status;
  }

  async signIn(credential: Credential): Promise<void> {
    if (!hasRequiredFields(credential)) {
      throw new MissingCredentialsError("Credential is missing handle, DID or access token");
    }
    const frozen = freezeCredential(credential);
    const epoch = ++this.epoch;
    try {
      await this.writeStore(() => this.store.save(frozen));
    } catch (error) {
      // The previous session was invalidated by the epoch bump
      if (epoch === this.epoch) {
        this.setState(UNAUTHENTICATED);
      }
      throw error;
    }
    if (epoch !== this.epoch) {
      throw new NotAuthenticatedError("Session changed during sign-in");
    }
    this.lastValidatedAt = this.clock();
    this.logger.info(`✅ [Session] Signed in as @${frozen.handle}`);
    this.setState({ status: "valid", credential: frozen });
  }

  async getValidCredentials(): Promise<Credential> {
    const state = this.current;
    switch (state.status) {
      case "unauthenticated":
        throw new NotAuthenticatedError();
      case "refreshing":
        return state.refresh;
      case "expired":
        return this.startRefresh(state.credential);
      case "valid":
        if (!this.nearExpiry(state.credential)) {
          return state.credential;
        }
        this.logger.info(`⏰ [Session] Token for @${state.credential.handle} is expiring`);
        this.setState({ status: "expired", credential: state.credential });
        return this.startRefresh(state.credential);
    }
  }

  /** Server-side check on app launch; never throws. */
  validateOnLaunch(): Promise<SessionStatus> {
    return this.validate("launch");
  }

  /**
   * Server-side check when the app returns to the foreground. Skipped
   * unless the token is near expiry or the last check is stale.
   */
  async validateOnResume(): Promise<SessionStatus> {
    const state = this.current;
    if (state.status === "unauthenticated") {
      return state.status;
    }

    const intervalMs = this.options.config.resumeValidationIntervalSeconds * 1000;
    const stale = this.lastValidatedAt === null ||
      this.clock().getTime() - this.lastValidatedAt.getTime() >= intervalMs;

    if (!stale && !this.nearExpiry(state.credential)) {
      this.logger.debug("[Session] Skipping resume validation, recently validated");
      return state.status;
    }
    return this.validate("resume");
  }

  async signOut(): Promise<void> {
    this.epoch++;
    this.lastValidatedAt = null;
    this.setState(UNAUTHENTICATED);
    this.logger.info("👋 [Session] Signed out");
    await this.clearStore();
  }

  private async validate(trigger: "launch" | "resume"): Promise<SessionStatus> {
    let state = this.current;
    if (state.status === "refreshing") {
      try {
        await state.refresh;
      } catch (error) {
        this.logger.warn(`[Session] Refresh before ${trigger} validation failed`, error);
      }
      state = this.current;
    }
    if (state.status === "unauthenticated") {
      return state.status;
    }

    const epoch = this.epoch;
    const credential = state.credential;
    try {
      const validated = await this.api.validateSession(credential);
      if (epoch !== this.epoch) {
        return this.current.status;
      }
      this.lastValidatedAt = this.clock();
      if (validated !== credential) {
        await this.persist(validated);
        if (epoch !== this.epoch) {
          return this.current.status;
        }
      }
      this.setState({ status: "valid", credential: freezeCredential(validated) });
      this.logger.info(`✅ [Session] Session validated on ${trigger}`);
    } catch (error) {
      if (!(error instanceof NotAuthenticatedError)) {
        this.logger.warn(`⚠️ [Session] Could not validate session on ${trigger}`, error);
        return this.current.status;
      }
      if (epoch !== this.epoch) {
        return this.current.status;
      }

      // Rejected server-side: one refresh attempt, then sign out
      this.logger.warn(`[Session] Session rejected on ${trigger}, attempting refresh`);
      this.setState({ status: "expired", credential });
      try {
        await this.startRefresh(credential);
        this.lastValidatedAt = this.clock();
      } catch (refreshError) {
        this.logger.warn("[Session] Refresh fallback failed", refreshError);
      }
    }
    return this.current.status;
  }

  private startRefresh(credential: Credential): Promise<Credential> {
    const refresh = this.refresh(credential, this.epoch);
    this.setState({ status: "refreshing", credential, refresh });
    return refresh;
  }

  private async refresh(credential: Credential, epoch: number): Promise<Credential> {
    let refreshed: Credential;
    try {
      if (!credential.refreshToken) {
        throw new MissingCredentialsError("No refresh token available");
      }
      refreshed = freezeCredential(await this.api.refreshTokens(credential));
    } catch (error) {
      this.logger.error(`❌ [Session] Token refresh failed for @${credential.handle}`, error);
      if (epoch === this.epoch) {
        this.epoch++;
        this.setState(UNAUTHENTICATED);
        await this.clearStore();
      }
      throw new NotAuthenticatedError("Session expired, please sign in again", {
        cause: error,
      });
    }

    if (epoch !== this.epoch) {
      throw new NotAuthenticatedError("Session ended during token refresh");
    }

    await this.persist(refreshed);
    if (epoch !== this.epoch) {
      throw new NotAuthenticatedError("Session ended during token refresh");
    }
    this.logger.info(`✅ [Session] Tokens refreshed for @${refreshed.handle}`);
    this.setState({ status: "valid", credential: refreshed });
    return refreshed;
  }

  // The refreshed tokens stay usable in memory even when saving fails
  private async persist(credential: Credential): Promise<void> {
    try {
      await this.writeStore(() => this.store.save(credential));
    } catch (error) {
      this.logger.error("❌ [Session] Failed to persist refreshed credentials", error);
    }
  }

  private async clearStore(): Promise<void> {
    try {
      await this.writeStore(() => this.store.clear());
    } catch (error) {
      this.logger.error("❌ [Session] Failed to clear stored credentials", error);
    }
  }

  // A clear issued after a pending save lands after it
  private writeStore(write: () => Promise<void>): Promise<void> {
    const next = this.storeWrites.then(write);
    this.storeWrites = next.catch((error: unknown) => {
      this.logger.debug("[Session] Store write failed", error);
    });
    return next;
  }

  private nearExpiry(credential: Credential): boolean {
    return isNearExpiry(
      credential,
      this.options.config.refreshThresholdSeconds,
      this.clock(),
    );
  }

  private setState(next: SessionState): void {
    this.current = next;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.error("[Session] State listener threw", error);
      }
    }
  }
}
