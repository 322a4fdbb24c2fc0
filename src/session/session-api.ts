/**
 * Remote session calls against the app backend's mobile auth endpoints.
 *
 * - `POST /api/auth/validate-mobile-session` confirms a session is still
 *   accepted and may hand back refreshed tokens.
 * - `POST /api/auth/refresh-mobile-token` exchanges the refresh token.
 *
 * Rejections surface as NotAuthenticatedError so SessionManager can run
 * its refresh-then-sign-out chain; everything else keeps its own type.
 */

import { decodeJwt } from "jose";
import { z } from "zod";
import {
  InvalidFormatError,
  MissingCredentialsError,
  NetworkError,
  NotAuthenticatedError,
  ServerError,
} from "../errors.js";
import { type Credential, freezeCredential } from "../models/credentials.js";
import type { FetchLike } from "../records/pds-client.js";
import { consoleLogger, type Logger } from "../utils/logger.js";

export interface SessionApi {
  /** Returns the credential to keep using, possibly with refreshed tokens. */
  validateSession(credential: Credential): Promise<Credential>;
  refreshTokens(credential: Credential): Promise<Credential>;
}

const tokensSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
});

const validateResponseSchema = z.object({
  valid: z.boolean(),
  refreshed: z.boolean().optional(),
  tokens: tokensSchema.optional(),
  error: z.string().optional(),
});

const refreshResponseSchema = z.object({
  success: z.boolean(),
  tokens: tokensSchema.optional(),
  error: z.string().optional(),
});

type Tokens = z.infer<typeof tokensSchema>;

export interface HttpSessionApiOptions {
  authBaseUrl: string;
  tokenLifetimeSeconds: number;
  userAgent: string;
  requestTimeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Expiry of a freshly issued access token: the JWT `exp` claim when the
 * token carries one, otherwise `now + lifetimeSeconds`.
 */
export function expiryForToken(
  accessToken: string,
  lifetimeSeconds: number,
  now: Date = new Date(),
): string {
  const exp = readExpClaim(accessToken);
  if (exp !== undefined) {
    return new Date(exp * 1000).toISOString();
  }
  return new Date(now.getTime() + lifetimeSeconds * 1000).toISOString();
}

function readExpClaim(token: string): number | undefined {
  // Opaque (non-JWT) tokens have no readable claims
  if (token.split(".").length !== 3) {
    return undefined;
  }
  try {
    return decodeJwt(token).exp;
  } catch {
    return undefined;
  }
}

export class HttpSessionApi implements SessionApi {
  private readonly fetch: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: HttpSessionApiOptions) {
    this.fetch = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  async validateSession(credential: Credential): Promise<Credential> {
    this.logger.info(`🔄 [Session] Validating session for @${credential.handle}`);

    const { status, body } = await this.post(
      "/api/auth/validate-mobile-session",
      {
        access_token: credential.accessToken,
        refresh_token: credential.refreshToken ?? "",
        did: credential.accountId,
        handle: credential.handle,
        session_id: credential.sessionId ?? "",
      },
    );

    if (status === 401) {
      throw new NotAuthenticatedError("Session rejected by server");
    }
    if (status !== 200) {
      throw new ServerError(status, `Session validation failed with HTTP ${status}`);
    }

    const response = this.parse(validateResponseSchema, body, "validation");
    if (!response.valid) {
      this.logger.warn("❌ [Session] Session invalid", { error: response.error });
      throw new NotAuthenticatedError(response.error ?? "Session is no longer valid");
    }

    if (response.refreshed && response.tokens) {
      this.logger.info("🔄 [Session] Tokens were refreshed by backend");
      return this.withTokens(credential, response.tokens);
    }

    this.logger.info("✅ [Session] Session valid, no token refresh needed");
    return credential;
  }

  async refreshTokens(credential: Credential): Promise<Credential> {
    if (!credential.refreshToken) {
      throw new MissingCredentialsError("No refresh token available");
    }

    this.logger.info(`🔄 [Session] Refreshing tokens for @${credential.handle}`);

    const { status, body } = await this.post("/api/auth/refresh-mobile-token", {
      refresh_token: credential.refreshToken,
      did: credential.accountId,
      handle: credential.handle,
    });

    if (status === 401 || status === 404) {
      throw new NotAuthenticatedError("Refresh token rejected by server");
    }
    if (status !== 200) {
      throw new ServerError(status, `Token refresh failed with HTTP ${status}`);
    }

    const response = this.parse(refreshResponseSchema, body, "refresh");
    if (!response.success || !response.tokens) {
      this.logger.warn("❌ [Session] Token refresh failed", {
        error: response.error,
      });
      throw new NotAuthenticatedError(response.error ?? "Token refresh failed");
    }

    this.logger.info("✅ [Session] Token refresh successful");
    return this.withTokens(credential, response.tokens);
  }

  private withTokens(credential: Credential, tokens: Tokens): Credential {
    return freezeCredential({
      ...credential,
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token,
      expiresAt: expiryForToken(
        tokens.access_token,
        this.options.tokenLifetimeSeconds,
        this.now(),
      ),
    });
  }

  private async post(
    path: string,
    payload: Record<string, string>,
  ): Promise<{ status: number; body: unknown }> {
    const url = `${this.options.authBaseUrl.replace(/\/$/, "")}${path}`;
    let status: number;
    let text: string;
    try {
      const response = await this.fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Accept": "application/json",
          "User-Agent": this.options.userAgent,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`❌ [Session] ${path} network error: ${reason}`);
      throw new NetworkError(`Session request failed: ${reason}`, error);
    }

    this.logger.debug(`[Session] ${path} HTTP status: ${status}`);
    if (status !== 200) {
      return { status, body: undefined };
    }
    try {
      return { status, body: JSON.parse(text) };
    } catch (error) {
      throw new InvalidFormatError(`${path} returned invalid JSON`, {
        cause: error,
      });
    }
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidFormatError(`Unexpected session ${what} response`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
