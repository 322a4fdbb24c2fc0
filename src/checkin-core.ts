// Wires the check-in core from configuration
import type { CheckinCoreConfig } from "./config.js";
import { InvalidFormatError } from "./errors.js";
import { CheckinReader } from "./records/checkin-reader.js";
import { IntegrityVerifier } from "./records/integrity-verifier.js";
import { type FetchLike, PdsClient } from "./records/pds-client.js";
import { RecordWriter } from "./records/record-writer.js";
import { SocialPostWriter } from "./records/social-post-writer.js";
import { CheckinTextComposer } from "./richtext/checkin-text-composer.js";
import type { CredentialStore } from "./session/credential-store.js";
import { HttpSessionApi, type SessionApi } from "./session/session-api.js";
import { SessionManager } from "./session/session-manager.js";
import { createPdsResolver } from "./utils/did-resolver.js";
import { XrpcHandleResolver } from "./utils/handle-resolver.js";
import { consoleLogger, type Logger } from "./utils/logger.js";

export interface CheckinCoreDependencies {
  store: CredentialStore;
  /** Defaults to HttpSessionApi, which needs `config.authBaseUrl`. */
  sessionApi?: SessionApi;
  fetch?: FetchLike;
  logger?: Logger;
  clock?: () => Date;
}

export interface CheckinCore {
  session: SessionManager;
  pds: PdsClient;
  writer: RecordWriter;
  verifier: IntegrityVerifier;
  reader: CheckinReader;
  composer: CheckinTextComposer;
}

export function createCheckinCore(
  config: CheckinCoreConfig,
  deps: CheckinCoreDependencies,
): CheckinCore {
  const logger = deps.logger ?? consoleLogger;
  const { fetch, clock } = deps;

  const sessionApi = deps.sessionApi ?? httpSessionApi(config, fetch, logger);
  const session = new SessionManager({
    store: deps.store,
    api: sessionApi,
    config,
    logger,
    clock,
  });

  const pds = new PdsClient({
    config,
    fetch,
    logger,
    resolveServiceUrl: createPdsResolver({
      plcDirectoryUrl: config.plcDirectoryUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      fetch,
      logger,
    }),
  });

  const composer = new CheckinTextComposer({
    defaultMessage: config.defaultCheckinMessage,
  });
  const socialPostWriter = new SocialPostWriter({
    repository: pds,
    composer,
    handleResolver: new XrpcHandleResolver(config.publicApiUrl, {
      fetch,
      logger,
      requestTimeoutMs: config.requestTimeoutMs,
    }),
    logger,
    clock,
  });

  const writer = new RecordWriter({
    session,
    repository: pds,
    socialPostWriter,
    config,
    logger,
    clock,
  });
  const verifier = new IntegrityVerifier({ repository: pds, config, logger });
  const reader = new CheckinReader(pds, verifier, logger);

  return { session, pds, writer, verifier, reader, composer };
}

function httpSessionApi(
  config: CheckinCoreConfig,
  fetch: FetchLike | undefined,
  logger: Logger,
): SessionApi {
  if (!config.authBaseUrl) {
    throw new InvalidFormatError(
      "CHECKIN_AUTH_BASE_URL is required when no session API is provided",
    );
  }
  return new HttpSessionApi({
    authBaseUrl: config.authBaseUrl,
    tokenLifetimeSeconds: config.tokenLifetimeSeconds,
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch,
    logger,
  });
}
