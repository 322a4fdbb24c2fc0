// Resolves a repo DID to the PDS that hosts it via the PLC directory
import { z } from "zod";
import type { FetchLike } from "../records/pds-client.js";
import { consoleLogger, type Logger } from "./logger.js";

const didDocumentSchema = z.object({
  service: z.array(z.object({
    id: z.string(),
    type: z.string().optional(),
    serviceEndpoint: z.unknown(),
  })).optional(),
});

export interface PdsResolverOptions {
  plcDirectoryUrl: string;
  /** Per-lookup timeout; defaults to 15 seconds. */
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Returns a resolver suitable for PdsClient's `resolveServiceUrl`.
 * Lookups are cached per DID; failures and timeouts resolve to null and
 * are not cached. Cancelling through `signal` rethrows its reason.
 */
export function createPdsResolver(
  options: PdsResolverOptions,
): (did: string, signal?: AbortSignal) => Promise<string | null> {
  const fetchFn = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
  const logger = options.logger ?? consoleLogger;
  const cache = new Map<string, string>();

  const timeoutMs = options.requestTimeoutMs ?? 15_000;

  return async (did: string, signal?: AbortSignal) => {
    const cached = cache.get(did);
    if (cached) {
      return cached;
    }

    // For other DID methods, implement as needed
    if (!did.startsWith("did:plc:")) {
      logger.warn(`Unsupported DID method for PDS lookup: ${did}`);
      return null;
    }

    try {
      const timeout = AbortSignal.timeout(timeoutMs);
      const response = await fetchFn(`${options.plcDirectoryUrl}/${did}`, {
        headers: { "Accept": "application/json" },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      if (!response.ok) {
        logger.warn(`PLC directory lookup failed for ${did}: ${response.status}`);
        return null;
      }

      const document = didDocumentSchema.safeParse(await response.json());
      if (!document.success) {
        logger.warn(`Malformed DID document for ${did}`);
        return null;
      }

      // Look for the PDS service in the DID document
      const pds = document.data.service?.find((service) =>
        service.id === "#atproto_pds" || service.id === `${did}#atproto_pds`
      );
      const endpoint = pds?.serviceEndpoint;
      if (typeof endpoint !== "string") {
        logger.warn(`No PDS service found in DID document for ${did}`);
        return null;
      }

      cache.set(did, endpoint);
      return endpoint;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      logger.error(`Failed to resolve DID to PDS: ${did}`, error);
      return null;
    }
  };
}
