// Handle resolution utilities for AT Protocol
// Resolves mention handles to DIDs before they are written into post facets
import { isValidHandle } from "@atproto/syntax";
import { z } from "zod";
import type { FetchLike } from "../records/pds-client.js";
import { consoleLogger, type Logger } from "./logger.js";

export interface HandleResolver {
  /** DID for the handle, or null when it cannot be resolved. */
  resolveHandle(handle: string, signal?: AbortSignal): Promise<string | null>;
}

const resolveHandleOutput = z.object({ did: z.string().startsWith("did:") });

export function normalizeHandle(handle: string): string {
  // Remove @ prefix if present
  const normalized = handle.startsWith("@") ? handle.slice(1) : handle;
  return normalized.toLowerCase();
}

export class XrpcHandleResolver implements HandleResolver {
  private readonly fetch: FetchLike;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly publicApiUrl: string,
    options: { fetch?: FetchLike; logger?: Logger; requestTimeoutMs?: number } = {},
  ) {
    this.fetch = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
    this.logger = options.logger ?? consoleLogger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15_000;
  }

  async resolveHandle(handle: string, signal?: AbortSignal): Promise<string | null> {
    const normalized = normalizeHandle(handle);
    if (!isValidHandle(normalized)) {
      return null;
    }

    const cached = this.cache.get(normalized);
    if (cached) {
      return cached;
    }

    try {
      const timeout = AbortSignal.timeout(this.requestTimeoutMs);
      const response = await this.fetch(
        `${this.publicApiUrl}/xrpc/com.atproto.identity.resolveHandle?handle=${
          encodeURIComponent(normalized)
        }`,
        {
          headers: { "Accept": "application/json" },
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        },
      );

      if (!response.ok) {
        this.logger.warn(
          `Handle resolution failed for ${normalized}: ${response.status}`,
        );
        return null;
      }

      const parsed = resolveHandleOutput.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn(`Unexpected resolveHandle body for ${normalized}`);
        return null;
      }

      this.cache.set(normalized, parsed.data.did);
      return parsed.data.did;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      this.logger.error(`Failed to resolve handle ${normalized}:`, error);
      return null;
    }
  }
}

/** Resolves a batch of handles concurrently, keyed by normalized handle. */
export async function batchResolveHandles(
  resolver: HandleResolver,
  handles: string[],
  signal?: AbortSignal,
): Promise<Map<string, string>> {
  const unique = [...new Set(handles.map(normalizeHandle))];
  const results = new Map<string, string>();

  await Promise.all(unique.map(async (handle) => {
    const did = await resolver.resolveHandle(handle, signal);
    if (did) {
      results.set(handle, did);
    }
  }));

  return results;
}
