/**
 * XRPC client for the com.atproto.repo record endpoints.
 *
 * Every failure leaves this module as a CheckinCoreError:
 * - transport failures and timeouts → NetworkError
 * - 401 and auth XRPC errors → NotAuthenticatedError
 * - any other non-2xx → ServerError (status + XRPC error name)
 * - bodies that do not match the endpoint's output → InvalidFormatError
 *
 * An AbortSignal passed by the caller cancels the request and its reason
 * is rethrown unchanged.
 */

import { z } from "zod";
import type { CheckinCoreConfig } from "../config.js";
import {
  InvalidFormatError,
  NetworkError,
  NotAuthenticatedError,
  ServerError,
} from "../errors.js";
import type { Credential } from "../models/credentials.js";
import type { FetchedRecord, StrongRef } from "../models/records.js";
import { consoleLogger, type Logger } from "../utils/logger.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface CreateRecordInput {
  repo: string;
  collection: string;
  record: object;
  rkey?: string;
}

export interface RecordKeyInput {
  repo: string;
  collection: string;
  rkey: string;
}

export interface ListRecordsInput {
  repo: string;
  collection: string;
  limit?: number;
  cursor?: string;
}

export interface ListRecordsOutput {
  records: FetchedRecord[];
  cursor?: string;
}

/** The remote record operations the writer, verifier and reader depend on. */
export interface RecordRepository {
  createRecord(
    input: CreateRecordInput,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<StrongRef>;
  deleteRecord(
    input: RecordKeyInput,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<void>;
  getRecord(input: RecordKeyInput, signal?: AbortSignal): Promise<FetchedRecord>;
  listRecords(
    input: ListRecordsInput,
    signal?: AbortSignal,
  ): Promise<ListRecordsOutput>;
}

const createRecordOutput = z.object({ uri: z.string(), cid: z.string() });

const fetchedRecordSchema = z.object({
  uri: z.string(),
  cid: z.string(),
  value: z.unknown(),
});

const listRecordsOutput = z.object({
  records: z.array(fetchedRecordSchema),
  cursor: z.string().optional(),
});

const xrpcErrorBody = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

const AUTH_ERRORS = new Set([
  "AuthRequired",
  "AuthMissing",
  "ExpiredToken",
  "InvalidToken",
]);

function parseJson(
  text: string,
): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

export function isRecordNotFound(error: unknown): boolean {
  return error instanceof ServerError &&
    (error.status === 404 || error.errorName === "RecordNotFound");
}

export interface PdsClientOptions {
  config: Pick<CheckinCoreConfig, "pdsUrl" | "requestTimeoutMs" | "userAgent">;
  fetch?: FetchLike;
  /** Finds the PDS hosting a repo for unauthenticated reads. */
  resolveServiceUrl?: (
    repo: string,
    signal?: AbortSignal,
  ) => Promise<string | null>;
  logger?: Logger;
}

interface XrpcRequest {
  method: "GET" | "POST";
  baseUrl: string;
  query?: Record<string, string | number | undefined>;
  body?: object;
  credential?: Credential;
  signal?: AbortSignal;
}

export class PdsClient implements RecordRepository {
  private readonly fetch: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly options: PdsClientOptions) {
    this.fetch = options.fetch ?? ((url, init) => globalThis.fetch(url, init));
    this.logger = options.logger ?? consoleLogger;
  }

  async createRecord(
    input: CreateRecordInput,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<StrongRef> {
    const body = await this.call("com.atproto.repo.createRecord", {
      method: "POST",
      baseUrl: this.serviceUrlFor(credential),
      body: input,
      credential,
      signal,
    });
    return this.parse("com.atproto.repo.createRecord", createRecordOutput, body);
  }

  async deleteRecord(
    input: RecordKeyInput,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.call("com.atproto.repo.deleteRecord", {
      method: "POST",
      baseUrl: this.serviceUrlFor(credential),
      body: input,
      credential,
      signal,
    });
  }

  async getRecord(
    input: RecordKeyInput,
    signal?: AbortSignal,
  ): Promise<FetchedRecord> {
    const body = await this.call("com.atproto.repo.getRecord", {
      method: "GET",
      baseUrl: await this.serviceUrlForRepo(input.repo, signal),
      query: { ...input },
      signal,
    });
    const record = this.parse(
      "com.atproto.repo.getRecord",
      fetchedRecordSchema,
      body,
    );
    return { uri: record.uri, cid: record.cid, value: record.value };
  }

  async listRecords(
    input: ListRecordsInput,
    signal?: AbortSignal,
  ): Promise<ListRecordsOutput> {
    const body = await this.call("com.atproto.repo.listRecords", {
      method: "GET",
      baseUrl: await this.serviceUrlForRepo(input.repo, signal),
      query: { ...input },
      signal,
    });
    const output = this.parse(
      "com.atproto.repo.listRecords",
      listRecordsOutput,
      body,
    );
    return {
      records: output.records.map((record) => ({
        uri: record.uri,
        cid: record.cid,
        value: record.value,
      })),
      cursor: output.cursor,
    };
  }

  private serviceUrlFor(credential: Credential): string {
    return (credential.pdsUrl ?? this.options.config.pdsUrl).replace(/\/$/, "");
  }

  private async serviceUrlForRepo(
    repo: string,
    signal?: AbortSignal,
  ): Promise<string> {
    if (this.options.resolveServiceUrl) {
      const resolved = await this.options.resolveServiceUrl(repo, signal);
      if (resolved) {
        return resolved.replace(/\/$/, "");
      }
      this.logger.warn(
        `⚠️ Could not resolve PDS for ${repo}, using ${this.options.config.pdsUrl}`,
      );
    }
    return this.options.config.pdsUrl;
  }

  private async call(nsid: string, request: XrpcRequest): Promise<unknown> {
    const url = new URL(`${request.baseUrl}/xrpc/${nsid}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      "Accept": "application/json",
      "User-Agent": this.options.config.userAgent,
    };
    if (request.body) {
      headers["Content-Type"] = "application/json";
    }
    if (request.credential) {
      headers["Authorization"] = `Bearer ${request.credential.accessToken}`;
    }

    const timeout = AbortSignal.timeout(this.options.config.requestTimeoutMs);
    const signal = request.signal
      ? AbortSignal.any([request.signal, timeout])
      : timeout;

    let response: Response;
    let text: string;
    try {
      response = await this.fetch(url.toString(), {
        method: request.method,
        headers,
        body: request.body ? JSON.stringify(request.body) : undefined,
        signal,
      });
      text = await response.text();
    } catch (error) {
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      const reason = timeout.aborted
        ? `timed out after ${this.options.config.requestTimeoutMs}ms`
        : error instanceof Error
        ? error.message
        : String(error);
      this.logger.error(`❌ ${nsid} request failed: ${reason}`);
      throw new NetworkError(`${nsid} request failed: ${reason}`, error);
    }

    if (!response.ok) {
      throw this.errorFromResponse(nsid, response.status, text);
    }

    if (text.length === 0) {
      return undefined;
    }

    const json = parseJson(text);
    if (!json.ok) {
      throw new InvalidFormatError(`${nsid} returned invalid JSON`, {
        cause: json.error,
      });
    }
    return json.value;
  }

  private errorFromResponse(nsid: string, status: number, text: string) {
    let errorName: string | undefined;
    let message = `${nsid} failed with HTTP ${status}`;

    // Non-JSON error bodies keep the generic message
    const json = parseJson(text);
    const parsed = json.ok ? xrpcErrorBody.safeParse(json.value) : undefined;
    if (parsed?.success) {
      errorName = parsed.data.error;
      if (parsed.data.message) {
        message = parsed.data.message;
      }
    }

    if (status === 401 || (errorName && AUTH_ERRORS.has(errorName))) {
      return new NotAuthenticatedError(message);
    }
    return new ServerError(status, message, errorName);
  }

  private parse<T>(nsid: string, schema: z.ZodType<T>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidFormatError(`${nsid} returned an unexpected body`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
