// Feed loading: lists a repo's check-ins and resolves each address
import { InvalidFormatError, MissingLocationDataError } from "../errors.js";
import { CHECKIN_COLLECTION, type ResolvedCheckin } from "../models/records.js";
import { consoleLogger, type Logger } from "../utils/logger.js";
import type { IntegrityVerifier } from "./integrity-verifier.js";
import type { RecordRepository } from "./pds-client.js";

export interface ListCheckinsOptions {
  limit?: number;
  cursor?: string;
  signal?: AbortSignal;
}

export interface CheckinPage {
  checkins: ResolvedCheckin[];
  cursor?: string;
  /** URIs of records left out because they could not be read. */
  skipped: string[];
}

export class CheckinReader {
  private readonly logger: Logger;

  constructor(
    private readonly repository: RecordRepository,
    private readonly verifier: IntegrityVerifier,
    logger?: Logger,
  ) {
    this.logger = logger ?? consoleLogger;
  }

  async listCheckins(
    repo: string,
    options: ListCheckinsOptions = {},
  ): Promise<CheckinPage> {
    const { signal } = options;
    const page = await this.repository.listRecords(
      {
        repo,
        collection: CHECKIN_COLLECTION,
        limit: options.limit,
        cursor: options.cursor,
      },
      signal,
    );

    const checkins: ResolvedCheckin[] = [];
    const skipped: string[] = [];

    for (const record of page.records) {
      signal?.throwIfAborted();
      try {
        checkins.push(await this.verifier.resolveFetchedCheckin(record, signal));
      } catch (error) {
        if (
          error instanceof InvalidFormatError ||
          error instanceof MissingLocationDataError
        ) {
          this.logger.warn(`⚠️ Skipping checkin ${record.uri}: ${error.message}`);
          skipped.push(record.uri);
          continue;
        }
        throw error;
      }
    }

    this.logger.info(
      `📋 Loaded ${checkins.length} checkins for ${repo} (${skipped.length} skipped)`,
    );
    return { checkins, cursor: page.cursor, skipped };
  }
}
