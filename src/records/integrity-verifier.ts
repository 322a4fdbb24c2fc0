// Read-time verification of StrongRefs: the record an address reference
// points at must still hash to the CID captured when the check-in was written.
import type { CheckinCoreConfig } from "../config.js";
import { InvalidFormatError, MissingLocationDataError } from "../errors.js";
import {
  ADDRESS_COLLECTION,
  CHECKIN_COLLECTION,
  type FetchedRecord,
  type ResolvedCheckin,
} from "../models/records.js";
import { consoleLogger, type Logger } from "../utils/logger.js";
import { cidForRecord, parseRecordUri } from "./content-hash.js";
import { isRecordNotFound, type RecordRepository } from "./pds-client.js";
import { decodeAddressRecord, decodeCheckinRecord } from "./record-decoder.js";

export interface IntegrityVerifierOptions {
  repository: RecordRepository;
  config: Pick<CheckinCoreConfig, "verifyContentHashLocally">;
  logger?: Logger;
}

export class IntegrityVerifier {
  private readonly logger: Logger;

  constructor(private readonly options: IntegrityVerifierOptions) {
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Re-fetches the address and compares content hashes. A mismatch is a
   * `false` result; a missing record throws MissingLocationDataError.
   */
  async verify(
    addressUri: string,
    capturedCid: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const fetched = await this.fetchAddress(addressUri, signal);
    return this.verifyRecord(fetched, capturedCid);
  }

  async verifyRecord(fetched: FetchedRecord, capturedCid: string): Promise<boolean> {
    if (fetched.cid !== capturedCid) {
      this.logger.warn(
        `⚠️ CID mismatch for ${fetched.uri}: expected ${capturedCid}, got ${fetched.cid}`,
      );
      return false;
    }

    if (!this.options.config.verifyContentHashLocally) {
      return true;
    }

    let localCid: string;
    try {
      localCid = await cidForRecord(fetched.value);
    } catch (error) {
      this.logger.warn(`⚠️ Could not hash record ${fetched.uri}`, error);
      return false;
    }

    if (localCid !== capturedCid) {
      this.logger.warn(
        `⚠️ Content of ${fetched.uri} hashes to ${localCid}, expected ${capturedCid}`,
      );
      return false;
    }
    return true;
  }

  /** Loads a check-in with its address and verification flag. */
  async resolveCheckin(
    checkinUri: string,
    signal?: AbortSignal,
  ): Promise<ResolvedCheckin> {
    const location = parseRecordUri(checkinUri);
    if (!location || location.collection !== CHECKIN_COLLECTION) {
      throw new InvalidFormatError(`Not a checkin URI: ${checkinUri}`);
    }

    const fetched = await this.options.repository.getRecord(location, signal);
    return this.resolveFetchedCheckin(fetched, signal);
  }

  async resolveFetchedCheckin(
    fetched: FetchedRecord,
    signal?: AbortSignal,
  ): Promise<ResolvedCheckin> {
    const checkin = decodeCheckinRecord(fetched.value);
    const addressRecord = await this.fetchAddress(
      checkin.addressRef.uri,
      signal,
      fetched.uri,
    );
    const address = decodeAddressRecord(addressRecord.value);
    const isVerified = await this.verifyRecord(addressRecord, checkin.addressRef.cid);

    return { uri: fetched.uri, cid: fetched.cid, checkin, address, isVerified };
  }

  private async fetchAddress(
    addressUri: string,
    signal?: AbortSignal,
    checkinUri?: string,
  ): Promise<FetchedRecord> {
    const location = parseRecordUri(addressUri);
    if (!location || location.collection !== ADDRESS_COLLECTION) {
      throw new MissingLocationDataError(checkinUri ?? addressUri);
    }

    try {
      return await this.options.repository.getRecord(location, signal);
    } catch (error) {
      if (isRecordNotFound(error)) {
        this.logger.warn(`⚠️ Address record not found: ${addressUri}`);
        throw new MissingLocationDataError(checkinUri ?? addressUri);
      }
      throw error;
    }
  }
}
