/**
 * Two-record check-in write.
 *
 * A check-in is an address record plus a check-in record that points at it
 * by StrongRef. The address is written first; when the check-in write fails
 * the address is deleted once, best-effort, and the check-in error is
 * rethrown as-is. The optional social post runs after both records exist
 * and its outcome is reported separately.
 */

import type { CheckinCoreConfig } from "../config.js";
import { type Result, toResult } from "../errors.js";
import type { Credential } from "../models/credentials.js";
import {
  ADDRESS_COLLECTION,
  CHECKIN_COLLECTION,
  type CheckinRecord,
  type StrongRef,
} from "../models/records.js";
import type { CredentialProvider } from "../session/session-manager.js";
import { consoleLogger, type Logger } from "../utils/logger.js";
import {
  assertStrongRef,
  parseRecordUri,
  type RecordLocation,
} from "./content-hash.js";
import type { RecordRepository } from "./pds-client.js";
import { decodeCheckinRecord } from "./record-decoder.js";
import type { SocialPostWriter } from "./social-post-writer.js";
import {
  buildAddressRecord,
  buildCoordinates,
  type Venue,
  venueCategoryFor,
  venueIconFor,
  venueUrlFor,
} from "./venue.js";

export interface CreatedCheckin {
  uri: string;
  cid: string;
  rkey: string;
  addressRef: StrongRef;
}

export interface CheckinResult {
  primary: CreatedCheckin;
  /** Present only when a social post was requested and a writer is configured. */
  secondary?: Result<StrongRef>;
}

export interface CreateCheckinOptions {
  crossPost?: boolean;
  signal?: AbortSignal;
}

export interface RecordWriterOptions {
  session: CredentialProvider;
  repository: RecordRepository;
  socialPostWriter?: SocialPostWriter;
  config: Pick<CheckinCoreConfig, "crossPostByDefault">;
  logger?: Logger;
  clock?: () => Date;
}

export class RecordWriter {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: RecordWriterOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  async createCheckin(
    venue: Venue,
    message?: string | null,
    options: CreateCheckinOptions = {},
  ): Promise<CheckinResult> {
    const { signal } = options;
    const coordinates = buildCoordinates(venue);
    const address = buildAddressRecord(venue);

    const credential = await this.options.session.getValidCredentials();
    signal?.throwIfAborted();

    this.logger.info(`📍 Creating address record for ${venue.name}`);
    const addressResult = await this.options.repository.createRecord(
      {
        repo: credential.accountId,
        collection: ADDRESS_COLLECTION,
        record: address,
      },
      credential,
      signal,
    );

    let addressRef: StrongRef;
    try {
      addressRef = assertStrongRef(addressResult, {
        collection: ADDRESS_COLLECTION,
        repo: credential.accountId,
      }).ref;
    } catch (error) {
      this.logger.error("❌ Address StrongRef failed validation:", error);
      await this.rollbackAddress(addressResult, credential);
      throw error;
    }
    this.logger.info(`✅ Created address record: ${addressRef.uri}`);

    const checkin: CheckinRecord = {
      $type: CHECKIN_COLLECTION,
      text: message?.trim() ?? "",
      createdAt: this.clock().toISOString(),
      addressRef,
      coordinates,
    };
    const category = venueCategoryFor(venue);
    if (category) checkin.category = category;
    if (venue.categoryGroup) checkin.categoryGroup = venue.categoryGroup;
    if (venue.icon) checkin.categoryIcon = venue.icon;

    let checkinResult: StrongRef;
    try {
      signal?.throwIfAborted();
      checkinResult = await this.options.repository.createRecord(
        {
          repo: credential.accountId,
          collection: CHECKIN_COLLECTION,
          record: checkin,
        },
        credential,
        signal,
      );
    } catch (error) {
      this.logger.error("❌ Failed to create checkin record:", error);
      await this.rollbackAddress(addressRef, credential);
      throw error;
    }

    // The check-in exists at this point, so a bad reference is not rolled back
    const { ref, location } = assertStrongRef(checkinResult, {
      collection: CHECKIN_COLLECTION,
      repo: credential.accountId,
    });
    this.logger.info(`✅ Created checkin record: ${ref.uri}`);

    const primary: CreatedCheckin = {
      uri: ref.uri,
      cid: ref.cid,
      rkey: location.rkey,
      addressRef,
    };

    const crossPost = options.crossPost ?? this.options.config.crossPostByDefault;
    if (!crossPost) {
      return { primary };
    }

    const writer = this.options.socialPostWriter;
    if (!writer) {
      this.logger.warn("⚠️ Social post requested but no post writer is configured");
      return { primary };
    }

    const secondary = await this.postToFeed(
      writer,
      venue,
      message,
      credential,
      signal,
    );
    return { primary, secondary };
  }

  /**
   * Deletes a check-in and, best-effort, the address it references when
   * that address lives in the same repository.
   */
  async deleteCheckin(rkey: string, signal?: AbortSignal): Promise<void> {
    const credential = await this.options.session.getValidCredentials();
    const location: RecordLocation = {
      repo: credential.accountId,
      collection: CHECKIN_COLLECTION,
      rkey,
    };

    this.logger.info(`🗑️ Deleting checkin ${rkey}`);
    const fetched = await this.options.repository.getRecord(location, signal);

    let addressLocation: RecordLocation | null = null;
    try {
      const record = decodeCheckinRecord(fetched.value);
      addressLocation = parseRecordUri(record.addressRef.uri);
    } catch (error) {
      this.logger.warn(`⚠️ Checkin ${rkey} has no readable address reference`, error);
    }

    await this.options.repository.deleteRecord(location, credential, signal);
    this.logger.info(`✅ Deleted checkin record: ${fetched.uri}`);

    if (
      addressLocation &&
      addressLocation.repo === credential.accountId &&
      addressLocation.collection === ADDRESS_COLLECTION
    ) {
      await this.deleteQuietly(addressLocation, credential);
    }
  }

  private async postToFeed(
    writer: SocialPostWriter,
    venue: Venue,
    message: string | null | undefined,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<Result<StrongRef>> {
    const result = await toResult(writer.createPost(
      {
        venueName: venue.name,
        venueIcon: venueIconFor(venue),
        venueUrl: venueUrlFor(venue),
        message,
      },
      credential,
      signal,
    ));
    if (!result.ok) {
      this.logger.warn("⚠️ Social post failed, checkin kept:", result.error);
    }
    return result;
  }

  // Rollback runs without the caller's signal: a cancelled write still cleans up
  private async rollbackAddress(
    address: StrongRef,
    credential: Credential,
  ): Promise<void> {
    const location = parseRecordUri(address.uri);
    if (
      !location ||
      location.repo !== credential.accountId ||
      location.collection !== ADDRESS_COLLECTION
    ) {
      this.logger.error(`❌ Cannot roll back address at ${address.uri}`);
      return;
    }
    this.logger.warn(`↩️ Rolling back address record: ${address.uri}`);
    await this.deleteQuietly(location, credential);
  }

  private async deleteQuietly(
    location: RecordLocation,
    credential: Credential,
  ): Promise<void> {
    try {
      await this.options.repository.deleteRecord(location, credential);
      this.logger.info(`✅ Deleted address record: ${location.rkey}`);
    } catch (error) {
      this.logger.error(
        `❌ Failed to delete address record ${location.rkey}, leaving it orphaned:`,
        error,
      );
    }
  }
}
