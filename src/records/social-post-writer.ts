// Writes the optional app.bsky.feed.post announcing a check-in
import type { Credential } from "../models/credentials.js";
import {
  LINK_FEATURE,
  MENTION_FEATURE,
  type RichTextFacet,
  TAG_FEATURE,
} from "../models/facets.js";
import {
  POST_COLLECTION,
  type PostFacet,
  type PostFacetFeature,
  type PostRecord,
  type StrongRef,
} from "../models/records.js";
import type {
  CheckinTextComposer,
  ComposeInput,
} from "../richtext/checkin-text-composer.js";
import {
  batchResolveHandles,
  type HandleResolver,
  normalizeHandle,
} from "../utils/handle-resolver.js";
import { consoleLogger, type Logger } from "../utils/logger.js";
import { assertStrongRef } from "./content-hash.js";
import type { RecordRepository } from "./pds-client.js";

export interface SocialPostWriterOptions {
  repository: RecordRepository;
  composer: CheckinTextComposer;
  /** Without a resolver, mention facets are left out of the post. */
  handleResolver?: HandleResolver;
  langs?: string[];
  logger?: Logger;
  clock?: () => Date;
}

export class SocialPostWriter {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: SocialPostWriterOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  async buildPost(input: ComposeInput, signal?: AbortSignal): Promise<PostRecord> {
    const { text, facets } = this.options.composer.compose(input);
    const postFacets = await this.toPostFacets(facets, signal);

    const post: PostRecord = {
      $type: POST_COLLECTION,
      text,
      createdAt: this.clock().toISOString(),
    };
    if (postFacets.length > 0) {
      post.facets = postFacets;
    }
    if (this.options.langs && this.options.langs.length > 0) {
      post.langs = this.options.langs;
    }
    return post;
  }

  async createPost(
    input: ComposeInput,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<StrongRef> {
    const post = await this.buildPost(input, signal);
    const result = await this.options.repository.createRecord(
      { repo: credential.accountId, collection: POST_COLLECTION, record: post },
      credential,
      signal,
    );
    const { ref } = assertStrongRef(result, {
      collection: POST_COLLECTION,
      repo: credential.accountId,
    });
    this.logger.info(`✅ Created social post: ${ref.uri}`);
    return ref;
  }

  private async toPostFacets(
    facets: RichTextFacet[],
    signal?: AbortSignal,
  ): Promise<PostFacet[]> {
    const handles = facets.flatMap((facet) =>
      facet.features.flatMap((feature) =>
        feature.$type === MENTION_FEATURE ? [feature.handle] : []
      )
    );

    const dids = handles.length > 0 && this.options.handleResolver
      ? await batchResolveHandles(this.options.handleResolver, handles, signal)
      : new Map<string, string>();

    const result: PostFacet[] = [];
    for (const facet of facets) {
      const features: PostFacetFeature[] = [];
      for (const feature of facet.features) {
        switch (feature.$type) {
          case LINK_FEATURE:
            features.push({ $type: LINK_FEATURE, uri: feature.uri });
            break;
          case TAG_FEATURE:
            features.push({ $type: TAG_FEATURE, tag: feature.tag });
            break;
          case MENTION_FEATURE: {
            const did = dids.get(normalizeHandle(feature.handle));
            if (did) {
              features.push({ $type: MENTION_FEATURE, did });
            } else {
              this.logger.warn(`⚠️ Dropping unresolved mention @${feature.handle}`);
            }
            break;
          }
        }
      }
      if (features.length > 0) {
        result.push({ index: { ...facet.index }, features });
      }
    }
    return result;
  }
}
