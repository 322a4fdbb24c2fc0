export * from "./checkin-core.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./models/credentials.js";
export * from "./models/facets.js";
export * from "./models/records.js";
export * from "./records/checkin-reader.js";
export * from "./records/content-hash.js";
export * from "./records/integrity-verifier.js";
export * from "./records/pds-client.js";
export * from "./records/record-decoder.js";
export * from "./records/record-writer.js";
export * from "./records/social-post-writer.js";
export * from "./records/venue.js";
export * from "./richtext/checkin-text-composer.js";
export * from "./richtext/facet-compiler.js";
export * from "./richtext/unicode-styles.js";
export * from "./session/credential-store.js";
export * from "./session/session-api.js";
export * from "./session/session-manager.js";
export * from "./utils/did-resolver.js";
export * from "./utils/handle-resolver.js";
export * from "./utils/logger.js";
