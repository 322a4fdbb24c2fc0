// AT Protocol record types for check-ins, addresses and posts

export const ADDRESS_COLLECTION = "community.lexicon.location.address";
export const CHECKIN_COLLECTION = "app.dropanchor.checkin";
export const POST_COLLECTION = "app.bsky.feed.post";

/** Reference to one immutable version of a record: location plus content hash. */
export interface StrongRef {
  uri: string;
  cid: string;
}

export interface AddressFields {
  name?: string;
  street?: string;
  locality?: string;
  region?: string;
  country?: string;
  postalCode?: string;
}

export interface AddressRecord extends AddressFields {
  $type: typeof ADDRESS_COLLECTION;
}

// Decimal strings rather than numbers: DAG-CBOR records carry no floats
export interface GeoCoordinates {
  latitude: string;
  longitude: string;
}

export interface CheckinRecord {
  $type: typeof CHECKIN_COLLECTION;
  text: string;
  createdAt: string;
  addressRef: StrongRef;
  coordinates: GeoCoordinates;
  category?: string;
  categoryGroup?: string;
  categoryIcon?: string;
}

export interface PostRecord {
  $type: typeof POST_COLLECTION;
  text: string;
  createdAt: string;
  facets?: PostFacet[];
  langs?: string[];
}

// Wire form of a facet inside app.bsky.feed.post: mentions carry a DID
export interface PostFacet {
  index: { byteStart: number; byteEnd: number };
  features: PostFacetFeature[];
}

export type PostFacetFeature =
  | { $type: "app.bsky.richtext.facet#link"; uri: string }
  | { $type: "app.bsky.richtext.facet#mention"; did: string }
  | { $type: "app.bsky.richtext.facet#tag"; tag: string };

/** Record as returned by com.atproto.repo.getRecord / listRecords. */
export interface FetchedRecord {
  uri: string;
  cid: string;
  value: unknown;
}

/** Read-side composite, recomputed per read. */
export interface ResolvedCheckin {
  uri: string;
  cid: string;
  checkin: CheckinRecord;
  address: AddressRecord;
  isVerified: boolean;
}
