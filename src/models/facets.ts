// Rich text facets: byte-range annotations over UTF-8 encoded text

export const LINK_FEATURE = "app.bsky.richtext.facet#link";
export const MENTION_FEATURE = "app.bsky.richtext.facet#mention";
export const TAG_FEATURE = "app.bsky.richtext.facet#tag";

/** Half-open byte range into the UTF-8 encoding of the annotated string. */
export interface ByteSlice {
  byteStart: number;
  byteEnd: number;
}

export interface LinkFeature {
  $type: typeof LINK_FEATURE;
  uri: string;
}

// Detection only knows the handle; DIDs are resolved when a post is written
export interface MentionFeature {
  $type: typeof MENTION_FEATURE;
  handle: string;
}

export interface TagFeature {
  $type: typeof TAG_FEATURE;
  tag: string;
}

export type FacetFeature = LinkFeature | MentionFeature | TagFeature;

export interface RichTextFacet {
  index: ByteSlice;
  features: FacetFeature[];
}

export function linkFacet(index: ByteSlice, uri: string): RichTextFacet {
  return { index, features: [{ $type: LINK_FEATURE, uri }] };
}

export function mentionFacet(index: ByteSlice, handle: string): RichTextFacet {
  return { index, features: [{ $type: MENTION_FEATURE, handle }] };
}

export function tagFacet(index: ByteSlice, tag: string): RichTextFacet {
  return { index, features: [{ $type: TAG_FEATURE, tag }] };
}
