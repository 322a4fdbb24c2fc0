/**
 * Rich text facet detection for post text.
 *
 * Facet ranges are UTF-8 byte offsets into the exact string that is
 * published, so every offset is computed by encoding the text in front of
 * a match, never from JavaScript string indices (UTF-16 code units).
 *
 * Detectors run independently and their results are concatenated in a
 * fixed order: links, mentions, hashtags. Overlapping ranges from
 * different detectors (a `#fragment` inside a URL, say) are kept as-is.
 */

import { isValidHandle } from "@atproto/syntax";
import {
  type ByteSlice,
  linkFacet,
  mentionFacet,
  type RichTextFacet,
  tagFacet,
} from "../models/facets.js";

const encoder = new TextEncoder();

export function utf8Length(text: string): number {
  return encoder.encode(text).length;
}

/** Byte range of `match` found at UTF-16 index `index` of `text`. */
export function byteSliceAt(
  text: string,
  index: number,
  match: string,
): ByteSlice {
  const byteStart = utf8Length(text.slice(0, index));
  return { byteStart, byteEnd: byteStart + utf8Length(match) };
}

// Links start with a scheme or "www." and must not continue a word, handle or path
const URL_REGEX = /(?<![\p{L}\p{N}@./])(?:https?:\/\/|www\.)[^\s<>"]+/giu;
const TRAILING_PUNCTUATION = /[.,;:!?'"]+$/u;

const MENTION_REGEX =
  /@([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*)/g;

const HASHTAG_REGEX = /#([a-zA-Z][a-zA-Z0-9_]*)/g;

// Reserved TLDs that never resolve to a real account (.test stays allowed)
const INVALID_TLDS = new Set(["invalid", "localhost", "local", "example"]);

export function detectFacets(text: string): RichTextFacet[] {
  if (text.length === 0) {
    return [];
  }

  return [
    ...detectLinks(text),
    ...detectMentions(text),
    ...detectHashtags(text),
  ];
}

export function detectLinks(text: string): RichTextFacet[] {
  const facets: RichTextFacet[] = [];

  for (const match of text.matchAll(URL_REGEX)) {
    if (match.index === undefined) continue;

    const matchedText = trimLinkMatch(match[0]);
    // Display-friendly default scheme; the range still covers only the typed text
    const uri = matchedText.toLowerCase().startsWith("www.")
      ? `https://${matchedText}`
      : matchedText;

    if (!isParseableUrl(uri)) {
      continue;
    }

    facets.push(linkFacet(byteSliceAt(text, match.index, matchedText), uri));
  }

  return facets;
}

export function detectMentions(text: string): RichTextFacet[] {
  const facets: RichTextFacet[] = [];

  for (const match of text.matchAll(MENTION_REGEX)) {
    if (match.index === undefined) continue;

    const handle = match[1];
    if (!isValidMentionDomain(handle)) {
      continue;
    }

    facets.push(mentionFacet(byteSliceAt(text, match.index, match[0]), handle));
  }

  return facets;
}

export function detectHashtags(text: string): RichTextFacet[] {
  const facets: RichTextFacet[] = [];

  for (const match of text.matchAll(HASHTAG_REGEX)) {
    if (match.index === undefined) continue;

    facets.push(tagFacet(byteSliceAt(text, match.index, match[0]), match[1]));
  }

  return facets;
}

/**
 * A mention target must look like a registrable domain: at least two
 * labels, an alphabetic TLD of two or more letters that is not reserved.
 */
export function isValidMentionDomain(domain: string): boolean {
  const components = domain.split(".");
  if (components.length < 2) return false;

  const tld = components[components.length - 1];
  if (!/^[a-zA-Z]{2,}$/.test(tld)) return false;
  if (INVALID_TLDS.has(tld.toLowerCase())) return false;

  return isValidHandle(domain);
}

function trimLinkMatch(raw: string): string {
  let text = raw;
  let previous = "";

  while (text !== previous) {
    previous = text;
    text = text.replace(TRAILING_PUNCTUATION, "");

    // Drop a closing parenthesis that has no opening partner inside the link
    if (text.endsWith(")") && count(text, "(") < count(text, ")")) {
      text = text.slice(0, -1);
    }
  }

  return text;
}

function count(text: string, char: string): number {
  return text.split(char).length - 1;
}

function isParseableUrl(uri: string): boolean {
  try {
    const url = new URL(uri);
    return url.hostname.length > 0;
  } catch {
    return false;
  }
}
