/**
 * Builds the social post announcing a check-in.
 *
 * The post is the user's message followed by a styled tagline:
 *
 *   <message>\n\n𝑎𝑡 <𝑽𝒆𝒏𝒖𝒆> <icon> #checkin #dropanchor
 *
 * This is only the social post. The check-in record itself stores the
 * user's original message and the structured location data.
 */

import {
  linkFacet,
  type RichTextFacet,
  tagFacet,
} from "../models/facets.js";
import { detectFacets, utf8Length } from "./facet-compiler.js";
import { toBoldItalic, toItalic } from "./unicode-styles.js";

export const CHECKIN_HASHTAGS = ["checkin", "dropanchor"] as const;

const TAGLINE_PREFIX = "at ";
const TAGLINE_SUFFIX = CHECKIN_HASHTAGS.map((tag) => ` #${tag}`).join("");

export interface ComposeInput {
  venueName: string;
  venueIcon: string;
  venueUrl: string;
  message?: string | null;
}

export interface ComposedText {
  text: string;
  facets: RichTextFacet[];
}

export interface CheckinTextComposerOptions {
  defaultMessage: string;
  detect?: (text: string) => RichTextFacet[];
}

export class CheckinTextComposer {
  private readonly defaultMessage: string;
  private readonly detect: (text: string) => RichTextFacet[];

  constructor(options: CheckinTextComposerOptions) {
    this.defaultMessage = options.defaultMessage;
    this.detect = options.detect ?? detectFacets;
  }

  compose(input: ComposeInput): ComposedText {
    const message = input.message && input.message.trim().length > 0
      ? input.message
      : this.defaultMessage;

    const head = `${message}\n\n`;
    const prefix = toItalic(TAGLINE_PREFIX);
    const venueName = toBoldItalic(input.venueName);
    const text = `${head}${prefix}${venueName} ${input.venueIcon}${TAGLINE_SUFFIX}`;

    // The message opens the text, so its facets need no shifting
    const facets: RichTextFacet[] = [...this.detect(message)];

    // Ranges are measured on the styled glyphs, which are wider than ASCII
    if (venueName.length > 0) {
      const nameStart = utf8Length(head + prefix);
      facets.push(
        linkFacet(
          { byteStart: nameStart, byteEnd: nameStart + utf8Length(venueName) },
          input.venueUrl,
        ),
      );
    }

    let cursor = utf8Length(text) - utf8Length(TAGLINE_SUFFIX);
    for (const tag of CHECKIN_HASHTAGS) {
      const byteStart = cursor + utf8Length(" ");
      const byteEnd = byteStart + utf8Length(`#${tag}`);
      facets.push(tagFacet({ byteStart, byteEnd }, tag));
      cursor = byteEnd;
    }

    return { text, facets };
  }
}
