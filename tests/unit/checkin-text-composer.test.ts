import { test } from "node:test";
import assert from "node:assert/strict";
import {
  CheckinTextComposer,
  type ComposedText,
} from "../../src/richtext/checkin-text-composer.js";
import { toBoldItalic, toItalic } from "../../src/richtext/unicode-styles.js";

const composer = new CheckinTextComposer({ defaultMessage: "Checked in here!" });

function slice({ text }: ComposedText, index: { byteStart: number; byteEnd: number }) {
  const bytes = new TextEncoder().encode(text);
  return new TextDecoder().decode(bytes.slice(index.byteStart, index.byteEnd));
}

test("CheckinTextComposer - default message with styled venue tagline", () => {
  const composed = composer.compose({
    venueName: "Café X",
    venueIcon: "☕",
    venueUrl: "https://x.test/1",
    message: null,
  });

  assert.equal(
    composed.text,
    `Checked in here!\n\n${toItalic("at ")}${toBoldItalic("Café X")} ☕ #checkin #dropanchor`,
  );
  assert.ok(composed.text.endsWith(" #checkin #dropanchor"));
});

test("CheckinTextComposer - tag facets slice to the fixed hashtags", () => {
  const composed = composer.compose({
    venueName: "Café X",
    venueIcon: "☕",
    venueUrl: "https://x.test/1",
  });

  const tags = composed.facets.filter((facet) =>
    facet.features[0].$type === "app.bsky.richtext.facet#tag"
  );
  assert.equal(tags.length, 2);
  assert.equal(slice(composed, tags[0].index), "#checkin");
  assert.equal(slice(composed, tags[1].index), "#dropanchor");
  assert.deepEqual(tags[0].index, { byteStart: 51, byteEnd: 59 });
  assert.deepEqual(tags[1].index, { byteStart: 60, byteEnd: 71 });
  assert.deepEqual(tags.map((facet) => facet.features[0]), [
    { $type: "app.bsky.richtext.facet#tag", tag: "checkin" },
    { $type: "app.bsky.richtext.facet#tag", tag: "dropanchor" },
  ]);
});

test("CheckinTextComposer - link facet covers the styled venue name", () => {
  const composed = composer.compose({
    venueName: "Café X",
    venueIcon: "☕",
    venueUrl: "https://x.test/1",
  });

  const [link] = composed.facets;
  assert.deepEqual(link.index, { byteStart: 27, byteEnd: 46 });
  assert.equal(slice(composed, link.index), toBoldItalic("Café X"));
  assert.deepEqual(link.features, [
    { $type: "app.bsky.richtext.facet#link", uri: "https://x.test/1" },
  ]);
});

test("CheckinTextComposer - message facets come first without offset", () => {
  const composed = composer.compose({
    venueName: "Joe's",
    venueIcon: "📍",
    venueUrl: "https://www.openstreetmap.org/node/1",
    message: "Great brew with @alice.bsky.social",
  });

  assert.equal(composed.facets.length, 4);
  const [mention, link] = composed.facets;
  assert.deepEqual(mention.index, { byteStart: 16, byteEnd: 34 });
  assert.equal(slice(composed, mention.index), "@alice.bsky.social");
  assert.equal(link.features[0].$type, "app.bsky.richtext.facet#link");
  assert.equal(slice(composed, link.index), toBoldItalic("Joe's"));
});

test("CheckinTextComposer - blank message falls back to the default", () => {
  const composed = composer.compose({
    venueName: "Park",
    venueIcon: "🌳",
    venueUrl: "https://x.test/park",
    message: "   ",
  });

  assert.ok(composed.text.startsWith("Checked in here!\n\n"));
});

test("CheckinTextComposer - empty venue name has no link facet", () => {
  const composed = composer.compose({
    venueName: "",
    venueIcon: "📍",
    venueUrl: "https://x.test/none",
    message: "Here",
  });

  assert.deepEqual(
    composed.facets.map((facet) => facet.features[0].$type),
    ["app.bsky.richtext.facet#tag", "app.bsky.richtext.facet#tag"],
  );
  assert.equal(slice(composed, composed.facets[1].index), "#dropanchor");
});

test("CheckinTextComposer - custom detector is used for the message", () => {
  const seen: string[] = [];
  const custom = new CheckinTextComposer({
    defaultMessage: "Default",
    detect: (text) => {
      seen.push(text);
      return [];
    },
  });

  custom.compose({ venueName: "A", venueIcon: "📍", venueUrl: "https://x.test/a" });
  assert.deepEqual(seen, ["Default"]);
});
