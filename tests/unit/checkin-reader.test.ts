import { test } from "node:test";
import assert from "node:assert/strict";
import { NetworkError } from "../../src/errors.js";
import { CheckinReader } from "../../src/records/checkin-reader.js";
import { IntegrityVerifier } from "../../src/records/integrity-verifier.js";
import { type FetchLike, PdsClient } from "../../src/records/pds-client.js";
import { MemoryLogger } from "../../src/utils/logger.js";
import { TEST_DID, testConfig } from "../fixtures/test-data.js";
import { FakePds } from "../mocks/fake-pds.js";

const checkinUri = (rkey: string) => `at://${TEST_DID}/app.dropanchor.checkin/${rkey}`;
const addressUri = (rkey: string) =>
  `at://${TEST_DID}/community.lexicon.location.address/${rkey}`;

function setup(wrap?: (pds: FakePds) => FetchLike) {
  const pds = new FakePds();
  const logger = new MemoryLogger();
  const repository = new PdsClient({
    config: testConfig,
    fetch: wrap ? wrap(pds) : pds.fetch,
    logger,
  });
  const verifier = new IntegrityVerifier({
    repository,
    config: { verifyContentHashLocally: true },
    logger,
  });
  return { pds, logger, reader: new CheckinReader(repository, verifier, logger) };
}

async function seed(pds: FakePds, rkey: string, withAddress = true) {
  const address = { $type: "community.lexicon.location.address", name: `Venue ${rkey}` };
  const stored = withAddress
    ? await pds.put(addressUri(rkey), address)
    : { cid: "bafyreicv3pecq6fuua22xcoguxep76otivb33nlaofzl76fpagczo5t5jm" };
  await pds.put(checkinUri(rkey), {
    $type: "app.dropanchor.checkin",
    text: `Checkin ${rkey}`,
    createdAt: "2024-07-04T10:30:00.000Z",
    addressRef: { uri: addressUri(rkey), cid: stored.cid },
    coordinates: { latitude: "52.37", longitude: "4.9" },
  });
}

test("CheckinReader - resolves and verifies each check-in", async () => {
  const { pds, reader } = setup();
  await seed(pds, "a");
  await seed(pds, "b");

  const page = await reader.listCheckins(TEST_DID);

  assert.deepEqual(page.checkins.map((checkin) => checkin.uri), [
    checkinUri("a"),
    checkinUri("b"),
  ]);
  assert.deepEqual(page.checkins.map((checkin) => checkin.isVerified), [true, true]);
  assert.equal(page.checkins[1].address.name, "Venue b");
  assert.deepEqual(page.skipped, []);
});

test("CheckinReader - unreadable records and missing addresses are skipped", async () => {
  const { pds, reader, logger } = setup();
  await seed(pds, "good");
  await pds.put(checkinUri("broken"), { $type: "app.dropanchor.checkin", text: 5 });
  await seed(pds, "orphan", false);

  const page = await reader.listCheckins(TEST_DID);

  assert.deepEqual(page.checkins.map((checkin) => checkin.uri), [checkinUri("good")]);
  assert.deepEqual(page.skipped, [checkinUri("broken"), checkinUri("orphan")]);
  assert.ok(
    logger.messages("warn").includes(
      `⚠️ Skipping checkin ${checkinUri("orphan")}: Checkin record is missing location data: ${
        checkinUri("orphan")
      }`,
    ),
  );
});

test("CheckinReader - passes limit and cursor through", async () => {
  const { pds, reader } = setup();
  await seed(pds, "a");
  await seed(pds, "b");
  await seed(pds, "c");

  const page = await reader.listCheckins(TEST_DID, { limit: 2, cursor: "1" });

  assert.deepEqual(page.checkins.map((checkin) => checkin.uri), [
    checkinUri("b"),
    checkinUri("c"),
  ]);
  assert.equal(page.cursor, undefined);
  assert.deepEqual(pds.callsTo("com.atproto.repo.listRecords")[0].query, {
    repo: TEST_DID,
    collection: "app.dropanchor.checkin",
    limit: "2",
    cursor: "1",
  });
});

test("CheckinReader - cancellation is checked between records", async () => {
  const controller = new AbortController();
  const reason = new Error("feed closed");
  const { pds, reader } = setup((pds) => async (url, init) => {
    const response = await pds.fetch(url, init);
    if (url.includes("com.atproto.repo.getRecord")) {
      controller.abort(reason);
    }
    return response;
  });
  await seed(pds, "a");
  await seed(pds, "b");

  await assert.rejects(
    reader.listCheckins(TEST_DID, { signal: controller.signal }),
    (error: unknown) => error === reason,
  );
  assert.equal(pds.callsTo("com.atproto.repo.getRecord").length, 1);
});

test("CheckinReader - transport failures are not skipped", async () => {
  const { pds, reader } = setup();
  await seed(pds, "a");
  pds.failNext("com.atproto.repo.getRecord", { status: 0, network: true });

  await assert.rejects(reader.listCheckins(TEST_DID), NetworkError);
});
