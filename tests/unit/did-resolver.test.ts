import { test } from "node:test";
import assert from "node:assert/strict";
import type { FetchLike } from "../../src/records/pds-client.js";
import { createPdsResolver } from "../../src/utils/did-resolver.js";
import { MemoryLogger } from "../../src/utils/logger.js";
import { jsonResponse } from "../mocks/fake-pds.js";

const documents = new Map<string, unknown>([
  ["https://plc.test/did:plc:alice", {
    id: "did:plc:alice",
    service: [
      { id: "#atproto_labeler", type: "AtprotoLabeler", serviceEndpoint: "https://labels.test" },
      { id: "#atproto_pds", type: "AtprotoPersonalDataServer", serviceEndpoint: "https://alice-pds.test" },
    ],
  }],
  ["https://plc.test/did:plc:noservice", { id: "did:plc:noservice" }],
]);

const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      reject(new Error("request had no signal"));
      return;
    }
    signal.throwIfAborted();
    signal.addEventListener("abort", () => reject(signal.reason));
  });

function setup() {
  const requested: string[] = [];
  const fetch: FetchLike = (url) => {
    requested.push(url);
    const document = documents.get(url);
    return Promise.resolve(
      document ? jsonResponse(document) : jsonResponse({ message: "DID not registered" }, 404),
    );
  };
  const logger = new MemoryLogger();
  const resolve = createPdsResolver({ plcDirectoryUrl: "https://plc.test", fetch, logger });
  return { requested, logger, resolve };
}

test("createPdsResolver - finds the PDS endpoint and caches it", async () => {
  const { requested, resolve } = setup();

  assert.equal(await resolve("did:plc:alice"), "https://alice-pds.test");
  assert.equal(await resolve("did:plc:alice"), "https://alice-pds.test");
  assert.deepEqual(requested, ["https://plc.test/did:plc:alice"]);
});

test("createPdsResolver - unknown DIDs and documents without a PDS are null", async () => {
  const { requested, logger, resolve } = setup();

  assert.equal(await resolve("did:plc:missing"), null);
  assert.equal(await resolve("did:plc:noservice"), null);
  assert.equal(await resolve("did:plc:missing"), null);

  assert.equal(requested.length, 3);
  assert.deepEqual(logger.messages("warn"), [
    "PLC directory lookup failed for did:plc:missing: 404",
    "No PDS service found in DID document for did:plc:noservice",
    "PLC directory lookup failed for did:plc:missing: 404",
  ]);
});

test("createPdsResolver - other DID methods are not looked up", async () => {
  const { requested, resolve } = setup();

  assert.equal(await resolve("did:web:example.com"), null);
  assert.equal(requested.length, 0);
});

test("createPdsResolver - a stalled directory times out to null", async () => {
  const logger = new MemoryLogger();
  const resolve = createPdsResolver({
    plcDirectoryUrl: "https://plc.test",
    requestTimeoutMs: 10,
    fetch: hangingFetch,
    logger,
  });

  // AbortSignal.timeout timers are unref'd; hold the event loop open meanwhile
  const keepAlive = setTimeout(() => {}, 5_000);
  try {
    assert.equal(await resolve("did:plc:alice"), null);
  } finally {
    clearTimeout(keepAlive);
  }
  assert.deepEqual(logger.messages("error"), ["Failed to resolve DID to PDS: did:plc:alice"]);
});

test("createPdsResolver - caller cancellation rethrows the abort reason", async () => {
  const resolve = createPdsResolver({
    plcDirectoryUrl: "https://plc.test",
    fetch: hangingFetch,
    logger: new MemoryLogger(),
  });
  const controller = new AbortController();
  const reason = new Error("feed closed");
  controller.abort(reason);

  await assert.rejects(
    resolve("did:plc:alice", controller.signal),
    (error: unknown) => error === reason,
  );
});
