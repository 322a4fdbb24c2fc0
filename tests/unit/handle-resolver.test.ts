import { test } from "node:test";
import assert from "node:assert/strict";
import type { FetchLike } from "../../src/records/pds-client.js";
import {
  batchResolveHandles,
  normalizeHandle,
  XrpcHandleResolver,
} from "../../src/utils/handle-resolver.js";
import { MemoryLogger } from "../../src/utils/logger.js";
import { FakePds, jsonResponse } from "../mocks/fake-pds.js";

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
  const pds = new FakePds();
  pds.handles.set("alice.bsky.social", "did:plc:alice");
  pds.handles.set("bob.example.com", "did:web:bob.example.com");
  const logger = new MemoryLogger();
  const resolver = new XrpcHandleResolver("https://pds.test", { fetch: pds.fetch, logger });
  return { pds, logger, resolver };
}

test("normalizeHandle - strips @ and lowercases", () => {
  assert.equal(normalizeHandle("@Alice.Bsky.Social"), "alice.bsky.social");
  assert.equal(normalizeHandle("bob.example.com"), "bob.example.com");
});

test("XrpcHandleResolver - resolves a handle to its DID", async () => {
  const { pds, resolver } = setup();

  assert.equal(await resolver.resolveHandle("@Alice.bsky.social"), "did:plc:alice");
  assert.deepEqual(pds.callsTo("com.atproto.identity.resolveHandle")[0].query, {
    handle: "alice.bsky.social",
  });
});

test("XrpcHandleResolver - caches resolved handles", async () => {
  const { pds, resolver } = setup();

  await resolver.resolveHandle("alice.bsky.social");
  await resolver.resolveHandle("@alice.bsky.social");

  assert.equal(pds.callsTo("com.atproto.identity.resolveHandle").length, 1);
});

test("XrpcHandleResolver - invalid handles never hit the network", async () => {
  const { pds, resolver } = setup();

  for (const handle of ["", "nodot", ".starts.with.dot", "double..dot.com", "sp ace.com"]) {
    assert.equal(await resolver.resolveHandle(handle), null);
  }
  assert.equal(pds.calls.length, 0);
});

test("XrpcHandleResolver - unknown handles resolve to null", async () => {
  const { resolver, logger } = setup();

  assert.equal(await resolver.resolveHandle("ghost.bsky.social"), null);
  assert.deepEqual(logger.messages("warn"), [
    "Handle resolution failed for ghost.bsky.social: 400",
  ]);
});

test("XrpcHandleResolver - transport errors resolve to null", async () => {
  const { pds, resolver, logger } = setup();
  pds.failNext("com.atproto.identity.resolveHandle", { status: 0, network: true });

  assert.equal(await resolver.resolveHandle("alice.bsky.social"), null);
  assert.deepEqual(logger.messages("error"), [
    "Failed to resolve handle alice.bsky.social:",
  ]);
});

test("XrpcHandleResolver - bodies without a DID resolve to null", async () => {
  const logger = new MemoryLogger();
  const resolver = new XrpcHandleResolver("https://pds.test", {
    fetch: () => Promise.resolve(jsonResponse({ did: "alice" })),
    logger,
  });

  assert.equal(await resolver.resolveHandle("alice.bsky.social"), null);
  assert.deepEqual(logger.messages("warn"), [
    "Unexpected resolveHandle body for alice.bsky.social",
  ]);
});

test("batchResolveHandles - dedupes and omits failures", async () => {
  const { pds, resolver } = setup();

  const resolved = await batchResolveHandles(resolver, [
    "alice.bsky.social",
    "@ALICE.bsky.social",
    "bob.example.com",
    "ghost.bsky.social",
  ]);

  assert.deepEqual(
    [...resolved.entries()].sort(),
    [
      ["alice.bsky.social", "did:plc:alice"],
      ["bob.example.com", "did:web:bob.example.com"],
    ],
  );
  assert.equal(pds.callsTo("com.atproto.identity.resolveHandle").length, 3);
});

test("XrpcHandleResolver - a stalled AppView times out to null", async () => {
  const logger = new MemoryLogger();
  const resolver = new XrpcHandleResolver("https://pds.test", {
    fetch: hangingFetch,
    logger,
    requestTimeoutMs: 10,
  });

  // AbortSignal.timeout timers are unref'd; hold the event loop open meanwhile
  const keepAlive = setTimeout(() => {}, 5_000);
  try {
    assert.equal(await resolver.resolveHandle("alice.bsky.social"), null);
  } finally {
    clearTimeout(keepAlive);
  }
  assert.deepEqual(logger.messages("error"), ["Failed to resolve handle alice.bsky.social:"]);
});

test("batchResolveHandles - caller cancellation rethrows the abort reason", async () => {
  const resolver = new XrpcHandleResolver("https://pds.test", {
    fetch: hangingFetch,
    logger: new MemoryLogger(),
  });
  const controller = new AbortController();
  const reason = new Error("post discarded");
  controller.abort(reason);

  await assert.rejects(
    batchResolveHandles(resolver, ["alice.bsky.social"], controller.signal),
    (error: unknown) => error === reason,
  );
});
