import assert from "node:assert/strict";
import test from "node:test";
import { createFakeTimers } from "../testing/fakeTimers.js";
import { flushAsync } from "../testing/flush.js";
import { WriteError } from "./errors.js";
import { startKeepalive } from "./keepalive.js";

test("sends one ping per interval", async () => {
  const timers = createFakeTimers();
  const sent: string[] = [];
  const failures: unknown[] = [];

  startKeepalive({
    connection: {
      send: async (text) => {
        sent.push(text);
      }
    },
    onFailure: (error) => failures.push(error),
    timers
  });

  timers.advance(9_999);
  assert.deepEqual(sent, []);

  for (let round = 0; round < 3; round += 1) {
    timers.advance(10_000);
    await flushAsync();
  }

  assert.deepEqual(sent, ["/ping", "/ping", "/ping"]);
  assert.deepEqual(failures, []);
});

test("a failed ping is reported once and ends the loop", async () => {
  const timers = createFakeTimers();
  const failure = new WriteError("connection is not open");
  const failures: unknown[] = [];
  let attempts = 0;

  startKeepalive({
    connection: {
      send: async () => {
        attempts += 1;
        throw failure;
      }
    },
    onFailure: (error) => failures.push(error),
    timers
  });

  timers.advance(10_000);
  await flushAsync();
  timers.advance(60_000);
  await flushAsync();

  assert.equal(attempts, 1);
  assert.deepEqual(failures, [failure]);
  assert.equal(timers.pendingCount(), 0);
});

test("stop prevents further pings", async () => {
  const timers = createFakeTimers();
  const sent: string[] = [];

  const keepalive = startKeepalive({
    connection: {
      send: async (text) => {
        sent.push(text);
      }
    },
    onFailure: () => undefined,
    timers
  });

  timers.advance(10_000);
  await flushAsync();
  keepalive.stop();
  timers.advance(30_000);
  await flushAsync();

  assert.deepEqual(sent, ["/ping"]);
  assert.equal(timers.pendingCount(), 0);
});
