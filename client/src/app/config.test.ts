import assert from "node:assert/strict";
import test from "node:test";
import { createClientConfig, resolveServerUrl } from "./config.js";
import { DEFAULT_SERVER_URL } from "./constants.js";

test("resolveServerUrl falls back to the default endpoint", () => {
  assert.equal(resolveServerUrl([]), DEFAULT_SERVER_URL);
  assert.equal(resolveServerUrl(["   "]), DEFAULT_SERVER_URL);
});

test("resolveServerUrl takes the first positional argument", () => {
  assert.equal(resolveServerUrl(["ws://localhost:3000/ws/anagram/2", "extra"]), "ws://localhost:3000/ws/anagram/2");
});

test("createClientConfig returns frozen layout settings", () => {
  const config = createClientConfig(["ws://localhost:9000"]);

  assert.equal(config.serverUrl, "ws://localhost:9000");
  assert.equal(config.width, 56);
  assert.equal(config.chatHeight, 12);
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.colors), true);
});
