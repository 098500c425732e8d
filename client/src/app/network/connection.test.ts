import assert from "node:assert/strict";
import test from "node:test";
import WebSocket, { WebSocketServer } from "ws";
import type { ServerFrame } from "../../../../shared/types.js";
import { connect } from "./connection.js";
import { ConnectError, ReadError, WriteError } from "./errors.js";

type TestServer = {
  url: string;
  nextClient: () => Promise<WebSocket>;
  received: string[];
  close: () => Promise<void>;
};

async function startTestServer(): Promise<TestServer> {
  const server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (typeof address === "string") {
    throw new Error(`expected a TCP address, got ${address}`);
  }
  const { port } = address;
  const received: string[] = [];

  server.on("connection", (client) => {
    client.on("message", (data) => received.push(data.toString()));
  });

  return {
    url: `ws://127.0.0.1:${port}/ws/anagram/1`,
    received,
    nextClient: () => new Promise((resolve) => server.once("connection", (client) => resolve(client))),
    close: () =>
      new Promise((resolve, reject) => {
        for (const client of server.clients) client.terminate();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

function sendFrame(client: WebSocket, frame: ServerFrame): void {
  client.send(JSON.stringify(frame));
}

test("reads frames in arrival order, including ones that arrive before the read", async (t) => {
  const server = await startTestServer();
  t.after(() => server.close());

  const clientPromise = server.nextClient();
  const connection = await connect(server.url);
  const client = await clientPromise;
  t.after(() => connection.close());

  sendFrame(client, { type: "ChatMessage", content: "first" });
  sendFrame(client, { type: "ChatMessage", content: "second" });

  assert.equal(await connection.read(), '{"type":"ChatMessage","content":"first"}');
  assert.equal(await connection.read(), '{"type":"ChatMessage","content":"second"}');

  const pending = connection.read();
  sendFrame(client, { type: "FinishedGame" });
  assert.equal(await pending, '{"type":"FinishedGame"}');
});

test("writes reach the server in the order they were sent", async (t) => {
  const server = await startTestServer();
  t.after(() => server.close());

  const connection = await connect(server.url);
  t.after(() => connection.close());

  await Promise.all([connection.send("apple"), connection.send("/ping"), connection.send("hello all")]);
  while (server.received.length < 3) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }

  assert.deepEqual(server.received, ["apple", "/ping", "hello all"]);
});

test("a closed connection fails reads with ReadError and writes with WriteError", async (t) => {
  const server = await startTestServer();
  t.after(() => server.close());

  const clientPromise = server.nextClient();
  const connection = await connect(server.url);
  const client = await clientPromise;

  const pending = connection.read();
  client.close(4000, "round over");

  await assert.rejects(pending, (error: unknown) => {
    assert.ok(error instanceof ReadError);
    assert.equal(error.message, "read: connection closed (4000 round over)");
    return true;
  });
  await assert.rejects(connection.read(), ReadError);
  await assert.rejects(connection.send("late"), (error: unknown) => {
    assert.ok(error instanceof WriteError);
    assert.equal(error.message, "write: connection is not open");
    return true;
  });
});

test("a second concurrent read is refused", async (t) => {
  const server = await startTestServer();
  t.after(() => server.close());

  const connection = await connect(server.url);
  t.after(() => connection.close());

  const first = connection.read();
  await assert.rejects(connection.read(), (error: unknown) => {
    assert.ok(error instanceof ReadError);
    assert.equal(error.message, "read: a read is already pending");
    return true;
  });

  connection.close();
  await assert.rejects(first, ReadError);
});

test("connect rejects with ConnectError when nothing is listening", async () => {
  const server = await startTestServer();
  const { url } = server;
  await server.close();

  await assert.rejects(connect(url), (error: unknown) => {
    assert.ok(error instanceof ConnectError);
    assert.equal(error.url, url);
    assert.ok(error.message.startsWith(`connect ${url}: `));
    return true;
  });
});

test("connect rejects with ConnectError for a malformed url", async () => {
  await assert.rejects(connect("not a url"), ConnectError);
});
