/**
 * WebSocketTransport / TransportHub Tests
 *
 * Runs a hub on an ephemeral localhost port and talks to it through real
 * sockets.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { AddressInfo } from "net";
import { WebSocket, WebSocketServer } from "ws";
import { InMemoryTransport } from "./InMemoryTransport";
import { TransportHub } from "./TransportHub";
import { WebSocketTransport } from "./WebSocketTransport";
import { rawDataToString } from "./protocol";
import { TransportError } from "../errors";

const quiet = { log: () => undefined, warn: () => undefined };

function portOf(address: AddressInfo | string | null): number {
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }
  return address.port;
}

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe("WebSocketTransport with TransportHub", () => {
  let fabric: InMemoryTransport;
  let hub: TransportHub;
  let wss: WebSocketServer;
  let url: string;
  let transports: WebSocketTransport[];

  const createTransport = (options: { autoReconnect?: boolean } = {}) => {
    const transport = new WebSocketTransport({
      url,
      reconnectBaseDelayMs: 20,
      reconnectMaxDelayMs: 100,
      requestTimeoutMs: 1000,
      autoReconnect: options.autoReconnect ?? true,
      logger: quiet,
    });
    transports.push(transport);
    return transport;
  };

  beforeEach(async () => {
    fabric = new InMemoryTransport();
    hub = new TransportHub(fabric, { logger: quiet });
    transports = [];

    wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
    wss.on("connection", (socket) => hub.addClient(socket));
    await new Promise<void>((resolve) => wss.once("listening", () => resolve()));

    url = `ws://127.0.0.1:${portOf(wss.address())}`;
  });

  afterEach(async () => {
    await Promise.all(transports.map((transport) => transport.close()));
    hub.dispose();
    await fabric.close();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });

  it("routes a publish from one client to a subscriber on another", async () => {
    const subscriber = createTransport();
    const publisher = createTransport();
    await subscriber.connect();
    await publisher.connect();

    const received: string[] = [];
    await subscriber.subscribe("agents:results:t1", (message, topic) => {
      received.push(`${topic}|${message}`);
    });

    const receivers = await publisher.publish("agents:results:t1", "done");
    await waitFor(() => received.length === 1);

    assert.equal(receivers, 1);
    assert.deepEqual(received, ["agents:results:t1|done"]);
  });

  it("shares topics between remote clients and in-process subscribers", async () => {
    const client = createTransport();
    await client.connect();

    const local: string[] = [];
    fabric.subscribeSync("agents:tasks", (message) => {
      local.push(message);
    });

    assert.equal(await client.publish("agents:tasks", "task-1"), 1);
    assert.deepEqual(local, ["task-1"]);

    const remote: string[] = [];
    await client.subscribe("agents:progress:t1", (message) => {
      remote.push(message);
    });
    assert.equal(fabric.publishSync("agents:progress:t1", "step"), 1);
    await waitFor(() => remote.length === 1);
    assert.deepEqual(remote, ["step"]);
  });

  it("keeps the hub subscription until the last local handler unsubscribes", async () => {
    const client = createTransport();
    await client.connect();

    const first = await client.subscribe("topic", () => undefined);
    const second = await client.subscribe("topic", () => undefined);
    assert.equal(fabric.getSubscriberCount("topic"), 1);

    await first.unsubscribe();
    assert.equal(fabric.getSubscriberCount("topic"), 1);

    await second.unsubscribe();
    assert.equal(fabric.getSubscriberCount("topic"), 0);
  });

  it("rejects requests made before connecting", async () => {
    const client = createTransport();

    await assert.rejects(() => client.publish("topic", "hello"), TransportError);
    await assert.rejects(() => client.subscribe("topic", () => undefined), TransportError);
  });

  it("rejects connect when the hub is unreachable", async () => {
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    wss = new WebSocketServer({ noServer: true });

    const client = createTransport();
    await assert.rejects(() => client.connect(), TransportError);
  });

  it("reconnects and re-subscribes after the hub drops the connection", async () => {
    const client = createTransport();
    await client.connect();

    const received: string[] = [];
    await client.subscribe("agents:results:t2", (message) => {
      received.push(message);
    });
    assert.equal(fabric.getSubscriberCount("agents:results:t2"), 1);

    for (const socket of wss.clients) {
      socket.terminate();
    }
    await waitFor(() => fabric.getSubscriberCount("agents:results:t2") === 0);
    await waitFor(() => fabric.getSubscriberCount("agents:results:t2") === 1);

    fabric.publishSync("agents:results:t2", "after-reconnect");
    await waitFor(() => received.length === 1);

    assert.equal(client.isConnected(), true);
    assert.deepEqual(received, ["after-reconnect"]);
  });

  it("answers a malformed frame with an error frame", async () => {
    const socket = new WebSocket(url);
    const frames: unknown[] = [];
    socket.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      frames.push(JSON.parse(rawDataToString(data)));
    });
    await new Promise<void>((resolve) => socket.once("open", () => resolve()));

    socket.send("not json");
    await waitFor(() => frames.length === 2);

    assert.deepEqual(frames[1], { type: "error", error: "Invalid frame: expected JSON" });

    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.close();
    });
  });
});
