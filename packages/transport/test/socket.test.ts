import { once } from "events";
import type { IncomingMessage } from "http";
import { createServer } from "net";
import type { AddressInfo, Server, Socket } from "net";
import { afterEach, describe, expect, it } from "vitest";
import { WebSocketServer } from "ws";
import { openSocket } from "../src/connection/socket.js";

function portOf(address: AddressInfo | string | null): number {
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return address.port;
}

async function listen(options: {
  verifyClient?: () => boolean;
}): Promise<WebSocketServer> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1", ...options });
  await once(server, "listening");
  return server;
}

describe("openSocket", () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const cleanup of cleanups.splice(0)) {
      await cleanup();
    }
  });

  function closeOnExit(server: WebSocketServer): void {
    cleanups.push(
      () =>
        new Promise((resolve) => {
          for (const client of server.clients) client.terminate();
          server.close(() => resolve());
        })
    );
  }

  it("sends the handshake headers and resolves with the log id", async () => {
    const server = await listen({});
    closeOnExit(server);

    const received: IncomingMessage[] = [];
    server.on("headers", (headers: string[], request: IncomingMessage) => {
      received.push(request);
      headers.push("X-Tt-Logid: log-test");
    });

    const { socket, logId } = await openSocket(
      `ws://127.0.0.1:${portOf(server.address())}`,
      { "X-Api-App-ID": "test-app", "X-Api-Connect-Id": "connect-1" },
      2000
    );
    socket.close();

    expect(logId).toBe("log-test");
    expect(received).toHaveLength(1);
    expect(received[0]?.headers["x-api-app-id"]).toBe("test-app");
    expect(received[0]?.headers["x-api-connect-id"]).toBe("connect-1");
  });

  it("resolves without a log id when the server sends none", async () => {
    const server = await listen({});
    closeOnExit(server);

    const { socket, logId } = await openSocket(
      `ws://127.0.0.1:${portOf(server.address())}`,
      {},
      2000
    );
    socket.close();

    expect(logId).toBeUndefined();
  });

  it("rejects when the server refuses the upgrade", async () => {
    const server = await listen({ verifyClient: () => false });
    closeOnExit(server);

    await expect(
      openSocket(`ws://127.0.0.1:${portOf(server.address())}`, {}, 2000)
    ).rejects.toThrow("Unexpected server response: 401");
  });

  it("rejects when the handshake does not finish in time", async () => {
    // Accepts TCP connections and never answers the upgrade request
    const peers: Socket[] = [];
    const silent: Server = createServer((peer) => peers.push(peer));
    silent.listen(0, "127.0.0.1");
    await once(silent, "listening");
    cleanups.push(
      () =>
        new Promise((resolve) => {
          for (const peer of peers) peer.destroy();
          silent.close(() => resolve());
        })
    );

    await expect(
      openSocket(`ws://127.0.0.1:${portOf(silent.address())}`, {}, 100)
    ).rejects.toThrow("WebSocket connection timeout after 100ms");
  });
});
