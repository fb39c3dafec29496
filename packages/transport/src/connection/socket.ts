import { EventEmitter } from "events";
import type { IncomingMessage } from "http";
import WebSocket from "ws";

/**
 * The subset of a WebSocket the Connection relies on.
 *
 * `ws` clients satisfy it; tests substitute an in-process fake.
 */
export interface FrameSocket extends EventEmitter {
  readonly readyState: number;
  send(data: Buffer, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export type OpenedSocket = {
  socket: WebSocket;
  logId?: string; // X-Tt-Logid from the upgrade response
};

/**
 * Open a WebSocket with handshake headers
 *
 * Resolves once the socket is open; rejects on error or timeout.
 */
export function openSocket(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<OpenedSocket> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, { headers });
    let logId: string | undefined;

    const timeout = setTimeout(() => {
      socket.terminate();
      reject(new Error(`WebSocket connection timeout after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once("upgrade", (response: IncomingMessage) => {
      const header = response.headers["x-tt-logid"];
      logId = Array.isArray(header) ? header[0] : header;
    });

    socket.once("open", () => {
      clearTimeout(timeout);
      resolve({ socket, logId });
    });

    socket.once("error", (err) => {
      clearTimeout(timeout);
      reject(err);
    });
  });
}
