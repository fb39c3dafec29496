import { EventEmitter } from "events";
import type WebSocket from "ws";
import { parseResponse } from "../../../protocol/src/frame.js";
import { MAX_FRAME_SIZE } from "../../../protocol/src/constants.js";
import type { FrameSocket } from "./socket.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export type ConnectionError = {
  type: "transport" | "protocol";
  reason: string;
  fatal: boolean;
};

export type ConnectionStats = {
  reason?: string;
  bytesSent: number;
  bytesReceived: number;
  framesReceived: number;
  framesDropped: number;
};

// WebSocket readyState for an open socket
const SOCKET_OPEN = 1;

/**
 * Connection represents one dialog WebSocket's lifecycle.
 *
 * Responsibilities:
 * - Decoding each received binary message into a frame
 * - Dropping undecodable messages without tearing the connection down
 * - State machine enforcement (INIT → OPEN → CLOSING → CLOSED)
 * - Event emission for decoded frames
 *
 * Does NOT:
 * - Interpret dialog events
 * - Track sessions or sequence numbers
 */
export class Connection extends EventEmitter {
  private socket: FrameSocket;
  private state: ConnectionState = ConnectionState.INIT;
  public readonly connectionId: string;

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private framesReceived: number = 0;
  private framesDropped: number = 0;
  private closeReason?: string;

  constructor(socket: FrameSocket, connectionId: string) {
    super();
    this.socket = socket;
    this.connectionId = connectionId;
    this.wireSocket();

    if (socket.readyState === SOCKET_OPEN) {
      this.transition(ConnectionState.OPEN);
      this.emit("open", connectionId);
    } else {
      this.socket.once("open", () => {
        if (this.state !== ConnectionState.INIT) return;
        this.transition(ConnectionState.OPEN);
        this.emit("open", connectionId);
      });
    }
  }

  /**
   * Bind socket events to Connection behavior
   */
  private wireSocket(): void {
    // Message event
    this.socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.state === ConnectionState.CLOSED) return;
      this.onMessage(data, isBinary);
    });

    // Close event
    this.socket.on("close", (code: number, reason: Buffer) => {
      const text = reason.toString("utf8");
      this.handleClose(text.length > 0 ? `${code} ${text}` : `${code}`);
    });

    // Error event
    this.socket.on("error", (err: Error) => {
      this.emit("error", {
        type: "transport",
        reason: err.message,
        fatal: true,
      });
      this.close();
    });
  }

  /**
   * Handle one WebSocket message
   *
   * Every binary message carries exactly one frame.
   */
  private onMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (!isBinary) {
      // Dialog servers only speak binary frames
      this.framesDropped++;
      return;
    }

    const size = messageSize(data);
    this.bytesReceived += size;

    // Safety check: prevent memory exhaustion
    if (size > MAX_FRAME_SIZE) {
      this.emit("error", {
        type: "protocol",
        reason: `Frame exceeded limit: ${size} bytes`,
        fatal: true,
      });
      this.close();
      return;
    }

    const result = parseResponse(data);

    if (result === null) {
      this.framesDropped++;
      return;
    }

    if (!result.ok) {
      // Reported, not fatal
      this.framesDropped++;
      this.emit("error", {
        type: "protocol",
        reason: `${result.error.name}: ${result.error.message}`,
        fatal: false,
      });
      return;
    }

    this.framesReceived++;
    this.emit("frame", result.frame);
  }

  /**
   * Send an encoded frame to the server
   */
  send(buffer: Buffer): void {
    if (this.state !== ConnectionState.OPEN) {
      // Silently drop if not in writable state
      return;
    }

    this.bytesSent += buffer.length;

    this.socket.send(buffer, (err) => {
      if (err) {
        this.emit("error", {
          type: "transport",
          reason: err.message,
          fatal: false,
        });
      }
    });
  }

  /**
   * Close the connection gracefully
   */
  close(reason?: string): void {
    if (
      this.state === ConnectionState.CLOSING ||
      this.state === ConnectionState.CLOSED
    ) {
      return;
    }

    this.closeReason = reason;
    this.transition(ConnectionState.CLOSING);
    this.socket.close(1000, reason);
  }

  /**
   * Handle socket close event
   */
  private handleClose(socketReason: string): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      reason: this.closeReason ?? socketReason,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesReceived: this.framesReceived,
      framesDropped: this.framesDropped,
    });
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    // Enforce state machine rules
    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.OPEN]: [ConnectionState.CLOSING, ConnectionState.CLOSED],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesReceived: this.framesReceived,
      framesDropped: this.framesDropped,
    };
  }
}

function messageSize(data: WebSocket.RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((total, chunk) => total + chunk.length, 0);
  }
  return data.byteLength;
}
