import { randomUUID } from "crypto";
import { encodeRequest } from "../../../packages/protocol/src/frame.js";
import {
  CompressionType,
  MessageType,
  MessageTypeFlags,
  SerializationMethod,
} from "../../../packages/protocol/src/constants.js";
import { ClientEvent } from "../../../packages/protocol/src/events.js";
import type { ServerFrame } from "../../../packages/protocol/src/types.js";
import type {
  Connection,
  ConnectionError,
  ConnectionStats,
} from "../../../packages/transport/src/connection/connection.js";
import { clampRecvTimeout } from "./config.js";
import { SessionError } from "./errors.js";
import { toServerMessage } from "./messages.js";
import type { ServerMessage } from "./messages.js";
import { logger as defaultLogger } from "./observability/logger.js";
import type { Logger } from "./observability/logger.js";
import { metrics as defaultMetrics } from "./observability/metrics.js";
import type { Metrics } from "./observability/metrics.js";

export const DEFAULT_SYSTEM_ROLE =
  "You use a lively voice, have an outgoing personality, and love life.";
export const DEFAULT_SPEAKING_STYLE =
  "Your speaking style is concise and clear, with a moderate pace and natural intonation.";
export const DEFAULT_AUDIT_RESPONSE =
  "Support customize security audit response scripts.";

export type StartSessionOptions = {
  speaker: string;
  systemRole?: string;
  botName?: string;
  speakingStyle?: string;
  recvTimeout?: number; // seconds
  inputMod?: "audio" | "text" | "audio_file";
};

export type StartSessionRequest = {
  asr: { extra: { end_smooth_window_ms: number } };
  tts: {
    speaker: string;
    audio_config: { channel: number; format: string; sample_rate: number };
  };
  dialog: {
    bot_name: string;
    system_role: string;
    speaking_style: string;
    extra: {
      strict_audit: boolean;
      audit_response: string;
      recv_timeout: number;
      input_mod: string;
    };
  };
};

/**
 * Build the StartSession payload
 */
export function buildStartSessionRequest(
  options: StartSessionOptions
): StartSessionRequest {
  return {
    asr: { extra: { end_smooth_window_ms: 1500 } },
    tts: {
      speaker: options.speaker,
      audio_config: { channel: 1, format: "pcm_s16le", sample_rate: 24000 },
    },
    dialog: {
      bot_name: options.botName ?? "assistant",
      system_role: options.systemRole ?? DEFAULT_SYSTEM_ROLE,
      speaking_style: options.speakingStyle ?? DEFAULT_SPEAKING_STYLE,
      extra: {
        strict_audit: false,
        audit_response: DEFAULT_AUDIT_RESPONSE,
        recv_timeout: clampRecvTimeout(options.recvTimeout ?? 120),
        input_mod: options.inputMod ?? "audio",
      },
    },
  };
}

export type SessionOptions = {
  sessionId?: string;
  logger?: Logger;
  metrics?: Metrics;
};

type FrameWaiter = (frame: ServerFrame | null) => void;

/**
 * RealtimeSession drives one dialog over an open Connection.
 *
 * Frames arrive as events; they are queued until the handshake or the
 * receive() iterator asks for them.
 */
export class RealtimeSession {
  readonly sessionId: string;
  private connection: Connection;
  private logger: Logger;
  private metrics: Metrics;
  private queue: ServerFrame[] = [];
  private waiters: FrameWaiter[] = [];
  private closed: boolean = false;

  constructor(connection: Connection, options: SessionOptions = {}) {
    this.connection = connection;
    this.sessionId = options.sessionId ?? randomUUID();
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.wireConnection();
  }

  /**
   * Bind connection events to the frame queue
   */
  private wireConnection(): void {
    const id = this.connection.connectionId;

    this.connection.on("frame", (frame: ServerFrame) => {
      this.metrics.frameReceived();
      this.logger.frame(id, frame);

      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(frame);
      } else {
        this.queue.push(frame);
      }
    });

    this.connection.on("error", (error: ConnectionError) => {
      if (error.type === "protocol" && !error.fatal) {
        this.metrics.frameDropped();
        this.logger.warn(`[${id}] Dropped frame`, { reason: error.reason });
      } else {
        this.logger.error(`[${id}] Connection error`, error);
      }
    });

    this.connection.on("state", (state: string) => {
      this.logger.stateTransition(id, state);
    });

    this.connection.on("close", (stats: ConnectionStats) => {
      this.logger.connection(id, "Closed", stats);
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(null);
      }
    });
  }

  /**
   * Next frame from the server, or null once the connection has closed
   */
  private nextFrame(): Promise<ServerFrame | null> {
    const frame = this.queue.shift();
    if (frame) return Promise.resolve(frame);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Send StartConnection and wait for the server's reply
   */
  async startConnection(): Promise<ServerFrame> {
    const { buffer } = encodeRequest({
      event: ClientEvent.START_CONNECTION,
      payload: {},
    });
    this.connection.send(buffer);
    return this.awaitReply("StartConnection");
  }

  /**
   * Send StartSession and wait for the server's reply
   */
  async startSession(request: StartSessionRequest): Promise<ServerFrame> {
    const { buffer } = encodeRequest({
      event: ClientEvent.START_SESSION,
      sessionId: this.sessionId,
      payload: request,
    });
    this.connection.send(buffer);
    return this.awaitReply("StartSession");
  }

  private async awaitReply(step: string): Promise<ServerFrame> {
    const frame = await this.nextFrame();
    if (frame === null) {
      throw new SessionError(`Connection closed during ${step}`);
    }

    if (frame.messageType === "SERVER_ERROR_RESPONSE") {
      const { error } = toServerMessage(frame, this.logger);
      throw new SessionError(
        `${step} rejected: ${error?.message ?? ""}`,
        frame.code
      );
    }

    this.logger.info(`${step} response`, {
      type: frame.messageType,
      ...("event" in frame && { event: frame.event }),
    });
    return frame;
  }

  /**
   * Stream one chunk of microphone audio (raw PCM)
   */
  sendAudio(chunk: Uint8Array): void {
    const { buffer } = encodeRequest({
      messageType: MessageType.CLIENT_AUDIO_ONLY_REQUEST,
      flags: MessageTypeFlags.MSG_WITH_EVENT,
      serialization: SerializationMethod.NO_SERIALIZATION,
      compression: CompressionType.GZIP,
      event: ClientEvent.TASK_REQUEST,
      sessionId: this.sessionId,
      payload: chunk,
    });
    this.connection.send(buffer);
    this.metrics.audioSent(chunk.length);
  }

  /**
   * Server messages in arrival order, ending when the connection closes
   */
  async *receive(): AsyncGenerator<ServerMessage> {
    while (true) {
      const frame = await this.nextFrame();
      if (frame === null) return;

      const message = toServerMessage(frame, this.logger);
      this.metrics.messageProcessed();

      const audio = message.serverContent.modelTurn?.parts[0]?.inlineData.data;
      if (audio) {
        this.metrics.audioReceived(audio.length);
      }

      yield message;
    }
  }

  /**
   * Close the underlying connection
   */
  close(reason?: string): void {
    this.connection.close(reason);
  }
}
