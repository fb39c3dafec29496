import { randomUUID } from "crypto";
import { Connection } from "../../../packages/transport/src/connection/connection.js";
import { openSocket } from "../../../packages/transport/src/connection/socket.js";
import type { FrameSocket } from "../../../packages/transport/src/connection/socket.js";
import { config as defaultConfig } from "./config.js";
import type { RealtimeConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { logger as defaultLogger } from "./observability/logger.js";
import type { Logger } from "./observability/logger.js";
import { metrics as defaultMetrics } from "./observability/metrics.js";
import type { Metrics } from "./observability/metrics.js";
import { RealtimeSession, buildStartSessionRequest } from "./session.js";
import type { StartSessionOptions } from "./session.js";

export const RESOURCE_ID = "volc.speech.dialog";

export type ConnectOptions = Partial<Omit<StartSessionOptions, "speaker">> & {
  speaker?: string;
};

export type SocketOpener = (
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
) => Promise<{ socket: FrameSocket; logId?: string }>;

/**
 * Build the WebSocket handshake headers
 */
export function buildHeaders(
  config: RealtimeConfig,
  connectId: string
): Record<string, string> {
  const missing = [
    ["MODEL_REALTIME_API_KEY", config.apiKey],
    ["MODEL_REALTIME_APP_ID", config.appId],
    ["MODEL_REALTIME_APP_KEY", config.appKey],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);

  if (missing.length > 0) {
    throw new ConfigError(`Missing configuration: ${missing.join(", ")}`);
  }

  return {
    "X-Api-App-ID": config.appId,
    "X-Api-Access-Key": config.apiKey,
    "X-Api-Resource-Id": RESOURCE_ID,
    "X-Api-App-Key": config.appKey,
    "X-Api-Connect-Id": connectId,
  };
}

/**
 * RealtimeClient - opens dialog sessions against the realtime voice service
 */
export class RealtimeClient {
  private config: RealtimeConfig;
  private logger: Logger;
  private metrics: Metrics;
  private open: SocketOpener;

  constructor(
    options: {
      config?: RealtimeConfig;
      logger?: Logger;
      metrics?: Metrics;
      openSocket?: SocketOpener;
    } = {}
  ) {
    this.config = options.config ?? defaultConfig;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.open = options.openSocket ?? openSocket;
  }

  /**
   * Connect, then run StartConnection and StartSession
   */
  async connect(options: ConnectOptions = {}): Promise<RealtimeSession> {
    const connectId = randomUUID();
    const headers = buildHeaders(this.config, connectId);

    this.logger.info(`Connecting to ${this.config.apiBase}`);
    const { socket, logId } = await this.open(
      this.config.apiBase,
      headers,
      this.config.connectTimeout
    );
    this.logger.info("Dialog server response logid", { logId });

    const connection = new Connection(socket, connectId);
    const session = new RealtimeSession(connection, {
      logger: this.logger,
      metrics: this.metrics,
    });

    try {
      await session.startConnection();
      await session.startSession(
        buildStartSessionRequest({
          ...options,
          speaker: options.speaker ?? this.config.speaker,
          recvTimeout: options.recvTimeout ?? this.config.recvTimeout,
        })
      );
    } catch (err) {
      session.close("handshake failed");
      throw err;
    }

    this.logger.connection(connectId, "Session started", {
      sessionId: session.sessionId,
    });
    return session;
  }
}
