/**
 * Leveled console logging; DEBUG lines need REALTIME_DEBUG=1
 */

import { config } from "../config.js";
import type { ServerFrame } from "../../../../packages/protocol/src/types.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

// Looked up per call so console can be replaced at runtime
const WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.log(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

/**
 * One log line: `[timestamp] [LEVEL] message {meta}`
 *
 * Binary meta (audio, raw payloads) is summarized by size.
 */
export function formatLine(
  level: LogLevel,
  message: string,
  meta?: unknown,
  now: Date = new Date()
): string {
  let suffix = "";
  if (Buffer.isBuffer(meta)) {
    suffix = ` <${meta.length} bytes>`;
  } else if (meta !== undefined) {
    suffix = ` ${JSON.stringify(meta)}`;
  }
  return `[${now.toISOString()}] [${level}] ${message}${suffix}`;
}

export class Logger {
  private threshold: LogLevel;

  constructor(
    threshold: LogLevel = config.debug ? LogLevel.DEBUG : LogLevel.INFO
  ) {
    this.threshold = threshold;
  }

  private get debugEnabled(): boolean {
    return this.threshold === LogLevel.DEBUG;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) return;
    WRITERS[level](formatLine(level, message, meta));
  }

  /**
   * Debug logs (only when REALTIME_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  /**
   * Log connection event
   */
  connection(connectionId: string, event: string, meta?: unknown): void {
    const message = `[${connectionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Log frame details (debug only)
   */
  frame(connectionId: string, frame: ServerFrame): void {
    if (!this.debugEnabled) return;

    const { header } = frame;
    const details: Record<string, unknown> = {
      type: frame.messageType,
      flags: `0b${header.flags.toString(2).padStart(4, "0")}`,
      serialization: header.serialization,
      compression: header.compression,
    };

    switch (frame.messageType) {
      case "SERVER_FULL_RESPONSE":
      case "SERVER_ACK":
        details.event = frame.event;
        details.seq = frame.seq;
        details.sessionId = frame.sessionId;
        details.payloadSize = `${frame.payloadSize}B`;
        break;
      case "SERVER_ERROR_RESPONSE":
        details.code = frame.code;
        details.payloadSize = `${frame.payloadSize}B`;
        break;
      default:
        details.rawType = frame.rawType;
    }

    this.debug(`[${connectionId}] ← Frame`, details);
  }

  /**
   * Log state transition (debug only)
   */
  stateTransition(connectionId: string, to: string): void {
    this.debug(`[${connectionId}] State → ${to}`);
  }
}

export const logger = new Logger();
