/**
 * Protocol Type Definitions
 */

import type {
  CompressionType,
  MessageType,
  SerializationMethod,
} from "./constants.js";
import type { ProtocolError } from "./errors.js";

/**
 * The fixed 4-byte header plus any extension bytes
 */
export type FrameHeader = {
  version: number;
  headerSize: number; // In 4-byte units
  messageType: number; // MessageType, or an unknown nibble value
  flags: number; // MessageTypeFlags bitmask
  serialization: number;
  compression: number;
  reserved: number;
  extensionHeader: Buffer;
};

/**
 * Options for building a header (all fields have protocol defaults)
 */
export type HeaderOptions = {
  messageType?: MessageType;
  flags?: number;
  serialization?: SerializationMethod;
  compression?: CompressionType;
  extensionHeader?: Uint8Array;
};

/**
 * Fields shared by full responses and acks
 */
type SessionFrameFields = {
  header: FrameHeader;
  seq?: number;
  event?: number;
  sessionId: string; // Byte-literal rendering, e.g. b'session123'
  sessionIdBytes: Buffer;
  payloadSize: number;
  payloadMsg: unknown; // JSON value, or Buffer for raw payloads
};

export type FullResponseFrame = SessionFrameFields & {
  messageType: "SERVER_FULL_RESPONSE";
};

export type AckFrame = SessionFrameFields & {
  messageType: "SERVER_ACK";
};

export type ErrorResponseFrame = {
  messageType: "SERVER_ERROR_RESPONSE";
  header: FrameHeader;
  code: number;
  payloadSize: number;
  payloadMsg: unknown;
};

/**
 * Any message type the decoder has no field layout for
 */
export type OtherFrame = {
  messageType: "CLIENT_FULL_REQUEST" | "CLIENT_AUDIO_ONLY_REQUEST" | "UNKNOWN";
  header: FrameHeader;
  rawType: number;
};

export type ServerFrame =
  | FullResponseFrame
  | AckFrame
  | ErrorResponseFrame
  | OtherFrame;

/**
 * Outcome of decoding one received buffer. Framing problems are returned,
 * never thrown.
 */
export type ParseResult =
  | { ok: true; frame: ServerFrame }
  | { ok: false; error: ProtocolError };

/**
 * Options for building an outgoing request frame
 */
export type RequestOptions = HeaderOptions & {
  sequence?: number;
  event?: number;
  sessionId?: string;
  payload?: unknown; // Buffer for NO_SERIALIZATION, JSON value for JSON
};

/**
 * Frame encoding result
 */
export type EncodedFrame = {
  buffer: Buffer; // Complete frame ready to send
};
