/**
 * Frame Encoding and Decoding
 *
 * A frame is a header (see header.ts) followed by type-dependent fields:
 * | sequence (4B, opt) | event (4B, opt) | session id len (4B) + bytes | payload size (4B) + bytes |
 *
 * Error responses replace the session and payload fields with:
 * | error code (4B) | message size (4B) + bytes |
 *
 * All numeric fields use Big Endian (network byte order).
 */

import {
  BASE_HEADER_SIZE,
  FIELD_SIZE,
  HEADER_UNIT_SIZE,
  MessageType,
  MessageTypeFlags,
  SerializationMethod,
  CompressionType,
  hasEvent,
  hasSequence,
} from "./constants.js";
import type {
  EncodedFrame,
  FrameHeader,
  OtherFrame,
  ParseResult,
  RequestOptions,
  ServerFrame,
} from "./types.js";
import { InvalidFrameError, ProtocolError } from "./errors.js";
import { generateHeader, readHeader } from "./header.js";
import { decodePayload, encodePayload } from "./payload.js";
import { bytesLiteral } from "./literal.js";

/**
 * Encode a request frame for transmission
 *
 * Sequence and event fields are written when the flags announce them; the
 * session id is written whenever one is given.
 */
export function encodeRequest(options: RequestOptions = {}): EncodedFrame {
  const {
    flags = MessageTypeFlags.MSG_WITH_EVENT,
    serialization = SerializationMethod.JSON,
    compression = CompressionType.GZIP,
    sequence,
    event,
    sessionId,
    payload,
  } = options;

  const parts: Buffer[] = [
    generateHeader({ ...options, flags, serialization, compression }),
  ];

  if (hasSequence(flags)) {
    if (sequence === undefined) {
      throw new InvalidFrameError("Flags announce a sequence number but none was given");
    }
    parts.push(int32(sequence));
  }

  if (hasEvent(flags)) {
    if (event === undefined) {
      throw new InvalidFrameError("Flags announce an event but none was given");
    }
    parts.push(uint32(event));
  }

  if (sessionId !== undefined) {
    const idBytes = Buffer.from(sessionId, "utf8");
    parts.push(uint32(idBytes.length), idBytes);
  }

  const payloadBytes = encodePayload(payload, serialization, compression);
  parts.push(uint32(payloadBytes.length), payloadBytes);

  return { buffer: Buffer.concat(parts) };
}

/**
 * Decode one received response
 *
 * @param response - Raw message bytes as delivered by the transport
 * @returns null when there is nothing to parse (non-binary or empty input),
 *   otherwise the decoded frame or the reason it could not be decoded
 */
export function parseResponse(response: unknown): ParseResult | null {
  const buffer = toBuffer(response);
  if (buffer === null || buffer.length === 0) {
    return null;
  }

  if (buffer.length < BASE_HEADER_SIZE) {
    return failure(new InvalidFrameError("Response too short"));
  }

  const headerSize = buffer.readUInt8(0) & 0x0f;
  if (headerSize === 0) {
    return failure(new InvalidFrameError("Invalid header size: 0"));
  }

  const headerLength = headerSize * HEADER_UNIT_SIZE;
  if (buffer.length < headerLength) {
    return failure(
      new InvalidFrameError("Response shorter than header indicates")
    );
  }

  const header = readHeader(buffer);
  const reader = new FrameReader(buffer, headerLength);

  try {
    return { ok: true, frame: decodeBody(header, reader) };
  } catch (err) {
    if (err instanceof ProtocolError) {
      return failure(err);
    }
    throw err;
  }
}

/**
 * Decode the fields that follow the header
 */
function decodeBody(header: FrameHeader, reader: FrameReader): ServerFrame {
  switch (header.messageType) {
    case MessageType.SERVER_FULL_RESPONSE:
    case MessageType.SERVER_ACK: {
      const seq = hasSequence(header.flags)
        ? reader.int32("sequence number")
        : undefined;
      const event = hasEvent(header.flags)
        ? reader.uint32("event code")
        : undefined;

      const sessionIdLength = reader.int32("session id length");
      if (sessionIdLength < 0) {
        throw new InvalidFrameError(
          `Invalid session id length: ${sessionIdLength}`
        );
      }
      const sessionIdBytes = reader.bytes(sessionIdLength, "session id");

      const payloadSize = reader.uint32("payload size");
      const payloadBytes = reader.bytes(payloadSize, "payload");

      const fields = {
        header,
        // Absent flags leave the keys out entirely
        ...(seq !== undefined && { seq }),
        ...(event !== undefined && { event }),
        sessionId: bytesLiteral(sessionIdBytes),
        sessionIdBytes,
        payloadSize,
        payloadMsg: decodePayload(
          payloadBytes,
          header.serialization,
          header.compression
        ),
      };

      return header.messageType === MessageType.SERVER_ACK
        ? { messageType: "SERVER_ACK", ...fields }
        : { messageType: "SERVER_FULL_RESPONSE", ...fields };
    }

    case MessageType.SERVER_ERROR_RESPONSE: {
      const code = reader.uint32("error code");
      const messageSize = reader.uint32("error message size");
      const messageBytes = reader.bytes(messageSize, "error message");

      return {
        messageType: "SERVER_ERROR_RESPONSE",
        header,
        code,
        payloadSize: messageBytes.length,
        payloadMsg: decodePayload(
          messageBytes,
          header.serialization,
          header.compression
        ),
      };
    }

    default:
      return {
        messageType: otherTypeName(header.messageType),
        header,
        rawType: header.messageType,
      };
  }
}

function otherTypeName(messageType: number): OtherFrame["messageType"] {
  switch (messageType) {
    case MessageType.CLIENT_FULL_REQUEST:
      return "CLIENT_FULL_REQUEST";
    case MessageType.CLIENT_AUDIO_ONLY_REQUEST:
      return "CLIENT_AUDIO_ONLY_REQUEST";
    default:
      return "UNKNOWN";
  }
}

/**
 * Sequential big-endian field reader with bounds checks
 */
class FrameReader {
  constructor(private readonly buffer: Buffer, private offset: number) {}

  int32(field: string): number {
    this.require(FIELD_SIZE, field);
    const value = this.buffer.readInt32BE(this.offset);
    this.offset += FIELD_SIZE;
    return value;
  }

  uint32(field: string): number {
    this.require(FIELD_SIZE, field);
    const value = this.buffer.readUInt32BE(this.offset);
    this.offset += FIELD_SIZE;
    return value;
  }

  bytes(length: number, field: string): Buffer {
    this.require(length, field);
    const value = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  private require(length: number, field: string): void {
    const remaining = this.buffer.length - this.offset;
    if (remaining < length) {
      throw new InvalidFrameError(
        `Frame truncated: ${field} needs ${length} bytes, ${remaining} remaining`
      );
    }
  }
}

/**
 * Normalize the shapes a WebSocket library hands over into one Buffer
 */
function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof Uint8Array) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (Array.isArray(data) && data.length > 0 && data.every(Buffer.isBuffer)) {
    return Buffer.concat(data);
  }
  return null;
}

function failure(error: ProtocolError): ParseResult {
  return { ok: false, error };
}

function int32(value: number): Buffer {
  const field = Buffer.alloc(FIELD_SIZE);
  field.writeInt32BE(value, 0);
  return field;
}

function uint32(value: number): Buffer {
  const field = Buffer.alloc(FIELD_SIZE);
  field.writeUInt32BE(value, 0);
  return field;
}
