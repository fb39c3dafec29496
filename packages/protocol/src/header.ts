/**
 * Header Encoding and Decoding
 *
 * | byte | high nibble          | low nibble                  |
 * |------|----------------------|-----------------------------|
 * | 0    | protocol version     | header size (4-byte units)  |
 * | 1    | message type         | message-type-specific flags |
 * | 2    | serialization method | compression type            |
 * | 3    | reserved (0x00)      |                             |
 *
 * Extension header bytes follow byte 3; the whole header is
 * `headerSize * 4` bytes long.
 */

import {
  PROTOCOL_VERSION,
  BASE_HEADER_SIZE,
  HEADER_UNIT_SIZE,
  MAX_HEADER_UNITS,
  MessageType,
  MessageTypeFlags,
  SerializationMethod,
  CompressionType,
} from "./constants.js";
import type { FrameHeader, HeaderOptions } from "./types.js";
import { InvalidFrameError } from "./errors.js";

const NIBBLE = 0x0f;

/**
 * Build the header for an outgoing request
 *
 * Defaults describe a gzip-compressed JSON full request carrying an event.
 */
export function generateHeader(options: HeaderOptions = {}): Buffer {
  const {
    messageType = MessageType.CLIENT_FULL_REQUEST,
    flags = MessageTypeFlags.MSG_WITH_EVENT,
    serialization = SerializationMethod.JSON,
    compression = CompressionType.GZIP,
    extensionHeader = new Uint8Array(0),
  } = options;

  const headerSize =
    1 + Math.ceil(extensionHeader.length / HEADER_UNIT_SIZE);

  if (headerSize > MAX_HEADER_UNITS) {
    throw new InvalidFrameError(
      `Extension header too long: ${extensionHeader.length} bytes (max ${
        (MAX_HEADER_UNITS - 1) * HEADER_UNIT_SIZE
      })`
    );
  }

  // Zero-filled, so a partial last unit is padded
  const header = Buffer.alloc(headerSize * HEADER_UNIT_SIZE);

  header.writeUInt8((PROTOCOL_VERSION << 4) | headerSize, 0);
  header.writeUInt8(((messageType & NIBBLE) << 4) | (flags & NIBBLE), 1);
  header.writeUInt8(
    ((serialization & NIBBLE) << 4) | (compression & NIBBLE),
    2
  );
  header.writeUInt8(0x00, 3); // reserved

  header.set(extensionHeader, BASE_HEADER_SIZE);

  return header;
}

/**
 * Split a header into its nibble fields
 *
 * The caller guarantees `buffer` holds at least `headerSize * 4` bytes.
 */
export function readHeader(buffer: Buffer): FrameHeader {
  const byte0 = buffer.readUInt8(0);
  const byte1 = buffer.readUInt8(1);
  const byte2 = buffer.readUInt8(2);
  const headerSize = byte0 & NIBBLE;

  return {
    version: byte0 >> 4,
    headerSize,
    messageType: byte1 >> 4,
    flags: byte1 & NIBBLE,
    serialization: byte2 >> 4,
    compression: byte2 & NIBBLE,
    reserved: buffer.readUInt8(3),
    extensionHeader: buffer.subarray(
      BASE_HEADER_SIZE,
      headerSize * HEADER_UNIT_SIZE
    ),
  };
}
