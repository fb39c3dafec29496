/**
 * Protocol Constants
 *
 * Defines the header nibble values and frame size parameters.
 */

// Protocol version (high nibble of header byte 0)
export const PROTOCOL_VERSION = 0b0001;

// Header structure sizes
export const HEADER_UNIT_SIZE = 4; // header size nibble counts 4-byte units
export const BASE_HEADER_SIZE = 4; // version/size, type/flags, serial/compression, reserved
export const MAX_HEADER_UNITS = 0x0f;
export const FIELD_SIZE = 4; // sequence, event, length prefixes, error code
export const MAX_FRAME_SIZE = 10 * 1024 * 1024; // 10MB safety limit

// Message Types (high nibble of byte 1)
export enum MessageType {
  CLIENT_FULL_REQUEST = 0b0001,
  CLIENT_AUDIO_ONLY_REQUEST = 0b0010,
  SERVER_FULL_RESPONSE = 0b1001,
  SERVER_ACK = 0b1011,
  SERVER_ERROR_RESPONSE = 0b1111,
}

// Message-type-specific flags (low nibble of byte 1, bitmask)
export enum MessageTypeFlags {
  NO_SEQUENCE = 0b0000,
  POS_SEQUENCE = 0b0001,
  NEG_SEQUENCE = 0b0010,
  MSG_WITH_EVENT = 0b0100,
}

// Serialization methods (high nibble of byte 2)
export enum SerializationMethod {
  NO_SERIALIZATION = 0b0000,
  JSON = 0b0001,
  THRIFT = 0b0011,
  CUSTOM_TYPE = 0b1111,
}

// Compression types (low nibble of byte 2)
export enum CompressionType {
  NO_COMPRESSION = 0b0000,
  GZIP = 0b0001,
  CUSTOM_COMPRESSION = 0b1111,
}

const SEQUENCE_MASK = MessageTypeFlags.POS_SEQUENCE | MessageTypeFlags.NEG_SEQUENCE;

/**
 * True when the flags announce a 4-byte sequence number
 *
 * Only the POS/NEG bits count: MSG_WITH_EVENT alone is non-zero flags but
 * carries no sequence field.
 */
export function hasSequence(flags: number): boolean {
  return (flags & SEQUENCE_MASK) !== 0;
}

/**
 * True when the flags announce a 4-byte event code
 */
export function hasEvent(flags: number): boolean {
  return (flags & MessageTypeFlags.MSG_WITH_EVENT) !== 0;
}
