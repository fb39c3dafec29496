/**
 * Payload serialization and compression
 *
 * Outgoing: serialize, then compress. Incoming: decompress, then deserialize.
 */

import { gunzipSync, gzipSync } from "node:zlib";
import {
  MAX_FRAME_SIZE,
  CompressionType,
  SerializationMethod,
} from "./constants.js";
import { InvalidFrameError, PayloadDecodeError } from "./errors.js";

/**
 * Turn a payload value into wire bytes
 *
 * @param payload - JSON value when serialization is JSON, otherwise a Buffer
 */
export function encodePayload(
  payload: unknown,
  serialization: number,
  compression: number
): Buffer {
  let bytes: Buffer;

  if (payload === undefined) {
    bytes = Buffer.alloc(0);
  } else if (serialization === SerializationMethod.JSON) {
    bytes = Buffer.from(JSON.stringify(payload), "utf8");
  } else if (payload instanceof Uint8Array) {
    bytes = Buffer.from(payload);
  } else {
    throw new InvalidFrameError(
      `Payload must be binary when serialization is ${serializationName(serialization)}`
    );
  }

  if (compression === CompressionType.GZIP) {
    return gzipSync(bytes);
  }
  return bytes;
}

/**
 * Turn received payload bytes into a value
 *
 * JSON payloads become parsed values; every other serialization is passed
 * through as raw bytes.
 *
 * @throws PayloadDecodeError when gunzip or JSON parsing fails, or the
 *   payload inflates past MAX_FRAME_SIZE
 */
export function decodePayload(
  bytes: Buffer,
  serialization: number,
  compression: number
): unknown {
  let data = bytes;

  if (compression === CompressionType.GZIP) {
    try {
      // Inflated size is bounded like the wire size
      data = gunzipSync(bytes, { maxOutputLength: MAX_FRAME_SIZE });
    } catch (err) {
      throw new PayloadDecodeError("decompress", err);
    }
  }

  if (serialization === SerializationMethod.JSON) {
    try {
      return JSON.parse(data.toString("utf8"));
    } catch (err) {
      throw new PayloadDecodeError("deserialize", err);
    }
  }

  return data;
}

function serializationName(serialization: number): string {
  return SerializationMethod[serialization] ?? `UNKNOWN(${serialization})`;
}
