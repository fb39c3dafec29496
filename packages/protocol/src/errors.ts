/**
 * Protocol Error Classes
 */

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class InvalidFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFrameError";
  }
}

export class PayloadDecodeError extends ProtocolError {
  constructor(
    public readonly stage: "decompress" | "deserialize",
    cause: unknown
  ) {
    super(
      `Payload ${stage} failed: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = "PayloadDecodeError";
  }
}
