import { z } from "zod";
import { ServerEvent } from "../../../packages/protocol/src/events.js";
import type { ServerFrame } from "../../../packages/protocol/src/types.js";
import { logger as defaultLogger } from "./observability/logger.js";
import type { Logger } from "./observability/logger.js";

/**
 * What a dialog frame means to the caller, shaped after live-model server
 * messages: content for the current turn plus usage accounting.
 */
export type ServerContent = {
  interrupted?: boolean;
  inputTranscription?: { text: string; finished: boolean };
  modelTurn?: { parts: Array<{ inlineData: { data: Buffer } }> };
  outputTranscription?: { text?: string; finished?: boolean };
  turnComplete?: boolean;
};

export type UsageMetadata = {
  toolUsePromptTokenCount?: number;
  cachedContentTokenCount?: number;
};

export type ServerMessage = {
  event?: number;
  serverContent: ServerContent;
  usageMetadata: UsageMetadata;
  error?: { code: number; message: string };
};

// Server payload shapes
const asrResponseSchema = z.object({
  results: z.array(z.object({ text: z.string() }).passthrough()).nonempty(),
});

const chatResponseSchema = z.object({ content: z.string() });

const usageResponseSchema = z.object({ usage: z.record(z.number()) });

const errorPayloadSchema = z.object({ error: z.string() });

const audioSchema = z.instanceof(Buffer);

/**
 * Convert a decoded frame into a ServerMessage
 *
 * Only frames carrying both an event code and a payload contribute content;
 * anything else yields an empty message.
 */
export function toServerMessage(
  frame: ServerFrame,
  log: Logger = defaultLogger
): ServerMessage {
  const message: ServerMessage = { serverContent: {}, usageMetadata: {} };

  if (frame.messageType === "SERVER_ERROR_RESPONSE") {
    message.error = {
      code: frame.code,
      message: errorText(frame.payloadMsg),
    };
    return message;
  }

  if (
    frame.messageType !== "SERVER_FULL_RESPONSE" &&
    frame.messageType !== "SERVER_ACK"
  ) {
    return message;
  }

  const { event, payloadMsg } = frame;
  if (event === undefined || payloadMsg === undefined || payloadMsg === null) {
    return message;
  }
  message.event = event;

  const content = message.serverContent;

  switch (event) {
    case ServerEvent.ASR_INFO:
      // First recognized speech; the client should stop playback
      content.interrupted = true;
      break;

    case ServerEvent.ASR_RESPONSE: {
      const parsed = asrResponseSchema.safeParse(payloadMsg);
      if (parsed.success) {
        content.inputTranscription = {
          text: parsed.data.results[0].text,
          finished: true,
        };
      }
      break;
    }

    case ServerEvent.TTS_RESPONSE: {
      const parsed = audioSchema.safeParse(payloadMsg);
      if (parsed.success) {
        content.modelTurn = { parts: [{ inlineData: { data: parsed.data } }] };
      }
      break;
    }

    case ServerEvent.CHAT_RESPONSE: {
      const parsed = chatResponseSchema.safeParse(payloadMsg);
      if (parsed.success) {
        content.outputTranscription = { text: parsed.data.content };
      }
      break;
    }

    case ServerEvent.CHAT_ENDED:
      content.outputTranscription = { finished: true };
      break;

    case ServerEvent.TTS_ENDED:
      content.turnComplete = true;
      break;

    case ServerEvent.USAGE_RESPONSE: {
      const parsed = usageResponseSchema.safeParse(payloadMsg);
      if (parsed.success) {
        message.usageMetadata = usageCounts(parsed.data.usage);
      }
      break;
    }

    case ServerEvent.ASR_ENDED:
      log.debug("ASR ended", payloadMsg);
      break;

    case ServerEvent.TTS_SENTENCE_START:
      log.debug("TTS sentence start", payloadMsg);
      break;

    case ServerEvent.TTS_SENTENCE_END:
      log.debug("TTS sentence end", payloadMsg);
      break;
  }

  return message;
}

/**
 * Total and cached token counts from a usage payload
 */
export function usageCounts(usage: Record<string, number>): UsageMetadata {
  let total = 0;
  let cached = 0;

  for (const [key, value] of Object.entries(usage)) {
    total += value;
    if (key.startsWith("cached_")) {
      cached += value;
    }
  }

  return { toolUsePromptTokenCount: total, cachedContentTokenCount: cached };
}

function errorText(payload: unknown): string {
  const parsed = errorPayloadSchema.safeParse(payload);
  if (parsed.success) return parsed.data.error;
  if (typeof payload === "string") return payload;
  if (Buffer.isBuffer(payload)) return payload.toString("utf8");
  return JSON.stringify(payload) ?? "";
}
