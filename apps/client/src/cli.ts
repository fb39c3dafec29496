import { createWriteStream, readFileSync } from "fs";
import type { WriteStream } from "fs";
import { setTimeout as sleep } from "timers/promises";
import { RealtimeClient } from "./client.js";
import type { ServerMessage } from "./messages.js";
import { metrics } from "./observability/metrics.js";
import type { RealtimeSession } from "./session.js";

export type DialogClient = Pick<RealtimeClient, "connect">;

// 100ms of 16kHz 16-bit mono PCM
export const CHUNK_SIZE = 3200;
const CHUNK_INTERVAL_MS = 100;

/**
 * Split PCM audio into fixed-size chunks
 */
export function chunkAudio(audio: Buffer, size: number = CHUNK_SIZE): Buffer[] {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < audio.length; offset += size) {
    chunks.push(audio.subarray(offset, offset + size));
  }
  return chunks;
}

/**
 * CLI for a single dialog turn: stream a PCM file, print the exchange
 */
export class RealtimeCLI {
  private client: DialogClient;
  private output: WriteStream | null = null;
  private reply: string = "";

  constructor(client: DialogClient = new RealtimeClient()) {
    this.client = client;
  }

  /**
   * Print one server message
   */
  private handleMessage(message: ServerMessage): boolean {
    const { serverContent, usageMetadata, error } = message;

    if (error) {
      console.log(`Server error ${error.code}: ${error.message}`);
    }

    if (serverContent.interrupted) {
      console.log("(speech detected)");
    }

    if (serverContent.inputTranscription) {
      console.log(`You: ${serverContent.inputTranscription.text}`);
    }

    const text = serverContent.outputTranscription?.text;
    if (text !== undefined) {
      this.reply += text;
    }

    if (serverContent.outputTranscription?.finished) {
      console.log(`Assistant: ${this.reply}`);
      this.reply = "";
    }

    const audio = serverContent.modelTurn?.parts[0]?.inlineData.data;
    if (audio && this.output) {
      this.output.write(audio);
    }

    if (usageMetadata.toolUsePromptTokenCount !== undefined) {
      console.log(
        `Tokens: ${usageMetadata.toolUsePromptTokenCount} (cached ${usageMetadata.cachedContentTokenCount ?? 0})`
      );
    }

    return serverContent.turnComplete === true;
  }

  /**
   * Stream the input file in real time until the file ends or `signal` aborts
   */
  private async streamAudio(
    session: RealtimeSession,
    audio: Buffer,
    signal: AbortSignal
  ): Promise<void> {
    for (const chunk of chunkAudio(audio)) {
      if (signal.aborted) return;
      session.sendAudio(chunk);

      try {
        await sleep(CHUNK_INTERVAL_MS, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }

  /**
   * Connect and run one turn
   */
  async start(inputPath: string, outputPath?: string): Promise<void> {
    const audio = readFileSync(inputPath);
    if (outputPath) {
      this.output = createWriteStream(outputPath);
    }

    const session = await this.client.connect();
    console.log(`Session ${session.sessionId} started`);

    // Aborted once the session ends, whoever closed it
    const stop = new AbortController();
    const streaming = this.streamAudio(session, audio, stop.signal);

    try {
      for await (const message of session.receive()) {
        if (this.handleMessage(message)) {
          session.close("turn complete");
        }
      }
    } finally {
      stop.abort();
    }

    await streaming;
    this.output?.end();
    metrics.print();
  }
}
