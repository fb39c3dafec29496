/**
 * Client configuration
 */

const MIN_RECV_TIMEOUT = 10;
const MAX_RECV_TIMEOUT = 120;

export type RealtimeConfig = {
  apiBase: string;
  apiKey: string;
  appId: string;
  appKey: string;
  speaker: string;
  debug: boolean;
  connectTimeout: number; // ms
  recvTimeout: number; // s, kept within [10, 120]
};

/**
 * Clamp the dialog idle timeout into the range the service accepts
 */
export function clampRecvTimeout(seconds: number): number {
  if (Number.isNaN(seconds)) return MAX_RECV_TIMEOUT;
  return Math.min(MAX_RECV_TIMEOUT, Math.max(MIN_RECV_TIMEOUT, seconds));
}

/**
 * Read configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RealtimeConfig {
  return {
    apiBase:
      env.MODEL_REALTIME_API_BASE ||
      "wss://openspeech.bytedance.com/api/v3/realtime/dialogue",
    apiKey: env.MODEL_REALTIME_API_KEY || "",
    appId: env.MODEL_REALTIME_APP_ID || "",
    appKey: env.MODEL_REALTIME_APP_KEY || "",
    speaker: env.MODEL_REALTIME_TTS_SPEAKER || "zh_male_yunzhou_jupiter_bigtts",
    debug: env.REALTIME_DEBUG === "1",
    connectTimeout: parseInt(env.REALTIME_CONNECT_TIMEOUT || "10000", 10),
    recvTimeout: clampRecvTimeout(
      parseInt(env.REALTIME_RECV_TIMEOUT || "120", 10)
    ),
  };
}

export const config = loadConfig();
