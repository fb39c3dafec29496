/**
 * Event codes carried in the event field of dialog frames
 */

// Sent by the client
export enum ClientEvent {
  START_CONNECTION = 1,
  START_SESSION = 100,
  TASK_REQUEST = 200,
}

// Sent by the server
export enum ServerEvent {
  USAGE_RESPONSE = 154,
  TTS_SENTENCE_START = 350,
  TTS_SENTENCE_END = 351,
  TTS_RESPONSE = 352,
  TTS_ENDED = 359,
  ASR_INFO = 450,
  ASR_RESPONSE = 451,
  ASR_ENDED = 459,
  CHAT_RESPONSE = 550,
  CHAT_ENDED = 559,
}
