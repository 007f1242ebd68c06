/**
 * Live Call Bridge
 *
 * Bridges telephony media streams (8kHz μ-law over WebSocket) to a streaming
 * speech-to-speech AI backend, one backend session per call.
 */

export {
  CallBridgeConfigSchema,
  loadConfigFromEnv,
  parseBridgeConfig,
  resolveSystemPrompt,
  type CallBridgeConfig,
} from "./src/config.js";
export { createBridgeRuntime, type BridgeRuntime, type BridgeRuntimeParams } from "./src/runtime.js";
export { CallBridge, ProtocolViolationError, type CallBridgeOptions } from "./src/call-bridge.js";
export { MediaStreamServer, type MediaStreamServerConfig } from "./src/media-stream-server.js";
export {
  DirectSessionProvider,
  SessionPool,
  type PoolStats,
  type SessionPoolConfig,
  type SessionProvider,
} from "./src/session-pool.js";
export {
  LiveSession,
  type BackendSession,
  type BackendSessionState,
  type LiveSessionConfig,
  type SessionFactory,
} from "./src/live-session.js";
export { WebSocketTransport, type MediaTransport } from "./src/transport.js";
export { MessageParseError, parseInboundMessage, serializeOutboundMessage } from "./src/stream-messages.js";
export { decodeMuLaw, encodeMuLaw, resample } from "./src/audio-utils.js";
export {
  buildAnswerResponse,
  isMachineAnswer,
  isTerminalCallStatus,
  toMediaStreamUrl,
} from "./src/call-control.js";
export { createLogger, type Logger } from "./src/logger.js";
export type * from "./src/types.js";
