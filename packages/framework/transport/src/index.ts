// @sealwire/transport: duplex SSE and WebSocket transports over sealed envelopes

// ─── Primitives ──────────────────────────────────────────────

export { TransportError, ClosedResourceError, type TransportErrorCode } from "./errors.js";
export { Channel } from "./channel.js";
export { TaskScope, type ScopedTask } from "./task-scope.js";
export { SessionRegistry } from "./session-registry.js";
export {
  type InboundMessage,
  type TransportSession,
  type SessionHandler,
  type SessionEvent,
  isTransportError,
} from "./types.js";

// ─── Security & Endpoints ────────────────────────────────────

export { SecurityValidator, SEALED_ENVELOPE_CONTENT_TYPE, matchesAllowList } from "./security.js";
export { toHttpUrl, toWebSocketUrl, isSameOrigin } from "./endpoint.js";

// ─── SSE ─────────────────────────────────────────────────────

export {
  type SseEvent,
  parseSseChunk,
  formatSseEvent,
  formatSseComment,
  toSessionEvent,
  fromSessionEvent,
} from "./sse-parser.js";
export { SseServerTransport, type SseServerTransportOptions, type SessionPolicy } from "./sse-server.js";
export { connectSseClient, type SseClientOptions } from "./sse-client.js";

// ─── WebSocket ───────────────────────────────────────────────

export { runWebSocketDuplex, type FrameEncoding, type WebSocketDuplexOptions } from "./ws-duplex.js";
export {
  createWebSocketTransportServer,
  type WebSocketTransportServer,
  type WebSocketTransportServerOptions,
} from "./ws-server.js";
export { connectWebSocketClient, type WebSocketClientOptions } from "./ws-client.js";
