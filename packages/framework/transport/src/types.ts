// Transport session types shared by the SSE and WebSocket transports

import type { SessionMessage } from "@sealwire/shared";
import type { Channel } from "./channel.js";
import { TransportError } from "./errors.js";

/** Inbound values: decoded messages, or the decode failure in their place */
export type InboundMessage = SessionMessage | TransportError;

export function isTransportError(item: InboundMessage): item is TransportError {
  return item instanceof TransportError;
}

/**
 * One live duplex connection to a peer.
 * Receive from `inbound`, send on `outbound`; both close when the connection ends.
 */
export interface TransportSession {
  readonly peerDid: string;
  readonly inbound: Channel<InboundMessage>;
  readonly outbound: Channel<SessionMessage>;
  /** Cancel both directions and release the connection */
  close(): void;
  /** Settles once both directions have stopped */
  readonly closed: Promise<void>;
}

/** Called by servers for every accepted session */
export type SessionHandler = (session: TransportSession) => void;

/** Session events carried on an SSE stream; both payloads are sealed text */
export type SessionEvent =
  /** Where to POST messages, sent once when the stream opens */
  | { kind: "endpoint"; sealed: string }
  | { kind: "message"; sealed: string };
