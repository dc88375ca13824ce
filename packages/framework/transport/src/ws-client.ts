// WebSocket Duplex Transport: client side

import { WebSocket } from "ws";
import { type Result, ok, err, errorMessage } from "@sealwire/shared";
import {
  type Logger,
  type WebSocketConfigInput,
  SseConfigSchema,
  WebSocketConfigSchema,
  createLogger,
} from "@sealwire/kernel";
import { type IdentityManager, removeRequestParams } from "@sealwire/identity";
import { TransportError } from "./errors.js";
import { toWebSocketUrl } from "./endpoint.js";
import { runWebSocketDuplex } from "./ws-duplex.js";
import type { TransportSession } from "./types.js";

export interface WebSocketClientOptions {
  identity: IdentityManager;
  /** DID of the server to connect to */
  peerDid: string;
  websocket?: WebSocketConfigInput;
  /** Opening handshake timeout */
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: Logger;
  /** Aborting closes the session */
  signal?: AbortSignal;
}

const HANDSHAKE_TIMEOUT_MS = SseConfigSchema.parse({}).timeoutMs;

/** Errors the ws client raises when the server's subprotocol answer is wrong */
const SUBPROTOCOL_ERROR = /subprotocol/i;
const UNEXPECTED_RESPONSE = /Unexpected server response: (\d+)/;

function handshakeError(error: Error): TransportError {
  if (SUBPROTOCOL_ERROR.test(error.message)) {
    return new TransportError(error.message, "SUBPROTOCOL_MISMATCH", undefined, error);
  }
  const status = UNEXPECTED_RESPONSE.exec(error.message)?.[1];
  return new TransportError(
    `WebSocket handshake failed: ${error.message}`,
    "HTTP_ERROR",
    status === undefined ? undefined : Number(status),
    error
  );
}

/**
 * Wait for the opening handshake to finish one way or the other.
 * `start` runs inside the `open` handler so the session's listeners are
 * attached before the socket can emit its first frame.
 */
function openSession(
  ws: WebSocket,
  subprotocol: string,
  start: () => TransportSession
): Promise<Result<TransportSession, TransportError>> {
  return new Promise((resolve) => {
    const onOpen = () => {
      ws.off("error", onError);
      if (ws.protocol !== subprotocol) {
        ws.close(1002, "Subprotocol mismatch");
        resolve(err(new TransportError(`Server selected subprotocol "${ws.protocol}"`, "SUBPROTOCOL_MISMATCH")));
        return;
      }
      resolve(ok(start()));
    };
    const onError = (error: Error) => {
      ws.off("open", onOpen);
      resolve(err(handshakeError(error)));
    };
    ws.once("open", onOpen);
    ws.once("error", onError);
  });
}

/**
 * Open a WebSocket session to `peerDid`.
 * The peer's endpoint must be `ws://` or `wss://` and the server must
 * select the configured subprotocol.
 */
export async function connectWebSocketClient(
  options: WebSocketClientOptions
): Promise<Result<TransportSession, TransportError>> {
  const log = (options.logger ?? createLogger({ name: "ws-client" })).child({ peer: options.peerDid });
  const configResult = WebSocketConfigSchema.safeParse(options.websocket ?? {});
  if (!configResult.success) {
    return err(new TransportError(`Invalid WebSocket config: ${configResult.error.message}`, "HTTP_ERROR"));
  }
  const config = configResult.data;

  const connected = await options.identity.connect(options.peerDid);
  if (!connected.ok) {
    return err(new TransportError(connected.error.message, "PEER_UNRESOLVABLE", undefined, connected.error));
  }
  const connection = connected.value;

  const endpoint = await connection.resolveEndpoint(true);
  if (!endpoint.ok) {
    return err(new TransportError(endpoint.error.message, "PEER_UNRESOLVABLE", undefined, endpoint.error));
  }
  const url = toWebSocketUrl(endpoint.value);
  if (!url.ok) return url;

  log.debug("Opening WebSocket", { url: removeRequestParams(url.value.href) });
  let ws: WebSocket;
  try {
    ws = new WebSocket(url.value, [config.subprotocol], {
      handshakeTimeout: options.timeoutMs ?? HANDSHAKE_TIMEOUT_MS,
      maxPayload: config.maxPayloadBytes,
      headers: options.headers,
    });
  } catch (e) {
    return err(new TransportError(`Invalid WebSocket request: ${errorMessage(e)}`, "HTTP_ERROR", undefined, e));
  }

  const opened = await openSession(ws, config.subprotocol, () =>
    runWebSocketDuplex({
      ws,
      connection,
      frameEncoding: config.frameEncoding,
      logger: log,
      signal: options.signal,
    })
  );
  if (!opened.ok) {
    log.warn("WebSocket handshake failed", { code: opened.error.code, error: opened.error.message });
    return opened;
  }
  log.info("WebSocket connected");
  return opened;
}
