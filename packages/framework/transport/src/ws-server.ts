// WebSocket Duplex Transport: server side

import type { IncomingMessage, Server } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer, type VerifyClientCallbackAsync, type WebSocket } from "ws";
import { type Result, ok, err, errorMessage } from "@sealwire/shared";
import {
  type Logger,
  type SecurityConfigInput,
  type WebSocketConfigInput,
  WebSocketConfigSchema,
  createLogger,
} from "@sealwire/kernel";
import { type Connection, type IdentityManager, PEER_ID_PARAM } from "@sealwire/identity";
import { TransportError } from "./errors.js";
import { SecurityValidator } from "./security.js";
import { runWebSocketDuplex } from "./ws-duplex.js";
import type { SessionHandler, TransportSession } from "./types.js";

export interface WebSocketTransportServerOptions {
  identity: IdentityManager;
  /** Attach to an existing HTTP server, or */
  server?: Server;
  /** Listen on a port of our own */
  port?: number;
  host?: string;
  path?: string;
  websocket?: WebSocketConfigInput;
  security?: SecurityConfigInput;
  logger?: Logger;
}

export interface WebSocketTransportServer {
  readonly wss: WebSocketServer;
  /** Address of the listening socket, once bound */
  address(): AddressInfo | null;
  /** Sessions currently open */
  sessions(): TransportSession[];
  /** Close every session and stop accepting new ones */
  close(): Promise<void>;
}

/** Parse the comma-separated Sec-WebSocket-Protocol header */
function offeredProtocols(req: IncomingMessage): string[] {
  const header = req.headers["sec-websocket-protocol"];
  if (!header) return [];
  return header.split(",").map((protocol) => protocol.trim());
}

/**
 * Start a WebSocket transport server.
 * Upgrades are validated (Host/Origin, routing parameter, peer identity,
 * subprotocol) before the handshake completes.
 */
export async function createWebSocketTransportServer(
  options: WebSocketTransportServerOptions,
  onSession: SessionHandler
): Promise<Result<WebSocketTransportServer, TransportError>> {
  const configResult = WebSocketConfigSchema.safeParse(options.websocket ?? {});
  if (!configResult.success) {
    return err(new TransportError(`Invalid WebSocket config: ${configResult.error.message}`, "HTTP_ERROR"));
  }
  const config = configResult.data;
  const log = options.logger ?? createLogger({ name: "ws-server" });
  const validator = new SecurityValidator(options.security, log);
  const pending = new WeakMap<IncomingMessage, Connection>();
  const live = new Set<TransportSession>();

  // Upgrades are held open until the peer's identity is verified
  const verifyClient: VerifyClientCallbackAsync = ({ req }, callback) => {
    const reject = (error: TransportError) => {
      log.warn("Upgrade rejected", { code: error.code, reason: error.message });
      callback(false, error.status ?? 400, error.message);
    };

    const validated = validator.validate(req, false);
    if (!validated.ok) {
      reject(validated.error);
      return;
    }
    if (!offeredProtocols(req).includes(config.subprotocol)) {
      reject(new TransportError(`Subprotocol ${config.subprotocol} required`, "SUBPROTOCOL_MISMATCH", 400));
      return;
    }
    const peerDid = new URL(req.url ?? "/", "http://localhost").searchParams.get(PEER_ID_PARAM);
    if (!peerDid) {
      reject(new TransportError(`Missing ${PEER_ID_PARAM} parameter`, "MISSING_PEER_ID", 400));
      return;
    }

    options.identity
      .connect(peerDid)
      .then((connected) => {
        if (!connected.ok) {
          const status = connected.error.code === "NOT_FOUND" ? 404 : connected.error.code === "UNREACHABLE" ? 502 : 400;
          reject(new TransportError(`Could not resolve peer ${peerDid}`, "PEER_UNRESOLVABLE", status));
          return;
        }
        pending.set(req, connected.value);
        callback(true);
      })
      .catch((e: unknown) => {
        reject(new TransportError(`Peer verification failed: ${errorMessage(e)}`, "PEER_UNRESOLVABLE", 500));
      });
  };

  const wss = new WebSocketServer({
    ...(options.server ? { server: options.server } : { port: options.port ?? 0, host: options.host }),
    path: options.path ?? "/ws",
    maxPayload: config.maxPayloadBytes,
    handleProtocols: (protocols) => (protocols.has(config.subprotocol) ? config.subprotocol : false),
    verifyClient,
  });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const connection = pending.get(req);
    pending.delete(req);
    if (!connection) {
      ws.close(1011, "Unverified connection");
      return;
    }

    const session = runWebSocketDuplex({
      ws,
      connection,
      frameEncoding: config.frameEncoding,
      logger: log.child({ peer: connection.peerDid }),
    });
    live.add(session);
    session.closed.then(
      () => live.delete(session),
      (e: unknown) => log.error("Session join failed", { error: errorMessage(e) })
    );
    log.info("WebSocket session opened", { peer: connection.peerDid });
    onSession(session);
  });

  if (!options.server) {
    try {
      await new Promise<void>((resolve, reject) => {
        wss.once("listening", resolve);
        wss.once("error", reject);
      });
    } catch (e) {
      return err(new TransportError(`WebSocket server failed to listen: ${errorMessage(e)}`, "HTTP_ERROR"));
    }
  }

  return ok({
    wss,
    address: () => {
      const address = options.server ? options.server.address() : wss.address();
      return address !== null && typeof address === "object" ? address : null;
    },
    sessions: () => Array.from(live),
    close: async () => {
      const sessions = Array.from(live);
      for (const session of sessions) session.close();
      await Promise.all(sessions.map((session) => session.closed));
      await new Promise<void>((resolve, reject) => wss.close((e) => (e ? reject(e) : resolve())));
    },
  });
}
