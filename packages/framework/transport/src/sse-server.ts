// SSE Duplex Transport: server side
// GET opens a per-peer event stream, POST delivers sealed envelopes into it

import { once } from "node:events";
import type { IncomingMessage, ServerResponse } from "node:http";
import {
  errorMessage,
  serializeRpcMessage,
  type SessionMessage,
} from "@sealwire/shared";
import {
  type Logger,
  type SseServerConfig,
  type SseServerConfigInput,
  type SecurityConfigInput,
  SseServerConfigSchema,
  createLogger,
} from "@sealwire/kernel";
import {
  type Connection,
  type IdentityError,
  type IdentityManager,
  PEER_ID_PARAM,
} from "@sealwire/identity";
import { Channel } from "./channel.js";
import { ClosedResourceError, TransportError } from "./errors.js";
import { SecurityValidator } from "./security.js";
import { SessionRegistry } from "./session-registry.js";
import { formatSseComment, formatSseEvent, fromSessionEvent } from "./sse-parser.js";
import { TaskScope } from "./task-scope.js";
import { decodePayload } from "./codec.js";
import type { InboundMessage, SessionEvent, SessionHandler, TransportSession } from "./types.js";

export type SessionPolicy = "replace" | "reject";

export interface SseServerTransportOptions {
  identity: IdentityManager;
  sse?: SseServerConfigInput;
  security?: SecurityConfigInput;
  /** Whether a second GET from a peer with a live stream replaces it */
  sessionPolicy?: SessionPolicy;
  logger?: Logger;
}

/** Server-side state of one open GET stream */
interface SseSession {
  readonly peerDid: string;
  readonly connection: Connection;
  readonly inbound: Channel<InboundMessage>;
  readonly outbound: Channel<SessionMessage>;
  readonly scope: TaskScope;
}

function reply(res: ServerResponse, status: number, message: string): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(message);
}

function replyError(res: ServerResponse, error: TransportError): void {
  reply(res, error.status ?? 400, error.message);
}

/** NOT_FOUND answers 404, directory trouble 502, anything else 400 */
function peerStatus(error: IdentityError): number {
  switch (error.code) {
    case "NOT_FOUND":
      return 404;
    case "UNREACHABLE":
      return 502;
    default:
      return 400;
  }
}

function flattenHeaders(req: IncomingMessage): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return headers;
}

/** Read a request body as text, refusing more than `limit` bytes */
async function readBody(req: IncomingMessage, limit: number): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  let overflow = false;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    // Keep draining past the limit so the response can still be written
    if (size > limit) {
      overflow = true;
      continue;
    }
    chunks.push(buffer);
  }
  return overflow ? null : Buffer.concat(chunks).toString("utf8");
}

export class SseServerTransport {
  readonly registry = new SessionRegistry<SseSession>();
  private readonly identity: IdentityManager;
  private readonly config: SseServerConfig;
  private readonly validator: SecurityValidator;
  private readonly sessionPolicy: SessionPolicy;
  private readonly log: Logger;

  constructor(options: SseServerTransportOptions) {
    this.identity = options.identity;
    this.config = SseServerConfigSchema.parse(options.sse ?? {});
    this.sessionPolicy = options.sessionPolicy ?? "replace";
    this.log = options.logger ?? createLogger({ name: "sse-server" });
    this.validator = new SecurityValidator(options.security, this.log);
  }

  /** Absolute path peers POST to, including the mount prefix, URI-escaped */
  get messagePath(): string {
    return encodeURI(this.config.mountPath.replace(/\/$/, "") + this.config.endpoint);
  }

  /**
   * Handle a stream-open GET. Resolves once the stream has closed.
   */
  async connectSse(req: IncomingMessage, res: ServerResponse, onSession: SessionHandler): Promise<void> {
    const validated = this.validator.validate(req, false);
    if (!validated.ok) {
      replyError(res, validated.error);
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const peerDid = url.searchParams.get(PEER_ID_PARAM);
    if (!peerDid) {
      replyError(res, new TransportError(`Missing ${PEER_ID_PARAM} parameter`, "MISSING_PEER_ID", 400));
      return;
    }

    const connected = await this.identity.connect(peerDid);
    if (!connected.ok) {
      this.log.warn("Rejected stream from unresolvable peer", { peer: peerDid, code: connected.error.code });
      reply(res, peerStatus(connected.error), `Could not resolve peer ${peerDid}`);
      return;
    }

    // Checked after the await so the check and the registration below are one step
    if (this.sessionPolicy === "reject" && this.registry.has(peerDid)) {
      this.log.warn("Rejected second stream for peer", { peer: peerDid });
      replyError(res, new TransportError("Session already active", "SESSION_CONFLICT", 409));
      return;
    }

    const session: SseSession = {
      peerDid,
      connection: connected.value,
      inbound: new Channel<InboundMessage>("inbound"),
      outbound: new Channel<SessionMessage>("outbound"),
      scope: new TaskScope(undefined, this.log),
    };

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
    });
    res.flushHeaders();

    const displaced = this.registry.register(peerDid, session);
    if (displaced) {
      this.log.info("Stream replaces an earlier session", { peer: peerDid });
    }
    session.scope.onClose(() => {
      this.registry.unregister(peerDid, session);
      session.inbound.close();
      session.outbound.close();
      if (!res.writableEnded) res.end();
      this.log.info("Stream closed", { peer: peerDid });
    });

    const endpoint = await session.connection.seal(this.messagePath);
    if (!endpoint.ok) {
      this.log.error("Could not seal endpoint event", { peer: peerDid, error: endpoint.error.message });
      session.scope.cancel();
      return;
    }

    session.scope.spawn("sse-disconnect", (signal) => this.watchDisconnect(res, signal));
    session.scope.spawn("sse-writer", () => this.writeEvents(session, res, endpoint.value));
    this.keepAlive(session, res);
    this.log.info("Stream opened", { peer: peerDid });

    onSession({
      peerDid,
      inbound: session.inbound,
      outbound: session.outbound,
      close: () => session.scope.cancel(),
      closed: session.scope.join(),
    });

    await session.scope.join();
  }

  /**
   * Handle a message-delivery POST.
   * Answers 202 before the message is handed on; resolves once it has been.
   */
  async handlePostMessage(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const validated = this.validator.validate(req, true);
    if (!validated.ok) {
      replyError(res, validated.error);
      return;
    }

    const body = await readBody(req, this.config.maxBodyBytes);
    if (body === null) {
      reply(res, 413, "Payload too large");
      return;
    }
    const wire = body.trim();

    const addresses = this.identity.readAddresses(wire);
    if (!addresses.ok) {
      this.log.warn("Undecodable envelope", { error: addresses.error.message });
      reply(res, 400, "Could not decode envelope");
      return;
    }
    const { sender, receiver } = addresses.value;
    if (receiver !== this.identity.did) {
      this.log.warn("Envelope for another receiver", { sender, receiver });
      reply(res, 400, "Incorrect receiver");
      return;
    }

    let connection = this.registry.lookup(sender)?.connection;
    if (!connection) {
      const connected = await this.identity.connect(sender);
      if (!connected.ok) {
        reply(res, peerStatus(connected.error), `Could not resolve sender ${sender}`);
        return;
      }
      connection = connected.value;
    }

    const opened = await connection.open(wire);
    if (!opened.ok) {
      this.log.warn("Could not open envelope", { sender, code: opened.error.code });
      reply(res, 400, "Could not decode envelope");
      return;
    }

    const session = this.registry.lookup(sender);
    if (!session) {
      this.log.warn("No session for sender", { sender });
      reply(res, 404, "Could not find session");
      return;
    }

    const item = decodePayload(opened.value, flattenHeaders(req));
    if (item instanceof TransportError) {
      this.log.warn("Could not parse message", { sender, error: item.message });
      reply(res, 400, "Could not parse message");
    } else {
      reply(res, 202, "Accepted");
    }
    await this.deliver(session, item);
  }

  /** Node `http` request listener routing the stream and message paths */
  requestListener(onSession: SessionHandler): (req: IncomingMessage, res: ServerResponse) => void {
    const mount = this.config.mountPath.replace(/\/$/, "");
    return (req, res) => {
      let pathname = new URL(req.url ?? "/", "http://localhost").pathname;
      if (mount && pathname.startsWith(mount)) {
        pathname = pathname.slice(mount.length) || "/";
      }

      if (req.method === "GET" && pathname === this.config.path) {
        this.connectSse(req, res, onSession).catch((e: unknown) => {
          this.log.error("Stream handler failed", { error: errorMessage(e) });
          reply(res, 500, "Internal Server Error");
        });
      } else if (req.method === "POST" && pathname === this.config.endpoint) {
        this.handlePostMessage(req, res).catch((e: unknown) => {
          this.log.error("Message handler failed", { error: errorMessage(e) });
          reply(res, 500, "Internal Server Error");
        });
      } else {
        reply(res, 404, "Not Found");
      }
    };
  }

  /** Close every open stream */
  async close(): Promise<void> {
    const sessions = this.registry.handles();
    for (const session of sessions) session.scope.cancel();
    await Promise.all(sessions.map((session) => session.scope.join()));
  }

  private async deliver(session: SseSession, item: InboundMessage): Promise<void> {
    try {
      await session.inbound.send(item);
    } catch (e) {
      if (!(e instanceof ClosedResourceError)) throw e;
      this.log.debug("Session closed before delivery", { peer: session.peerDid });
    }
  }

  private async watchDisconnect(res: ServerResponse, signal: AbortSignal): Promise<void> {
    if (res.destroyed) return;
    try {
      await once(res, "close", { signal });
    } catch (e) {
      if (!signal.aborted) throw e;
    }
  }

  private async writeEvents(session: SseSession, res: ServerResponse, endpoint: string): Promise<void> {
    await this.writeEvent(res, { kind: "endpoint", sealed: endpoint }, session.scope.signal);

    for await (const item of session.outbound) {
      const sealed = await session.connection.seal(serializeRpcMessage(item.message));
      if (!sealed.ok) {
        this.log.error("Could not seal outbound message", { peer: session.peerDid, error: sealed.error.message });
        continue;
      }
      await this.writeEvent(res, { kind: "message", sealed: sealed.value }, session.scope.signal);
    }
  }

  /** Comment pings so a quiet stream still shows the client activity */
  private keepAlive(session: SseSession, res: ServerResponse): void {
    const ping = setInterval(() => {
      // A full socket buffer already means the client has data to read
      if (res.writableEnded || res.destroyed || res.writableNeedDrain) return;
      res.write(formatSseComment("ping"));
    }, this.config.pingIntervalMs);
    session.scope.onClose(() => clearInterval(ping));
  }

  /** Write one event, waiting for `drain` when the socket buffer is full */
  private async writeEvent(res: ServerResponse, event: SessionEvent, signal: AbortSignal): Promise<void> {
    if (res.writableEnded || res.destroyed) {
      throw new ClosedResourceError("Event stream is closed");
    }
    if (!res.write(formatSseEvent(fromSessionEvent(event)))) {
      try {
        await once(res, "drain", { signal });
      } catch (e) {
        if (signal.aborted) throw new ClosedResourceError("Event stream is closed");
        throw e;
      }
    }
  }
}
