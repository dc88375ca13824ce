// SSE Duplex Transport: client side
// One long-lived GET stream for inbound events, one POST per outbound message

import type { ReadableStream } from "node:stream/web";
import { type Result, ok, err, errorMessage, serializeRpcMessage, type SessionMessage } from "@sealwire/shared";
import {
  type Logger,
  SseConfigSchema,
  createIdleTimer,
  createLogger,
  createTimeoutController,
} from "@sealwire/kernel";
import {
  type Connection,
  type FetchFn,
  type IdentityManager,
  removeRequestParams,
  utf8Decode,
} from "@sealwire/identity";
import { Channel } from "./channel.js";
import { TransportError } from "./errors.js";
import { isSameOrigin, toHttpUrl } from "./endpoint.js";
import { type SseEvent, parseSseChunk, toSessionEvent } from "./sse-parser.js";
import { SEALED_ENVELOPE_CONTENT_TYPE } from "./security.js";
import { TaskScope } from "./task-scope.js";
import { openInbound } from "./codec.js";
import type { InboundMessage, TransportSession } from "./types.js";

export interface SseClientOptions {
  identity: IdentityManager;
  /** DID of the server to connect to */
  peerDid: string;
  /** Extra headers sent with the GET and every POST */
  headers?: Record<string, string>;
  /** Per-request HTTP timeout */
  timeoutMs?: number;
  /** Idle window on the event stream */
  readTimeoutMs?: number;
  fetch?: FetchFn;
  logger?: Logger;
  /** Aborting closes the session */
  signal?: AbortSignal;
}

const SSE_DEFAULTS = SseConfigSchema.parse({});

/** Read SSE events off a response body, reporting every chunk to `onActivity` */
async function* readEvents(
  body: ReadableStream<Uint8Array>,
  onActivity: () => void
): AsyncGenerator<SseEvent, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let carry = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      onActivity();
      const parsed = parseSseChunk(decoder.decode(value, { stream: true }), carry);
      carry = parsed.carry;
      yield* parsed.events;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Open an SSE session to `peerDid`.
 * Resolves after the endpoint handshake; the server's POST endpoint must
 * share scheme, host and port with the stream URL.
 */
export async function connectSseClient(
  options: SseClientOptions
): Promise<Result<TransportSession, TransportError>> {
  const log = (options.logger ?? createLogger({ name: "sse-client" })).child({ peer: options.peerDid });
  const fetchFn = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? SSE_DEFAULTS.timeoutMs;
  const readTimeoutMs = options.readTimeoutMs ?? SSE_DEFAULTS.readTimeoutMs;

  const connected = await options.identity.connect(options.peerDid);
  if (!connected.ok) {
    return err(new TransportError(connected.error.message, "PEER_UNRESOLVABLE", undefined, connected.error));
  }
  const connection = connected.value;

  const endpoint = await connection.resolveEndpoint(true);
  if (!endpoint.ok) {
    return err(new TransportError(endpoint.error.message, "PEER_UNRESOLVABLE", undefined, endpoint.error));
  }
  const streamUrl = toHttpUrl(endpoint.value);
  if (!streamUrl.ok) return streamUrl;

  const scope = new TaskScope(options.signal, log);
  const inbound = new Channel<InboundMessage>("inbound");
  const outbound = new Channel<SessionMessage>("outbound");
  const stream = new AbortController();
  let idle = false;
  const idleTimer = createIdleTimer(readTimeoutMs, () => {
    idle = true;
    log.warn("Event stream idle, disconnecting", { readTimeoutMs });
    stream.abort();
  });
  scope.onClose(() => {
    idleTimer.stop();
    stream.abort();
    inbound.close();
    outbound.close();
  });

  const fail = (error: TransportError): Result<TransportSession, TransportError> => {
    scope.cancel(error);
    return err(error);
  };

  log.debug("Connecting to event stream", { url: removeRequestParams(streamUrl.value.href) });
  const connectTimer = setTimeout(() => stream.abort(), timeoutMs);
  let response: Response;
  try {
    response = await fetchFn(streamUrl.value, {
      method: "GET",
      headers: { ...options.headers, Accept: "text/event-stream", "Cache-Control": "no-store" },
      signal: stream.signal,
    });
  } catch (e) {
    return fail(new TransportError(`Event stream request failed: ${errorMessage(e)}`, "HTTP_ERROR", undefined, e));
  } finally {
    clearTimeout(connectTimer);
  }

  if (!response.ok || !response.body) {
    return fail(new TransportError(`Event stream returned HTTP ${response.status}`, "HTTP_ERROR", response.status));
  }

  const events = readEvents(response.body, () => idleTimer.touch());

  // Handshake: the first event names the POST endpoint
  let first: IteratorResult<SseEvent, void>;
  try {
    first = await events.next();
  } catch (e) {
    const code = idle ? "READ_TIMEOUT" : "STREAM_CLOSED";
    return fail(new TransportError(`Event stream failed before handshake: ${errorMessage(e)}`, code, undefined, e));
  }
  if (first.done) {
    return fail(new TransportError("Event stream ended before handshake", "STREAM_CLOSED"));
  }
  const handshake = toSessionEvent(first.value);
  if (handshake?.kind !== "endpoint") {
    return fail(new TransportError(`Expected endpoint event, got ${first.value.event}`, "STREAM_CLOSED"));
  }

  const postUrl = await resolvePostUrl(connection, handshake.sealed, streamUrl.value);
  if (!postUrl.ok) {
    log.error("Rejected endpoint event", { error: postUrl.error.message });
    return fail(postUrl.error);
  }
  log.info("Event stream connected", { endpoint: postUrl.value.href });

  scope.spawn("sse-reader", async () => {
    try {
      for await (const event of events) {
        const sessionEvent = toSessionEvent(event);
        if (sessionEvent === null) {
          log.debug("Ignoring unknown event", { event: event.event });
          continue;
        }
        switch (sessionEvent.kind) {
          case "endpoint":
            log.warn("Ignoring repeated endpoint event");
            break;
          case "message":
            await inbound.send(await openInbound(connection, sessionEvent.sealed));
            break;
          default: {
            const unreachable: never = sessionEvent;
            throw new Error(`Unhandled session event ${JSON.stringify(unreachable)}`);
          }
        }
      }
    } catch (e) {
      if (!idle) throw e;
    }
    if (idle) {
      // The session closes one window later even if nobody takes the error
      const giveUp = setTimeout(() => scope.cancel(), readTimeoutMs);
      try {
        await inbound.send(new TransportError(`No data for ${readTimeoutMs}ms`, "READ_TIMEOUT"));
      } finally {
        clearTimeout(giveUp);
      }
    }
    log.info("Event stream ended");
  });

  scope.spawn("sse-writer", async () => {
    for await (const item of outbound) {
      if (idle) {
        log.warn("Dropping outbound message on a timed-out stream");
        continue;
      }
      const sealed = await connection.seal(serializeRpcMessage(item.message));
      if (!sealed.ok) {
        log.error("Could not seal outbound message", { error: sealed.error.message });
        continue;
      }
      const posted = await postEnvelope(fetchFn, postUrl.value, sealed.value, options.headers, timeoutMs, scope.signal);
      if (!posted.ok) {
        log.error("Message POST failed, closing session", { error: posted.error.message });
        return;
      }
    }
  });

  return ok({
    peerDid: options.peerDid,
    inbound,
    outbound,
    close: () => scope.cancel(),
    closed: scope.join(),
  });
}

/** Open the endpoint event and check it stays on the stream's origin */
async function resolvePostUrl(
  connection: Connection,
  sealed: string,
  streamUrl: URL
): Promise<Result<URL, TransportError>> {
  const opened = await connection.open(sealed);
  if (!opened.ok) {
    return err(new TransportError(`Could not open endpoint event: ${opened.error.message}`, "ENVELOPE_DECODE_ERROR"));
  }

  let postUrl: URL;
  try {
    postUrl = new URL(utf8Decode(opened.value.payload), streamUrl);
  } catch (e) {
    return err(new TransportError(`Invalid endpoint event: ${errorMessage(e)}`, "ENDPOINT_ORIGIN_MISMATCH"));
  }
  if (!isSameOrigin(postUrl, streamUrl)) {
    return err(
      new TransportError(
        `Endpoint origin does not match connection origin: ${postUrl.origin}`,
        "ENDPOINT_ORIGIN_MISMATCH"
      )
    );
  }
  return ok(postUrl);
}

async function postEnvelope(
  fetchFn: FetchFn,
  url: URL,
  body: string,
  headers: Record<string, string> | undefined,
  timeoutMs: number,
  parent: AbortSignal
): Promise<Result<void, TransportError>> {
  const { signal, cleanup } = createTimeoutController(timeoutMs, parent);
  try {
    const response = await fetchFn(url, {
      method: "POST",
      headers: { ...headers, "Content-Type": SEALED_ENVELOPE_CONTENT_TYPE },
      body,
      signal,
    });
    const text = await response.text();
    if (!response.ok) {
      return err(new TransportError(`HTTP ${response.status}: ${text}`, "HTTP_ERROR", response.status));
    }
    return ok(undefined);
  } catch (e) {
    return err(new TransportError(`POST to ${url.href} failed: ${errorMessage(e)}`, "HTTP_ERROR", undefined, e));
  } finally {
    cleanup();
  }
}
