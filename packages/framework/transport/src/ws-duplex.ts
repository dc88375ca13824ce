// WebSocket duplex runner, shared by server and client
// A reader task opens frames into the inbound channel, a writer task
// seals the outbound channel into frames; either ending closes the socket

import { on } from "node:events";
import { WebSocket } from "ws";
import { errorMessage, serializeRpcMessage, type SessionMessage } from "@sealwire/shared";
import type { Logger } from "@sealwire/kernel";
import { type Connection, toBase64Url } from "@sealwire/identity";
import { Channel } from "./channel.js";
import { TransportError } from "./errors.js";
import { TaskScope } from "./task-scope.js";
import { openInbound } from "./codec.js";
import type { InboundMessage, TransportSession } from "./types.js";

export type FrameEncoding = "text" | "binary";

export interface WebSocketDuplexOptions {
  ws: WebSocket;
  connection: Connection;
  frameEncoding: FrameEncoding;
  logger: Logger;
  signal?: AbortSignal;
}

/** Raw frame payload as text or bytes */
function frameToWire(data: unknown, isBinary: boolean): string | Uint8Array | null {
  let bytes: Buffer;
  if (Buffer.isBuffer(data)) {
    bytes = data;
  } else if (Array.isArray(data) && data.every((part) => Buffer.isBuffer(part))) {
    bytes = Buffer.concat(data);
  } else if (data instanceof ArrayBuffer) {
    bytes = Buffer.from(data);
  } else {
    return null;
  }
  return isBinary ? new Uint8Array(bytes) : bytes.toString("utf8");
}

function send(ws: WebSocket, data: string | Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(data, { binary: typeof data !== "string" }, (error) => (error ? reject(error) : resolve()));
  });
}

export function runWebSocketDuplex(options: WebSocketDuplexOptions): TransportSession {
  const { ws, connection, frameEncoding, logger: log } = options;
  const scope = new TaskScope(options.signal, log);
  const inbound = new Channel<InboundMessage>("inbound");
  const outbound = new Channel<SessionMessage>("outbound");

  scope.onClose(() => {
    inbound.close();
    outbound.close();
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
      ws.close(1000);
    }
  });
  ws.once("close", (code: number) => {
    log.info("WebSocket closed", { code });
    scope.cancel();
  });
  ws.on("error", (error: Error) => {
    log.warn("WebSocket error", { error: error.message });
    scope.cancel(error);
  });

  scope.spawn("ws-reader", async (signal) => {
    try {
      for await (const args of on(ws, "message", { signal })) {
        const [data, isBinary]: unknown[] = args;
        const wire = frameToWire(data, isBinary === true);
        if (wire === null) {
          await inbound.send(new TransportError("Unsupported frame payload", "ENVELOPE_DECODE_ERROR"));
          continue;
        }

        const addresses = connection.readAddresses(wire);
        if (addresses.ok && addresses.value.receiver !== connection.localDid) {
          log.warn("Dropping frame for another receiver", {
            sender: addresses.value.sender,
            receiver: addresses.value.receiver,
          });
          continue;
        }
        await inbound.send(await openInbound(connection, wire));
      }
    } catch (e) {
      if (!signal.aborted) throw e;
    }
  });

  scope.spawn("ws-writer", async () => {
    for await (const item of outbound) {
      const sealed = await connection.sealBytes(serializeRpcMessage(item.message));
      if (!sealed.ok) {
        log.error("Could not seal outbound message", { error: sealed.error.message });
        continue;
      }
      try {
        await send(ws, frameEncoding === "text" ? toBase64Url(sealed.value) : sealed.value);
      } catch (e) {
        log.warn("WebSocket send failed", { error: errorMessage(e) });
        return;
      }
    }
  });

  return {
    peerDid: connection.peerDid,
    inbound,
    outbound,
    close: () => scope.cancel(),
    closed: scope.join(),
  };
}
