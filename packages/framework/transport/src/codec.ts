// Envelope <-> session message conversion shared by the transports

import { parseRpcMessage, errorMessage, type SessionMessage } from "@sealwire/shared";
import { type Connection, type OpenedEnvelope, utf8Decode } from "@sealwire/identity";
import { TransportError } from "./errors.js";
import type { InboundMessage } from "./types.js";

/** Decode an opened payload into a session message, or the parse failure */
export function decodePayload(
  opened: OpenedEnvelope,
  requestHeaders?: Record<string, string>
): InboundMessage {
  let text: string;
  try {
    text = utf8Decode(opened.payload);
  } catch (e) {
    return new TransportError(`Payload is not UTF-8: ${errorMessage(e)}`, "MESSAGE_PARSE_ERROR", undefined, e);
  }

  const parsed = parseRpcMessage(text);
  if (!parsed.ok) {
    return new TransportError(parsed.error.message, "MESSAGE_PARSE_ERROR", undefined, parsed.error);
  }
  return {
    message: parsed.value,
    metadata: requestHeaders ? { sender: opened.sender, requestHeaders } : { sender: opened.sender },
  };
}

/** Open a wire envelope and decode it; failures come back as error values */
export async function openInbound(connection: Connection, wire: string | Uint8Array): Promise<InboundMessage> {
  const opened = await connection.open(wire);
  if (!opened.ok) {
    return new TransportError(
      `Could not open envelope: ${opened.error.message}`,
      "ENVELOPE_DECODE_ERROR",
      undefined,
      opened.error
    );
  }
  return decodePayload(opened.value);
}
