// Transport endpoint schemes
// sse:// and sses:// name SSE endpoints, ws:// and wss:// WebSocket endpoints

import { type Result, ok, err } from "@sealwire/shared";
import { TransportError } from "./errors.js";

const SSE_SCHEMES: Record<string, string> = { "sse:": "http:", "sses:": "https:" };
const WS_SCHEMES = new Set(["ws:", "wss:"]);

function parse(endpoint: string): Result<URL, TransportError> {
  try {
    return ok(new URL(endpoint));
  } catch {
    return err(new TransportError(`Invalid endpoint URL: ${endpoint}`, "UNSUPPORTED_SCHEME"));
  }
}

/** Map an `sse://` or `sses://` endpoint to the HTTP URL of its stream */
export function toHttpUrl(endpoint: string): Result<URL, TransportError> {
  const parsed = parse(endpoint);
  if (!parsed.ok) return parsed;

  const scheme = SSE_SCHEMES[parsed.value.protocol];
  if (!scheme) {
    return err(
      new TransportError(`Unsupported SSE endpoint scheme: ${parsed.value.protocol}`, "UNSUPPORTED_SCHEME")
    );
  }
  // Non-special schemes cannot be switched in place, so rebuild from the string
  return parse(scheme + endpoint.slice(parsed.value.protocol.length));
}

/** Accept `ws://` and `wss://` endpoints only */
export function toWebSocketUrl(endpoint: string): Result<URL, TransportError> {
  const parsed = parse(endpoint);
  if (!parsed.ok) return parsed;

  if (!WS_SCHEMES.has(parsed.value.protocol)) {
    return err(
      new TransportError(`Unsupported WebSocket endpoint scheme: ${parsed.value.protocol}`, "UNSUPPORTED_SCHEME")
    );
  }
  return parsed;
}

/** Same scheme, host and port */
export function isSameOrigin(a: URL, b: URL): boolean {
  return a.protocol === b.protocol && a.hostname === b.hostname && a.port === b.port;
}
