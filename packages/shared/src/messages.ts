// RPC message model carried by the transports
// JSON-RPC 2.0 framing only; method semantics belong to the layer above

import { z } from "zod";
import { type Result, ok, err, errorMessage } from "./result.js";

export const JSONRPC_VERSION = "2.0" as const;

export const RpcIdSchema = z.union([z.string(), z.number().int()]);
export type RpcId = z.infer<typeof RpcIdSchema>;

export const RpcRequestSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RpcIdSchema,
    method: z.string().min(1),
    params: z.record(z.unknown()).optional(),
  })
  .strict();
export type RpcRequest = z.infer<typeof RpcRequestSchema>;

export const RpcNotificationSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    method: z.string().min(1),
    params: z.record(z.unknown()).optional(),
  })
  .strict();
export type RpcNotification = z.infer<typeof RpcNotificationSchema>;

export const RpcResultResponseSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RpcIdSchema,
    result: z.record(z.unknown()),
  })
  .strict();
export type RpcResultResponse = z.infer<typeof RpcResultResponseSchema>;

export const RpcErrorResponseSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RpcIdSchema.nullable(),
    error: z.object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  })
  .strict();
export type RpcErrorResponse = z.infer<typeof RpcErrorResponseSchema>;

/** Any message that may cross a transport */
export const RpcMessageSchema = z.union([
  RpcRequestSchema,
  RpcNotificationSchema,
  RpcResultResponseSchema,
  RpcErrorResponseSchema,
]);
export type RpcMessage = z.infer<typeof RpcMessageSchema>;

/** Transport-side context attached to an inbound message */
export interface MessageMetadata {
  /** Identity that sealed the envelope */
  sender?: string;
  /** Headers of the HTTP request that delivered it (SSE POST only) */
  requestHeaders?: Record<string, string>;
}

/** A message plus the transport metadata that travelled with it */
export interface SessionMessage {
  readonly message: RpcMessage;
  readonly metadata?: MessageMetadata;
}

/**
 * Parse a JSON text into an RPC message.
 * Fails on malformed JSON as well as on schema mismatch.
 */
export function parseRpcMessage(text: string): Result<RpcMessage, Error> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return err(new Error(`Invalid JSON: ${errorMessage(e)}`));
  }

  const parsed = RpcMessageSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new Error(`Invalid RPC message: ${parsed.error.message}`));
  }
  return ok(parsed.data);
}

/** Serialize an RPC message, dropping undefined fields */
export function serializeRpcMessage(message: RpcMessage): string {
  return JSON.stringify(message);
}

export function isRpcRequest(message: RpcMessage): message is RpcRequest {
  return "method" in message && "id" in message;
}

export function isRpcNotification(message: RpcMessage): message is RpcNotification {
  return "method" in message && !("id" in message);
}

export function isRpcResponse(
  message: RpcMessage
): message is RpcResultResponse | RpcErrorResponse {
  return "result" in message || "error" in message;
}
