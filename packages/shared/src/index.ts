// @sealwire/shared: Shared types, utils, and the RPC message model

// ─── Result Type (no try/catch for business logic) ───
export { ok, err, errorMessage, type Ok, type Err, type Result } from "./result.js";

// ─── RPC Messages ───
export {
  JSONRPC_VERSION,
  RpcIdSchema,
  RpcRequestSchema,
  RpcNotificationSchema,
  RpcResultResponseSchema,
  RpcErrorResponseSchema,
  RpcMessageSchema,
  parseRpcMessage,
  serializeRpcMessage,
  isRpcRequest,
  isRpcNotification,
  isRpcResponse,
  type RpcId,
  type RpcRequest,
  type RpcNotification,
  type RpcResultResponse,
  type RpcErrorResponse,
  type RpcMessage,
  type SessionMessage,
  type MessageMetadata,
} from "./messages.js";
