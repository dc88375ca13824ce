// @sealwire/identity: identity lifecycle and secure channels
// DIDs, directory publishing, envelope sealing

// ─── Types ───────────────────────────────────────────────────

export {
  IdentityError,
  type IdentityErrorCode,
  IdentityFormatSchema,
  IdentityDocumentSchema,
  HistoryEntrySchema,
  OwnedIdentitySchema,
  type IdentityFormat,
  type IdentityDocument,
  type HistoryEntry,
  type OwnedIdentity,
  type CreateIdentityRequest,
  type CreatedIdentity,
  type EnvelopeAddresses,
  type OpenedEnvelope,
  type SecureChannelProvider,
} from "./types.js";

// ─── Identity Manager ────────────────────────────────────────

export {
  IdentityManager,
  createIdentityManager,
  type IdentityManagerOptions,
} from "./identity-manager.js";

export {
  Connection,
  resolvePeerEndpoint,
  readEnvelopeAddresses,
  type ConnectionOptions,
  type MismatchPolicy,
} from "./connection.js";

// ─── NaCl Provider ───────────────────────────────────────────

export {
  NaclSecureChannelProvider,
  createSecureChannelProvider,
  encodeEnvelope,
  decodeEnvelope,
  createHistoryEntry,
  verifyHistoryEntry,
  ENVELOPE_VERSION,
  type NaclProviderOptions,
  type SecureChannelProviderDeps,
} from "./nacl-provider.js";

export {
  DirectoryClient,
  expandDidTemplate,
  type DirectoryClientOptions,
  type FetchFn,
} from "./directory-client.js";

// ─── Storage ─────────────────────────────────────────────────

export {
  type IdentityStorage,
  InMemoryIdentityStorage,
  FileIdentityStorage,
} from "./identity-store.js";

// ─── Encoding & Endpoints ────────────────────────────────────

export {
  toBase64,
  fromBase64,
  toBase64Url,
  fromBase64Url,
  utf8Encode,
  utf8Decode,
} from "./encoding.js";

export { PEER_ID_PARAM, addRequestParams, removeRequestParams } from "./endpoint.js";
