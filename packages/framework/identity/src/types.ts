// Identity types: owned identities, identity documents, envelopes,
// and the Secure Channel Provider capability everything else consumes

import { z } from "zod";
import type { Result } from "@sealwire/shared";

// ─── Error Types ─────────────────────────────────────────────

export type IdentityErrorCode =
  | "NOT_FOUND"
  | "UNREACHABLE"
  | "PUBLISH_FAILED"
  | "STORAGE_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_INITIALIZED"
  | "ENVELOPE_DECODE_ERROR"
  | "RECEIVER_MISMATCH"
  | "SENDER_MISMATCH";

export class IdentityError extends Error {
  constructor(
    message: string,
    public readonly code: IdentityErrorCode,
    public readonly did?: string
  ) {
    super(message);
    this.name = "IdentityError";
  }
}

// ─── Identity Records ────────────────────────────────────────

/** `history` identities carry a signed log entry next to their document */
export const IdentityFormatSchema = z.enum(["history", "plain"]);
export type IdentityFormat = z.infer<typeof IdentityFormatSchema>;

/** Public half of an identity as published to the directory */
export const IdentityDocumentSchema = z.object({
  id: z.string().min(1),
  /** Transport endpoint peers reach this identity at */
  endpoint: z.string().min(1),
  keys: z.object({
    /** X25519 public key, base64 */
    box: z.string().min(1),
    /** Ed25519 public key, base64 */
    sign: z.string().min(1),
  }),
});
export type IdentityDocument = z.infer<typeof IdentityDocumentSchema>;

/** First entry of an identity's history log */
export const HistoryEntrySchema = z.object({
  versionId: z.number().int().min(1),
  id: z.string().min(1),
  /** sha256 of the serialized document, hex */
  documentHash: z.string().regex(/^[0-9a-f]{64}$/),
  /** Ed25519 signature over `versionId:id:documentHash`, base64 */
  signature: z.string().min(1),
});
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

/** An identity whose secret keys we hold */
export const OwnedIdentitySchema = z.object({
  did: z.string().min(1),
  endpoint: z.string().min(1),
  format: IdentityFormatSchema,
  keys: z.object({
    boxPublicKey: z.string().min(1),
    boxSecretKey: z.string().min(1),
    signPublicKey: z.string().min(1),
    signSecretKey: z.string().min(1),
  }),
  createdAt: z.string(),
});
export type OwnedIdentity = z.infer<typeof OwnedIdentitySchema>;

/** What `createIdentity` asks the provider for */
export interface CreateIdentityRequest {
  did: string;
  endpoint: string;
  format: IdentityFormat;
}

/** A freshly generated identity, not yet published or stored */
export interface CreatedIdentity {
  readonly did: string;
  /** Serialized identity document */
  readonly document: string;
  /** Serialized history artifact; null for formats without one */
  readonly history: string | null;
  readonly identity: OwnedIdentity;
}

// ─── Envelopes ───────────────────────────────────────────────

/** Addressing recoverable from an envelope without opening it */
export interface EnvelopeAddresses {
  readonly sender: string;
  readonly receiver: string;
}

/** An opened envelope */
export interface OpenedEnvelope extends EnvelopeAddresses {
  readonly payload: Uint8Array;
}

// ─── Secure Channel Provider ─────────────────────────────────

/**
 * Capability performing the cryptographic work and identity resolution.
 * Transports and the identity manager only ever see envelopes through it.
 */
export interface SecureChannelProvider {
  /** DID stored under a local alias, if any; STORAGE_ERROR when the store cannot be read */
  resolveAlias(alias: string): Promise<Result<string | null, IdentityError>>;
  /** Resolve a DID against the directory and return its transport endpoint */
  verifyIdentity(did: string): Promise<Result<string, IdentityError>>;
  /** Generate key material and the documents to publish */
  createIdentity(request: CreateIdentityRequest): Promise<Result<CreatedIdentity, IdentityError>>;
  publishIdentity(created: CreatedIdentity): Promise<Result<void, IdentityError>>;
  publishHistory(did: string, history: string): Promise<Result<void, IdentityError>>;
  /** Persist an owned identity under an alias */
  storeIdentity(created: CreatedIdentity, alias: string): Promise<Result<void, IdentityError>>;
  seal(localDid: string, peerDid: string, payload: Uint8Array): Promise<Result<Uint8Array, IdentityError>>;
  open(envelope: Uint8Array): Promise<Result<OpenedEnvelope, IdentityError>>;
  readAddresses(envelope: Uint8Array): Result<EnvelopeAddresses, IdentityError>;
}
