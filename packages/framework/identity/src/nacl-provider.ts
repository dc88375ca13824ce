// NaCl Secure Channel Provider
// X25519 box keys seal envelopes, Ed25519 keys sign history entries,
// identity documents live in an HTTP directory

import { createHash } from "node:crypto";
import tweetnacl from "tweetnacl";
import { type Result, ok, err, errorMessage } from "@sealwire/shared";
import { type IdentityConfig, type Logger, createLogger } from "@sealwire/kernel";
import { DirectoryClient, type FetchFn } from "./directory-client.js";
import { type IdentityStorage, FileIdentityStorage, InMemoryIdentityStorage } from "./identity-store.js";
import { fromBase64, toBase64, utf8Decode, utf8Encode } from "./encoding.js";
import {
  IdentityError,
  type CreateIdentityRequest,
  type CreatedIdentity,
  type EnvelopeAddresses,
  type HistoryEntry,
  type IdentityDocument,
  type OpenedEnvelope,
  type OwnedIdentity,
  type SecureChannelProvider,
} from "./types.js";

const { box, sign, randomBytes } = tweetnacl;

export const ENVELOPE_VERSION = 1;
const MAX_ID_BYTES = 0xffff;

// ─── Envelope Codec ──────────────────────────────────────────

function decodeError(message: string): IdentityError {
  return new IdentityError(message, "ENVELOPE_DECODE_ERROR");
}

interface EnvelopeParts extends EnvelopeAddresses {
  nonce: Uint8Array;
  ciphertext: Uint8Array;
}

/**
 * Layout: version(1) | senderLen(u16) | sender | receiverLen(u16) | receiver | nonce(24) | box
 */
export function encodeEnvelope(parts: EnvelopeParts): Uint8Array {
  const sender = utf8Encode(parts.sender);
  const receiver = utf8Encode(parts.receiver);
  if (sender.length > MAX_ID_BYTES || receiver.length > MAX_ID_BYTES) {
    throw decodeError("Identity too long for envelope header");
  }

  const out = new Uint8Array(
    1 + 2 + sender.length + 2 + receiver.length + parts.nonce.length + parts.ciphertext.length
  );
  const view = new DataView(out.buffer);
  let offset = 0;
  out[offset++] = ENVELOPE_VERSION;
  view.setUint16(offset, sender.length);
  offset += 2;
  out.set(sender, offset);
  offset += sender.length;
  view.setUint16(offset, receiver.length);
  offset += 2;
  out.set(receiver, offset);
  offset += receiver.length;
  out.set(parts.nonce, offset);
  offset += parts.nonce.length;
  out.set(parts.ciphertext, offset);
  return out;
}

export function decodeEnvelope(bytes: Uint8Array): Result<EnvelopeParts, IdentityError> {
  if (bytes.length < 1 || bytes[0] !== ENVELOPE_VERSION) {
    return err(decodeError("Unsupported envelope version"));
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 1;

  const readId = (): string | null => {
    if (offset + 2 > bytes.length) return null;
    const length = view.getUint16(offset);
    offset += 2;
    if (length === 0 || offset + length > bytes.length) return null;
    const slice = bytes.subarray(offset, offset + length);
    offset += length;
    try {
      return utf8Decode(slice);
    } catch {
      return null;
    }
  };

  const sender = readId();
  const receiver = readId();
  if (sender === null || receiver === null) {
    return err(decodeError("Truncated envelope header"));
  }
  if (offset + box.nonceLength + box.overheadLength > bytes.length) {
    return err(decodeError("Truncated envelope body"));
  }

  const nonce = bytes.subarray(offset, offset + box.nonceLength);
  const ciphertext = bytes.subarray(offset + box.nonceLength);
  return ok({ sender, receiver, nonce, ciphertext });
}

// ─── Identity Artifacts ──────────────────────────────────────

function sha256Hex(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/** Build the first history entry for a document, signed by its owner */
export function createHistoryEntry(did: string, document: string, signSecretKey: Uint8Array): HistoryEntry {
  const documentHash = sha256Hex(document);
  const message = utf8Encode(`1:${did}:${documentHash}`);
  return {
    versionId: 1,
    id: did,
    documentHash,
    signature: toBase64(sign.detached(message, signSecretKey)),
  };
}

/** Check a history entry against the document and the published signing key */
export function verifyHistoryEntry(entry: HistoryEntry, document: string, signPublicKey: Uint8Array): boolean {
  if (entry.documentHash !== sha256Hex(document)) return false;
  const message = utf8Encode(`${entry.versionId}:${entry.id}:${entry.documentHash}`);
  return sign.detached.verify(message, fromBase64(entry.signature), signPublicKey);
}

// ─── Provider ────────────────────────────────────────────────

export interface NaclProviderOptions {
  directory: DirectoryClient;
  storage?: IdentityStorage;
  logger?: Logger;
}

export class NaclSecureChannelProvider implements SecureChannelProvider {
  private readonly directory: DirectoryClient;
  private readonly storage: IdentityStorage;
  private readonly log: Logger;
  private readonly owned = new Map<string, OwnedIdentity>();
  private readonly verified = new Map<string, IdentityDocument>();

  constructor(options: NaclProviderOptions) {
    this.directory = options.directory;
    this.storage = options.storage ?? new InMemoryIdentityStorage();
    this.log = options.logger ?? createLogger({ name: "nacl-provider" });
  }

  async resolveAlias(alias: string): Promise<Result<string | null, IdentityError>> {
    let identity: OwnedIdentity | null;
    try {
      identity = await this.storage.loadByAlias(alias);
    } catch (e) {
      return err(this.storageError(`Failed to read identity store: ${errorMessage(e)}`, { alias }));
    }
    if (!identity) return ok(null);
    this.owned.set(identity.did, identity);
    return ok(identity.did);
  }

  async verifyIdentity(did: string): Promise<Result<string, IdentityError>> {
    const resolved = await this.directory.resolve(did);
    if (!resolved.ok) return resolved;

    this.verified.set(did, resolved.value);
    this.log.debug("Identity verified", { did, endpoint: resolved.value.endpoint });
    return ok(resolved.value.endpoint);
  }

  async createIdentity(request: CreateIdentityRequest): Promise<Result<CreatedIdentity, IdentityError>> {
    const boxKeys = box.keyPair();
    const signKeys = sign.keyPair();

    const document: IdentityDocument = {
      id: request.did,
      endpoint: request.endpoint,
      keys: { box: toBase64(boxKeys.publicKey), sign: toBase64(signKeys.publicKey) },
    };
    const serialized = JSON.stringify(document);
    const history =
      request.format === "history"
        ? JSON.stringify(createHistoryEntry(request.did, serialized, signKeys.secretKey))
        : null;

    return ok({
      did: request.did,
      document: serialized,
      history,
      identity: {
        did: request.did,
        endpoint: request.endpoint,
        format: request.format,
        keys: {
          boxPublicKey: toBase64(boxKeys.publicKey),
          boxSecretKey: toBase64(boxKeys.secretKey),
          signPublicKey: toBase64(signKeys.publicKey),
          signSecretKey: toBase64(signKeys.secretKey),
        },
        createdAt: new Date().toISOString(),
      },
    });
  }

  publishIdentity(created: CreatedIdentity): Promise<Result<void, IdentityError>> {
    return this.directory.publishDocument(created.did, created.document);
  }

  publishHistory(did: string, history: string): Promise<Result<void, IdentityError>> {
    return this.directory.publishHistory(did, history);
  }

  async storeIdentity(created: CreatedIdentity, alias: string): Promise<Result<void, IdentityError>> {
    try {
      await this.storage.save(alias, created.identity);
    } catch (e) {
      this.log.error("Failed to store identity", { did: created.did, alias, error: errorMessage(e) });
      return err(
        new IdentityError(`Failed to store identity: ${errorMessage(e)}`, "STORAGE_ERROR", created.did)
      );
    }
    this.owned.set(created.did, created.identity);
    return ok(undefined);
  }

  async seal(localDid: string, peerDid: string, payload: Uint8Array): Promise<Result<Uint8Array, IdentityError>> {
    const loaded = await this.loadOwned(localDid);
    if (!loaded.ok) return loaded;
    const local = loaded.value;
    if (!local) {
      return err(new IdentityError(`Not an owned identity: ${localDid}`, "NOT_FOUND", localDid));
    }
    const peerKey = await this.boxPublicKey(peerDid);
    if (!peerKey.ok) return peerKey;

    const nonce = randomBytes(box.nonceLength);
    const ciphertext = box(payload, nonce, peerKey.value, fromBase64(local.keys.boxSecretKey));
    try {
      return ok(encodeEnvelope({ sender: localDid, receiver: peerDid, nonce, ciphertext }));
    } catch (e) {
      return err(decodeError(errorMessage(e)));
    }
  }

  async open(envelope: Uint8Array): Promise<Result<OpenedEnvelope, IdentityError>> {
    const decoded = decodeEnvelope(envelope);
    if (!decoded.ok) return decoded;
    const { sender, receiver, nonce, ciphertext } = decoded.value;

    const loaded = await this.loadOwned(receiver);
    if (!loaded.ok) return loaded;
    const local = loaded.value;
    if (!local) {
      return err(
        new IdentityError(`Envelope addressed to foreign identity ${receiver}`, "RECEIVER_MISMATCH", receiver)
      );
    }
    const senderKey = await this.boxPublicKey(sender);
    if (!senderKey.ok) return senderKey;

    const payload = box.open(ciphertext, nonce, senderKey.value, fromBase64(local.keys.boxSecretKey));
    if (!payload) {
      return err(decodeError(`Envelope from ${sender} failed authentication`));
    }
    return ok({ sender, receiver, payload });
  }

  readAddresses(envelope: Uint8Array): Result<EnvelopeAddresses, IdentityError> {
    const decoded = decodeEnvelope(envelope);
    if (!decoded.ok) return decoded;
    return ok({ sender: decoded.value.sender, receiver: decoded.value.receiver });
  }

  private async loadOwned(did: string): Promise<Result<OwnedIdentity | null, IdentityError>> {
    const cached = this.owned.get(did);
    if (cached) return ok(cached);
    let stored: OwnedIdentity | null;
    try {
      stored = await this.storage.loadByDID(did);
    } catch (e) {
      return err(this.storageError(`Failed to read identity store: ${errorMessage(e)}`, { did }, did));
    }
    if (stored) this.owned.set(did, stored);
    return ok(stored);
  }

  private storageError(message: string, context: Record<string, string>, did?: string): IdentityError {
    this.log.error(message, context);
    return new IdentityError(message, "STORAGE_ERROR", did);
  }

  /** Box key of a peer: verified cache, then local ownership, then the directory */
  private async boxPublicKey(did: string): Promise<Result<Uint8Array, IdentityError>> {
    const known = this.verified.get(did);
    if (known) return this.decodeKey(did, known.keys.box);

    const owned = await this.loadOwned(did);
    if (!owned.ok) return owned;
    if (owned.value) return ok(fromBase64(owned.value.keys.boxPublicKey));

    const verified = await this.verifyIdentity(did);
    if (!verified.ok) return verified;
    const document = this.verified.get(did);
    if (!document) {
      return err(new IdentityError(`Identity not found: ${did}`, "NOT_FOUND", did));
    }
    return this.decodeKey(did, document.keys.box);
  }

  private decodeKey(did: string, base64: string): Result<Uint8Array, IdentityError> {
    try {
      const key = fromBase64(base64);
      if (key.length === box.publicKeyLength) return ok(key);
    } catch (e) {
      this.log.warn("Undecodable box key", { did, error: errorMessage(e) });
    }
    return err(new IdentityError(`Invalid box key published for ${did}`, "UNREACHABLE", did));
  }
}

// ─── Factory ─────────────────────────────────────────────────

export interface SecureChannelProviderDeps {
  fetch?: FetchFn;
  logger?: Logger;
  storage?: IdentityStorage;
}

/** Build the NaCl provider from identity configuration */
export function createSecureChannelProvider(
  config: IdentityConfig,
  deps: SecureChannelProviderDeps = {}
): NaclSecureChannelProvider {
  const storage =
    deps.storage ?? (config.storePath ? new FileIdentityStorage(config.storePath) : new InMemoryIdentityStorage());
  const directory = new DirectoryClient({
    publishUrl: config.publishUrl,
    historyUrl: config.historyUrl,
    resolveUrl: config.resolveUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch: deps.fetch,
    logger: deps.logger,
  });
  return new NaclSecureChannelProvider({ directory, storage, logger: deps.logger });
}
