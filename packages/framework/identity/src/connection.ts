// Connection: a (local identity, peer identity) binding that seals and opens envelopes

import { type Result, ok, err, errorMessage } from "@sealwire/shared";
import { type Logger, createLogger } from "@sealwire/kernel";
import { PEER_ID_PARAM, addRequestParams } from "./endpoint.js";
import { fromBase64Url, toBase64Url, utf8Encode } from "./encoding.js";
import {
  IdentityError,
  type EnvelopeAddresses,
  type OpenedEnvelope,
  type SecureChannelProvider,
} from "./types.js";

export type MismatchPolicy = "warn" | "reject";

export interface ConnectionOptions {
  localDid: string;
  peerDid: string;
  provider: SecureChannelProvider;
  /** What `open` does when the envelope names another sender or receiver */
  mismatchPolicy?: MismatchPolicy;
  /** Log envelopes at info instead of debug */
  verbose?: boolean;
  logger?: Logger;
}

/**
 * Resolve a peer's transport endpoint, optionally tagged with our own DID
 * so the peer can address replies.
 */
export async function resolvePeerEndpoint(
  provider: SecureChannelProvider,
  localDid: string,
  peerDid: string,
  includeLocalId: boolean
): Promise<Result<string, IdentityError>> {
  const endpoint = await provider.verifyIdentity(peerDid);
  if (!endpoint.ok || !includeLocalId) return endpoint;

  try {
    return ok(addRequestParams(endpoint.value, { [PEER_ID_PARAM]: localDid }));
  } catch (e) {
    return err(
      new IdentityError(`Invalid endpoint ${endpoint.value} for ${peerDid}: ${errorMessage(e)}`, "VALIDATION_ERROR", peerDid)
    );
  }
}

/** Addresses of a URL-safe text or raw envelope */
export function readEnvelopeAddresses(
  provider: SecureChannelProvider,
  wire: string | Uint8Array
): Result<EnvelopeAddresses, IdentityError> {
  if (typeof wire !== "string") return provider.readAddresses(wire);
  try {
    return provider.readAddresses(fromBase64Url(wire));
  } catch (e) {
    return err(new IdentityError(`Undecodable envelope: ${errorMessage(e)}`, "ENVELOPE_DECODE_ERROR"));
  }
}

export class Connection {
  readonly localDid: string;
  readonly peerDid: string;
  private readonly provider: SecureChannelProvider;
  private readonly mismatchPolicy: MismatchPolicy;
  private readonly verbose: boolean;
  private readonly log: Logger;

  constructor(options: ConnectionOptions) {
    this.localDid = options.localDid;
    this.peerDid = options.peerDid;
    this.provider = options.provider;
    this.mismatchPolicy = options.mismatchPolicy ?? "warn";
    this.verbose = options.verbose ?? false;
    this.log = (options.logger ?? createLogger({ name: "connection" })).child({
      local: options.localDid,
      peer: options.peerDid,
    });
  }

  /** Seal for the peer and encode as URL-safe text */
  async seal(plaintext: string | Uint8Array): Promise<Result<string, IdentityError>> {
    const sealed = await this.sealBytes(plaintext);
    if (!sealed.ok) return sealed;
    return ok(toBase64Url(sealed.value));
  }

  /** Seal for the peer, raw envelope bytes */
  async sealBytes(plaintext: string | Uint8Array): Promise<Result<Uint8Array, IdentityError>> {
    const payload = typeof plaintext === "string" ? utf8Encode(plaintext) : plaintext;
    const sealed = await this.provider.seal(this.localDid, this.peerDid, payload);
    if (sealed.ok) {
      this.trace("Sealed envelope", { bytes: sealed.value.length });
    }
    return sealed;
  }

  /**
   * Open an envelope, given as URL-safe text or raw bytes.
   * Address mismatches are logged, or rejected under the `reject` policy.
   */
  async open(wire: string | Uint8Array): Promise<Result<OpenedEnvelope, IdentityError>> {
    let bytes: Uint8Array;
    if (typeof wire === "string") {
      try {
        bytes = fromBase64Url(wire);
      } catch (e) {
        return err(new IdentityError(`Undecodable envelope: ${errorMessage(e)}`, "ENVELOPE_DECODE_ERROR"));
      }
    } else {
      bytes = wire;
    }

    const opened = await this.provider.open(bytes);
    if (!opened.ok) return opened;
    const { sender, receiver } = opened.value;

    if (receiver !== this.localDid) {
      const mismatch = this.mismatch(`Envelope receiver ${receiver} is not ${this.localDid}`, "RECEIVER_MISMATCH");
      if (mismatch) return err(mismatch);
    }
    if (sender !== this.peerDid) {
      const mismatch = this.mismatch(`Envelope sender ${sender} is not ${this.peerDid}`, "SENDER_MISMATCH");
      if (mismatch) return err(mismatch);
    }

    this.trace("Opened envelope", { sender, receiver, bytes: opened.value.payload.length });
    return opened;
  }

  /** Sender and receiver of an envelope, without opening it */
  readAddresses(wire: string | Uint8Array): Result<EnvelopeAddresses, IdentityError> {
    return readEnvelopeAddresses(this.provider, wire);
  }

  /** The peer's transport endpoint */
  resolveEndpoint(includeLocalId: boolean): Promise<Result<string, IdentityError>> {
    return resolvePeerEndpoint(this.provider, this.localDid, this.peerDid, includeLocalId);
  }

  private mismatch(message: string, code: "RECEIVER_MISMATCH" | "SENDER_MISMATCH"): IdentityError | null {
    if (this.mismatchPolicy === "reject") {
      this.log.warn(`${message}; rejecting`);
      return new IdentityError(message, code);
    }
    this.log.warn(message);
    return null;
  }

  private trace(msg: string, context: Record<string, unknown>): void {
    if (this.verbose) {
      this.log.info(msg, context);
    } else {
      this.log.debug(msg, context);
    }
  }
}
