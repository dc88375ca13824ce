// Identity Manager: owns the local identity and hands out peer Connections
// One instance per process, passed by reference to every transport

import { randomUUID } from "node:crypto";
import { type Result, ok, err } from "@sealwire/shared";
import {
  type IdentityConfig,
  type IdentityConfigInput,
  IdentityConfigSchema,
  type Logger,
  createLogger,
} from "@sealwire/kernel";
import { Connection, readEnvelopeAddresses, resolvePeerEndpoint } from "./connection.js";
import { type SecureChannelProviderDeps, createSecureChannelProvider } from "./nacl-provider.js";
import { IdentityError, type EnvelopeAddresses, type SecureChannelProvider } from "./types.js";

export interface IdentityManagerOptions {
  provider: SecureChannelProvider;
  config?: IdentityConfigInput;
  logger?: Logger;
}

/**
 * Identity Manager: handles the identity lifecycle.
 *
 * Responsibilities:
 * - Load the identity stored under an alias, or create and publish a new one
 * - Verify peers against the directory
 * - Bind (local, peer) pairs into Connections
 */
export class IdentityManager {
  private readonly provider: SecureChannelProvider;
  private readonly config: IdentityConfig;
  private readonly log: Logger;
  private localDid: string | null = null;

  constructor(options: IdentityManagerOptions) {
    const validated = IdentityConfigSchema.safeParse(options.config ?? {});
    if (!validated.success) {
      throw new IdentityError(`Invalid identity config: ${validated.error.message}`, "VALIDATION_ERROR");
    }
    this.config = validated.data;
    this.provider = options.provider;
    this.log = options.logger ?? createLogger({ name: "identity-manager" });
  }

  /** The local DID; throws before `init` has succeeded */
  get did(): string {
    if (this.localDid === null) {
      throw new IdentityError("Identity manager not initialized", "NOT_INITIALIZED");
    }
    return this.localDid;
  }

  get initialized(): boolean {
    return this.localDid !== null;
  }

  /**
   * Load the identity stored under `alias` and check it still resolves.
   * An identity the directory no longer knows is replaced by a new one;
   * any other verification failure is returned as is.
   */
  async init(alias: string = this.config.alias): Promise<Result<string, IdentityError>> {
    const resolved = await this.provider.resolveAlias(alias);
    if (!resolved.ok) return resolved;
    const existing = resolved.value;

    if (existing !== null) {
      const verified = await this.provider.verifyIdentity(existing);
      if (verified.ok) {
        this.localDid = existing;
        this.log.info("Loaded identity", { alias, did: existing });
        return ok(existing);
      }
      if (verified.error.code !== "NOT_FOUND") {
        this.log.error("Stored identity failed verification", {
          alias,
          did: existing,
          code: verified.error.code,
          error: verified.error.message,
        });
        return verified;
      }
      this.log.warn("Stored identity no longer resolves, creating a new one", { alias, did: existing });
    }

    const created = await this.createIdentity(alias);
    if (!created.ok) return created;
    this.localDid = created.value;
    return created;
  }

  /** Verify `peerDid` and bind it to the local identity */
  async connect(peerDid: string): Promise<Result<Connection, IdentityError>> {
    const localDid = this.localDid;
    if (localDid === null) {
      return err(new IdentityError("Identity manager not initialized", "NOT_INITIALIZED"));
    }

    const verified = await this.provider.verifyIdentity(peerDid);
    if (!verified.ok) {
      this.log.warn("Peer verification failed", { peer: peerDid, code: verified.error.code });
      return verified;
    }

    return ok(
      new Connection({
        localDid,
        peerDid,
        provider: this.provider,
        mismatchPolicy: this.config.mismatchPolicy,
        verbose: this.config.verbose,
        logger: this.log,
      })
    );
  }

  /** Resolve a peer's transport URL, optionally carrying our DID for reply routing */
  async resolveEndpoint(peerDid: string, includeLocalId: boolean): Promise<Result<string, IdentityError>> {
    if (includeLocalId && this.localDid === null) {
      return err(new IdentityError("Identity manager not initialized", "NOT_INITIALIZED"));
    }
    return resolvePeerEndpoint(this.provider, this.localDid ?? "", peerDid, includeLocalId);
  }

  /** Sender and receiver of an envelope, without opening it */
  readAddresses(wire: string | Uint8Array): Result<EnvelopeAddresses, IdentityError> {
    return readEnvelopeAddresses(this.provider, wire);
  }

  /** Generate a DID from the template: `<alias>-<uuid>`, truncated */
  generateDid(alias: string): string {
    const name = `${alias}-${randomUUID()}`.slice(0, this.config.maxNameLength);
    return this.config.didTemplate.replaceAll("{name}", name);
  }

  private async createIdentity(alias: string): Promise<Result<string, IdentityError>> {
    const did = this.generateDid(alias);
    const created = await this.provider.createIdentity({
      did,
      endpoint: this.config.transport,
      format: this.config.format,
    });
    if (!created.ok) return created;

    const published = await this.provider.publishIdentity(created.value);
    if (!published.ok) {
      this.log.error("Identity publish failed", { did, error: published.error.message });
      return published;
    }

    if (created.value.history !== null) {
      const history = await this.provider.publishHistory(did, created.value.history);
      if (!history.ok) {
        this.log.error("History publish failed", { did, error: history.error.message });
        return history;
      }
    }

    const stored = await this.provider.storeIdentity(created.value, alias);
    if (!stored.ok) return stored;

    this.log.info("Created identity", { alias, did, format: this.config.format });
    return ok(did);
  }
}

/** Identity Manager backed by the NaCl provider, configured from the identity section */
export function createIdentityManager(
  config: IdentityConfigInput = {},
  deps: SecureChannelProviderDeps = {}
): IdentityManager {
  const validated = IdentityConfigSchema.safeParse(config);
  if (!validated.success) {
    throw new IdentityError(`Invalid identity config: ${validated.error.message}`, "VALIDATION_ERROR");
  }
  const provider = createSecureChannelProvider(validated.data, deps);
  return new IdentityManager({ provider, config: validated.data, logger: deps.logger });
}
