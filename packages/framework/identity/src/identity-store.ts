// Identity storage: persists owned identities under local aliases

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errorMessage } from "@sealwire/shared";
import { type OwnedIdentity, OwnedIdentitySchema } from "./types.js";

/** Storage interface for owned identities */
export interface IdentityStorage {
  save(alias: string, identity: OwnedIdentity): Promise<void>;
  loadByAlias(alias: string): Promise<OwnedIdentity | null>;
  loadByDID(did: string): Promise<OwnedIdentity | null>;
  list(): Promise<OwnedIdentity[]>;
}

/** In-memory storage implementation */
export class InMemoryIdentityStorage implements IdentityStorage {
  private identities: Map<string, OwnedIdentity> = new Map(); // DID -> identity
  private aliasIndex: Map<string, string> = new Map(); // alias -> DID

  async save(alias: string, identity: OwnedIdentity): Promise<void> {
    this.identities.set(identity.did, identity);
    this.aliasIndex.set(alias, identity.did);
  }

  async loadByAlias(alias: string): Promise<OwnedIdentity | null> {
    const did = this.aliasIndex.get(alias);
    if (!did) return null;
    return this.identities.get(did) ?? null;
  }

  async loadByDID(did: string): Promise<OwnedIdentity | null> {
    return this.identities.get(did) ?? null;
  }

  async list(): Promise<OwnedIdentity[]> {
    return Array.from(this.identities.values());
  }

  /** Clear all identities (for testing) */
  clear(): void {
    this.identities.clear();
    this.aliasIndex.clear();
  }
}

const StoreFileSchema = z.object({
  version: z.literal(1),
  aliases: z.record(z.string()),
  identities: z.record(OwnedIdentitySchema),
});
type StoreFile = z.infer<typeof StoreFileSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSON file storage. The file holds secret keys and is written with mode 0600.
 * Writes are serialized and replace the file atomically.
 */
export class FileIdentityStorage implements IdentityStorage {
  private cache: StoreFile | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly path: string) {}

  async save(alias: string, identity: OwnedIdentity): Promise<void> {
    const next = this.writeChain.then(async () => {
      const data = await this.read();
      data.identities[identity.did] = identity;
      data.aliases[alias] = identity.did;
      await this.write(data);
    });
    // Keep the chain alive after a failed write; the caller still sees the failure
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  async loadByAlias(alias: string): Promise<OwnedIdentity | null> {
    const data = await this.read();
    const did = data.aliases[alias];
    if (!did) return null;
    return data.identities[did] ?? null;
  }

  async loadByDID(did: string): Promise<OwnedIdentity | null> {
    const data = await this.read();
    return data.identities[did] ?? null;
  }

  async list(): Promise<OwnedIdentity[]> {
    const data = await this.read();
    return Object.values(data.identities);
  }

  private async read(): Promise<StoreFile> {
    if (this.cache) return this.cache;

    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (e) {
      if (isMissingFile(e)) {
        this.cache = { version: 1, aliases: {}, identities: {} };
        return this.cache;
      }
      throw e;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e) {
      throw new Error(`Corrupt identity store ${this.path}: ${errorMessage(e)}`);
    }
    const parsed = StoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Corrupt identity store ${this.path}: ${parsed.error.message}`);
    }
    this.cache = parsed.data;
    return this.cache;
  }

  private async write(data: StoreFile): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(data, null, 2), { mode: 0o600 });
    await rename(tmpPath, this.path);
    this.cache = data;
  }
}
