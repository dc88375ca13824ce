// Identity storage tests
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileIdentityStorage, InMemoryIdentityStorage } from "./identity-store.js";
import type { OwnedIdentity } from "./types.js";

function identity(did: string): OwnedIdentity {
  return {
    did,
    endpoint: "client://",
    format: "plain",
    keys: {
      boxPublicKey: "box-public",
      boxSecretKey: "box-secret",
      signPublicKey: "sign-public",
      signSecretKey: "sign-secret",
    },
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

describe("InMemoryIdentityStorage", () => {
  it("should index identities by alias and DID", async () => {
    const storage = new InMemoryIdentityStorage();
    await storage.save("alice", identity("did:test:alice"));

    expect((await storage.loadByAlias("alice"))?.did).toBe("did:test:alice");
    expect((await storage.loadByDID("did:test:alice"))?.did).toBe("did:test:alice");
    expect(await storage.loadByAlias("bob")).toBeNull();
  });

  it("should point an alias at its newest identity", async () => {
    const storage = new InMemoryIdentityStorage();
    await storage.save("alice", identity("did:test:old"));
    await storage.save("alice", identity("did:test:new"));

    expect((await storage.loadByAlias("alice"))?.did).toBe("did:test:new");
    expect(await storage.list()).toHaveLength(2);
  });
});

describe("FileIdentityStorage", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sealwire-store-"));
    path = join(dir, "nested", "identities.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should start empty when the file does not exist", async () => {
    const storage = new FileIdentityStorage(path);
    expect(await storage.list()).toEqual([]);
    expect(await storage.loadByAlias("alice")).toBeNull();
  });

  it("should persist identities across instances", async () => {
    await new FileIdentityStorage(path).save("alice", identity("did:test:alice"));

    const reopened = new FileIdentityStorage(path);
    expect(await reopened.loadByAlias("alice")).toEqual(identity("did:test:alice"));
    expect((await reopened.loadByDID("did:test:alice"))?.keys.boxSecretKey).toBe("box-secret");
  });

  it("should write the file readable by the owner only", async () => {
    await new FileIdentityStorage(path).save("alice", identity("did:test:alice"));

    const info = await stat(path);
    expect(info.mode & 0o777).toBe(0o600);
  });

  it("should serialize concurrent saves", async () => {
    const storage = new FileIdentityStorage(path);
    await Promise.all([
      storage.save("a", identity("did:test:a")),
      storage.save("b", identity("did:test:b")),
      storage.save("c", identity("did:test:c")),
    ]);

    const reopened = new FileIdentityStorage(path);
    const dids = (await reopened.list()).map((item) => item.did).sort();
    expect(dids).toEqual(["did:test:a", "did:test:b", "did:test:c"]);
  });

  it("should reject a corrupt store", async () => {
    const corruptPath = join(dir, "corrupt.json");
    await writeFile(corruptPath, JSON.stringify({ version: 2, aliases: {}, identities: {} }));

    await expect(new FileIdentityStorage(corruptPath).list()).rejects.toThrow(/Corrupt identity store/);
  });

  it("should report a store that is not JSON as corrupt", async () => {
    const corruptPath = join(dir, "garbled.json");
    await writeFile(corruptPath, "{not json");

    await expect(new FileIdentityStorage(corruptPath).loadByAlias("alice")).rejects.toThrow(/Corrupt identity store/);
  });
});
