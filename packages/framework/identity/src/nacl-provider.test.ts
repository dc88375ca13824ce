// NaCl provider and envelope codec tests
import { describe, it, expect, beforeEach } from "vitest";
import tweetnacl from "tweetnacl";
import { IdentityConfigSchema } from "@sealwire/kernel";
import {
  type NaclSecureChannelProvider,
  createHistoryEntry,
  createSecureChannelProvider,
  decodeEnvelope,
  encodeEnvelope,
  verifyHistoryEntry,
} from "./nacl-provider.js";
import { InMemoryDirectory } from "./testing.js";
import { fromBase64, utf8Decode, utf8Encode } from "./encoding.js";
import { HistoryEntrySchema, IdentityDocumentSchema } from "./types.js";
import type { IdentityStorage } from "./identity-store.js";

async function createOwned(
  provider: NaclSecureChannelProvider,
  did: string,
  alias: string
): Promise<void> {
  const created = await provider.createIdentity({ did, endpoint: "client://", format: "history" });
  if (!created.ok) throw created.error;
  const published = await provider.publishIdentity(created.value);
  if (!published.ok) throw published.error;
  if (created.value.history !== null) {
    const history = await provider.publishHistory(did, created.value.history);
    if (!history.ok) throw history.error;
  }
  const stored = await provider.storeIdentity(created.value, alias);
  if (!stored.ok) throw stored.error;
}

describe("envelope codec", () => {
  const nonce = new Uint8Array(24).fill(7);
  const ciphertext = new Uint8Array(20).fill(9);

  it("should encode the header in front of nonce and box", () => {
    const bytes = encodeEnvelope({ sender: "a", receiver: "bc", nonce, ciphertext });

    expect(Array.from(bytes.subarray(0, 9))).toEqual([1, 0, 1, 97, 0, 2, 98, 99, 7]);
    expect(bytes.length).toBe(1 + 2 + 1 + 2 + 2 + 24 + 20);
  });

  it("should decode what it encodes", () => {
    const decoded = decodeEnvelope(encodeEnvelope({ sender: "did:x:a", receiver: "did:x:b", nonce, ciphertext }));

    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(decoded.value.sender).toBe("did:x:a");
      expect(decoded.value.receiver).toBe("did:x:b");
      expect(Array.from(decoded.value.nonce)).toEqual(Array.from(nonce));
      expect(Array.from(decoded.value.ciphertext)).toEqual(Array.from(ciphertext));
    }
  });

  it("should reject an unknown version byte", () => {
    const bytes = encodeEnvelope({ sender: "a", receiver: "b", nonce, ciphertext });
    bytes[0] = 2;

    const decoded = decodeEnvelope(bytes);

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.error.code).toBe("ENVELOPE_DECODE_ERROR");
      expect(decoded.error.message).toBe("Unsupported envelope version");
    }
  });

  it("should reject a truncated header", () => {
    const decoded = decodeEnvelope(new Uint8Array([1, 0, 5, 97]));

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.error.message).toBe("Truncated envelope header");
    }
  });

  it("should reject a body shorter than nonce plus authenticator", () => {
    const bytes = encodeEnvelope({ sender: "a", receiver: "b", nonce, ciphertext: new Uint8Array(4) });

    const decoded = decodeEnvelope(bytes);

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.error.message).toBe("Truncated envelope body");
    }
  });
});

describe("history entries", () => {
  it("should verify against the signed document only", () => {
    const keys = tweetnacl.sign.keyPair();
    const document = '{"id":"did:x:a"}';
    const entry = createHistoryEntry("did:x:a", document, keys.secretKey);

    expect(entry.versionId).toBe(1);
    expect(entry.id).toBe("did:x:a");
    expect(verifyHistoryEntry(entry, document, keys.publicKey)).toBe(true);
    expect(verifyHistoryEntry(entry, '{"id":"did:x:b"}', keys.publicKey)).toBe(false);
    expect(verifyHistoryEntry(entry, document, tweetnacl.sign.keyPair().publicKey)).toBe(false);
  });
});

describe("NaclSecureChannelProvider", () => {
  let directory: InMemoryDirectory;
  let alice: NaclSecureChannelProvider;
  let bob: NaclSecureChannelProvider;

  beforeEach(async () => {
    directory = new InMemoryDirectory();
    const config = IdentityConfigSchema.parse(directory.config());
    alice = createSecureChannelProvider(config, { fetch: directory.fetch });
    bob = createSecureChannelProvider(config, { fetch: directory.fetch });
    await createOwned(alice, "did:test:alice", "alice");
    await createOwned(bob, "did:test:bob", "bob");
  });

  it("should resolve owned aliases only", async () => {
    expect(await alice.resolveAlias("alice")).toEqual({ ok: true, value: "did:test:alice" });
    expect(await alice.resolveAlias("bob")).toEqual({ ok: true, value: null });
  });

  it("should return storage failures as results", async () => {
    const unreadable: IdentityStorage = {
      save: async () => undefined,
      loadByAlias: () => Promise.reject(new Error("disk unavailable")),
      loadByDID: () => Promise.reject(new Error("disk unavailable")),
      list: () => Promise.reject(new Error("disk unavailable")),
    };
    const broken = createSecureChannelProvider(IdentityConfigSchema.parse(directory.config()), {
      fetch: directory.fetch,
      storage: unreadable,
    });
    const sealed = await alice.seal("did:test:alice", "did:test:bob", utf8Encode("payload"));
    if (!sealed.ok) throw sealed.error;

    const alias = await broken.resolveAlias("alice");
    const sealedByBroken = await broken.seal("did:test:alice", "did:test:bob", utf8Encode("x"));
    const opened = await broken.open(sealed.value);

    for (const result of [alias, sealedByBroken, opened]) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("STORAGE_ERROR");
        expect(result.error.message).toBe("Failed to read identity store: disk unavailable");
      }
    }
  });

  it("should return the advertised endpoint on verify", async () => {
    directory.setEndpoint("did:test:bob", "sse://127.0.0.1:8123/sse");

    expect(await alice.verifyIdentity("did:test:bob")).toEqual({ ok: true, value: "sse://127.0.0.1:8123/sse" });
  });

  it("should seal for the peer and open with the receiver's keys", async () => {
    const sealed = await alice.seal("did:test:alice", "did:test:bob", utf8Encode("payload"));
    if (!sealed.ok) throw sealed.error;

    expect(alice.readAddresses(sealed.value)).toEqual({
      ok: true,
      value: { sender: "did:test:alice", receiver: "did:test:bob" },
    });

    const opened = await bob.open(sealed.value);
    expect(opened.ok).toBe(true);
    if (opened.ok) {
      expect(utf8Decode(opened.value.payload)).toBe("payload");
    }
  });

  it("should refuse to seal from an identity it does not own", async () => {
    const sealed = await alice.seal("did:test:bob", "did:test:alice", utf8Encode("x"));

    expect(sealed.ok).toBe(false);
    if (!sealed.ok) {
      expect(sealed.error.code).toBe("NOT_FOUND");
    }
  });

  it("should fail to open a tampered ciphertext", async () => {
    const sealed = await alice.seal("did:test:alice", "did:test:bob", utf8Encode("payload"));
    if (!sealed.ok) throw sealed.error;
    const tampered = sealed.value.slice();
    const last = tampered.length - 1;
    tampered[last] = (tampered[last] ?? 0) ^ 0xff;

    const opened = await bob.open(tampered);

    expect(opened.ok).toBe(false);
    if (!opened.ok) {
      expect(opened.error.code).toBe("ENVELOPE_DECODE_ERROR");
    }
  });

  it("should fail to open when the sender header is rewritten", async () => {
    const carol = createSecureChannelProvider(IdentityConfigSchema.parse(directory.config()), {
      fetch: directory.fetch,
    });
    await createOwned(carol, "did:test:carol", "carol");
    const sealed = await alice.seal("did:test:alice", "did:test:bob", utf8Encode("payload"));
    if (!sealed.ok) throw sealed.error;
    const parts = decodeEnvelope(sealed.value);
    if (!parts.ok) throw parts.error;

    const forged = encodeEnvelope({ ...parts.value, sender: "did:test:carol" });
    const opened = await bob.open(forged);

    expect(opened.ok).toBe(false);
    if (!opened.ok) {
      expect(opened.error.code).toBe("ENVELOPE_DECODE_ERROR");
    }
  });

  it("should report an unknown sender as not found", async () => {
    const sealed = await alice.seal("did:test:alice", "did:test:bob", utf8Encode("payload"));
    if (!sealed.ok) throw sealed.error;
    const parts = decodeEnvelope(sealed.value);
    if (!parts.ok) throw parts.error;

    const opened = await bob.open(encodeEnvelope({ ...parts.value, sender: "did:test:ghost" }));

    expect(opened.ok).toBe(false);
    if (!opened.ok) {
      expect(opened.error.code).toBe("NOT_FOUND");
    }
  });

  it("should publish a history entry signed with the published key", () => {
    const history = directory.histories.get("did:test:alice");
    const document = directory.documents.get("did:test:alice");
    if (history === undefined || document === undefined) {
      throw new Error("alice was not published");
    }

    const entry = HistoryEntrySchema.parse(JSON.parse(history));
    const published = IdentityDocumentSchema.parse(JSON.parse(document));

    expect(entry.id).toBe("did:test:alice");
    expect(verifyHistoryEntry(entry, document, fromBase64(published.keys.sign))).toBe(true);
  });
});
