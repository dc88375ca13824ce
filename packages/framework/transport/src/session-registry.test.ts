// Session Registry tests
import { describe, it, expect, beforeEach } from "vitest";
import { SessionRegistry } from "./session-registry.js";

interface Handle {
  id: string;
}

describe("SessionRegistry", () => {
  let registry: SessionRegistry<Handle>;
  const first: Handle = { id: "first" };
  const second: Handle = { id: "second" };

  beforeEach(() => {
    registry = new SessionRegistry<Handle>();
  });

  it("should return undefined for an unknown peer", () => {
    expect(registry.lookup("did:sealwire:nobody")).toBeUndefined();
    expect(registry.has("did:sealwire:nobody")).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("should resolve a registered handle", () => {
    const displaced = registry.register("did:sealwire:alice", first);

    expect(displaced).toBeUndefined();
    expect(registry.lookup("did:sealwire:alice")).toBe(first);
    expect(registry.peers()).toEqual(["did:sealwire:alice"]);
  });

  it("should prefer the most recent handle and report the one it displaces", () => {
    registry.register("did:sealwire:alice", first);
    const displaced = registry.register("did:sealwire:alice", second);

    expect(displaced).toBe(first);
    expect(registry.lookup("did:sealwire:alice")).toBe(second);
    expect(registry.handles()).toEqual([first, second]);
    expect(registry.size).toBe(1);
  });

  it("should fall back to the older handle when the newer one disconnects", () => {
    registry.register("did:sealwire:alice", first);
    registry.register("did:sealwire:alice", second);

    expect(registry.unregister("did:sealwire:alice", second)).toBe(true);

    expect(registry.lookup("did:sealwire:alice")).toBe(first);
  });

  it("should keep the newer handle when the older one disconnects late", () => {
    registry.register("did:sealwire:alice", first);
    registry.register("did:sealwire:alice", second);

    registry.unregister("did:sealwire:alice", first);

    expect(registry.lookup("did:sealwire:alice")).toBe(second);
  });

  it("should forget a peer once its last handle is gone", () => {
    registry.register("did:sealwire:alice", first);

    expect(registry.unregister("did:sealwire:alice", first)).toBe(true);
    expect(registry.unregister("did:sealwire:alice", first)).toBe(false);

    expect(registry.has("did:sealwire:alice")).toBe(false);
    expect(registry.lookup("did:sealwire:alice")).toBeUndefined();
  });

  it("should keep peers independent", () => {
    registry.register("did:sealwire:alice", first);
    registry.register("did:sealwire:bob", second);

    registry.unregister("did:sealwire:alice", first);

    expect(registry.lookup("did:sealwire:bob")).toBe(second);
    expect(registry.size).toBe(1);
  });
});
