// In-process directory stand-in for tests
// Serves the resolve, publish and history routes through an injected fetch

import type { IdentityConfigInput } from "@sealwire/kernel";
import type { FetchFn } from "./directory-client.js";
import { type IdentityManager, createIdentityManager } from "./identity-manager.js";
import { IdentityDocumentSchema } from "./types.js";

export interface PublishCall {
  kind: "document" | "history";
  did: string;
  url: string;
}

const BASE_URL = "http://directory.test";
const PREFIX = "/identities/";

export class InMemoryDirectory {
  readonly documents = new Map<string, string>();
  readonly histories = new Map<string, string>();
  readonly publishCalls: PublishCall[] = [];
  /** Every request fails at the network level */
  unreachable = false;
  /** Document publishes answer 500 */
  failDocument = false;
  /** History publishes answer 500 */
  failHistory = false;

  readonly publishUrl = `${BASE_URL}/identities`;
  readonly historyUrl = `${BASE_URL}/identities/{did}/history`;
  readonly resolveUrl = `${BASE_URL}/identities/{did}`;

  readonly fetch: FetchFn = async (input, init) => {
    if (this.unreachable) {
      throw new TypeError("fetch failed");
    }
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? "GET";
    const body = typeof init?.body === "string" ? init.body : "";

    if (method === "POST" && url.pathname === "/identities") {
      return this.publishDocument(url.href, body);
    }
    if (!url.pathname.startsWith(PREFIX)) {
      return new Response("Not Found", { status: 404 });
    }

    const rest = url.pathname.slice(PREFIX.length);
    if (method === "POST" && rest.endsWith("/history")) {
      const did = decodeURIComponent(rest.slice(0, -"/history".length));
      this.publishCalls.push({ kind: "history", did, url: url.href });
      if (this.failHistory) return new Response("boom", { status: 500 });
      this.histories.set(did, body);
      return new Response(null, { status: 201 });
    }
    if (method === "GET") {
      const document = this.documents.get(decodeURIComponent(rest));
      if (document === undefined) return new Response("Not Found", { status: 404 });
      return new Response(document, { status: 200, headers: { "Content-Type": "application/json" } });
    }
    return new Response("Method Not Allowed", { status: 405 });
  };

  /** Identity config pointing at this directory */
  config(overrides: IdentityConfigInput = {}): IdentityConfigInput {
    return {
      publishUrl: this.publishUrl,
      historyUrl: this.historyUrl,
      resolveUrl: this.resolveUrl,
      requestTimeoutMs: 1000,
      ...overrides,
    };
  }

  /** Identity manager using the NaCl provider against this directory */
  createManager(overrides: IdentityConfigInput = {}): IdentityManager {
    return createIdentityManager(this.config(overrides), { fetch: this.fetch });
  }

  /** Rewrite the endpoint a published identity advertises */
  setEndpoint(did: string, endpoint: string): void {
    const document = this.documents.get(did);
    if (document === undefined) {
      throw new Error(`Unknown identity ${did}`);
    }
    const parsed = IdentityDocumentSchema.parse(JSON.parse(document));
    this.documents.set(did, JSON.stringify({ ...parsed, endpoint }));
  }

  /** Forget an identity, as if the directory had dropped it */
  remove(did: string): void {
    this.documents.delete(did);
    this.histories.delete(did);
  }

  private publishDocument(url: string, body: string): Response {
    const parsed = IdentityDocumentSchema.safeParse(JSON.parse(body));
    if (!parsed.success) return new Response("Bad Request", { status: 400 });

    this.publishCalls.push({ kind: "document", did: parsed.data.id, url });
    if (this.failDocument) return new Response("boom", { status: 500 });
    this.documents.set(parsed.data.id, body);
    return new Response(null, { status: 201 });
  }
}
