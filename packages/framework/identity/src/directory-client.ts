// Directory client: resolves and publishes identity documents over HTTP

import { type Result, ok, err, errorMessage } from "@sealwire/shared";
import { type Logger, createLogger, createTimeoutController } from "@sealwire/kernel";
import { IdentityError, type IdentityDocument, IdentityDocumentSchema } from "./types.js";

/** Fetch signature the client calls; tests pass an in-process stand-in */
export type FetchFn = typeof fetch;

export interface DirectoryClientOptions {
  publishUrl: string;
  /** Must contain `{did}` */
  historyUrl: string;
  /** Must contain `{did}` */
  resolveUrl: string;
  requestTimeoutMs: number;
  fetch?: FetchFn;
  logger?: Logger;
}

/** Substitute `{did}` in a URL template */
export function expandDidTemplate(template: string, did: string): string {
  return template.replaceAll("{did}", encodeURIComponent(did));
}

interface DirectoryResponse {
  status: number;
  ok: boolean;
  body: string;
}

export class DirectoryClient {
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;

  constructor(private readonly options: DirectoryClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.log = options.logger ?? createLogger({ name: "directory-client" });
  }

  /**
   * Fetch and validate the document published for a DID.
   * 404 maps to NOT_FOUND; every other failure to UNREACHABLE.
   */
  async resolve(did: string): Promise<Result<IdentityDocument, IdentityError>> {
    const url = expandDidTemplate(this.options.resolveUrl, did);

    let response: DirectoryResponse;
    try {
      response = await this.request(url, { method: "GET", headers: { Accept: "application/json" } });
    } catch (e) {
      this.log.warn("Directory unreachable", { did, url, error: errorMessage(e) });
      return err(new IdentityError(`Directory unreachable for ${did}: ${errorMessage(e)}`, "UNREACHABLE", did));
    }

    if (response.status === 404) {
      return err(new IdentityError(`Identity not found: ${did}`, "NOT_FOUND", did));
    }
    if (!response.ok) {
      return err(
        new IdentityError(`Directory returned HTTP ${response.status} for ${did}`, "UNREACHABLE", did)
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch (e) {
      return err(new IdentityError(`Malformed document for ${did}: ${errorMessage(e)}`, "UNREACHABLE", did));
    }

    const parsed = IdentityDocumentSchema.safeParse(body);
    if (!parsed.success) {
      return err(
        new IdentityError(`Malformed document for ${did}: ${parsed.error.message}`, "UNREACHABLE", did)
      );
    }
    if (parsed.data.id !== did) {
      return err(
        new IdentityError(`Directory returned document ${parsed.data.id} for ${did}`, "UNREACHABLE", did)
      );
    }
    return ok(parsed.data);
  }

  /** POST a serialized identity document */
  publishDocument(did: string, document: string): Promise<Result<void, IdentityError>> {
    return this.post(did, this.options.publishUrl, document);
  }

  /** POST a serialized history artifact to the DID's history URL */
  publishHistory(did: string, history: string): Promise<Result<void, IdentityError>> {
    return this.post(did, expandDidTemplate(this.options.historyUrl, did), history);
  }

  private async post(did: string, url: string, body: string): Promise<Result<void, IdentityError>> {
    let response: DirectoryResponse;
    try {
      response = await this.request(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
      });
    } catch (e) {
      return err(new IdentityError(`Publish to ${url} failed: ${errorMessage(e)}`, "PUBLISH_FAILED", did));
    }

    if (!response.ok) {
      return err(
        new IdentityError(`Publish to ${url} returned HTTP ${response.status}`, "PUBLISH_FAILED", did)
      );
    }
    this.log.debug("Published to directory", { did, url, status: response.status });
    return ok(undefined);
  }

  private async request(url: string, init: RequestInit): Promise<DirectoryResponse> {
    const { signal, cleanup } = createTimeoutController(this.options.requestTimeoutMs);
    try {
      const response = await this.fetchFn(url, { ...init, signal });
      // Body is read inside the timeout window
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } finally {
      cleanup();
    }
  }
}
