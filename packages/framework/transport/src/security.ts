// Security Validator: Host / Origin / Content-Type checks for inbound requests
// Runs before any session state is touched

import type { IncomingMessage } from "node:http";
import { type Result, ok, err } from "@sealwire/shared";
import {
  type Logger,
  type SecurityConfig,
  type SecurityConfigInput,
  SecurityConfigSchema,
  createLogger,
} from "@sealwire/kernel";
import { TransportError } from "./errors.js";

/** Content type of a POSTed envelope */
export const SEALED_ENVELOPE_CONTENT_TYPE = "application/sealed-envelope";

/** Match a value against an allow-list; `name:*` entries accept any port */
export function matchesAllowList(value: string, allowList: readonly string[]): boolean {
  const candidate = value.toLowerCase();
  return allowList.some((entry) => {
    const allowed = entry.toLowerCase();
    if (allowed.endsWith(":*")) {
      const base = allowed.slice(0, -1);
      return candidate.startsWith(base) && /^\d+$/.test(candidate.slice(base.length));
    }
    return candidate === allowed;
  });
}

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export class SecurityValidator {
  private readonly config: SecurityConfig;
  private readonly log: Logger;

  constructor(config: SecurityConfigInput = {}, logger?: Logger) {
    this.config = SecurityConfigSchema.parse(config);
    this.log = logger ?? createLogger({ name: "security-validator" });
  }

  /**
   * Validate a stream-open (GET) or message-delivery (POST) request.
   * The error carries the HTTP status to answer with.
   */
  validate(req: IncomingMessage, isPost: boolean): Result<void, TransportError> {
    if (isPost) {
      const contentType = (header(req, "content-type") ?? "").split(";")[0]?.trim().toLowerCase();
      if (contentType !== SEALED_ENVELOPE_CONTENT_TYPE) {
        return this.reject(`Invalid Content-Type header: ${contentType ?? ""}`, 400);
      }
    }

    if (!this.config.enableDnsRebindingProtection) {
      return ok(undefined);
    }

    const host = header(req, "host");
    if (!host || !matchesAllowList(host, this.config.allowedHosts)) {
      return this.reject(`Invalid Host header: ${host ?? "(missing)"}`, 421);
    }

    const origin = header(req, "origin");
    if (origin !== undefined && !matchesAllowList(origin, this.config.allowedOrigins)) {
      return this.reject(`Invalid Origin header: ${origin}`, 403);
    }

    return ok(undefined);
  }

  private reject(message: string, status: number): Result<void, TransportError> {
    this.log.warn("Request rejected", { reason: message, status });
    return err(new TransportError(message, "ORIGIN_VALIDATION_FAILED", status));
  }
}
