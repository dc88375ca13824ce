// Security Validator and endpoint scheme tests
import { IncomingMessage, type IncomingHttpHeaders } from "node:http";
import { Socket } from "node:net";
import { describe, it, expect } from "vitest";
import { SEALED_ENVELOPE_CONTENT_TYPE, SecurityValidator, matchesAllowList } from "./security.js";
import { isSameOrigin, toHttpUrl, toWebSocketUrl } from "./endpoint.js";

function request(headers: IncomingHttpHeaders): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.headers = headers;
  return req;
}

describe("matchesAllowList", () => {
  it("should match a wildcard port entry only with a numeric port", () => {
    expect(matchesAllowList("127.0.0.1:8080", ["127.0.0.1:*"])).toBe(true);
    expect(matchesAllowList("127.0.0.1", ["127.0.0.1:*"])).toBe(false);
    expect(matchesAllowList("127.0.0.1:http", ["127.0.0.1:*"])).toBe(false);
  });

  it("should match exact entries case-insensitively", () => {
    expect(matchesAllowList("Example.test", ["example.test"])).toBe(true);
    expect(matchesAllowList("evil.test", ["example.test"])).toBe(false);
  });
});

describe("SecurityValidator", () => {
  const validator = new SecurityValidator();

  it("should accept a loopback stream request", () => {
    const result = validator.validate(request({ host: "127.0.0.1:9000" }), false);

    expect(result.ok).toBe(true);
  });

  it("should accept a loopback origin", () => {
    const result = validator.validate(
      request({ host: "localhost:9000", origin: "http://localhost:3000" }),
      false
    );

    expect(result.ok).toBe(true);
  });

  it("should answer 421 for a missing or foreign host", () => {
    const missing = validator.validate(request({}), false);
    const foreign = validator.validate(request({ host: "evil.test" }), false);

    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.status).toBe(421);
      expect(missing.error.code).toBe("ORIGIN_VALIDATION_FAILED");
      expect(missing.error.message).toBe("Invalid Host header: (missing)");
    }
    expect(foreign.ok).toBe(false);
    if (!foreign.ok) expect(foreign.error.status).toBe(421);
  });

  it("should answer 403 for a foreign origin", () => {
    const result = validator.validate(
      request({ host: "127.0.0.1:9000", origin: "http://evil.test" }),
      false
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(403);
      expect(result.error.message).toBe("Invalid Origin header: http://evil.test");
    }
  });

  it("should require the envelope content type on POST", () => {
    const wrong = validator.validate(
      request({ host: "127.0.0.1:9000", "content-type": "application/json" }),
      true
    );
    const right = validator.validate(
      request({ host: "127.0.0.1:9000", "content-type": `${SEALED_ENVELOPE_CONTENT_TYPE}; charset=utf-8` }),
      true
    );

    expect(wrong.ok).toBe(false);
    if (!wrong.ok) {
      expect(wrong.error.status).toBe(400);
      expect(wrong.error.message).toBe("Invalid Content-Type header: application/json");
    }
    expect(right.ok).toBe(true);
  });

  it("should only check the content type with protection disabled", () => {
    const open = new SecurityValidator({ enableDnsRebindingProtection: false });

    expect(open.validate(request({ host: "evil.test", origin: "http://evil.test" }), false).ok).toBe(true);
    const post = open.validate(request({ host: "evil.test" }), true);
    expect(post.ok).toBe(false);
    if (!post.ok) expect(post.error.status).toBe(400);
  });

  it("should honour a configured host allow-list", () => {
    const custom = new SecurityValidator({ allowedHosts: ["tools.example.test"] });

    expect(custom.validate(request({ host: "tools.example.test" }), false).ok).toBe(true);
    expect(custom.validate(request({ host: "127.0.0.1:9000" }), false).ok).toBe(false);
  });
});

describe("endpoint schemes", () => {
  it("should map sse and sses endpoints to http and https", () => {
    const plain = toHttpUrl("sse://127.0.0.1:9000/sse?did=did%3Asealwire%3Abob");
    const secure = toHttpUrl("sses://tools.example.test/sse");

    expect(plain.ok && plain.value.href).toBe("http://127.0.0.1:9000/sse?did=did%3Asealwire%3Abob");
    expect(secure.ok && secure.value.href).toBe("https://tools.example.test/sse");
  });

  it("should reject other schemes", () => {
    const ftp = toHttpUrl("ftp://127.0.0.1/sse");
    const ws = toHttpUrl("ws://127.0.0.1/ws");
    const garbage = toHttpUrl("not a url");

    expect(ftp.ok).toBe(false);
    if (!ftp.ok) expect(ftp.error.code).toBe("UNSUPPORTED_SCHEME");
    expect(ws.ok).toBe(false);
    expect(garbage.ok).toBe(false);
  });

  it("should accept only ws and wss for WebSocket endpoints", () => {
    expect(toWebSocketUrl("ws://127.0.0.1:9000/ws").ok).toBe(true);
    expect(toWebSocketUrl("wss://tools.example.test/ws").ok).toBe(true);

    const sse = toWebSocketUrl("sse://127.0.0.1:9000/sse");
    expect(sse.ok).toBe(false);
    if (!sse.ok) expect(sse.error.code).toBe("UNSUPPORTED_SCHEME");
  });

  it("should compare scheme, host and port", () => {
    const stream = new URL("http://127.0.0.1:9000/sse");

    expect(isSameOrigin(new URL("http://127.0.0.1:9000/messages/"), stream)).toBe(true);
    expect(isSameOrigin(new URL("http://127.0.0.1:9001/messages/"), stream)).toBe(false);
    expect(isSameOrigin(new URL("https://127.0.0.1:9000/messages/"), stream)).toBe(false);
    expect(isSameOrigin(new URL("http://evil.test:9000/messages/"), stream)).toBe(false);
  });
});
