import { describe, it, expect, beforeEach } from "vitest";
import { createLogger, initLogger } from "../logger.js";

interface LogLine {
  level: number;
  msg: string;
  component?: string;
  [key: string]: unknown;
}

describe("Logger", () => {
  let lines: LogLine[];

  beforeEach(() => {
    lines = [];
    initLogger(
      { level: "debug", pretty: false },
      {
        write: (chunk: string) => {
          lines.push(JSON.parse(chunk));
        },
      }
    );
  });

  it("should bind the component name", () => {
    createLogger({ name: "sse-server" }).info("Stream opened", { peer: "did:sealwire:alice" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Stream opened",
      component: "sse-server",
      peer: "did:sealwire:alice",
      name: "sealwire",
    });
  });

  it("should accept a message without context", () => {
    createLogger({ name: "test" }).warn("bare message");

    expect(lines[0]).toMatchObject({ level: 40, msg: "bare message" });
  });

  it("should carry bindings into child loggers", () => {
    const child = createLogger({ name: "connection", bindings: { local: "did:sealwire:bob" } }).child({
      peer: "did:sealwire:alice",
    });

    child.debug("Sealed envelope");

    expect(lines[0]).toMatchObject({ component: "connection", local: "did:sealwire:bob", peer: "did:sealwire:alice" });
    expect(child.level).toBe("debug");
  });

  it("should honour a per-component level", () => {
    const logger = createLogger({ name: "quiet", level: "warn" });

    logger.info("dropped");
    logger.error("kept");

    expect(logger.level).toBe("warn");
    expect(lines.map((line) => line.msg)).toEqual(["kept"]);
  });

  it("should redact secret keys", () => {
    createLogger({ name: "identity-store" }).info("Stored identity", {
      identity: { did: "did:sealwire:alice", boxSecretKey: "test-secret", signSecretKey: "test-secret" },
    });

    expect(lines[0]?.identity).toEqual({
      did: "did:sealwire:alice",
      boxSecretKey: "[Redacted]",
      signSecretKey: "[Redacted]",
    });
  });

  it("should redact authorization headers on delivered messages", () => {
    createLogger({ name: "sse-server" }).debug("Delivered", {
      requestHeaders: { authorization: "Bearer test-token", "content-type": "application/sealed-envelope" },
    });

    expect(lines[0]?.requestHeaders).toEqual({
      authorization: "[Redacted]",
      "content-type": "application/sealed-envelope",
    });
  });
});
