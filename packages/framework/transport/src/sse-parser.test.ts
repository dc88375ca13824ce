import { describe, it, expect } from "vitest";
import { formatSseComment, formatSseEvent, fromSessionEvent, parseSseChunk, toSessionEvent } from "./sse-parser.js";

describe("parseSseChunk", () => {
  it("should carry a partial event across chunks", () => {
    const first = parseSseChunk("event: endpoint\ndata: abc\n\nevent: mess", "");

    expect(first.events).toEqual([{ event: "endpoint", data: "abc" }]);
    expect(first.carry).toBe("event: mess");

    const second = parseSseChunk("age\ndata: xyz\n\n", first.carry);

    expect(second.events).toEqual([{ event: "message", data: "xyz" }]);
    expect(second.carry).toBe("");
  });

  it("should default the event name and skip comments", () => {
    const parsed = parseSseChunk(": keep-alive\n\ndata: y\n\n", "");

    expect(parsed.events).toEqual([{ event: "message", data: "y" }]);
  });

  it("should join multi-line data and accept CRLF", () => {
    const parsed = parseSseChunk("data: a\r\ndata: b\r\n\r\n", "");

    expect(parsed.events).toEqual([{ event: "message", data: "a\nb" }]);
  });
});

describe("formatSseEvent", () => {
  it("should write one data field per line", () => {
    expect(formatSseEvent({ event: "message", data: "a\nb" })).toBe("event: message\ndata: a\ndata: b\n\n");
  });

  it("should parse back what it formats", () => {
    const text = formatSseEvent(fromSessionEvent({ kind: "endpoint", sealed: "c2VhbGVk" }));

    expect(parseSseChunk(text, "").events).toEqual([{ event: "endpoint", data: "c2VhbGVk" }]);
  });

  it("should write keep-alive comments that parse to nothing", () => {
    const ping = formatSseComment("ping");

    expect(ping).toBe(": ping\n\n");
    expect(parseSseChunk(ping + formatSseEvent({ event: "message", data: "m" }), "")).toEqual({
      events: [{ event: "message", data: "m" }],
      carry: "",
    });
  });
});

describe("toSessionEvent", () => {
  it("should map known event names", () => {
    expect(toSessionEvent({ event: "endpoint", data: "e" })).toEqual({ kind: "endpoint", sealed: "e" });
    expect(toSessionEvent({ event: "message", data: "m" })).toEqual({ kind: "message", sealed: "m" });
  });

  it("should ignore unknown event names", () => {
    expect(toSessionEvent({ event: "ping", data: "" })).toBeNull();
  });
});
