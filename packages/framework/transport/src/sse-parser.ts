import type { SessionEvent } from "./types.js";

/**
 * SSE framing
 *
 * Splits raw SSE text into complete events.
 * Handles partial chunks across read boundaries via carry buffer.
 */

export interface SseEvent {
  /** `message` when the block names no event */
  event: string;
  data: string;
}

export function parseSseChunk(raw: string, carry: string): { events: SseEvent[]; carry: string } {
  const merged = carry + raw;
  const blocks = merged.split(/\r?\n\r?\n/);
  const nextCarry = blocks.pop() ?? "";
  const events: SseEvent[] = [];

  for (const block of blocks) {
    let event = "message";
    const data: string[] = [];
    let hasData = false;
    for (const line of block.split(/\r?\n/)) {
      // Comment lines carry keep-alives only
      if (line.startsWith(":")) continue;
      const colon = line.indexOf(":");
      const field = colon < 0 ? line : line.slice(0, colon);
      let value = colon < 0 ? "" : line.slice(colon + 1);
      if (value.startsWith(" ")) value = value.slice(1);

      if (field === "event") {
        event = value;
      } else if (field === "data") {
        data.push(value);
        hasData = true;
      }
    }
    if (hasData) events.push({ event, data: data.join("\n") });
  }

  return { events, carry: nextCarry };
}

/** Serialize one event; multi-line data becomes several data fields */
export function formatSseEvent(event: SseEvent): string {
  const lines = event.data.split(/\r?\n/).map((line) => `data: ${line}`);
  return `event: ${event.event}\n${lines.join("\n")}\n\n`;
}

/** Comment block; readers skip it, so it only resets idle timers */
export function formatSseComment(text: string): string {
  return `: ${text}\n\n`;
}

/** Session event carried by an SSE event; unknown event names yield null */
export function toSessionEvent(event: SseEvent): SessionEvent | null {
  switch (event.event) {
    case "endpoint":
      return { kind: "endpoint", sealed: event.data };
    case "message":
      return { kind: "message", sealed: event.data };
    default:
      return null;
  }
}

export function fromSessionEvent(event: SessionEvent): SseEvent {
  return { event: event.kind, data: event.sealed };
}
