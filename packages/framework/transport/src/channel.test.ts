// Channel and TaskScope tests
import { describe, it, expect, vi } from "vitest";
import { Channel } from "./channel.js";
import { ClosedResourceError } from "./errors.js";
import { TaskScope } from "./task-scope.js";

describe("Channel", () => {
  it("should hold a send until a receiver takes the value", async () => {
    const channel = new Channel<number>();
    let delivered = false;
    const sending = channel.send(1).then(() => {
      delivered = true;
    });

    await Promise.resolve();
    expect(delivered).toBe(false);

    await expect(channel.receive()).resolves.toBe(1);
    await sending;
    expect(delivered).toBe(true);
  });

  it("should hand a value straight to a waiting receiver", async () => {
    const channel = new Channel<string>();
    const receiving = channel.receive();

    await channel.send("hello");

    await expect(receiving).resolves.toBe("hello");
  });

  it("should deliver values in send order", async () => {
    const channel = new Channel<number>();
    const sends = [channel.send(1), channel.send(2), channel.send(3)];

    const received = [await channel.receive(), await channel.receive(), await channel.receive()];

    expect(received).toEqual([1, 2, 3]);
    await Promise.all(sends);
  });

  it("should fail pending sends and receives on close", async () => {
    const sender = new Channel<number>("outbound");
    const receiver = new Channel<number>("inbound");
    const pendingSend = sender.send(1);
    const pendingReceive = receiver.receive();

    sender.close();
    receiver.close();

    await expect(pendingSend).rejects.toBeInstanceOf(ClosedResourceError);
    await expect(pendingReceive).rejects.toThrow("inbound is closed");
    expect(sender.isClosed).toBe(true);
  });

  it("should reject send and receive once closed", async () => {
    const channel = new Channel<number>();
    channel.close();

    await expect(channel.send(1)).rejects.toBeInstanceOf(ClosedResourceError);
    await expect(channel.receive()).rejects.toBeInstanceOf(ClosedResourceError);
  });

  it("should end iteration when the channel closes", async () => {
    const channel = new Channel<number>();
    const seen: number[] = [];
    const consuming = (async () => {
      for await (const value of channel) seen.push(value);
    })();

    await channel.send(1);
    await channel.send(2);
    channel.close();
    await consuming;

    expect(seen).toEqual([1, 2]);
  });
});

describe("TaskScope", () => {
  it("should cancel the scope when the first task finishes", async () => {
    const scope = new TaskScope();
    let sawAbort = false;

    scope.spawn("waiter", async (signal) => {
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
      sawAbort = true;
    });
    scope.spawn("quick", async () => {});
    await scope.join();

    expect(scope.cancelled).toBe(true);
    expect(sawAbort).toBe(true);
  });

  it("should run cleanups exactly once", () => {
    const scope = new TaskScope();
    const cleanup = vi.fn();
    scope.onClose(cleanup);

    scope.cancel();
    scope.cancel();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it("should run a cleanup registered after cancellation immediately", () => {
    const scope = new TaskScope();
    scope.cancel();
    const cleanup = vi.fn();

    scope.onClose(cleanup);

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it("should record the first unexpected task error", async () => {
    const scope = new TaskScope();
    scope.spawn("failing", async () => {
      throw new Error("boom");
    });
    await scope.join();

    expect(scope.error).toBeInstanceOf(Error);
    expect(scope.error instanceof Error ? scope.error.message : "").toBe("boom");
  });

  it("should not treat a closed channel as a task failure", async () => {
    const scope = new TaskScope();
    const channel = new Channel<number>();
    channel.close();
    scope.spawn("reader", async () => {
      await channel.receive();
    });
    await scope.join();

    expect(scope.cancelled).toBe(true);
    expect(scope.error).toBeUndefined();
  });

  it("should follow a parent signal", async () => {
    const parent = new AbortController();
    const scope = new TaskScope(parent.signal);
    const channel = new Channel<number>();
    scope.onClose(() => channel.close());
    scope.spawn("reader", async () => {
      await channel.receive();
    });

    parent.abort();
    await scope.join();

    expect(scope.cancelled).toBe(true);
    expect(channel.isClosed).toBe(true);
  });

  it("should start cancelled under an aborted parent", () => {
    const parent = new AbortController();
    parent.abort();

    expect(new TaskScope(parent.signal).cancelled).toBe(true);
  });
});
