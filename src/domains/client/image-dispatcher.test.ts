import { describe, it, expect, vi } from "vitest";
import type { ImageFrame } from "../camera/types";
import { IsocamLogger } from "../observability/logger";
import { ImageDispatcher } from "./image-dispatcher";

const logger = new IsocamLogger({ level: "error" });

function frame(frameCount: number): ImageFrame {
  return {
    data: Buffer.alloc(4),
    frameCount,
    queuedCount: 0,
    timestamp: frameCount / 100,
    width: 2,
    height: 1,
    pixelFormat: "gray16le",
  };
}

const turn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ImageDispatcher", () => {
  it("never calls the handler synchronously from push", () => {
    const handler = vi.fn();
    const dispatcher = new ImageDispatcher(handler, 2, logger);

    dispatcher.push(frame(1));

    expect(handler).not.toHaveBeenCalled();
    expect(dispatcher.stats).toEqual({ delivered: 0, dropped: 0, pending: 1 });
  });

  it("keeps only the newest frames when the consumer falls behind", async () => {
    const seen: number[] = [];
    const dispatcher = new ImageDispatcher((f) => {
      seen.push(f.frameCount);
    }, 2, logger);

    for (let i = 1; i <= 5; i++) dispatcher.push(frame(i));

    await vi.waitFor(() => expect(seen).toEqual([4, 5]));
    expect(dispatcher.stats).toEqual({ delivered: 2, dropped: 3, pending: 0 });
  });

  it("waits for an async handler before delivering the next frame", async () => {
    let release: () => void = () => {};
    const seen: number[] = [];
    const dispatcher = new ImageDispatcher(async (f) => {
      seen.push(f.frameCount);
      if (f.frameCount === 1) {
        await new Promise<void>((resolve) => {
          release = resolve;
        });
      }
    }, 2, logger);

    dispatcher.push(frame(1));
    await vi.waitFor(() => expect(seen).toEqual([1]));

    // The slow handler is still busy: 2 and 3 are pushed out by 4 and 5
    for (let i = 2; i <= 5; i++) dispatcher.push(frame(i));
    await turn();
    expect(seen).toEqual([1]);

    release();
    await vi.waitFor(() => expect(seen).toEqual([1, 4, 5]));
    expect(dispatcher.stats.dropped).toBe(2);
  });

  it("lets other work run between deliveries", async () => {
    const order: string[] = [];
    const dispatcher = new ImageDispatcher((f) => {
      order.push(`frame ${f.frameCount}`);
    }, 2, logger);

    dispatcher.push(frame(1));
    dispatcher.push(frame(2));
    setImmediate(() => order.push("other"));
    setImmediate(() => setImmediate(() => order.push("later")));

    await vi.waitFor(() => expect(order).toHaveLength(4));
    expect(order.indexOf("frame 1")).toBeLessThan(order.indexOf("frame 2"));
    expect(order.indexOf("other")).toBeLessThan(order.indexOf("frame 2"));
  });

  it("keeps delivering after a handler throws", async () => {
    const seen: number[] = [];
    const dispatcher = new ImageDispatcher((f) => {
      seen.push(f.frameCount);
      if (f.frameCount === 1) throw new Error("consumer bug");
    }, 2, logger);

    dispatcher.push(frame(1));
    await vi.waitFor(() => expect(seen).toEqual([1]));
    dispatcher.push(frame(2));

    await vi.waitFor(() => expect(seen).toEqual([1, 2]));
    expect(dispatcher.stats.delivered).toBe(2);
  });

  it("delivers nothing after clear", async () => {
    const handler = vi.fn();
    const dispatcher = new ImageDispatcher(handler, 2, logger);

    dispatcher.push(frame(1));
    dispatcher.clear();
    dispatcher.push(frame(2));
    await turn();
    await turn();

    expect(handler).not.toHaveBeenCalled();
    expect(dispatcher.stats.pending).toBe(0);
  });

  it("drops pending frames on flush and delivers later ones", async () => {
    const seen: number[] = [];
    const dispatcher = new ImageDispatcher((f) => {
      seen.push(f.frameCount);
    }, 2, logger);

    dispatcher.push(frame(1));
    dispatcher.push(frame(2));
    dispatcher.flush();
    dispatcher.push(frame(3));

    await vi.waitFor(() => expect(seen).toEqual([3]));
    expect(dispatcher.stats).toEqual({ delivered: 1, dropped: 2, pending: 0 });
  });

  it("rejects a capacity below one", () => {
    expect(() => new ImageDispatcher(() => {}, 0, logger)).toThrow(RangeError);
  });
});
