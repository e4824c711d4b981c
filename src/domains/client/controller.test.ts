import { describe, it, expect, afterEach, vi } from "vitest";
import { createServer } from "node:net";
import { CameraNotFound, ChannelClosed, ConfigError } from "../../errors";
import { InProcessLauncher } from "../../test-utils/in-process-launcher";
import type { ImageFrame } from "../camera/types";
import { IsocamLogger } from "../observability/logger";
import { CameraController, type CameraControllerOptions, type CameraEvent } from "./controller";
import type { ExitInfo, LaunchedServer, ServerLauncher } from "./server-process";

const logger = new IsocamLogger({ level: "error" });

function isTag<T extends CameraEvent["tag"]>(event: CameraEvent, tag: T): event is Extract<CameraEvent, { tag: T }> {
  return event.tag === tag;
}

function nextEvent<T extends CameraEvent["tag"]>(camera: CameraController, tag: T): Promise<Extract<CameraEvent, { tag: T }>> {
  return new Promise((resolve) => {
    const handler = (event: CameraEvent) => {
      if (isTag(event, tag)) {
        camera.events.off("event", handler);
        resolve(event);
      }
    };
    camera.events.on("event", handler);
  });
}

function nextImage(camera: CameraController): Promise<ImageFrame> {
  return new Promise((resolve) => {
    const handler = (frame: ImageFrame) => {
      camera.events.off("image", handler);
      resolve(frame);
    };
    camera.events.on("image", handler);
  });
}

function options(launcher: ServerLauncher, extra: Partial<CameraControllerOptions> = {}): CameraControllerOptions {
  return {
    launcher,
    logger,
    server: { mock: { cameras: [{ serial: "05762" }, { serial: "05761" }], fps: 200 } },
    shutdownTimeoutMs: 2000,
    ...extra,
  };
}

describe("CameraController", () => {
  let camera: CameraController | undefined;

  afterEach(async () => {
    await camera?.shutdown();
    camera = undefined;
  });

  it("drives a camera through a full session", async () => {
    const launcher = new InProcessLauncher();
    camera = await CameraController.start(options(launcher));
    const tags: CameraEvent["tag"][] = [];
    camera.events.on("event", (event) => tags.push(event.tag));

    const serials = nextEvent(camera, "serials");
    await camera.enumerate();
    expect((await serials).value).toEqual(["05761", "05762"]);
    expect(camera.view.serials).toEqual(["05761", "05762"]);

    const opened = nextEvent(camera, "cam_open");
    await camera.open("05761");
    await opened;
    expect(camera.view.open).toBe(true);
    expect(camera.view.settings.exposure_ms?.value).toBe(5);

    const updated = nextEvent(camera, "settings");
    await camera.setSetting("exposure_ms", 150);
    expect((await updated).value.exposure_ms?.value).toBe(150);
    expect(camera.view.settings.exposure_ms?.value).toBe(150);

    const playing = nextEvent(camera, "playing");
    const first = nextImage(camera);
    await camera.play();
    expect((await playing).value).toBe(true);
    expect(camera.view.playing).toBe(true);
    const image = await first;
    expect(image.width).toBe(64);
    expect(image.pixelFormat).toBe("gray16le");
    const second = await nextImage(camera);
    expect(second.frameCount).toBeGreaterThan(image.frameCount);

    const stopped = nextEvent(camera, "playing");
    await camera.stop();
    expect((await stopped).value).toBe(false);

    const closed = nextEvent(camera, "cam_closed");
    await camera.close();
    await closed;
    expect(camera.view.open).toBe(false);
    expect(camera.view.settings).toEqual({});

    expect(tags).toEqual(["serials", "settings", "cam_open", "settings", "playing", "playing", "cam_closed"]);
  });

  it("forwards server errors as typed error events", async () => {
    camera = await CameraController.start(options(new InProcessLauncher()));

    const error = nextEvent(camera, "error");
    await camera.open("NOPE");

    const { value } = await error;
    expect(value).toBeInstanceOf(CameraNotFound);
    expect(value.message).toBe('No camera with serial "NOPE" is attached');
    expect(camera.view.open).toBe(false);
  });

  it("passes events and images to the option callbacks", async () => {
    const events: CameraEvent[] = [];
    const frames: number[] = [];
    camera = await CameraController.start(options(new InProcessLauncher(), {
      onEvent: (event) => events.push(event),
      onImage: (frame) => {
        frames.push(frame.frameCount);
      },
    }));

    const opened = nextEvent(camera, "cam_open");
    await camera.open("05761");
    await opened;
    await camera.play();

    await vi.waitFor(() => expect(frames.length).toBeGreaterThanOrEqual(3));
    expect(events.map((e) => e.tag).slice(0, 2)).toEqual(["settings", "cam_open"]);
    expect(camera.imageStats.delivered).toBeGreaterThanOrEqual(3);
  });

  it("delivers no image after reporting that playback stopped", async () => {
    let stopped = false;
    let late = 0;
    const c = await CameraController.start(options(new InProcessLauncher(), {
      server: { mock: { cameras: [{ serial: "05761" }], fps: 500 } },
      onEvent: (event) => {
        if (event.tag === "playing" && !event.value) stopped = true;
      },
      onImage: async () => {
        if (stopped) late++;
        await new Promise((resolve) => setTimeout(resolve, 20));
      },
    }));
    camera = c;

    const opened = nextEvent(c, "cam_open");
    await c.open("05761");
    await opened;
    await c.play();
    await vi.waitFor(() => expect(c.view.playing).toBe(true));
    await vi.waitFor(() => expect(c.imageStats.dropped).toBeGreaterThan(0));

    const halted = nextEvent(c, "playing");
    await c.stop();
    expect((await halted).value).toBe(false);
    expect(c.imageStats.pending).toBe(0);

    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(late).toBe(0);
  });

  it("keeps reporting events while the image consumer is stuck", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const c = await CameraController.start(options(new InProcessLauncher(), { onImage: () => gate }));
    camera = c;

    const opened = nextEvent(c, "cam_open");
    await c.open("05761");
    await opened;
    await c.play();
    await vi.waitFor(() => expect(c.imageStats.dropped).toBeGreaterThan(0));

    const updated = nextEvent(c, "settings");
    await c.setSetting("exposure_ms", 20);

    expect((await updated).value.exposure_ms?.value).toBe(20);
    expect(c.view.settings.exposure_ms?.value).toBe(20);
    expect(c.imageStats.delivered).toBe(0);
    release();
  });

  it("hands out copies of its view", async () => {
    const c = await CameraController.start(options(new InProcessLauncher()));
    camera = c;
    const opened = nextEvent(c, "cam_open");
    const serials = nextEvent(c, "serials");
    await c.enumerate();
    await serials;
    await c.open("05761");
    await opened;

    const view = c.view;
    view.serials.push("EXTRA");
    delete view.settings.exposure_ms;
    view.open = false;

    expect(c.view.serials).toEqual(["05761", "05762"]);
    expect(c.view.settings.exposure_ms?.value).toBe(5);
    expect(c.view.open).toBe(true);
  });

  it("shuts the server down and reports the disconnect once", async () => {
    const launcher = new InProcessLauncher();
    camera = await CameraController.start(options(launcher));
    const disconnects: CameraEvent[] = [];
    camera.events.on("event", (event) => {
      if (event.tag === "disconnect") disconnects.push(event);
    });

    const opened = nextEvent(camera, "cam_open");
    await camera.open("05761");
    await opened;

    const first = camera.shutdown();
    expect(camera.shutdown()).toBe(first);
    await first;

    expect(disconnects).toEqual([{ tag: "disconnect", value: { reason: "client requested shutdown" } }]);
    expect(camera.connected).toBe(false);
    expect(launcher.server?.sessionState).toBe("idle");
    expect(launcher.driver?.get("05761")).toBeUndefined();
    await expect(camera.enumerate()).rejects.toBeInstanceOf(ChannelClosed);
  });

  it("surfaces a lost server while playing and goes quiet afterwards", async () => {
    const launcher = new InProcessLauncher();
    camera = await CameraController.start(options(launcher));
    const opened = nextEvent(camera, "cam_open");
    await camera.open("05761");
    await opened;
    await camera.play();
    await nextImage(camera);

    let images = 0;
    let disconnects = 0;
    camera.events.on("image", () => images++);
    camera.events.on("event", (event) => {
      if (event.tag === "disconnect") disconnects++;
    });
    const lost = nextEvent(camera, "disconnect");

    await launcher.server?.abort("killed");
    await lost;
    const imagesAtDisconnect = images;

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(images).toBe(imagesAtDisconnect);
    expect(disconnects).toBe(1);
    expect(camera.view).toEqual({ connected: false, serials: [], open: false, playing: false, settings: {} });
    await expect(camera.play()).rejects.toBeInstanceOf(ChannelClosed);
  });

  it("always shuts down when the scoped body throws", async () => {
    const launcher = new InProcessLauncher();

    await expect(CameraController.use(options(launcher), async () => {
      throw new Error("body failed");
    })).rejects.toThrow("body failed");

    expect(launcher.launches).toBe(1);
    const stopped = await new Promise<boolean>((resolve) => {
      launcher.server?.stop().then(() => resolve(true), () => resolve(false));
    });
    expect(stopped).toBe(true);
  });

  it("returns the scoped body's result", async () => {
    const result = await CameraController.use(options(new InProcessLauncher()), async (c) => {
      const serials = nextEvent(c, "serials");
      await c.enumerate();
      return (await serials).value;
    });
    expect(result).toEqual(["05761", "05762"]);
  });

  it("rejects invalid options before launching anything", async () => {
    const launcher = new InProcessLauncher();

    await expect(CameraController.start(options(launcher, { server: { host: "10.0.0.1" } }))).rejects.toThrow(
      "Invalid controller options: server.host: host must be a loopback address"
    );
    await expect(CameraController.start(options(launcher, { imageQueueSize: 0 }))).rejects.toBeInstanceOf(ConfigError);
    expect(launcher.launches).toBe(0);
  });

  it("tears everything down on a protocol error from the server", async () => {
    const garbage = createServer((socket) => socket.write(Buffer.from("not a frame at all")));
    await new Promise<void>((resolve) => garbage.listen(0, "127.0.0.1", () => resolve()));
    const address = garbage.address();
    const port = address && typeof address !== "string" ? address.port : 0;

    let resolveExit: (exit: ExitInfo) => void = () => {};
    const kill = vi.fn(() => resolveExit({ code: null, signal: "SIGKILL" }));
    const fake: LaunchedServer = {
      host: "127.0.0.1",
      port,
      exited: new Promise((resolve) => {
        resolveExit = resolve;
      }),
      terminate: async () => ({ code: null, signal: "SIGKILL" }),
      kill,
    };

    camera = await CameraController.start(options({ launch: async () => fake }));
    const lost = await nextEvent(camera, "disconnect");

    expect(lost.value.reason).toBe("protocol error: Invalid magic bytes: 0x6e6f");
    expect(kill).toHaveBeenCalled();
    expect(camera.connected).toBe(false);

    await new Promise<void>((resolve) => garbage.close(() => resolve()));
  });
});
