import mitt, { type Emitter } from 'mitt';
import { loadControllerConfig, type ControllerConfig, type ControllerConfigInput } from '../../config';
import { ChannelClosed, IsocamError, ProtocolError, ServerStartError, describeError, errorFromKind } from '../../errors';
import type { ImageFrame, SettingValue, SettingsSnapshot } from '../camera/types';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import { TransportChannel } from '../transport/channel';
import type { CommandMessage, Message } from '../transport/protocol';
import { ImageDispatcher, type DispatcherStats, type ImageHandler } from './image-dispatcher';
import { ChildProcessLauncher, type ExitInfo, type LaunchedServer, type ServerLauncher } from './server-process';

/** Everything the server reports, other than images. */
export type CameraEvent =
  | { tag: 'serials'; value: string[] }
  | { tag: 'settings'; value: SettingsSnapshot }
  | { tag: 'cam_open'; value: null }
  | { tag: 'cam_closed'; value: null }
  | { tag: 'playing'; value: boolean }
  | { tag: 'error'; value: IsocamError }
  | { tag: 'disconnect'; value: { reason: string } };

export type CameraEventHandler = (event: CameraEvent) => void;

type ControllerEvents = {
  event: CameraEvent;
  image: ImageFrame;
};

/** The controller's mirror of server state, updated from received events. */
export interface CameraView {
  connected: boolean;
  serials: string[];
  open: boolean;
  playing: boolean;
  settings: SettingsSnapshot;
}

export interface CameraControllerOptions extends ControllerConfigInput {
  /** How the server is started; a child process by default. */
  launcher?: ServerLauncher;
  logger?: Logger;
  onEvent?: CameraEventHandler;
  /** Called for every delivered image; the next image waits until a returned promise settles. */
  onImage?: ImageHandler;
}

/**
 * Client side of an isolated camera. Starts the server, connects to it and
 * turns its messages into events.
 *
 * Commands return once written; their outcome arrives as events. After a
 * `disconnect` event no further image or event callbacks fire.
 *
 * @example
 * await CameraController.use({ onImage: (frame) => save(frame) }, async (camera) => {
 *   camera.events.on('event', (e) => console.log(e.tag, e.value));
 *   await camera.enumerate();
 *   await camera.open('MOCK0001');
 *   await camera.play();
 * });
 */
export class CameraController {
  public readonly events: Emitter<ControllerEvents> = mitt<ControllerEvents>();
  private mirror: CameraView = { connected: true, serials: [], open: false, playing: false, settings: {} };
  private dispatcher: ImageDispatcher;
  private receiving: Promise<void>;
  private disconnected = false;
  private gone: Promise<void>;
  private markGone: () => void = () => {};
  private shuttingDown?: Promise<void>;

  private constructor(
    private config: ControllerConfig,
    private server: LaunchedServer,
    private channel: TransportChannel,
    private log: Logger,
    options: CameraControllerOptions
  ) {
    this.gone = new Promise((resolve) => {
      this.markGone = resolve;
    });
    const { onEvent, onImage } = options;
    if (onEvent) this.events.on('event', onEvent);

    this.dispatcher = new ImageDispatcher(async (frame) => {
      this.events.emit('image', frame);
      await onImage?.(frame);
    }, config.imageQueueSize, log.child({ component: 'ImageDispatcher' }));

    this.receiving = this.receiveLoop();
    this.server.exited
      .then((exit) => this.onServerExit(exit))
      .catch((e) => this.log.error('[CameraController] Server exit handling failed', e));
  }

  /** Launches the server and connects to it. */
  static async start(options: CameraControllerOptions = {}): Promise<CameraController> {
    const { launcher = new ChildProcessLauncher(), logger, onEvent: _onEvent, onImage: _onImage, ...input } = options;
    const config = loadControllerConfig(input);
    const log = logger ?? rootLogger.child({ component: 'CameraController' });

    const server = await launcher.launch(config.server, {
      startupTimeoutMs: config.startupTimeoutMs,
      logger: log.child({ component: 'ServerProcess' }),
    });

    let channel: TransportChannel;
    try {
      channel = await TransportChannel.connect(server.host, server.port, {
        timeoutMs: config.connectTimeoutMs,
        writeTimeoutMs: config.writeTimeoutMs,
        logger: log.child({ component: 'Channel' }),
      });
    } catch (e) {
      log.error('[CameraController] Cannot connect to server', e);
      server.kill();
      await server.exited;
      throw new ServerStartError(`Cannot connect to server on ${server.host}:${server.port}: ${describeError(e)}`, { cause: e });
    }

    log.info(`[CameraController] Connected to server on ${server.host}:${server.port}`);
    return new CameraController(config, server, channel, log, options);
  }

  /** Runs `body` with a started controller and always shuts it down afterwards. */
  static async use<T>(options: CameraControllerOptions, body: (camera: CameraController) => Promise<T>): Promise<T> {
    const camera = await CameraController.start(options);
    try {
      return await body(camera);
    } finally {
      await camera.shutdown();
    }
  }

  /** A copy of the mirrored state; changing it does not affect the controller. */
  get view(): CameraView {
    return structuredClone(this.mirror);
  }

  get connected(): boolean {
    return !this.disconnected;
  }

  get imageStats(): DispatcherStats {
    return this.dispatcher.stats;
  }

  enumerate(): Promise<void> {
    return this.send({ type: 'enumerate' });
  }

  open(serial: string): Promise<void> {
    return this.send({ type: 'open', serial });
  }

  close(): Promise<void> {
    return this.send({ type: 'close' });
  }

  play(): Promise<void> {
    return this.send({ type: 'play' });
  }

  stop(): Promise<void> {
    return this.send({ type: 'stop' });
  }

  setSetting(name: string, value: SettingValue): Promise<void> {
    return this.send({ type: 'set_setting', name, value });
  }

  /**
   * Closes any open camera, asks the server to exit and waits for it, killing
   * it if it does not go within the shutdown timeout. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.runShutdown();
    }
    return this.shuttingDown;
  }

  private async runShutdown() {
    this.log.info('[CameraController] Shutting down');

    if (!this.disconnected) {
      try {
        if (this.mirror.open) await this.send({ type: 'close' });
        await this.send({ type: 'shutdown' });
        // The server answers with `disconnect` and closes the socket itself.
        await this.waitForDisconnect(this.config.shutdownTimeoutMs);
        await this.channel.close();
      } catch (e) {
        this.log.warn(`[CameraController] Graceful shutdown failed: ${describeError(e)}`);
        this.channel.destroy();
      }
    }

    const exit = await this.server.terminate(this.config.shutdownTimeoutMs);
    this.log.info(`[CameraController] Server exited (code ${exit.code}, signal ${exit.signal})`);

    this.channel.destroy();
    this.handleDisconnect('shut down');
    await this.receiving;
  }

  private async waitForDisconnect(timeoutMs: number) {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    await Promise.race([this.gone, timedOut]);
    clearTimeout(timer);
  }

  private async send(message: CommandMessage) {
    if (this.disconnected) {
      throw new ChannelClosed(`Cannot ${message.type}: not connected to the camera server`);
    }
    await this.channel.send(message);
  }

  private async receiveLoop() {
    let reason = 'connection lost';
    try {
      while (!this.disconnected) {
        this.handleMessage(await this.channel.receive());
      }
      return;
    } catch (e) {
      if (e instanceof ProtocolError) {
        // The stream can no longer be trusted; take the server down with it.
        this.log.error('[CameraController] Protocol error from server', e);
        reason = `protocol error: ${e.message}`;
        this.channel.destroy(e);
        this.server.kill();
      } else {
        reason = describeError(e);
      }
    }
    this.handleDisconnect(reason);
  }

  private handleMessage(message: Message) {
    if (this.disconnected) return;

    switch (message.type) {
      case 'serials':
        this.mirror.serials = message.serials;
        return this.emit({ tag: 'serials', value: message.serials });
      case 'settings':
        this.mirror.settings = { ...this.mirror.settings, ...message.settings };
        return this.emit({ tag: 'settings', value: message.settings });
      case 'cam_open':
        this.mirror.open = true;
        return this.emit({ tag: 'cam_open', value: null });
      case 'cam_closed':
        this.dispatcher.flush();
        this.mirror.open = false;
        this.mirror.playing = false;
        this.mirror.settings = {};
        return this.emit({ tag: 'cam_closed', value: null });
      case 'playing':
        // No image may reach the application after playing(false).
        if (!message.playing) this.dispatcher.flush();
        this.mirror.playing = message.playing;
        return this.emit({ tag: 'playing', value: message.playing });
      case 'image': {
        const { type: _type, ...frame } = message;
        this.dispatcher.push(frame);
        return;
      }
      case 'error':
        return this.emit({ tag: 'error', value: errorFromKind(message.kind, message.detail) });
      case 'disconnect':
        return this.handleDisconnect(message.reason);
      default:
        this.log.warn(`[CameraController] Ignoring unexpected "${message.type}" from server`);
    }
  }

  private emit(event: CameraEvent) {
    try {
      this.events.emit('event', event);
    } catch (e) {
      this.log.error(`[CameraController] Event handler for "${event.tag}" threw`, e);
    }
  }

  private onServerExit(exit: ExitInfo) {
    if (this.disconnected) return;
    const reason = `server exited (code ${exit.code}, signal ${exit.signal})`;
    this.log.warn(`[CameraController] Unexpected ${reason}`);
    this.channel.destroy(new ChannelClosed(reason));
    this.handleDisconnect(reason);
  }

  /** Surfaces the loss of the server exactly once and silences everything after it. */
  private handleDisconnect(reason: string) {
    if (this.disconnected) return;
    this.disconnected = true;
    this.markGone();
    this.dispatcher.clear();
    this.mirror = { connected: false, serials: this.mirror.serials, open: false, playing: false, settings: {} };
    this.log.info(`[CameraController] Disconnected: ${reason}`);
    this.emit({ tag: 'disconnect', value: { reason } });
  }
}
