import { createServer, type Server, type Socket } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import mitt, { type Emitter } from 'mitt';
import {
  AcquisitionStartFailed,
  CameraBusy,
  CameraNotFound,
  ChannelClosed,
  DriverFault,
  FatalDriverError,
  InvalidSetting,
  InvalidState,
  IsocamError,
  MalformedMessage,
  WriteTimeout,
  describeError,
} from '../../errors';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import { TransportChannel } from '../transport/channel';
import type { CommandMessage, EventMessage, Message } from '../transport/protocol';
import type { CameraDriver, CameraHandle } from './driver';
import { PLAY_SETTINGS, applySetting, describeSettings, isSettingName, normalizeValues, type CameraValues } from './settings';
import type { SessionState, SettingValue } from './types';

export interface CameraServerOptions {
  driver: CameraDriver;
  host?: string;
  /** 0 binds a free port; see {@link CameraServer.listen}. */
  port?: number;
  /** Wait between polls of an empty acquisition queue. */
  pollIntervalMs?: number;
  /** Socket backlog in bytes above which frames are dropped instead of sent. */
  highWaterMark?: number;
  writeTimeoutMs?: number;
  logger?: Logger;
}

type CameraServerEvents = {
  connected: void;
  stopped: { reason: string };
  fatal: { error: Error };
};

interface Session {
  serial: string;
  handle: CameraHandle;
  values: CameraValues;
}

export interface AcquisitionStats {
  sent: number;
  dropped: number;
}

// Command rejections that leave the session as it was.
const REJECTIONS = [CameraNotFound, CameraBusy, AcquisitionStartFailed, InvalidState, InvalidSetting, MalformedMessage];

function isRejection(error: unknown): error is IsocamError {
  return REJECTIONS.some((type) => error instanceof type);
}

/**
 * Hosts one camera behind a single client connection.
 *
 * Commands are applied one at a time in arrival order; they are the only thing
 * that mutates the session. While playing, a separate loop pulls frames from
 * the driver and posts them without ever waiting on the socket.
 */
export class CameraServer {
  public readonly events: Emitter<CameraServerEvents> = mitt<CameraServerEvents>();
  private server?: Server;
  private channel?: TransportChannel;
  private session?: Session;
  private state: SessionState = 'idle';
  private acquisition?: Promise<void>;
  private tasks: Promise<void> = Promise.resolve();
  private stopping?: Promise<void>;
  private stats: AcquisitionStats = { sent: 0, dropped: 0 };
  private readonly driver: CameraDriver;
  private readonly pollIntervalMs: number;
  private readonly log: Logger;

  constructor(private options: CameraServerOptions) {
    this.driver = options.driver;
    this.pollIntervalMs = options.pollIntervalMs ?? 2;
    this.log = options.logger ?? rootLogger.child({ component: 'CameraServer' });
  }

  get sessionState(): SessionState {
    return this.state;
  }

  get acquisitionStats(): AcquisitionStats {
    return { ...this.stats };
  }

  /** Starts listening and resolves with the bound port. */
  async listen(): Promise<number> {
    const host = this.options.host ?? '127.0.0.1';
    const server = createServer((socket) => this.handleConnection(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port ?? 0, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (e) => this.log.error('[CameraServer] Listener error', e));

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error(`Unexpected listener address: ${String(address)}`);
    }
    const { port } = address;
    this.log.info(`[CameraServer] Listening on ${host}:${port}`);
    return port;
  }

  /**
   * Closes any open camera, tells the client we are going away and releases the
   * socket. Safe to call more than once.
   */
  stop(reason = 'server stopped'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  /**
   * Drops the client without a `disconnect` message, then stops as usual. Used
   * when the client is known to be gone.
   */
  abort(reason = 'aborted'): Promise<void> {
    this.channel?.destroy(new ChannelClosed(reason));
    return this.stop(reason);
  }

  private async shutdown(reason: string) {
    this.log.info(`[CameraServer] Stopping: ${reason}`);
    await this.serialize(() => this.closeSession());

    const channel = this.channel;
    if (channel?.isOpen) {
      await this.reply({ type: 'disconnect', reason });
      await channel.close();
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    await this.driver.dispose?.();
    this.events.emit('stopped', { reason });
  }

  private handleConnection(socket: Socket) {
    if (this.channel || this.stopping) {
      this.log.warn('[CameraServer] Rejecting extra connection');
      socket.destroy();
      return;
    }

    this.log.info('[CameraServer] Client connected');
    const channel = new TransportChannel(socket, {
      writeTimeoutMs: this.options.writeTimeoutMs,
      highWaterMark: this.options.highWaterMark,
      logger: this.log,
    });
    this.channel = channel;
    this.events.emit('connected');

    this.serve(channel).catch((e) => this.log.error('[CameraServer] Serve loop failed', e));
  }

  private async serve(channel: TransportChannel) {
    let reason = 'client disconnected';
    try {
      for await (const message of channel) {
        await this.serialize(() => this.handleCommand(message));
        if (message.type === 'shutdown') {
          reason = 'client requested shutdown';
          break;
        }
      }
    } catch (e) {
      this.log.error('[CameraServer] Protocol error from client', e);
      reason = `protocol error: ${describeError(e)}`;
    }
    await this.stop(reason);
  }

  /** Runs `task` after every previously queued task. */
  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.tasks.then(task);
    this.tasks = run.catch((e) => this.log.error('[CameraServer] Task failed', e));
    return run;
  }

  private async handleCommand(message: Message) {
    try {
      await this.dispatch(message);
    } catch (e) {
      await this.handleFailure(message.type, e);
    }
  }

  private async dispatch(message: Message) {
    this.log.debug(`[CameraServer] <- ${message.type}`);

    switch (message.type) {
      case 'enumerate':
        return this.enumerate();
      case 'open':
        return this.openCamera(message.serial);
      case 'close':
        this.requireSession('close');
        return this.closeSession();
      case 'play':
        return this.play(this.requireSession('play'));
      case 'stop':
        return this.stopPlaying(this.requireSession('stop'));
      case 'set_setting':
        return this.setSetting(this.requireSession('set_setting'), message);
      case 'shutdown':
        return this.closeSession();
      default:
        throw new MalformedMessage(`"${message.type}" is not a command`);
    }
  }

  private requireSession(command: CommandMessage['type']): Session {
    if (!this.session) {
      throw new InvalidState(`Cannot ${command}: no camera is open`);
    }
    return this.session;
  }

  // Enumeration never touches the session, so a failure here is reported without closing it.
  private async enumerate() {
    let serials: string[];
    try {
      serials = [...await this.driver.listSerials()].sort();
    } catch (e) {
      if (e instanceof FatalDriverError) throw e;
      this.log.error('[CameraServer] Enumeration failed', e);
      await this.reportError(new DriverFault(`enumerate failed: ${describeError(e)}`, { cause: e }));
      return;
    }
    await this.reply({ type: 'serials', serials });
  }

  private async openCamera(serial: string) {
    if (this.session) {
      throw new CameraBusy(`Camera ${this.session.serial} is already open`);
    }

    const serials = await this.driver.listSerials();
    if (!serials.includes(serial)) {
      throw new CameraNotFound(`No camera with serial "${serial}" is attached`);
    }

    const handle = await this.driver.open(serial);
    let values: CameraValues;
    try {
      values = normalizeValues(handle.capabilities, await handle.readValues());
      await handle.writeValues(values);
    } catch (e) {
      await handle.close().catch((closeError) => this.log.error('[CameraServer] Close after failed open', closeError));
      throw e;
    }

    this.session = { serial, handle, values };
    this.state = 'open';
    this.log.info(`[CameraServer] Camera ${serial} open`);

    await this.reply({ type: 'settings', settings: describeSettings(handle.capabilities, values) });
    await this.reply({ type: 'cam_open' });
  }

  private async play(session: Session) {
    if (this.state === 'playing') {
      await this.reply({ type: 'playing', playing: true });
      return;
    }

    await session.handle.start();
    this.state = 'playing';
    await this.reply({ type: 'playing', playing: true });

    this.stats = { sent: 0, dropped: 0 };
    this.acquisition = this.acquire(session, performance.now());
  }

  private async stopPlaying(session: Session) {
    if (this.state === 'playing') {
      await this.stopAcquisition(session);
    }
    await this.reply({ type: 'playing', playing: false });
  }

  private async stopAcquisition(session: Session) {
    this.state = 'open';
    await this.acquisition;
    this.acquisition = undefined;
    await session.handle.stop();
    this.log.info(`[CameraServer] Acquisition stopped: ${this.stats.sent} frames sent, ${this.stats.dropped} dropped`);
  }

  private async setSetting(session: Session, message: { name: string; value: SettingValue }) {
    const { name, value } = message;
    if (this.state === 'playing' && isSettingName(name) && !PLAY_SETTINGS.has(name)) {
      throw new InvalidSetting(`Setting "${name}" cannot be set while the camera is playing`);
    }

    const next = applySetting(session.handle.capabilities, session.values, name, value);
    await session.handle.writeValues(next);
    session.values = next;

    await this.reply({ type: 'settings', settings: describeSettings(session.handle.capabilities, next) });
  }

  /**
   * Ends the session, stopping acquisition first. Driver errors on the way are
   * reported but never keep the session alive.
   */
  private async closeSession() {
    const session = this.session;
    if (!session) return;

    if (this.state === 'playing') {
      try {
        await this.stopAcquisition(session);
      } catch (e) {
        await this.reportError(new DriverFault(`Stopping acquisition failed: ${describeError(e)}`, { cause: e }));
      }
      await this.reply({ type: 'playing', playing: false });
    }

    this.session = undefined;
    this.state = 'idle';
    try {
      await session.handle.close();
    } catch (e) {
      await this.reportError(new DriverFault(`Closing camera failed: ${describeError(e)}`, { cause: e }));
    }

    this.log.info(`[CameraServer] Camera ${session.serial} closed`);
    await this.reply({ type: 'cam_closed' });
  }

  private async acquire(session: Session, startedAt: number) {
    let fault: unknown;

    try {
      while (this.session === session && this.state === 'playing') {
        const frame = await session.handle.readFrame();
        // Stop may have been requested while we were reading
        if (this.session !== session || this.state !== 'playing') break;

        if (!frame) {
          await sleep(this.pollIntervalMs);
          continue;
        }

        const posted = this.channel?.post({
          type: 'image',
          data: frame.data,
          frameCount: frame.frameNumber,
          queuedCount: frame.queuedCount,
          timestamp: (performance.now() - startedAt) / 1000,
          width: frame.width,
          height: frame.height,
          pixelFormat: frame.pixelFormat,
        });

        if (posted) {
          this.stats.sent++;
        } else {
          this.stats.dropped++;
        }
      }
    } catch (e) {
      fault = e;
    }

    if (fault !== undefined) {
      const error = fault;
      this.serialize(() => this.onAcquisitionFault(session, error))
        .catch((e) => this.log.error('[CameraServer] Acquisition fault handling failed', e));
    }
  }

  private async onAcquisitionFault(session: Session, error: unknown) {
    if (this.session !== session) return;
    this.log.error('[CameraServer] Acquisition failed', error);
    await this.handleFailure('play', error);
  }

  private async handleFailure(command: Message['type'], error: unknown) {
    if (isRejection(error)) {
      this.log.warn(`[CameraServer] ${command} rejected: ${error.message}`);
      await this.reportError(error);
      return;
    }

    if (error instanceof ChannelClosed || error instanceof WriteTimeout) {
      // Nothing to report to; the serve loop notices the closed channel.
      this.log.warn(`[CameraServer] Lost client during ${command}: ${error.message}`);
      return;
    }

    if (error instanceof FatalDriverError) {
      this.log.error('[CameraServer] Fatal driver error', error);
      await this.reportError(error);
      this.events.emit('fatal', { error });
      this.stop('fatal driver error').catch((e) => this.log.error('[CameraServer] Stop after fatal error failed', e));
      return;
    }

    // Hardware state is unknown after a driver fault: drop back to idle.
    const fault = error instanceof DriverFault
      ? error
      : new DriverFault(`${command} failed: ${describeError(error)}`, { cause: error });
    this.log.error(`[CameraServer] Driver fault during ${command}`, error);
    await this.reportError(fault);
    await this.closeSession();
  }

  private reportError(error: IsocamError) {
    return this.reply({ type: 'error', kind: error.kind, detail: error.message });
  }

  private async reply(message: EventMessage) {
    const channel = this.channel;
    if (!channel?.isOpen) return;
    try {
      await channel.send(message);
    } catch (e) {
      this.log.warn(`[CameraServer] Could not send ${message.type}: ${describeError(e)}`);
    }
  }
}
