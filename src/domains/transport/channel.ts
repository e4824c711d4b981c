import { connect, type Socket } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import mitt, { type Emitter } from 'mitt';
import { ChannelClosed, WriteTimeout, describeError } from '../../errors';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import { MessageCodec, type Message } from './protocol';

export interface ChannelOptions {
  /** How long `send` waits for the socket to flush a frame. */
  writeTimeoutMs?: number;
  /** Pending write bytes above which `post` refuses new frames. */
  highWaterMark?: number;
  logger?: Logger;
}

export interface ConnectOptions extends ChannelOptions {
  /** Keep retrying refused connections until this much time has passed. */
  timeoutMs?: number;
  retryDelayMs?: number;
}

type ChannelEvents = {
  close: { error: Error };
};

interface Waiter {
  resolve: (message: Message) => void;
  reject: (error: Error) => void;
}

/**
 * One framed, ordered, bidirectional message stream over a socket.
 *
 * Messages are delivered whole and in arrival order. Once the channel fails
 * every pending and future `receive` rejects with the failure, after any
 * messages already decoded have been handed out.
 */
export class TransportChannel {
  public readonly events: Emitter<ChannelEvents> = mitt<ChannelEvents>();
  /** Resolves with the failure once the channel has closed, for whatever reason. */
  public readonly closed: Promise<Error>;
  private markClosed: (error: Error) => void = () => {};
  private buffer: Buffer = Buffer.alloc(0);
  private inbox: Message[] = [];
  private waiters: Waiter[] = [];
  private failure?: Error;
  private closing = false;
  private readonly writeTimeoutMs: number;
  private readonly highWaterMark: number;
  private readonly log: Logger;

  constructor(private socket: Socket, options: ChannelOptions = {}) {
    this.writeTimeoutMs = options.writeTimeoutMs ?? 5000;
    this.highWaterMark = options.highWaterMark ?? 8 * 1024 * 1024;
    this.log = options.logger ?? rootLogger.child({ component: 'Channel' });
    this.closed = new Promise((resolve) => {
      this.markClosed = resolve;
    });

    socket.setNoDelay(true);
    socket.on('data', (data: Buffer) => this.handleData(data));
    socket.on('error', (error) => {
      this.fail(new ChannelClosed(`Socket error: ${error.message}`, { cause: error }));
    });
    socket.on('close', () => {
      this.fail(new ChannelClosed(this.closing ? 'Channel closed' : 'Peer disconnected'));
    });
  }

  static async connect(host: string, port: number, options: ConnectOptions = {}): Promise<TransportChannel> {
    const deadline = Date.now() + (options.timeoutMs ?? 5000);
    const retryDelayMs = options.retryDelayMs ?? 50;

    while (true) {
      try {
        const socket = await openSocket(host, port);
        return new TransportChannel(socket, options);
      } catch (e) {
        const refused = e instanceof Error && 'code' in e && e.code === 'ECONNREFUSED';
        if (!refused || Date.now() >= deadline) {
          throw new ChannelClosed(`Cannot connect to ${host}:${port}: ${describeError(e)}`, { cause: e });
        }
        await sleep(retryDelayMs);
      }
    }
  }

  get isOpen(): boolean {
    return this.failure === undefined;
  }

  /** Bytes written by us that the OS has not accepted yet. */
  get pendingWriteBytes(): number {
    return this.socket.writableLength;
  }

  /**
   * Writes one frame and resolves once it has been handed to the OS.
   */
  async send(message: Message): Promise<void> {
    if (this.failure) {
      throw new ChannelClosed(`Cannot send "${message.type}": ${this.failure.message}`);
    }
    const frame = MessageCodec.encode(message);

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => reject(new WriteTimeout(this.writeTimeoutMs)), this.writeTimeoutMs);
      this.socket.write(frame, (error) => {
        clearTimeout(timer);
        if (error) {
          reject(new ChannelClosed(`Write failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Queues one frame without waiting for it. Returns false, writing nothing,
   * when the channel is closed or the socket is already backed up past the
   * high water mark.
   */
  post(message: Message): boolean {
    if (this.failure || this.socket.writableLength > this.highWaterMark) {
      return false;
    }
    this.socket.write(MessageCodec.encode(message));
    return true;
  }

  receive(): Promise<Message> {
    const next = this.inbox.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Yields messages until the peer closes; rethrows protocol errors. */
  async *[Symbol.asyncIterator](): AsyncGenerator<Message, void, undefined> {
    while (true) {
      try {
        yield await this.receive();
      } catch (e) {
        if (e instanceof ChannelClosed) return;
        throw e;
      }
    }
  }

  /** Flushes pending writes, then closes the socket. */
  async close(): Promise<void> {
    if (this.failure) return;
    this.closing = true;
    // A peer that never finishes its side gets cut off.
    const timer = setTimeout(() => this.socket.destroy(), this.writeTimeoutMs);
    this.socket.end();
    await this.closed;
    clearTimeout(timer);
  }

  destroy(error?: Error) {
    this.closing = true;
    this.fail(error ?? new ChannelClosed('Channel destroyed'));
  }

  private handleData(data: Buffer) {
    this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);

    try {
      while (true) {
        const result = MessageCodec.tryDecode(this.buffer);
        if (!result) break;
        this.buffer = this.buffer.subarray(result.consumed);
        this.deliver(result.message);
      }
    } catch (e) {
      this.log.error('[Channel] Protocol error, closing', e);
      this.fail(e instanceof Error ? e : new Error(String(e)));
    }
  }

  private deliver(message: Message) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private fail(error: Error) {
    if (this.failure) return;
    this.failure = error;
    this.buffer = Buffer.alloc(0);

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
    this.socket.destroy();
    this.markClosed(error);
    this.events.emit('close', { error });
  }
}

function openSocket(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });
    const onError = (error: Error) => {
      socket.destroy();
      reject(error);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}
