import type { ImageFrame } from '../camera/types';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';

export type ImageHandler = (frame: ImageFrame) => void | Promise<void>;

export interface DispatcherStats {
  delivered: number;
  dropped: number;
  pending: number;
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Hands images to a possibly slow consumer without holding up the receive
 * loop. At most `capacity` frames wait; a new frame pushes out the oldest.
 * Frames are delivered one per event-loop turn, each after the previous
 * handler has settled.
 */
export class ImageDispatcher {
  private queue: ImageFrame[] = [];
  private draining = false;
  private closed = false;
  private delivered = 0;
  private dropped = 0;
  private readonly log: Logger;

  constructor(private handler: ImageHandler, private capacity = 2, logger?: Logger) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Image queue capacity must be a positive integer, got ${capacity}`);
    }
    this.log = logger ?? rootLogger.child({ component: 'ImageDispatcher' });
  }

  get stats(): DispatcherStats {
    return { delivered: this.delivered, dropped: this.dropped, pending: this.queue.length };
  }

  push(frame: ImageFrame): void {
    if (this.closed) return;

    this.queue.push(frame);
    while (this.queue.length > this.capacity) {
      this.queue.shift();
      this.dropped++;
    }
    this.schedule();
  }

  /** Drops pending frames, counting them as dropped. Later pushes are delivered as usual. */
  flush(): void {
    this.dropped += this.queue.length;
    this.queue = [];
  }

  /** Discards pending frames and stops all further delivery. */
  clear(): void {
    this.closed = true;
    this.queue = [];
  }

  private schedule() {
    if (this.draining) return;
    this.draining = true;
    setImmediate(() => {
      this.drain().catch((e) => this.log.error('[ImageDispatcher] Drain failed', e));
    });
  }

  private async drain() {
    try {
      while (!this.closed) {
        const frame = this.queue.shift();
        if (!frame) break;

        try {
          await this.handler(frame);
        } catch (e) {
          this.log.error('[ImageDispatcher] Image handler threw', e);
        }
        this.delivered++;
        await nextTurn();
      }
    } finally {
      this.draining = false;
    }
  }
}
