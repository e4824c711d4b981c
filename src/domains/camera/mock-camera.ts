import { EventEmitter } from 'events';
import { AcquisitionStartFailed, CameraBusy, CameraNotFound } from '../../errors';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import type { CameraDriver, CameraHandle, RawFrame } from './driver';
import type { CameraCapabilities, CameraValues } from './settings';

export interface MockCameraSpec {
  serial: string;
  sensorWidth?: number;
  sensorHeight?: number;
  color?: boolean;
  /** Whether a hardware trigger line is wired; arming in HW mode fails without one. */
  hardwareTrigger?: boolean;
  /** Pretend another process already holds this camera. */
  claimed?: boolean;
}

export interface MockDriverOptions {
  cameras: MockCameraSpec[];
  fps?: number;
  logger?: Logger;
}

/**
 * Mock camera driver: simulated cameras that generate frames on a timer, for
 * development and tests.
 */
export class MockCameraDriver implements CameraDriver {
  private cameras: MockCameraSpec[];
  private openCameras = new Map<string, MockCamera>();
  private fps: number;
  private log: Logger;

  constructor(options: MockDriverOptions) {
    this.cameras = options.cameras;
    this.fps = options.fps || 30;
    this.log = options.logger || rootLogger.child({ component: 'MockCamera' });
  }

  async listSerials(): Promise<string[]> {
    return this.cameras.map((c) => c.serial).sort();
  }

  async open(serial: string): Promise<MockCamera> {
    const spec = this.cameras.find((c) => c.serial === serial);
    if (!spec) {
      throw new CameraNotFound(`No camera with serial "${serial}" is attached`);
    }
    if (spec.claimed || this.openCameras.has(serial)) {
      throw new CameraBusy(`Camera ${serial} is in use by another session`);
    }

    const camera = new MockCamera(spec, this.fps, this.log);
    camera.once('closed', () => this.openCameras.delete(serial));
    this.openCameras.set(serial, camera);
    this.log.info(`[MockCamera] ${serial} opened (${camera.capabilities.sensorWidth}x${camera.capabilities.sensorHeight})`);
    return camera;
  }

  /** The currently open camera with this serial, for fault injection. */
  get(serial: string): MockCamera | undefined {
    return this.openCameras.get(serial);
  }

  async dispose(): Promise<void> {
    for (const camera of [...this.openCameras.values()]) {
      await camera.close();
    }
  }
}

export class MockCamera extends EventEmitter implements CameraHandle {
  readonly serial: string;
  readonly capabilities: CameraCapabilities;
  private values: CameraValues;
  private frameTimer?: ReturnType<typeof setInterval>;
  private queue: RawFrame[] = [];
  private frameNumber = 0;
  private fault?: Error;
  private hardwareTrigger: boolean;

  constructor(spec: MockCameraSpec, private fps: number, private log: Logger) {
    super();
    this.serial = spec.serial;
    this.hardwareTrigger = spec.hardwareTrigger ?? false;

    const sensorWidth = spec.sensorWidth || 64;
    const sensorHeight = spec.sensorHeight || 48;
    this.capabilities = {
      sensorWidth,
      sensorHeight,
      color: spec.color ?? false,
      exposureRangeMs: [0.01, 1000],
      binningXRange: [1, 4],
      binningYRange: [1, 4],
      gainRange: [0, 100],
      blackLevelRange: [0, 100],
      maxFrameQueueSize: 32,
      supportedFreqs: ['20 MHz', '40 MHz'],
      supportedTaps: ['1'],
    };
    this.values = {
      exposure_ms: 5,
      binning_x: 1,
      binning_y: 1,
      roi_x: 0,
      roi_y: 0,
      roi_width: sensorWidth,
      roi_height: sensorHeight,
      trigger_type: 'SW Trigger',
      trigger_count: 0,
      frame_queue_size: 4,
      gain: 0,
      black_level: 0,
      freq: '20 MHz',
      taps: '1',
      hot_pixel_correction: false,
    };
  }

  get armed(): boolean {
    return this.frameTimer !== undefined;
  }

  /** Makes every later driver call fail with `error`, as a crashed SDK would. */
  injectFault(error: Error) {
    this.fault = error;
  }

  async readValues(): Promise<CameraValues> {
    this.checkFault();
    return { ...this.values };
  }

  async writeValues(values: CameraValues): Promise<void> {
    this.checkFault();
    this.values = { ...values };
  }

  async start(): Promise<void> {
    this.checkFault();
    if (this.armed) return;
    if (this.values.trigger_type === 'HW Trigger' && !this.hardwareTrigger) {
      throw new AcquisitionStartFailed(`Camera ${this.serial} has no hardware trigger input`);
    }

    this.frameNumber = 0;
    this.queue = [];
    let produced = 0;

    // Frame generation
    this.frameTimer = setInterval(() => {
      const limit = this.values.trigger_count;
      if (limit > 0 && produced >= limit) return;
      produced++;
      this.queue.push(this.generateFrame());
      // The hardware queue discards its oldest frame when full
      while (this.queue.length > this.values.frame_queue_size) {
        this.queue.shift();
      }
    }, 1000 / this.fps);

    this.log.debug(`[MockCamera] ${this.serial} armed`);
  }

  async stop(): Promise<void> {
    this.checkFault();
    this.disarm();
  }

  async readFrame(): Promise<RawFrame | null> {
    this.checkFault();
    const frame = this.queue.shift();
    if (!frame) return null;
    return { ...frame, queuedCount: this.queue.length };
  }

  async close(): Promise<void> {
    this.disarm();
    this.emit('closed');
    this.log.info(`[MockCamera] ${this.serial} closed`);
  }

  private disarm() {
    if (this.frameTimer) {
      clearInterval(this.frameTimer);
      this.frameTimer = undefined;
    }
    this.queue = [];
  }

  private checkFault() {
    if (this.fault) throw this.fault;
  }

  private generateFrame(): RawFrame {
    this.frameNumber++;
    const { color } = this.capabilities;
    const width = Math.floor(this.values.roi_width / this.values.binning_x);
    const height = Math.floor(this.values.roi_height / this.values.binning_y);
    const data = Buffer.alloc(width * height * (color ? 3 : 1) * 2, this.frameNumber & 0xff);

    return {
      data,
      width,
      height,
      pixelFormat: color ? 'bgr48le' : 'gray16le',
      frameNumber: this.frameNumber,
      queuedCount: 0,
    };
  }
}
