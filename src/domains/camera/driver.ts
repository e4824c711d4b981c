import type { Logger } from '../observability/types';
import type { CameraCapabilities, CameraValues } from './settings';
import type { PixelFormat } from './types';

/** One frame as pulled off the camera's acquisition queue. */
export interface RawFrame {
  data: Buffer;
  width: number;
  height: number;
  pixelFormat: PixelFormat;
  frameNumber: number;
  /** Frames left on the camera's queue after this one was taken. */
  queuedCount: number;
}

/**
 * The native camera SDK as seen by the server process. Implementations wrap
 * whatever vendor library is loaded from `binPath`.
 *
 * `open` rejects with `CameraNotFound` or `CameraBusy` for those conditions;
 * any other rejection is treated as a driver fault.
 */
export interface CameraDriver {
  listSerials(): Promise<string[]>;
  open(serial: string): Promise<CameraHandle>;
  dispose?(): Promise<void>;
}

export interface CameraHandle {
  readonly serial: string;
  readonly capabilities: CameraCapabilities;

  readValues(): Promise<CameraValues>;
  /** Programs the complete set of values into the camera. */
  writeValues(values: CameraValues): Promise<void>;

  /** Arms the camera. Rejects with `AcquisitionStartFailed` when the camera refuses. */
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Returns the next pending frame, or null when none is ready. Never blocks on the camera. */
  readFrame(): Promise<RawFrame | null>;

  close(): Promise<void>;
}

export interface DriverOptions {
  /** Directory holding the vendor's native libraries. */
  binPath: string;
  logger: Logger;
}

export type DriverFactory = (options: DriverOptions) => CameraDriver | Promise<CameraDriver>;
