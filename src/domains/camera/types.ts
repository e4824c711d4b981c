export type SettingValue = number | boolean | string;

export interface NumericSetting {
  name: string;
  kind: 'numeric';
  value: number;
  range: [number, number];
  integer: boolean;
}

export interface BooleanSetting {
  name: string;
  kind: 'boolean';
  value: boolean;
}

export interface EnumeratedSetting {
  name: string;
  kind: 'enumerated';
  value: string;
  choices: string[];
}

/**
 * One configurable camera parameter together with the range or choices it may
 * currently take. Ranges can move when another setting changes.
 */
export type SettingSpec = NumericSetting | BooleanSetting | EnumeratedSetting;

export type SettingsSnapshot = Record<string, SettingSpec>;

export type PixelFormat = 'gray16le' | 'bgr48le';

/**
 * A single acquired image.
 *
 * `data` may be a view into a buffer that is reused once the image callback
 * returns; copy it to keep it.
 */
export interface ImageFrame {
  data: Buffer;
  /** Sequence number assigned by the camera, increasing while playing. */
  frameCount: number;
  /** Frames still waiting in the camera's queue when this one was read. */
  queuedCount: number;
  /** Seconds since acquisition started. */
  timestamp: number;
  width: number;
  height: number;
  pixelFormat: PixelFormat;
}

export type SessionState = 'idle' | 'open' | 'playing';

/** Error kinds the server reports in `error` messages. */
export type CameraErrorKind =
  | 'CameraNotFound'
  | 'CameraBusy'
  | 'AcquisitionStartFailed'
  | 'DriverFault'
  | 'FatalDriverError'
  | 'InvalidState'
  | 'InvalidSetting'
  | 'MalformedMessage';
