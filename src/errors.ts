import type { CameraErrorKind } from './domains/camera/types';

/**
 * Error taxonomy shared by both sides of the camera channel.
 *
 * `kind` is what travels over the wire in an `error` message, so the client can
 * rebuild the same class with {@link errorFromKind}.
 */
export class IsocamError extends Error {
  readonly kind: string;

  constructor(kind: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

// === Transport ===

export class ChannelClosed extends IsocamError {
  constructor(message = 'Channel closed', options?: { cause?: unknown }) {
    super('ChannelClosed', message, options);
  }
}

export class WriteTimeout extends IsocamError {
  constructor(timeoutMs: number) {
    super('WriteTimeout', `Socket write did not complete within ${timeoutMs}ms`);
  }
}

export class ProtocolError extends IsocamError {
  constructor(message: string, kind = 'ProtocolError', options?: { cause?: unknown }) {
    super(kind, message, options);
  }
}

export class MalformedMessage extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MalformedMessage', options);
  }
}

// === Camera ===

export class CameraNotFound extends IsocamError {
  constructor(message: string) {
    super('CameraNotFound', message);
  }
}

export class CameraBusy extends IsocamError {
  constructor(message: string) {
    super('CameraBusy', message);
  }
}

export class AcquisitionStartFailed extends IsocamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AcquisitionStartFailed', message, options);
  }
}

export class DriverFault extends IsocamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DriverFault', message, options);
  }
}

/** The driver is in a state the process cannot recover from; the server exits. */
export class FatalDriverError extends IsocamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FatalDriverError', message, options);
  }
}

export class InvalidState extends IsocamError {
  constructor(message: string) {
    super('InvalidState', message);
  }
}

export class InvalidSetting extends IsocamError {
  constructor(message: string) {
    super('InvalidSetting', message);
  }
}

// === Process / config ===

export class ServerStartError extends IsocamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ServerStartError', message, options);
  }
}

export class ConfigError extends IsocamError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

const CAMERA_ERRORS: Record<CameraErrorKind, (detail: string) => IsocamError> = {
  CameraNotFound: (detail) => new CameraNotFound(detail),
  CameraBusy: (detail) => new CameraBusy(detail),
  AcquisitionStartFailed: (detail) => new AcquisitionStartFailed(detail),
  DriverFault: (detail) => new DriverFault(detail),
  FatalDriverError: (detail) => new FatalDriverError(detail),
  InvalidState: (detail) => new InvalidState(detail),
  InvalidSetting: (detail) => new InvalidSetting(detail),
  MalformedMessage: (detail) => new MalformedMessage(detail),
};

/**
 * Rebuilds a typed error from an `error` message received from the server.
 * Unknown kinds come back as a plain {@link IsocamError}.
 */
export function errorFromKind(kind: string, detail: string): IsocamError {
  return isCameraErrorKind(kind) ? CAMERA_ERRORS[kind](detail) : new IsocamError(kind, detail);
}

function isCameraErrorKind(kind: string): kind is CameraErrorKind {
  return Object.hasOwn(CAMERA_ERRORS, kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
