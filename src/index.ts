export { CameraController } from './domains/client/controller';
export type { CameraControllerOptions, CameraEvent, CameraEventHandler, CameraView } from './domains/client/controller';
export { ImageDispatcher } from './domains/client/image-dispatcher';
export type { DispatcherStats, ImageHandler } from './domains/client/image-dispatcher';
export { ChildProcessLauncher, ServerProcess } from './domains/client/server-process';
export type { ExitInfo, LaunchedServer, LaunchOptions, ServerLauncher } from './domains/client/server-process';

export { CameraServer } from './domains/camera/server';
export type { AcquisitionStats, CameraServerOptions } from './domains/camera/server';
export { MockCameraDriver } from './domains/camera/mock-camera';
export type { MockCameraSpec, MockDriverOptions } from './domains/camera/mock-camera';
export type { CameraDriver, CameraHandle, DriverFactory, DriverOptions, RawFrame } from './domains/camera/driver';
export { PLAY_SETTINGS, SETTING_NAMES, TRIGGER_TYPES, applySetting, describeSettings, normalizeValues } from './domains/camera/settings';
export type { CameraCapabilities, CameraValues, SettingName, TriggerType } from './domains/camera/settings';
export type * from './domains/camera/types';

export { MessageCodec, MessageTag } from './domains/transport/protocol';
export type { CommandMessage, EventMessage, Message } from './domains/transport/protocol';
export { TransportChannel } from './domains/transport/channel';

export { IsocamLogger, rootLogger } from './domains/observability/logger';
export type { LogEntry, LogLevel, Logger } from './domains/observability/types';

export * from './errors';
export * from './config';
