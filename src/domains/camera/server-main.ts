import path from 'node:path';
import { parseServerConfig, type ServerConfig } from '../../config';
import { ConfigError, describeError } from '../../errors';
import { IsocamLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import type { CameraDriver, DriverFactory } from './driver';
import { MockCameraDriver } from './mock-camera';
import { CameraServer } from './server';

/** Messages the server process sends its parent over the IPC channel. */
export type ParentMessage =
  | { type: 'ready'; port: number }
  | { type: 'failed'; error: string };

/** Exit status after a fatal driver error. */
export const EXIT_FATAL = 70;

function notifyParent(message: ParentMessage): Promise<void> {
  return new Promise((resolve) => {
    if (!process.send) return resolve();
    process.send(message, undefined, undefined, () => resolve());
  });
}

// The vendor SDK resolves its native libraries through the search path.
function exposeBinaries(binPath: string) {
  if (!binPath) return;
  for (const name of ['PATH', 'LD_LIBRARY_PATH']) {
    const current = process.env[name];
    process.env[name] = current ? `${current}${path.delimiter}${binPath}` : binPath;
  }
}

function hasDriverFactory(mod: unknown): mod is { createDriver: DriverFactory } {
  return typeof mod === 'object' && mod !== null && 'createDriver' in mod && typeof mod.createDriver === 'function';
}

export async function loadDriver(config: ServerConfig, logger: Logger): Promise<CameraDriver> {
  if (config.driver === 'mock') {
    return new MockCameraDriver({ ...config.mock, logger: logger.child({ component: 'MockCamera' }) });
  }

  const mod: unknown = await import(path.resolve(config.driver));
  if (!hasDriverFactory(mod)) {
    throw new ConfigError(`Driver module ${config.driver} does not export createDriver`);
  }
  return mod.createDriver({ binPath: config.binPath, logger: logger.child({ component: 'Driver' }) });
}

/**
 * Entry point of the server process. Reads its JSON config from the first
 * argument, reports readiness to the parent and exits once the server stops.
 */
export async function runServer(argv: string[] = process.argv.slice(2)): Promise<void> {
  const log = new IsocamLogger({ format: 'json', component: 'ServerMain' });

  try {
    const config = parseServerConfig(JSON.parse(argv[0] ?? '{}'));
    const logger = new IsocamLogger({ level: config.logLevel, format: 'json', component: 'CameraServer' });

    exposeBinaries(config.binPath);
    const driver = await loadDriver(config, logger);
    const server = new CameraServer({
      driver,
      host: config.host,
      port: config.port,
      pollIntervalMs: config.pollIntervalMs,
      highWaterMark: config.highWaterMark,
      writeTimeoutMs: config.writeTimeoutMs,
      logger,
    });

    let exitCode = 0;
    server.events.on('fatal', () => {
      exitCode = EXIT_FATAL;
    });
    server.events.on('stopped', () => process.exit(exitCode));

    const stop = (reason: string) => {
      server.stop(reason).catch((e) => {
        logger.error('[ServerMain] Stop failed', e);
        process.exit(1);
      });
    };
    process.once('SIGTERM', () => stop('terminated'));
    process.once('SIGINT', () => stop('interrupted'));
    // The parent is the client; once it is gone there is nobody to notify.
    process.once('disconnect', () => {
      server.abort('parent exited').catch((e) => {
        logger.error('[ServerMain] Abort failed', e);
        process.exit(1);
      });
    });

    const port = await server.listen();
    await notifyParent({ type: 'ready', port });
  } catch (e) {
    log.error('[ServerMain] Startup failed', e);
    await notifyParent({ type: 'failed', error: describeError(e) });
    process.exitCode = 1;
    process.disconnect?.();
  }
}

if (require.main === module) {
  runServer().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
