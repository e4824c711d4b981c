import type { ServerConfig } from '../config';
import { MockCameraDriver } from '../domains/camera/mock-camera';
import { CameraServer } from '../domains/camera/server';
import type { ExitInfo, LaunchedServer, LaunchOptions, ServerLauncher } from '../domains/client/server-process';
import { IsocamLogger } from '../domains/observability/logger';

/**
 * Runs the camera server inside the test process. `kill` stops it the way a
 * dying process would look to the client: the connection just goes away.
 */
export class InProcessLauncher implements ServerLauncher {
  server?: CameraServer;
  driver?: MockCameraDriver;
  launches = 0;

  async launch(config: ServerConfig, _options: LaunchOptions): Promise<LaunchedServer> {
    const logger = new IsocamLogger({ level: 'error', component: 'TestServer' });
    const driver = new MockCameraDriver({ ...config.mock, logger });
    const server = new CameraServer({
      driver,
      host: config.host,
      port: config.port,
      pollIntervalMs: config.pollIntervalMs,
      highWaterMark: config.highWaterMark,
      writeTimeoutMs: config.writeTimeoutMs,
      logger,
    });
    this.server = server;
    this.driver = driver;
    this.launches++;

    const port = await server.listen();
    let stopped = false;
    const exited = new Promise<ExitInfo>((resolve) => {
      server.events.on('stopped', () => {
        stopped = true;
        resolve({ code: 0, signal: null });
      });
    });

    return {
      host: config.host,
      port,
      exited,
      async terminate(graceMs: number): Promise<ExitInfo> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<'timeout'>((resolve) => {
          timer = setTimeout(() => resolve('timeout'), graceMs);
        });
        const result = await Promise.race([exited, timeout]);
        clearTimeout(timer);
        if (result !== 'timeout') return result;
        await server.stop('terminated');
        return { code: null, signal: 'SIGKILL' };
      },
      kill() {
        if (stopped) return;
        server.abort('killed').catch((e) => logger.error('[TestServer] Abort failed', e));
      },
    };
  }
}
