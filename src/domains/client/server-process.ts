import { spawn, type ChildProcess } from 'node:child_process';
import path from 'node:path';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import mitt, { type Emitter } from 'mitt';
import { z } from 'zod';
import type { ServerConfig } from '../../config';
import { ServerStartError } from '../../errors';
import { isLogLevel, rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** A running camera server, however it was started. */
export interface LaunchedServer {
  readonly host: string;
  readonly port: number;
  /** Settles once the server is gone. */
  readonly exited: Promise<ExitInfo>;
  /** Waits up to `graceMs` for the server to exit on its own, then kills it. */
  terminate(graceMs: number): Promise<ExitInfo>;
  /** Ends the server immediately. */
  kill(): void;
}

export interface LaunchOptions {
  startupTimeoutMs: number;
  logger?: Logger;
}

export interface ServerLauncher {
  launch(config: ServerConfig, options: LaunchOptions): Promise<LaunchedServer>;
}

const ParentMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), port: z.number().int().positive() }),
  z.object({ type: z.literal('failed'), error: z.string() }),
]);

const ChildLogSchema = z.object({
  level: z.string(),
  msg: z.string(),
  component: z.string().optional(),
}).passthrough();

type ServerProcessEvents = {
  exit: ExitInfo;
  output: { stream: 'stdout' | 'stderr'; line: string };
};

const STDERR_TAIL_LINES = 20;

/** Entry script and loader flags for the server process, matching how this module was loaded. */
function serverEntry(): { entry: string; execArgv: string[] } {
  const ext = path.extname(__filename);
  const entry = path.join(__dirname, '..', 'camera', `server-main${ext}`);
  return { entry, execArgv: ext === '.ts' ? ['--import', 'tsx'] : [] };
}

/**
 * The camera server running as a child process. Its JSON log lines are
 * re-emitted through the parent's logger.
 */
export class ServerProcess implements LaunchedServer {
  public readonly events: Emitter<ServerProcessEvents> = mitt<ServerProcessEvents>();
  readonly exited: Promise<ExitInfo>;
  private exitInfo?: ExitInfo;
  private stderrTail: string[] = [];
  private readonly log: Logger;

  private constructor(private child: ChildProcess, readonly host: string, private _port: number, logger: Logger) {
    this.log = logger;
    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        this.exitInfo = { code, signal };
        this.log.info(`[ServerProcess] Exited (code ${code}, signal ${signal})`);
        this.events.emit('exit', this.exitInfo);
        resolve(this.exitInfo);
      });
    });

    if (child.stdout) this.streamToEvent('stdout', child.stdout);
    if (child.stderr) this.streamToEvent('stderr', child.stderr);
  }

  get port(): number {
    return this._port;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get running(): boolean {
    return this.exitInfo === undefined;
  }

  /** Spawns the server and resolves once it reports the port it listens on. */
  static async start(config: ServerConfig, options: LaunchOptions): Promise<ServerProcess> {
    const log = options.logger ?? rootLogger.child({ component: 'ServerProcess' });
    const { entry, execArgv } = serverEntry();

    const child = spawn(process.execPath, [...execArgv, entry, JSON.stringify(config)], {
      stdio: ['ignore', 'pipe', 'pipe', 'ipc'],
      env: process.env,
    });
    const server = new ServerProcess(child, config.host, 0, log);
    log.info(`[ServerProcess] Spawned server (PID: ${child.pid})`);

    try {
      server._port = await server.awaitReady(options.startupTimeoutMs);
    } catch (e) {
      server.kill();
      await server.exited;
      throw e;
    }
    return server;
  }

  private awaitReady(timeoutMs: number): Promise<number> {
    const child = this.child;

    return new Promise<number>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        child.off('message', onMessage);
        child.off('exit', onExit);
        child.off('error', onError);
      };
      const fail = (message: string, cause?: unknown) => {
        cleanup();
        const tail = this.stderrTail.join('\n');
        reject(new ServerStartError(tail ? `${message}\n${tail}` : message, { cause }));
      };

      const onMessage = (raw: unknown) => {
        const parsed = ParentMessageSchema.safeParse(raw);
        if (!parsed.success) {
          this.log.warn('[ServerProcess] Ignoring unexpected IPC message', { raw });
          return;
        }
        if (parsed.data.type === 'failed') {
          fail(`Server failed to start: ${parsed.data.error}`);
          return;
        }
        cleanup();
        resolve(parsed.data.port);
      };
      const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
        fail(`Server exited during startup (code ${code}, signal ${signal})`);
      };
      const onError = (error: Error) => fail(`Cannot launch server: ${error.message}`, error);
      const timer = setTimeout(() => fail(`Server did not become ready within ${timeoutMs}ms`), timeoutMs);

      child.on('message', onMessage);
      child.once('exit', onExit);
      child.once('error', onError);
    });
  }

  private streamToEvent(stream: 'stdout' | 'stderr', input: Readable) {
    const lines = createInterface({ input });
    lines.on('line', (line) => {
      if (stream === 'stderr') {
        this.stderrTail.push(line);
        if (this.stderrTail.length > STDERR_TAIL_LINES) this.stderrTail.shift();
      }
      this.events.emit('output', { stream, line });
      this.forward(stream, line);
    });
  }

  private forward(stream: 'stdout' | 'stderr', line: string) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parsed = undefined;
    }

    const entry = ChildLogSchema.safeParse(parsed);
    if (!entry.success) {
      // Not one of our log lines (native library output, a crash trace)
      if (stream === 'stderr') this.log.warn(`[ServerProcess] ${line}`);
      else this.log.info(`[ServerProcess] ${line}`);
      return;
    }

    const { level, msg, component, ts: _ts, ...meta } = entry.data;
    const child = this.log.child({ component: `server:${component ?? 'unknown'}` });
    switch (isLogLevel(level) ? level : 'info') {
      case 'debug':
        child.debug(msg, meta);
        break;
      case 'info':
        child.info(msg, meta);
        break;
      case 'warn':
        child.warn(msg, meta);
        break;
      case 'error': {
        const { error, ...rest } = meta;
        child.error(msg, error, rest);
        break;
      }
    }
  }

  async terminate(graceMs: number): Promise<ExitInfo> {
    if (this.exitInfo) return this.exitInfo;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });
    const result = await Promise.race([this.exited, timedOut]);
    clearTimeout(timer);

    if (result === 'timeout') {
      this.log.warn(`[ServerProcess] Server still running after ${graceMs}ms, killing it`);
      this.kill();
      return this.exited;
    }
    return result;
  }

  kill(): void {
    if (this.exitInfo) return;
    this.child.kill('SIGKILL');
    this.log.info(`[ServerProcess] Killed server (PID: ${this.child.pid})`);
  }
}

/** Starts the server as a child process of this one. */
export class ChildProcessLauncher implements ServerLauncher {
  launch(config: ServerConfig, options: LaunchOptions): Promise<LaunchedServer> {
    return ServerProcess.start(config, options);
  }
}
