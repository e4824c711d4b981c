import { z } from 'zod';
import { ConfigError } from './errors';
import { isLogLevel } from './domains/observability/logger';

export const LOOPBACK_HOSTS = ['127.0.0.1', 'localhost', '::1'];

export const DEFAULT_MOCK_CAMERAS = [{ serial: 'MOCK0001' }];

const MockCameraSpecSchema = z.object({
  serial: z.string().min(1),
  sensorWidth: z.number().int().positive().optional(),
  sensorHeight: z.number().int().positive().optional(),
  color: z.boolean().optional(),
  hardwareTrigger: z.boolean().optional(),
  claimed: z.boolean().optional(),
});

/** Options handed to the server process on its command line. */
export const ServerConfigSchema = z.object({
  /** Where the native driver libraries are loaded from. */
  binPath: z.string().default(''),
  host: z.string()
    .default('127.0.0.1')
    .refine((host) => LOOPBACK_HOSTS.includes(host), { message: 'host must be a loopback address' }),
  port: z.number().int().min(0).max(65535).default(0),
  /** `mock`, or a path to a module exporting `createDriver`. */
  driver: z.string().min(1).default('mock'),
  mock: z.object({
    cameras: z.array(MockCameraSpecSchema).default(DEFAULT_MOCK_CAMERAS),
    fps: z.number().positive().optional(),
  }).default({}),
  pollIntervalMs: z.number().int().positive().default(2),
  highWaterMark: z.number().int().positive().default(8 * 1024 * 1024),
  writeTimeoutMs: z.number().int().positive().default(5000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

export const ControllerConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  startupTimeoutMs: z.number().int().positive().default(10000),
  connectTimeoutMs: z.number().int().positive().default(5000),
  shutdownTimeoutMs: z.number().int().positive().default(5000),
  writeTimeoutMs: z.number().int().positive().default(5000),
  /** Frames held for a slow image callback before the oldest is dropped. */
  imageQueueSize: z.number().int().positive().default(2),
});

export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;
export type ControllerConfigInput = z.input<typeof ControllerConfigSchema>;

function parse<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid ${what}: ${issues.join('; ')}`);
  }
  return result.data;
}

export function parseServerConfig(input: unknown): ServerConfig {
  return parse(ServerConfigSchema, input, 'server config');
}

/** Server options taken from ISOCAM_* variables and LOG_LEVEL. */
export function serverConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfigInput {
  const config: ServerConfigInput = {};
  if (env.ISOCAM_BIN_PATH) config.binPath = env.ISOCAM_BIN_PATH;
  if (env.ISOCAM_HOST) config.host = env.ISOCAM_HOST;
  if (env.ISOCAM_PORT) config.port = Number(env.ISOCAM_PORT);
  if (env.ISOCAM_DRIVER) config.driver = env.ISOCAM_DRIVER;
  if (isLogLevel(env.LOG_LEVEL)) config.logLevel = env.LOG_LEVEL;
  return config;
}

/**
 * Resolves controller options. Explicit `server` options win over the
 * environment, which wins over the defaults.
 */
export function loadControllerConfig(
  input: ControllerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ControllerConfig {
  return parse(ControllerConfigSchema, {
    ...input,
    server: { ...serverConfigFromEnv(env), ...input.server },
  }, 'controller options');
}
