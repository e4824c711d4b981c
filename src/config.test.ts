import { describe, it, expect } from "vitest";
import { loadControllerConfig, parseServerConfig, serverConfigFromEnv } from "./config";
import { ConfigError } from "./errors";

describe("config", () => {
  it("fills in server defaults", () => {
    const config = parseServerConfig({});

    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(0);
    expect(config.driver).toBe("mock");
    expect(config.mock.cameras).toEqual([{ serial: "MOCK0001" }]);
    expect(config.pollIntervalMs).toBe(2);
    expect(config.logLevel).toBe("info");
  });

  it("reads server options from the environment", () => {
    expect(serverConfigFromEnv({
      ISOCAM_BIN_PATH: "/opt/camera/bin",
      ISOCAM_HOST: "::1",
      ISOCAM_PORT: "5123",
      ISOCAM_DRIVER: "./driver.js",
      LOG_LEVEL: "debug",
    })).toEqual({
      binPath: "/opt/camera/bin",
      host: "::1",
      port: 5123,
      driver: "./driver.js",
      logLevel: "debug",
    });
    expect(serverConfigFromEnv({ LOG_LEVEL: "chatty" })).toEqual({});
  });

  it("lets explicit options win over the environment", () => {
    const config = loadControllerConfig(
      { server: { port: 6000 }, imageQueueSize: 4 },
      { ISOCAM_PORT: "5123", ISOCAM_BIN_PATH: "/opt/camera/bin" }
    );

    expect(config.server.port).toBe(6000);
    expect(config.server.binPath).toBe("/opt/camera/bin");
    expect(config.imageQueueSize).toBe(4);
    expect(config.shutdownTimeoutMs).toBe(5000);
  });

  it("lists every invalid field", () => {
    expect(() => parseServerConfig({ host: "192.168.1.20", port: 70000 })).toThrow(
      "Invalid server config: host: host must be a loopback address; port: Number must be less than or equal to 65535"
    );
    expect(() => loadControllerConfig({}, { ISOCAM_PORT: "abc" })).toThrow(ConfigError);
  });
});
