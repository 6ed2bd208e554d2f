import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONFIG, resolveConfig } from "../types/config.js";
import { loadConfig } from "./load-config.js";

describe("config validation", () => {
  it("returns defaults for an empty config", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("applies overrides and keeps defaults for omitted fields", () => {
    const config = resolveConfig({ rpcTimeoutMs: 500, socketDir: "/var/run/editors" });
    expect(config.rpcTimeoutMs).toBe(500);
    expect(config.socketDir).toBe("/var/run/editors");
    expect(config.sideEffectWaitMs).toBe(DEFAULT_CONFIG.sideEffectWaitMs);
    expect(config.notifyOnDeny).toBe(true);
  });

  it("rejects zero or negative timeouts", () => {
    expect(() => resolveConfig({ rpcTimeoutMs: 0 })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ rpcTimeoutMs: -5 })).toThrow("Invalid configuration");
  });

  it("accepts a zero side-effect wait", () => {
    expect(resolveConfig({ sideEffectWaitMs: 0 }).sideEffectWaitMs).toBe(0);
  });

  it("rejects non-integer timeouts", () => {
    expect(() => resolveConfig({ rpcTimeoutMs: 12.5 })).toThrow(ConfigError);
  });

  it("names the offending field", () => {
    expect(() => resolveConfig({ socketDir: "" })).toThrow(/socketDir/);
  });
});

describe("loadConfig", () => {
  it("reads BUFGUARD_* variables", () => {
    const config = loadConfig({
      BUFGUARD_SOCKET_DIR: "/run/user/1000",
      BUFGUARD_RPC_TIMEOUT_MS: "750",
      BUFGUARD_SIDE_EFFECT_WAIT_MS: "0",
      BUFGUARD_NOTIFY_ON_DENY: "false",
      BUFGUARD_LOG_LEVEL: "debug",
      BUFGUARD_NVIM: "/opt/nvim/bin/nvim",
    });

    expect(config).toEqual({
      socketDir: "/run/user/1000",
      rpcTimeoutMs: 750,
      sideEffectWaitMs: 0,
      notifyOnDeny: false,
      logLevel: "debug",
      neovimBinary: "/opt/nvim/bin/nvim",
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ BUFGUARD_RPC_TIMEOUT_MS: "" })).toEqual(DEFAULT_CONFIG);
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/home/dev", PATH: "/usr/bin" })).toEqual(DEFAULT_CONFIG);
  });

  it("accepts 1/0 for booleans", () => {
    expect(loadConfig({ BUFGUARD_NOTIFY_ON_DENY: "0" }).notifyOnDeny).toBe(false);
    expect(loadConfig({ BUFGUARD_NOTIFY_ON_DENY: "1" }).notifyOnDeny).toBe(true);
  });

  it("rejects malformed values with the variable name", () => {
    expect(() => loadConfig({ BUFGUARD_RPC_TIMEOUT_MS: "soon" })).toThrow(
      /BUFGUARD_RPC_TIMEOUT_MS/,
    );
    expect(() => loadConfig({ BUFGUARD_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => loadConfig({ BUFGUARD_NOTIFY_ON_DENY: "yes" })).toThrow(ConfigError);
  });

  it("rejects a non-positive timeout after coercion", () => {
    expect(() => loadConfig({ BUFGUARD_RPC_TIMEOUT_MS: "-1" })).toThrow("Invalid configuration");
  });
});
