import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError, clearConfigCache, loadConfig, parseConfig } from "../src/config.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({ rpcUrl: "http://127.0.0.1:8545" })).toEqual({
      rpcUrl: "http://127.0.0.1:8545",
      chainId: 1,
      backend: "anvil",
      requestTimeoutMs: 30000,
      concurrency: 8,
      maxProxyDepth: 4,
      searchAccount: undefined,
      spender: undefined,
      holdersFile: undefined,
      holdersUrl: undefined,
    });
  });

  it("keeps explicit values", () => {
    const config = parseConfig({
      rpcUrl: "http://node:8545",
      chainId: 10,
      backend: "ganache",
      concurrency: 2,
      spender: "0x000000000000000000000000000000000000b0b0",
      holdersFile: "holders.json",
    });

    expect(config.chainId).toBe(10);
    expect(config.backend).toBe("ganache");
    expect(config.concurrency).toBe(2);
    expect(config.spender).toBe("0x000000000000000000000000000000000000b0b0");
    expect(config.holdersFile).toBe("holders.json");
  });

  it.each([
    [[], "Configuration must be a JSON object"],
    [{}, `"rpcUrl" is required`],
    [{ rpcUrl: "" }, `"rpcUrl" must be a non-empty string`],
    [{ rpcUrl: "x", backend: "hardhat" }, `"backend" must be one of rpc, anvil, tenderly, ganache`],
    [{ rpcUrl: "x", concurrency: 0 }, `"concurrency" must be a positive integer`],
    [{ rpcUrl: "x", chainId: 1.5 }, `"chainId" must be a positive integer`],
    [{ rpcUrl: "x", searchAccount: "0x1234" }, `"searchAccount" is not an address: 0x1234`],
  ])("rejects %j", (raw, message) => {
    expect(() => parseConfig(raw)).toThrow(new ConfigError(message));
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "slot-config-"));
    clearConfigCache();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    clearConfigCache();
  });

  it("reads and caches the file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ rpcUrl: "http://a:8545" }));

    const first = loadConfig(path);
    writeFileSync(path, JSON.stringify({ rpcUrl: "http://b:8545" }));

    expect(first.rpcUrl).toBe("http://a:8545");
    expect(loadConfig(path)).toBe(first);

    clearConfigCache();
    expect(loadConfig(path).rpcUrl).toBe("http://b:8545");
  });

  it("wraps unreadable files in a ConfigError", () => {
    const path = join(dir, "missing.json");

    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow(`Cannot read ${path}`);
  });

  it("wraps malformed JSON in a ConfigError", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ rpcUrl: ");

    expect(() => loadConfig(path)).toThrow(ConfigError);
  });
});
