import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { isAddress } from "ethers";
import {
    BACKEND_TYPES,
    DEFAULT_CONCURRENCY,
    DEFAULT_MAX_PROXY_DEPTH,
    DEFAULT_REQUEST_TIMEOUT_MS,
    SlotFinderError,
    errorMessage,
    type Address,
    type BackendType,
} from "@token-slots/finder";
import type { SlotFinderConfig } from "./types";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = join(__dirname, "..");
const MONOREPO_ROOT = join(PACKAGE_ROOT, "..", "..");
export const CONFIG_PATH = join(MONOREPO_ROOT, "slot-finder-config.json");

export class ConfigError extends SlotFinderError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "ConfigError";
    }
}

let cachedConfig: SlotFinderConfig | null = null;

/**
 * Clear the cached config so the next call to loadConfig() re-reads from disk.
 */
export function clearConfigCache(): void {
    cachedConfig = null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBackendType(value: unknown): value is BackendType {
    return typeof value === "string" && BACKEND_TYPES.some((b) => b === value);
}

function optionalString(raw: Record<string, unknown>, field: string): string | undefined {
    const value = raw[field];
    if (value === undefined) return undefined;
    if (typeof value !== "string" || value.length === 0) {
        throw new ConfigError(`"${field}" must be a non-empty string`);
    }
    return value;
}

function optionalAddress(raw: Record<string, unknown>, field: string): Address | undefined {
    const value = optionalString(raw, field);
    if (value === undefined) return undefined;
    if (!isAddress(value)) {
        throw new ConfigError(`"${field}" is not an address: ${value}`);
    }
    return value as Address;
}

function positiveInteger(raw: Record<string, unknown>, field: string, fallback: number): number {
    const value = raw[field];
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
        throw new ConfigError(`"${field}" must be a positive integer`);
    }
    return value;
}

/**
 * Validate a parsed configuration object and fill in defaults.
 *
 * @throws ConfigError on a missing or malformed field
 */
export function parseConfig(raw: unknown): SlotFinderConfig {
    if (!isRecord(raw)) {
        throw new ConfigError("Configuration must be a JSON object");
    }

    const rpcUrl = optionalString(raw, "rpcUrl");
    if (!rpcUrl) {
        throw new ConfigError(`"rpcUrl" is required`);
    }

    const backend = raw.backend ?? "anvil";
    if (!isBackendType(backend)) {
        throw new ConfigError(`"backend" must be one of ${BACKEND_TYPES.join(", ")}`);
    }

    return {
        rpcUrl,
        chainId: positiveInteger(raw, "chainId", 1),
        backend,
        requestTimeoutMs: positiveInteger(raw, "requestTimeoutMs", DEFAULT_REQUEST_TIMEOUT_MS),
        concurrency: positiveInteger(raw, "concurrency", DEFAULT_CONCURRENCY),
        maxProxyDepth: positiveInteger(raw, "maxProxyDepth", DEFAULT_MAX_PROXY_DEPTH),
        searchAccount: optionalAddress(raw, "searchAccount"),
        spender: optionalAddress(raw, "spender"),
        holdersFile: optionalString(raw, "holdersFile"),
        holdersUrl: optionalString(raw, "holdersUrl"),
    };
}

export function loadConfig(path: string = CONFIG_PATH): SlotFinderConfig {
    if (cachedConfig) return cachedConfig;
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
    }
    cachedConfig = parseConfig(raw);
    return cachedConfig;
}
