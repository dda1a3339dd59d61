/**
 * Backend factory and exports
 */

export type { ChainBackend, BackendType, BackendOptions } from "./types.js";
export { BACKEND_TYPES } from "./types.js";

export { JsonRpcBackend, DEFAULT_REQUEST_TIMEOUT_MS } from "./json-rpc.js";
export { AnvilBackend } from "./anvil.js";
export { TenderlyBackend } from "./tenderly.js";
export { GanacheBackend } from "./ganache.js";
export { RpcBackend } from "./rpc.js";

import type { BackendOptions, BackendType } from "./types.js";
import type { JsonRpcBackend } from "./json-rpc.js";
import { AnvilBackend } from "./anvil.js";
import { TenderlyBackend } from "./tenderly.js";
import { GanacheBackend } from "./ganache.js";
import { RpcBackend } from "./rpc.js";

/**
 * Create a backend instance
 *
 * @param type - Backend type ("rpc", "anvil", "tenderly" or "ganache")
 */
export function createBackend(type: BackendType, options: BackendOptions): JsonRpcBackend {
  switch (type) {
    case "rpc":
      return new RpcBackend(options);
    case "anvil":
      return new AnvilBackend(options);
    case "tenderly":
      return new TenderlyBackend(options);
    case "ganache":
      return new GanacheBackend(options);
    default:
      throw new Error(`Unknown backend type: ${type}`);
  }
}
