/**
 * Ganache fork. Its `eth_call` ignores state overrides, so every probe goes
 * through `evm_setAccountStorageAt` under a per-contract lock.
 */

import { JsonRpcBackend } from "./json-rpc.js";
import type { BackendType } from "./types.js";

export class GanacheBackend extends JsonRpcBackend {
  readonly name: BackendType = "ganache";
  readonly supportsCallOverrides = false;
  protected readonly setStorageMethod = "evm_setAccountStorageAt";
}
