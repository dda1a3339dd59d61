/**
 * Anvil (and Hardhat-compatible) node, typically a local fork
 */

import { JsonRpcBackend } from "./json-rpc.js";
import type { BackendType } from "./types.js";

export class AnvilBackend extends JsonRpcBackend {
  readonly name: BackendType = "anvil";
  readonly supportsCallOverrides = true;
  protected readonly setStorageMethod = "anvil_setStorageAt";
}
