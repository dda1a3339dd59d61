/**
 * Tenderly virtual testnet
 */

import { JsonRpcBackend } from "./json-rpc.js";
import type { BackendType } from "./types.js";

export class TenderlyBackend extends JsonRpcBackend {
  readonly name: BackendType = "tenderly";
  readonly supportsCallOverrides = true;
  protected readonly setStorageMethod = "tenderly_setStorageAt";
}
