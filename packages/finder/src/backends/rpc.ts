/**
 * Any node that honours `eth_call` state overrides (geth, erigon, reth, most
 * hosted endpoints). Read-only: storage is never written.
 */

import { JsonRpcBackend } from "./json-rpc.js";
import type { BackendType } from "./types.js";

export class RpcBackend extends JsonRpcBackend {
  readonly name: BackendType = "rpc";
  readonly supportsCallOverrides = true;
  protected readonly setStorageMethod = null;
}
