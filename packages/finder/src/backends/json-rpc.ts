import { FetchRequest, JsonRpcProvider, isError } from "ethers";
import { RequestTimeoutError, RpcCallError, TransportError, errorMessage } from "../errors.js";
import type { RequestArguments } from "../lib/evm-proxy-detection/types.js";
import type { Address, Hex } from "../types.js";
import type { BackendOptions, BackendType, ChainBackend } from "./types.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Shared JSON-RPC plumbing; subclasses only name the storage-writing method.
 */
export abstract class JsonRpcBackend implements ChainBackend {
  abstract readonly name: BackendType;
  abstract readonly supportsCallOverrides: boolean;
  /** RPC method that writes a storage word, or null when the node has none */
  protected abstract readonly setStorageMethod: string | null;

  protected readonly provider: JsonRpcProvider;
  private readonly timeoutMs: number;

  constructor(options: BackendOptions) {
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const fetchRequest = new FetchRequest(options.rpcUrl);
    fetchRequest.timeout = this.timeoutMs;
    this.provider = new JsonRpcProvider(fetchRequest, options.chainId ?? 1, {
      staticNetwork: true,
      batchMaxCount: 1,
    });
  }

  readonly request = async ({ method, params }: RequestArguments): Promise<unknown> => {
    try {
      return await this.provider.send(method, params);
    } catch (err) {
      throw this.classify(method, err);
    }
  };

  async setStorageAt(address: Address, slot: Hex, value: Hex): Promise<void> {
    if (!this.setStorageMethod) {
      throw new Error(`Backend ${this.name} cannot write storage`);
    }
    await this.request({ method: this.setStorageMethod, params: [address, slot, value] });
  }

  destroy(): void {
    this.provider.destroy();
  }

  // Only an answer from the node is a call error; anything else means the node was not reached
  private classify(method: string, err: unknown): Error {
    if (isError(err, "TIMEOUT")) {
      return new RequestTimeoutError(method, this.timeoutMs, { cause: err });
    }
    if (isError(err, "CALL_EXCEPTION") || hasNodeError(err)) {
      return new RpcCallError(`${method} failed: ${errorMessage(err)}`, method, { cause: err });
    }
    return new TransportError(`${method} failed: ${errorMessage(err)}`, method, { cause: err });
  }
}

function isJsonRpcError(value: unknown): boolean {
  return typeof value === "object" && value !== null && "code" in value && typeof value.code === "number";
}

/** ethers keeps the node's JSON-RPC `error` object on the error itself or under `info` */
function hasNodeError(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("code" in err) || typeof err.code !== "string") {
    return false;
  }
  if ("error" in err && isJsonRpcError(err.error)) {
    return true;
  }
  return "info" in err && typeof err.info === "object" && err.info !== null && "error" in err.info
    ? isJsonRpcError(err.info.error)
    : false;
}
