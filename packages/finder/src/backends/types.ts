/**
 * Backend interface for the node the search runs against (Anvil, Tenderly, ...)
 *
 * Backends differ in how a storage word can be replaced for the duration of a
 * probe: most accept a state override on `eth_call`, older ones only offer a
 * method that writes storage for real.
 */

import type { EIP1193ProviderRequestFunc } from "../lib/evm-proxy-detection/types.js";
import type { Address, Hex } from "../types.js";

export type BackendType = "rpc" | "anvil" | "tenderly" | "ganache";

export const BACKEND_TYPES: readonly BackendType[] = ["rpc", "anvil", "tenderly", "ganache"];

/**
 * Options for connecting to a backend
 */
export interface BackendOptions {
  rpcUrl: string;
  /** Chain id of the node; fixed up front so that no network detection runs */
  chainId?: number;
  /** Timeout applied to every JSON-RPC request */
  requestTimeoutMs?: number;
}

export interface ChainBackend {
  /** Backend identifier */
  readonly name: BackendType;

  /**
   * Whether `eth_call` accepts a third, state-override argument
   *
   * When false, probes write storage through {@link ChainBackend.setStorageAt}
   * and restore it afterwards.
   */
  readonly supportsCallOverrides: boolean;

  /**
   * Raw JSON-RPC access
   *
   * Rejects with `TransportError` when the node cannot be reached or times out
   * and with `RpcCallError` when the node answers with an error.
   */
  readonly request: EIP1193ProviderRequestFunc;

  /**
   * Set storage at a specific slot
   *
   * Anvil: anvil_setStorageAt
   * Tenderly: tenderly_setStorageAt
   * Ganache: evm_setAccountStorageAt
   *
   * @param value - Value to set (hex string, 32 bytes)
   */
  setStorageAt(address: Address, slot: Hex, value: Hex): Promise<void>;
}
