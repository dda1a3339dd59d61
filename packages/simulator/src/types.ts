/**
 * Shared types for the simulator package
 */

import type { Address, BackendType, FindSlotsResult, NotFoundReason, ProxyType, Role } from "@token-slots/finder";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface SlotFinderConfig {
    rpcUrl: string;
    chainId: number;
    backend: BackendType;
    requestTimeoutMs: number;
    concurrency: number;
    maxProxyDepth: number;
    searchAccount?: Address;
    spender?: Address;
    /** JSON file mapping token address to known holders */
    holdersFile?: string;
    /** Same as holdersFile, fetched over HTTP */
    holdersUrl?: string;
}

/** Known holders per token, keyed by lowercase token address */
export type HoldersMap = Record<string, Address[]>;

/**
 * Outcome of simulating `transferFrom(owner, recipient, amount)` with
 * balance and allowance set through the discovered slots.
 *
 * A token is "complex" when that is not enough to move funds, for example
 * because transfers also depend on other state.
 */
export interface TransferCheck {
    token: Address;
    owner: Address;
    recipient: Address;
    amount: bigint;
    complex: boolean;
    reason?: string;
}

export interface TokenReport {
    result: FindSlotsResult;
    transfer?: TransferCheck;
}

// ============ Serialized (JSON-safe) types ============

export interface SerializedProxyLink {
    proxy: string;
    implementation: string;
    method: ProxyType;
}

export type SerializedRoleResult =
    | {
          found: true;
          role: Role;
          contract: string;
          scheme: string;
          index: number;
          key: string;
          accessor: string;
          injected: string;
          compiler: string;
          proxyChain: SerializedProxyLink[];
      }
    | {
          found: false;
          role: Role;
          reason: NotFoundReason;
          contract?: string;
          proxyChain: SerializedProxyLink[];
      };

export interface SerializedTransferCheck {
    owner: string;
    recipient: string;
    amount: string;
    complex: boolean;
    reason?: string;
}

export interface SerializedTokenReport {
    token: string;
    account: { address: string; balance: string };
    spender?: string;
    compiler: string;
    balance?: SerializedRoleResult;
    allowance?: SerializedRoleResult;
    transfer?: SerializedTransferCheck;
}
