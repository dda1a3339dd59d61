import type { ProxyType } from "./lib/evm-proxy-detection/types.js";

export type Address = `0x${string}`;
export type Hex = `0x${string}`;

/** Which token variable a slot holds. */
export type Role = "balance" | "allowance";

export const ROLES: readonly Role[] = ["balance", "allowance"];

export type Compiler = "solidity" | "vyper";

/**
 * Result of inspecting deployed bytecode. `source` records whether the
 * identity came from the CBOR metadata trailer or from a creation prefix.
 */
export type CompilerInfo =
  | { kind: "known"; compiler: Compiler; version?: string; source: "metadata" | "prefix" }
  | { kind: "unknown" };

export type LayoutSchemeId = "solidity-mapping" | "vyper-hashmap" | "erc7201-openzeppelin";

/**
 * How a compiler (or a storage convention) places the entries of a
 * `mapping(address => ...)` declared at some index.
 */
export interface LayoutScheme {
  readonly id: LayoutSchemeId;
  /** Compilers whose detection makes this scheme the fast path */
  readonly compilers: readonly Compiler[];
  /** Declared indices tried are `0 .. maxIndex - 1` */
  readonly maxIndex: number;
  /** Storage word that holds the mapping itself for a declared index */
  baseSlot(index: number): Hex;
  /** Storage key of `mapping[key]` for a mapping rooted at `base` */
  mappingKey(base: Hex, key: Address): Hex;
}

export type Accessor = "balanceOf" | "principalBalanceOf" | "allowance";

export interface SlotCandidate {
  scheme: LayoutSchemeId;
  index: number;
  key: Hex;
  role: Role;
}

export interface ProxyLink {
  proxy: Address;
  implementation: Address;
  method: ProxyType;
}

export interface VerifiedSlot extends SlotCandidate {
  found: true;
  /** Entry address whose accessor reproduced the injected value */
  token: Address;
  /** Contract whose storage holds the slot */
  contract: Address;
  accessor: Accessor;
  injected: bigint;
  /** Value the accessor returned under the override; equals `injected` */
  observed: bigint;
  compiler: CompilerInfo;
  proxyChain: ProxyLink[];
}

export type NotFoundReason =
  | "ProxyUnresolvable"
  | "CycleDetected"
  | "DepthExceeded"
  | "AccessorReverted"
  | "NoCode"
  | "Skipped"
  | "Cancelled";

export interface NotFound {
  found: false;
  role: Role;
  reason: NotFoundReason;
  /** Last contract searched, when the search got that far */
  contract?: Address;
  proxyChain: ProxyLink[];
}

export type RoleResult = VerifiedSlot | NotFound;

export interface Account {
  address: Address;
  balance: bigint;
}

export interface FindSlotsResult {
  token: Address;
  account: Account;
  spender?: Address;
  compiler: CompilerInfo;
  balance?: RoleResult;
  allowance?: RoleResult;
}
