import type { Address, Hex } from "../../types.js";

export enum ProxyType {
  Eip1167 = "Eip1167",
  Eip1967Direct = "Eip1967Direct",
  Eip1967Beacon = "Eip1967Beacon",
  OpenZeppelin = "OpenZeppelin",
  Eip1822 = "Eip1822",
  Eip897 = "Eip897",
  TokenAccessor = "TokenAccessor",
}

export interface Result {
  target: Address;
  type: ProxyType;
  /** Public function that exposed the target, for accessor-based schemes */
  accessor?: string;
}

export type Resolution =
  | { kind: "resolved"; result: Result }
  | { kind: "unresolvable"; reason: "not-a-proxy" | "private-implementation" };

export type BlockTag = number | "earliest" | "latest" | "pending";

export interface RequestArguments {
  method: string;
  params: unknown[];
}

export type EIP1193ProviderRequestFunc = (args: RequestArguments) => Promise<unknown>;

/** Runtime bytecode of an address, possibly from a cache the caller keeps */
export type CodeLoader = (address: Address) => Promise<Hex>;

export type DetectionFunction = (
  proxyAddress: Address,
  jsonRpcRequest: EIP1193ProviderRequestFunc,
  blockTag: BlockTag,
  loadCode: CodeLoader
) => Promise<Result | null>;

export interface DetectionScheme {
  name: string;
  detect: DetectionFunction;
}
