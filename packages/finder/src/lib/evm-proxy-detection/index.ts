import { logger } from "../../logger.js";
import type { Address } from "../../types.js";
import { hasOpcode, DELEGATECALL } from "../../bytecode.js";
import {
  type BlockTag,
  type CodeLoader,
  type EIP1193ProviderRequestFunc,
  type DetectionScheme,
  type Resolution,
} from "./types.js";
import { getCode } from "./utils.js";
import { minimalProxyScheme } from "./schemes/minimal-proxy.js";
import { eip1967BeaconScheme, storagePointerSchemes } from "./schemes/storage-pointers.js";
import { eip897Scheme, tokenAccessorScheme } from "./schemes/accessor-pointers.js";

// Bytecode pattern first, then standardized storage slots, then public getters.
const detections: DetectionScheme[] = [
  minimalProxyScheme,
  ...storagePointerSchemes,
  eip1967BeaconScheme,
  eip897Scheme,
  tokenAccessorScheme,
];

/**
 * Find the contract a token forwards to. Schemes run one after another so that
 * the outcome does not depend on which RPC answers first. Bytecode is read
 * through `loadCode` when given, so a caller's cache is reused.
 */
const resolveProxy = async (
  proxyAddress: Address,
  jsonRpcRequest: EIP1193ProviderRequestFunc,
  blockTag: BlockTag = "latest",
  loadCode?: CodeLoader
): Promise<Resolution> => {
  const codeOf: CodeLoader = loadCode ?? ((address) => getCode(jsonRpcRequest, address, blockTag));
  for (const { name, detect } of detections) {
    logger.trace({ proxy: name, address: proxyAddress }, "detection start");
    const result = await detect(proxyAddress, jsonRpcRequest, blockTag, codeOf);
    if (result !== null) {
      logger.debug({ proxy: name, address: proxyAddress, target: result.target }, "proxy detected");
      return { kind: "resolved", result };
    }
    logger.trace({ proxy: name, address: proxyAddress }, "detection unsuccessful");
  }

  const code = await codeOf(proxyAddress);
  return {
    kind: "unresolvable",
    reason: hasOpcode(code, DELEGATECALL) ? "private-implementation" : "not-a-proxy",
  };
};

export default resolveProxy;
export { resolveProxy };
export { ProxyType } from "./types.js";
export type { Resolution, Result as ProxyDetection, BlockTag, CodeLoader, EIP1193ProviderRequestFunc } from "./types.js";
