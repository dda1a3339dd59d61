import { ProxyType, type DetectionScheme } from "../types.js";
import { callAddress, notDetected } from "../utils.js";

/** EIP-897 `implementation()` */
export const eip897Scheme: DetectionScheme = {
  name: "EIP-897 DelegateProxy",
  detect: async (proxyAddress, jsonRpcRequest, blockTag) => {
    const target = await callAddress(jsonRpcRequest, proxyAddress, "implementation()", blockTag).catch(notDetected);
    return target ? { target, type: ProxyType.Eip897, accessor: "implementation()" } : null;
  },
};

/**
 * Getters that token front-ends use to point at the contract holding their
 * state: Synthetix-style `target()` -> `tokenState()` and Gemini dollar's
 * `erc20Impl()` -> `erc20Store()`. Tried in order, first non-zero wins.
 */
const TOKEN_ACCESSORS = ["target()", "tokenState()", "erc20Impl()", "erc20Store()"];

export const tokenAccessorScheme: DetectionScheme = {
  name: "Token state accessor",
  detect: async (proxyAddress, jsonRpcRequest, blockTag) => {
    for (const signature of TOKEN_ACCESSORS) {
      try {
        const target = await callAddress(jsonRpcRequest, proxyAddress, signature, blockTag);
        return { target, type: ProxyType.TokenAccessor, accessor: signature };
      } catch (err) {
        notDetected(err);
      }
    }
    return null;
  },
};
