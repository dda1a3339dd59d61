import { ProxyType, type DetectionScheme } from "../types.js";
import { notDetected } from "../utils.js";
import { parseMinimalProxy } from "../../../bytecode.js";

export const minimalProxyScheme: DetectionScheme = {
  name: "EIP-1167 minimal proxy",
  detect: async (proxyAddress, _jsonRpcRequest, _blockTag, loadCode) => {
    try {
      const target = parseMinimalProxy(await loadCode(proxyAddress));
      return target ? { target, type: ProxyType.Eip1167 } : null;
    } catch (err) {
      return notDetected(err);
    }
  },
};
