import { ProxyType, type DetectionScheme } from "../types.js";
import { callAddress, getWord, notDetected, readAddress } from "../utils.js";
import type { Hex } from "../../../types.js";

/** Proxies that keep their implementation address in a fixed storage word */
const POINTER_SLOTS: { name: string; type: ProxyType; slot: Hex }[] = [
  {
    name: "EIP-1967 direct proxy",
    type: ProxyType.Eip1967Direct,
    // bytes32(uint256(keccak256('eip1967.proxy.implementation')) - 1)
    slot: "0x360894a13ba1a3210667c828492db98dca3e2076cc3735a920a3ca505d382bbc",
  },
  {
    name: "OpenZeppelin proxy",
    type: ProxyType.OpenZeppelin,
    // keccak256("org.zeppelinos.proxy.implementation")
    slot: "0x7050c9e0f4ca769c69bd3a8ef740bc37934f8e2c036e5a723fd8ee048ed3f8c3",
  },
  {
    name: "EIP-1822 UUPS proxy",
    type: ProxyType.Eip1822,
    // keccak256("PROXIABLE")
    slot: "0xc5f16f0fcc639fa48a6947836d9850f504798523bf8c9a3a87d5876cf622bcf7",
  },
];

export const storagePointerSchemes: DetectionScheme[] = POINTER_SLOTS.map(({ name, type, slot }) => ({
  name,
  detect: async (proxyAddress, jsonRpcRequest, blockTag) => {
    try {
      const target = readAddress(await getWord(jsonRpcRequest, proxyAddress, slot, blockTag));
      return { target, type };
    } catch (err) {
      return notDetected(err);
    }
  },
}));

// bytes32(uint256(keccak256('eip1967.proxy.beacon')) - 1)
const EIP_1967_BEACON_SLOT: Hex = "0xa3f0ad74e5423aebfd80d3ef4346578335a9a72aeaee59ff6cb3582b35133d50";

// Some beacons name the getter childImplementation() so they do not look like EIP-897 proxies
const BEACON_GETTERS = ["implementation()", "childImplementation()"];

export const eip1967BeaconScheme: DetectionScheme = {
  name: "EIP-1967 beacon proxy",
  detect: async (proxyAddress, jsonRpcRequest, blockTag) => {
    const beacon = await getWord(jsonRpcRequest, proxyAddress, EIP_1967_BEACON_SLOT, blockTag)
      .then(readAddress)
      .catch(notDetected);
    if (!beacon) return null;
    for (const getter of BEACON_GETTERS) {
      try {
        const target = await callAddress(jsonRpcRequest, beacon, getter, blockTag);
        return { target, type: ProxyType.Eip1967Beacon };
      } catch (err) {
        notDetected(err);
      }
    }
    return null;
  },
};
