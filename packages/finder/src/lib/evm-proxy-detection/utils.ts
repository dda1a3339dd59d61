import { getAddress, id } from "ethers"; // v6
import { TransportError } from "../../errors.js";
import type { Address, Hex } from "../../types.js";
import { type EIP1193ProviderRequestFunc, type BlockTag } from "./types.js";

const zeroAddress = "0x" + "0".repeat(40);

export const readAddress = (value: unknown): Address => {
  if (typeof value !== "string" || value === "0x") {
    throw new Error(`Invalid address value: ${value}`);
  }

  let address = value;
  if (address.length > 42) {
    address = "0x" + address.slice(-40);
  }

  if (address.toLowerCase() === zeroAddress) {
    throw new Error("Empty address");
  }

  return getAddress(address) as Address;
};

export async function getWord(
  req: EIP1193ProviderRequestFunc,
  addr: Address,
  slot: Hex,
  blockTag: BlockTag
): Promise<Hex> {
  const word = await req({ method: "eth_getStorageAt", params: [addr, slot, blockTag] });
  if (typeof word !== "string" || !word.startsWith("0x") || word.length !== 66)
    throw new Error("bad storage word");
  return word as Hex;
}

export async function getCode(
  req: EIP1193ProviderRequestFunc,
  addr: Address,
  blockTag: BlockTag
): Promise<Hex> {
  const code = await req({ method: "eth_getCode", params: [addr, blockTag] });
  if (typeof code !== "string" || !code.startsWith("0x")) throw new Error("bad code");
  return code as Hex;
}

/**
 * Outcome of a scheme whose probe failed. Transport failures are not a
 * "no" from the chain and must reach the caller.
 */
export function notDetected(err: unknown): null {
  if (err instanceof TransportError) throw err;
  return null;
}

/** Call a zero-argument getter and read the returned word as an address */
export async function callAddress(
  req: EIP1193ProviderRequestFunc,
  to: Address,
  signature: string,
  blockTag: BlockTag
): Promise<Address> {
  const data = id(signature).slice(0, 10);
  return readAddress(await req({ method: "eth_call", params: [{ to, data }, blockTag] }));
}
