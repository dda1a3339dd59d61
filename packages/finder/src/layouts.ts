import { concat, id, keccak256, toBeHex, zeroPadValue } from "ethers";
import type { Address, CompilerInfo, Hex, LayoutScheme, LayoutSchemeId, Role, SlotCandidate } from "./types.js";

const pad32 = (v: string): Hex => zeroPadValue(v, 32) as Hex;

/** keccak256(abi.encode(uint256(keccak256(namespace)) - 1)) & ~bytes32(uint256(0xff)) */
export function erc7201Slot(namespace: string): Hex {
  const inner = BigInt(id(namespace)) - 1n;
  const outer = BigInt(keccak256(toBeHex(inner, 32)));
  return toBeHex(outer & ~0xffn, 32) as Hex;
}

/** Namespace root of OpenZeppelin v5 `ERC20Upgradeable`; balances at +0, allowances at +1. */
export const OPENZEPPELIN_ERC20_NAMESPACE = erc7201Slot("openzeppelin.storage.ERC20");

// mapping(address => T) at slot p: keccak256(abi.encode(key, p))
const solidityMappingKey = (base: Hex, key: Address): Hex =>
  keccak256(concat([pad32(key), base])) as Hex;

// HashMap[address, T] at slot p: keccak256(p ++ key)
const vyperHashMapKey = (base: Hex, key: Address): Hex =>
  keccak256(concat([base, pad32(key)])) as Hex;

const solidityMapping: LayoutScheme = {
  id: "solidity-mapping",
  compilers: ["solidity"],
  maxIndex: 310,
  baseSlot: (index) => toBeHex(index, 32) as Hex,
  mappingKey: solidityMappingKey,
};

const erc7201OpenZeppelin: LayoutScheme = {
  id: "erc7201-openzeppelin",
  compilers: ["solidity"],
  maxIndex: 8,
  baseSlot: (index) => toBeHex(BigInt(OPENZEPPELIN_ERC20_NAMESPACE) + BigInt(index), 32) as Hex,
  mappingKey: solidityMappingKey,
};

const vyperHashMap: LayoutScheme = {
  id: "vyper-hashmap",
  compilers: ["vyper"],
  maxIndex: 100,
  baseSlot: (index) => toBeHex(index, 32) as Hex,
  mappingKey: vyperHashMapKey,
};

/** Every supported scheme, in the order an exhaustive search tries them. */
export const LAYOUT_CATALOG: readonly LayoutScheme[] = [solidityMapping, erc7201OpenZeppelin, vyperHashMap];

export function getScheme(schemeId: LayoutSchemeId): LayoutScheme {
  const scheme = LAYOUT_CATALOG.find((s) => s.id === schemeId);
  if (!scheme) {
    throw new Error(`Unknown layout scheme: ${schemeId}`);
  }
  return scheme;
}

/**
 * Schemes to try for a contract: those of the detected compiler first, then
 * every other scheme. An unknown compiler gets the whole catalog.
 */
export function schemesFor(compiler: CompilerInfo): LayoutScheme[] {
  if (compiler.kind === "unknown") return [...LAYOUT_CATALOG];
  const preferred = LAYOUT_CATALOG.filter((s) => s.compilers.includes(compiler.compiler));
  return [...preferred, ...LAYOUT_CATALOG.filter((s) => !preferred.includes(s))];
}

export interface MappingKeys {
  owner: Address;
  spender?: Address;
}

/**
 * Storage key of `balances[owner]` or `allowances[owner][spender]` for a
 * mapping declared at `index`. The allowance key nests one hash deeper.
 */
export function candidateKey(scheme: LayoutScheme, index: number, role: Role, keys: MappingKeys): Hex {
  const outer = scheme.mappingKey(scheme.baseSlot(index), keys.owner);
  if (role === "balance") return outer;
  if (!keys.spender) {
    throw new Error("Allowance keys need a spender");
  }
  return scheme.mappingKey(outer, keys.spender);
}

/** Candidates for one scheme in ascending declared-index order. */
export function* generateCandidates(
  scheme: LayoutScheme,
  role: Role,
  keys: MappingKeys,
  maxIndex: number = scheme.maxIndex
): Generator<SlotCandidate> {
  const limit = Math.min(maxIndex, scheme.maxIndex);
  for (let index = 0; index < limit; index++) {
    yield { scheme: scheme.id, index, key: candidateKey(scheme, index, role, keys), role };
  }
}
