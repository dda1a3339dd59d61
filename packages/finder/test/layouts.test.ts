import { describe, it, expect } from "vitest";
import { toBeHex } from "ethers";
import {
  LAYOUT_CATALOG,
  OPENZEPPELIN_ERC20_NAMESPACE,
  candidateKey,
  generateCandidates,
  getScheme,
  schemesFor,
} from "../src/layouts.js";
import { OZ_ERC20_STORAGE_LOCATION, addr, mappingSlot } from "./helpers/fake-chain.js";

const owner = addr(0xa11ce);
const spender = addr(0xb0b);

const ids = (schemes: { id: string }[]) => schemes.map((s) => s.id);

describe("layout catalog", () => {
  it("derives the OpenZeppelin ERC20 namespace root", () => {
    expect(OPENZEPPELIN_ERC20_NAMESPACE).toBe(toBeHex(OZ_ERC20_STORAGE_LOCATION, 32));
  });

  it("keys Solidity mappings as keccak256(key . slot)", () => {
    const key = candidateKey(getScheme("solidity-mapping"), 3, "balance", { owner });
    expect(BigInt(key)).toBe(mappingSlot("solidity", 3n, owner));
  });

  it("keys Vyper hash maps as keccak256(slot . key)", () => {
    const key = candidateKey(getScheme("vyper-hashmap"), 3, "balance", { owner });
    expect(BigInt(key)).toBe(mappingSlot("vyper", 3n, owner));
    expect(BigInt(key)).not.toBe(mappingSlot("solidity", 3n, owner));
  });

  it("nests allowance keys one level deeper", () => {
    const key = candidateKey(getScheme("solidity-mapping"), 4, "allowance", { owner, spender });
    expect(BigInt(key)).toBe(mappingSlot("solidity", mappingSlot("solidity", 4n, owner), spender));

    const vyperKey = candidateKey(getScheme("vyper-hashmap"), 4, "allowance", { owner, spender });
    expect(BigInt(vyperKey)).toBe(mappingSlot("vyper", mappingSlot("vyper", 4n, owner), spender));
  });

  it("roots ERC-7201 candidates at the namespace", () => {
    const key = candidateKey(getScheme("erc7201-openzeppelin"), 1, "allowance", { owner, spender });
    const outer = mappingSlot("solidity", OZ_ERC20_STORAGE_LOCATION + 1n, owner);
    expect(BigInt(key)).toBe(mappingSlot("solidity", outer, spender));
  });

  it("needs a spender for allowance keys", () => {
    expect(() => candidateKey(getScheme("solidity-mapping"), 0, "allowance", { owner })).toThrow(
      "Allowance keys need a spender"
    );
  });
});

describe("generateCandidates", () => {
  it("yields index-ascending candidates and the same keys every time", () => {
    const scheme = getScheme("solidity-mapping");
    const first = [...generateCandidates(scheme, "balance", { owner }, 5)];
    const second = [...generateCandidates(scheme, "balance", { owner }, 5)];
    expect(first.map((c) => c.index)).toEqual([0, 1, 2, 3, 4]);
    expect(second).toEqual(first);
    expect(first[2]).toEqual({
      scheme: "solidity-mapping",
      index: 2,
      key: toBeHex(mappingSlot("solidity", 2n, owner), 32),
      role: "balance",
    });
  });

  it("never exceeds the scheme's own maximum", () => {
    expect([...generateCandidates(getScheme("solidity-mapping"), "balance", { owner })]).toHaveLength(310);
    expect([...generateCandidates(getScheme("vyper-hashmap"), "balance", { owner }, 1000)]).toHaveLength(100);
    expect([...generateCandidates(getScheme("erc7201-openzeppelin"), "balance", { owner })]).toHaveLength(8);
  });
});

describe("schemesFor", () => {
  it("puts the detected compiler's schemes first", () => {
    expect(ids(schemesFor({ kind: "known", compiler: "solidity", source: "metadata" }))).toEqual([
      "solidity-mapping",
      "erc7201-openzeppelin",
      "vyper-hashmap",
    ]);
    expect(ids(schemesFor({ kind: "known", compiler: "vyper", source: "prefix" }))).toEqual([
      "vyper-hashmap",
      "solidity-mapping",
      "erc7201-openzeppelin",
    ]);
  });

  it("tries the whole catalog for unknown code", () => {
    expect(ids(schemesFor({ kind: "unknown" }))).toEqual(ids([...LAYOUT_CATALOG]));
  });
});
