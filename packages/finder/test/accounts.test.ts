import { describe, it, expect } from "vitest";
import { DEFAULT_SEARCH_ACCOUNT, selectAccount } from "../src/accounts.js";
import { RpcCallError, TransportError } from "../src/errors.js";
import { FakeChain, SOLIDITY_CODE, addr } from "./helpers/fake-chain.js";
import { getAddress } from "ethers";

const token = addr(0x70);
const empty = addr(0x10);
const rich = addr(0x20);
const richer = addr(0x30);

function chainWithHolders(): FakeChain {
  return new FakeChain()
    .deploy(token, { code: SOLIDITY_CODE, token: { layout: "solidity", balances: 0n } })
    .setBalance(token, rich, 5n)
    .setBalance(token, richer, 9n);
}

describe("selectAccount", () => {
  it("prefers the first holder with a non-zero balance", async () => {
    const chain = chainWithHolders();
    await expect(selectAccount(chain, token, { holders: [empty, rich, richer] })).resolves.toEqual({
      address: rich,
      balance: 5n,
    });
  });

  it("uses an explicit account even with a zero balance", async () => {
    const chain = chainWithHolders();
    await expect(selectAccount(chain, token, { account: empty, holders: [rich] })).resolves.toEqual({
      address: empty,
      balance: 0n,
    });
  });

  it("falls back to the placeholder when every holder is empty", async () => {
    const chain = chainWithHolders();
    await expect(selectAccount(chain, token, { holders: [empty] })).resolves.toEqual({
      address: getAddress(DEFAULT_SEARCH_ACCOUNT),
      balance: 0n,
    });
    await expect(selectAccount(chain, token, { fallback: richer })).resolves.toEqual({
      address: richer,
      balance: 9n,
    });
  });

  it("skips holders whose balanceOf reverts", async () => {
    const chain = new FakeChain({
      failWith: (args) =>
        args.method === "eth_call" && JSON.stringify(args.params).includes(rich.slice(2).toLowerCase())
          ? new RpcCallError("execution reverted", args.method)
          : undefined,
    })
      .deploy(token, { code: SOLIDITY_CODE, token: { layout: "solidity", balances: 0n } })
      .setBalance(token, rich, 5n)
      .setBalance(token, richer, 9n);

    await expect(selectAccount(chain, token, { holders: [rich, richer] })).resolves.toEqual({
      address: richer,
      balance: 9n,
    });
  });

  it("gives up on transport failures", async () => {
    const chain = new FakeChain({
      failWith: (args) => (args.method === "eth_call" ? new TransportError("rate limited", args.method) : undefined),
    }).deploy(token, { code: SOLIDITY_CODE, token: { layout: "solidity", balances: 0n } });

    await expect(selectAccount(chain, token, { holders: [rich] })).rejects.toBeInstanceOf(TransportError);
  });
});
