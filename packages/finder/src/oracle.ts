/**
 * Override-and-verify oracle
 *
 * A candidate key is confirmed when overriding it with a probe value makes the
 * token's accessor return exactly that value.
 */

import { Interface, toBeHex } from "ethers";
import type { ChainBackend } from "./backends/types.js";
import { RequestTimeoutError, RpcCallError, TransportError, errorMessage } from "./errors.js";
import { KeyedLock } from "./lock.js";
import { getWord } from "./lib/evm-proxy-detection/utils.js";
import type { BlockTag } from "./lib/evm-proxy-detection/types.js";
import { logger } from "./logger.js";
import type { Accessor, Address, Hex, Role } from "./types.js";

export const tokenInterface = new Interface([
  "function balanceOf(address account) view returns (uint256)",
  "function principalBalanceOf(address account) view returns (uint256)",
  "function allowance(address owner, address spender) view returns (uint256)",
  "function transferFrom(address from, address to, uint256 amount) returns (bool)",
]);

/** One accessor invocation against the token entry address */
export interface AccessorCall {
  token: Address;
  accessor: Accessor;
  account: Address;
  spender?: Address;
}

/** `eth_call` state override: address → { stateDiff: key → 32-byte word } */
export type StateOverride = Record<string, { stateDiff: Record<string, Hex> }>;

export interface VerifyRequest extends AccessorCall {
  /** Contract whose storage receives the probe */
  contract: Address;
  key: Hex;
  injected: bigint;
  role: Role;
}

function encodeAccessorCall(call: AccessorCall): Hex {
  if (call.accessor === "allowance") {
    if (!call.spender) {
      throw new Error("allowance() needs a spender");
    }
    return tokenInterface.encodeFunctionData("allowance", [call.account, call.spender]) as Hex;
  }
  return tokenInterface.encodeFunctionData(call.accessor, [call.account]) as Hex;
}

/**
 * Call an accessor and decode its uint256 result.
 *
 * @throws RpcCallError when the call reverts or returns something other than a uint256
 */
export async function readAccessor(
  backend: ChainBackend,
  call: AccessorCall,
  override?: StateOverride,
  blockTag: BlockTag = "latest"
): Promise<bigint> {
  const tx = { to: call.token, data: encodeAccessorCall(call) };
  const params: unknown[] = override ? [tx, blockTag, override] : [tx, blockTag];
  const output = await backend.request({ method: "eth_call", params });
  if (typeof output !== "string" || output === "0x") {
    throw new RpcCallError(`${call.accessor}() returned no data`, "eth_call");
  }
  try {
    const [value] = tokenInterface.decodeFunctionResult(call.accessor, output);
    if (typeof value !== "bigint") {
      throw new Error(`unexpected ${typeof value}`);
    }
    return value;
  } catch (err) {
    throw new RpcCallError(`${call.accessor}() output is not a uint256: ${errorMessage(err)}`, "eth_call", {
      cause: err,
    });
  }
}

export class OverrideOracle {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly backend: ChainBackend,
    private readonly blockTag: BlockTag = "latest"
  ) {}

  /**
   * Whether overriding `key` at `contract` with `injected` makes the accessor
   * return `injected`. Reverts, undecodable output and timeouts count as
   * not verified; other transport failures are rethrown.
   */
  async verify(req: VerifyRequest): Promise<boolean> {
    try {
      const observed = this.backend.supportsCallOverrides
        ? await this.callWithOverride(req)
        : await this.callWithWrittenStorage(req);
      return observed === req.injected;
    } catch (err) {
      if (err instanceof RpcCallError || err instanceof RequestTimeoutError) {
        logger.trace({ contract: req.contract, key: req.key, err: errorMessage(err) }, "probe failed");
        return false;
      }
      throw err;
    }
  }

  private callWithOverride(req: VerifyRequest): Promise<bigint> {
    const override: StateOverride = {
      [req.contract]: { stateDiff: { [req.key]: toBeHex(req.injected, 32) as Hex } },
    };
    return readAccessor(this.backend, req, override, this.blockTag);
  }

  // Storage is shared by every caller of this contract until restored, hence the lock
  private callWithWrittenStorage(req: VerifyRequest): Promise<bigint> {
    return this.lock.runExclusive(req.contract.toLowerCase(), async () => {
      const original = await getWord(this.backend.request, req.contract, req.key, this.blockTag);
      await this.backend.setStorageAt(req.contract, req.key, toBeHex(req.injected, 32) as Hex);
      try {
        return await readAccessor(this.backend, req, undefined, this.blockTag);
      } finally {
        await this.restore(req, original);
      }
    });
  }

  private async restore(req: VerifyRequest, original: Hex): Promise<void> {
    try {
      await this.backend.setStorageAt(req.contract, req.key, original);
    } catch (err) {
      // A failed restore leaves the node modified: a transport failure, not a probe miss
      throw new TransportError(
        `Failed to restore ${req.key} at ${req.contract}: ${errorMessage(err)}`,
        "setStorageAt",
        { cause: err }
      );
    }
  }
}
