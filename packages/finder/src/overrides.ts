import { toBeHex } from "ethers";
import { candidateKey, getScheme } from "./layouts.js";
import type { StateOverride } from "./oracle.js";
import type { Address, Hex, RoleResult, VerifiedSlot } from "./types.js";

export type { StateOverride } from "./oracle.js";

export interface StorageOverrideRequest {
  balance?: RoleResult;
  allowance?: RoleResult;
  /** Account whose balance (and allowance, as owner) is set */
  owner: Address;
  spender?: Address;
  amount: bigint;
}

/**
 * Turn slots found for one account into an `eth_call` state override that
 * gives any other owner (and spender) `amount`. Keys are re-derived from the
 * slot's scheme and declared index; roles that were not found are left out.
 */
export function buildStorageOverrides(request: StorageOverrideRequest): StateOverride {
  const overrides: StateOverride = {};
  const value = toBeHex(request.amount, 32) as Hex;

  const put = (slot: VerifiedSlot, key: Hex) => {
    const entry = (overrides[slot.contract] ??= { stateDiff: {} });
    entry.stateDiff[key] = value;
  };

  const { balance, allowance } = request;
  if (balance?.found === true) {
    const slot = balance;
    put(slot, candidateKey(getScheme(slot.scheme), slot.index, "balance", { owner: request.owner }));
  }
  if (allowance?.found === true) {
    if (!request.spender) {
      throw new Error("An allowance override needs a spender");
    }
    const slot = allowance;
    put(
      slot,
      candidateKey(getScheme(slot.scheme), slot.index, "allowance", {
        owner: request.owner,
        spender: request.spender,
      })
    );
  }
  return overrides;
}
