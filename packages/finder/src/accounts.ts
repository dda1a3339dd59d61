import { getAddress } from "ethers";
import type { ChainBackend } from "./backends/types.js";
import { RequestTimeoutError, RpcCallError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { readAccessor } from "./oracle.js";
import type { Account, Address } from "./types.js";

/** Placeholder owner used when no holder of the token is known */
export const DEFAULT_SEARCH_ACCOUNT: Address = "0x00000000000000000000000000000000000a11ce";
/** Placeholder spender for allowance searches */
export const DEFAULT_SPENDER: Address = "0x000000000000000000000000000000000000b0b0";

/**
 * Which account a search reads balances and allowances for.
 *
 * Rebasing and share-based tokens can report zero for an empty account even
 * when the right slot is overridden, so a holder with a non-zero balance is
 * preferred over the placeholder.
 */
export interface SearchAccountPolicy {
  /** Use this account unconditionally */
  account?: Address;
  /** Known holders of the token, tried in order */
  holders?: readonly Address[];
  /** Used when no holder has a balance; defaults to {@link DEFAULT_SEARCH_ACCOUNT} */
  fallback?: Address;
  /** Spender for allowance searches; defaults to {@link DEFAULT_SPENDER} */
  spender?: Address;
}

export async function selectAccount(
  backend: ChainBackend,
  token: Address,
  policy: SearchAccountPolicy = {}
): Promise<Account> {
  if (policy.account) {
    const address = getAddress(policy.account) as Address;
    return { address, balance: await balanceOrZero(backend, token, address) };
  }

  for (const holder of policy.holders ?? []) {
    const address = getAddress(holder) as Address;
    let balance: bigint;
    try {
      balance = await readAccessor(backend, { token, accessor: "balanceOf", account: address });
    } catch (err) {
      if (!(err instanceof RpcCallError || err instanceof RequestTimeoutError)) throw err;
      logger.warn({ token, holder: address, err: errorMessage(err) }, "Skipping holder, balanceOf failed");
      continue;
    }
    if (balance > 0n) {
      logger.debug({ token, holder: address, balance: balance.toString() }, "Selected holder");
      return { address, balance };
    }
  }

  const address = getAddress(policy.fallback ?? DEFAULT_SEARCH_ACCOUNT) as Address;
  return { address, balance: await balanceOrZero(backend, token, address) };
}

async function balanceOrZero(backend: ChainBackend, token: Address, account: Address): Promise<bigint> {
  try {
    return await readAccessor(backend, { token, accessor: "balanceOf", account });
  } catch (err) {
    if (err instanceof RpcCallError) return 0n;
    throw err;
  }
}
