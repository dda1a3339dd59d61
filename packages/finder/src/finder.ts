/**
 * Slot search for ERC20-style tokens
 *
 * For each requested role the search walks every candidate key of every
 * layout scheme, fastest scheme first, and confirms a key by overriding it.
 * When the token's own storage yields nothing, the proxy resolver names the
 * contract that holds it and the search repeats there.
 */

import { getAddress } from "ethers";
import { DEFAULT_SEARCH_ACCOUNT, DEFAULT_SPENDER, type SearchAccountPolicy, selectAccount } from "./accounts.js";
import type { ChainBackend } from "./backends/types.js";
import { detectCompiler } from "./bytecode.js";
import { RpcCallError, errorMessage } from "./errors.js";
import { generateCandidates, schemesFor, type MappingKeys } from "./layouts.js";
import { resolveProxy } from "./lib/evm-proxy-detection/index.js";
import type { BlockTag } from "./lib/evm-proxy-detection/types.js";
import { getCode } from "./lib/evm-proxy-detection/utils.js";
import { logger } from "./logger.js";
import { OverrideOracle, readAccessor } from "./oracle.js";
import type {
  Accessor,
  Account,
  Address,
  CompilerInfo,
  FindSlotsResult,
  Hex,
  NotFound,
  NotFoundReason,
  ProxyLink,
  Role,
  RoleResult,
  VerifiedSlot,
} from "./types.js";
import { ROLES } from "./types.js";

/** Added to an accessor's current value to form the probe */
export const PROBE_DELTA = 1000n * 10n ** 18n;

/** Stand-in address many tools use for the chain's native currency */
export const NATIVE_TOKEN_PLACEHOLDER: Address = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

export const DEFAULT_MAX_PROXY_DEPTH = 4;
export const DEFAULT_CONCURRENCY = 8;

/** Accessors tried per role, in order. `principalBalanceOf` covers Aave v1 aTokens. */
export const ROLE_ACCESSORS: Record<Role, readonly Accessor[]> = {
  balance: ["balanceOf", "principalBalanceOf"],
  allowance: ["allowance"],
};

export interface FindSlotsOptions {
  /** Roles to search; both by default */
  roles?: readonly Role[];
  accountPolicy?: SearchAccountPolicy;
  /** Proxy hops followed per role */
  maxProxyDepth?: number;
  /** Caps every scheme's declared-index range */
  maxIndex?: number;
  /** Stop the remaining roles once one role is verified */
  firstMatchOnly?: boolean;
  signal?: AbortSignal;
  /** Addresses reported as `Skipped` without a single request */
  skip?: readonly Address[];
  blockTag?: BlockTag;
  /** Shared between searches of different tokens by {@link findSlotsForTokens} */
  oracle?: OverrideOracle;
}

export interface FindSlotsForTokensOptions extends FindSlotsOptions {
  /** Searches in flight at once */
  concurrency?: number;
  /** Known holders per token address (any casing) */
  holders?: Record<string, readonly Address[]>;
}

// Bytecode and compiler per contract, for one token's search
class TokenSession {
  private readonly code = new Map<string, Promise<Hex>>();
  private readonly compilers = new Map<string, CompilerInfo>();

  constructor(
    readonly backend: ChainBackend,
    readonly blockTag: BlockTag
  ) {}

  getCode(address: Address): Promise<Hex> {
    const key = address.toLowerCase();
    let code = this.code.get(key);
    if (!code) {
      code = getCode(this.backend.request, address, this.blockTag);
      this.code.set(key, code);
    }
    return code;
  }

  async compilerOf(address: Address): Promise<CompilerInfo> {
    const key = address.toLowerCase();
    const cached = this.compilers.get(key);
    if (cached) return cached;
    const compiler = detectCompiler(await this.getCode(address));
    logger.debug({ contract: address, compiler }, "Detected compiler");
    this.compilers.set(key, compiler);
    return compiler;
  }
}

interface Probe {
  accessor: Accessor;
  injected: bigint;
}

interface RoleSearch {
  session: TokenSession;
  oracle: OverrideOracle;
  token: Address;
  role: Role;
  keys: MappingKeys;
  maxProxyDepth: number;
  maxIndex?: number;
  signal: AbortSignal;
}

type DirectOutcome = { kind: "verified"; slot: VerifiedSlot } | { kind: "exhausted" } | { kind: "cancelled" };

function notFound(
  token: Address,
  role: Role,
  reason: NotFoundReason,
  proxyChain: ProxyLink[],
  contract?: Address
): NotFound {
  logger.warn({ token, role, reason, contract }, "Slot not found");
  return { found: false, role, reason, contract, proxyChain };
}

// Probe values are fixed once per search: starting value plus PROBE_DELTA
async function probesFor(search: RoleSearch): Promise<Probe[]> {
  const probes: Probe[] = [];
  for (const accessor of ROLE_ACCESSORS[search.role]) {
    if (search.signal.aborted) break;
    try {
      const current = await readAccessor(
        search.session.backend,
        { token: search.token, accessor, account: search.keys.owner, spender: search.keys.spender },
        undefined,
        search.session.blockTag
      );
      probes.push({ accessor, injected: current + PROBE_DELTA });
    } catch (err) {
      if (!(err instanceof RpcCallError)) throw err;
      logger.debug({ token: search.token, accessor, err: errorMessage(err) }, "Accessor unavailable");
    }
  }
  return probes;
}

async function searchDirect(
  search: RoleSearch,
  contract: Address,
  probes: Probe[],
  proxyChain: ProxyLink[]
): Promise<DirectOutcome> {
  const compiler = await search.session.compilerOf(contract);
  for (const { accessor, injected } of probes) {
    for (const scheme of schemesFor(compiler)) {
      logger.trace({ contract, role: search.role, accessor, scheme: scheme.id }, "Trying scheme");
      for (const candidate of generateCandidates(scheme, search.role, search.keys, search.maxIndex)) {
        if (search.signal.aborted) return { kind: "cancelled" };
        const verified = await search.oracle.verify({
          token: search.token,
          contract,
          key: candidate.key,
          injected,
          role: search.role,
          accessor,
          account: search.keys.owner,
          spender: search.keys.spender,
        });
        if (verified) {
          return {
            kind: "verified",
            slot: {
              ...candidate,
              found: true,
              token: search.token,
              contract,
              accessor,
              injected,
              observed: injected,
              compiler,
              proxyChain: [...proxyChain],
            },
          };
        }
      }
    }
  }
  return { kind: "exhausted" };
}

async function searchRole(search: RoleSearch): Promise<RoleResult> {
  const { token, role } = search;
  const proxyChain: ProxyLink[] = [];

  const probes = await probesFor(search);
  if (search.signal.aborted) {
    return notFound(token, role, "Cancelled", proxyChain, token);
  }
  if (probes.length === 0) {
    return notFound(token, role, "AccessorReverted", proxyChain, token);
  }

  const visited = new Set<string>([token.toLowerCase()]);
  let contract = token;
  for (;;) {
    const outcome = await searchDirect(search, contract, probes, proxyChain);
    if (outcome.kind === "verified") {
      logger.info(
        { token, role, contract, scheme: outcome.slot.scheme, index: outcome.slot.index, key: outcome.slot.key },
        "Slot verified"
      );
      return outcome.slot;
    }
    if (outcome.kind === "cancelled" || search.signal.aborted) {
      return notFound(token, role, "Cancelled", proxyChain, contract);
    }

    if (proxyChain.length >= search.maxProxyDepth) {
      return notFound(token, role, "DepthExceeded", proxyChain, contract);
    }
    const resolution = await resolveProxy(contract, search.session.backend.request, search.session.blockTag, (address) =>
      search.session.getCode(address)
    );
    if (resolution.kind === "unresolvable") {
      logger.debug({ contract, reason: resolution.reason }, "Proxy unresolvable");
      return notFound(token, role, "ProxyUnresolvable", proxyChain, contract);
    }

    const next = resolution.result.target;
    proxyChain.push({ proxy: contract, implementation: next, method: resolution.result.type });
    if (visited.has(next.toLowerCase())) {
      return notFound(token, role, "CycleDetected", proxyChain, next);
    }
    visited.add(next.toLowerCase());
    if ((await search.session.getCode(next)) === "0x") {
      return notFound(token, role, "NoCode", proxyChain, next);
    }
    logger.debug({ token, role, proxy: contract, implementation: next }, "Following proxy");
    contract = next;
  }
}

/**
 * Find the storage slots holding `token`'s balances and/or allowances.
 *
 * Never rejects for a slot that cannot be found: each requested role resolves
 * to a {@link VerifiedSlot} or a {@link NotFound} with its reason. Rejects with
 * `TransportError` when the node cannot be reached.
 */
export async function findSlots(
  backend: ChainBackend,
  tokenAddress: string,
  options: FindSlotsOptions = {}
): Promise<FindSlotsResult> {
  const token = getAddress(tokenAddress) as Address;
  const roles = options.roles ?? ROLES;
  const policy = options.accountPolicy ?? {};
  const blockTag = options.blockTag ?? "latest";
  const spender = roles.includes("allowance")
    ? (getAddress(policy.spender ?? DEFAULT_SPENDER) as Address)
    : undefined;

  const placeholder: Account = {
    address: getAddress(policy.account ?? policy.fallback ?? DEFAULT_SEARCH_ACCOUNT) as Address,
    balance: 0n,
  };
  const skipped = (options.skip ?? [NATIVE_TOKEN_PLACEHOLDER]).some((a) => a.toLowerCase() === token.toLowerCase());
  if (skipped) {
    return terminal(token, placeholder, spender, roles, "Skipped");
  }

  const session = new TokenSession(backend, blockTag);
  if ((await session.getCode(token)) === "0x") {
    return terminal(token, placeholder, spender, roles, "NoCode");
  }

  const account = await selectAccount(backend, token, policy);
  const compiler = await session.compilerOf(token);
  const oracle = options.oracle ?? new OverrideOracle(backend, blockTag);

  // Roles share one controller so that a verified or failed role can stop the others
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });
  if (options.signal?.aborted) controller.abort();

  try {
    const results = await Promise.all(
      roles.map(async (role) => {
        try {
          const result = await searchRole({
            session,
            oracle,
            token,
            role,
            keys: { owner: account.address, spender },
            maxProxyDepth: options.maxProxyDepth ?? DEFAULT_MAX_PROXY_DEPTH,
            maxIndex: options.maxIndex,
            signal: controller.signal,
          });
          if (result.found && options.firstMatchOnly) controller.abort();
          return result;
        } catch (err) {
          controller.abort();
          throw err;
        }
      })
    );

    const output: FindSlotsResult = { token, account, spender, compiler };
    roles.forEach((role, i) => {
      output[role] = results[i];
    });
    return output;
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }
}

function terminal(
  token: Address,
  account: Account,
  spender: Address | undefined,
  roles: readonly Role[],
  reason: NotFoundReason
): FindSlotsResult {
  const output: FindSlotsResult = { token, account, spender, compiler: { kind: "unknown" } };
  for (const role of roles) {
    output[role] = notFound(token, role, reason, [], reason === "NoCode" ? token : undefined);
  }
  return output;
}

/**
 * Run {@link findSlots} for many tokens with at most `concurrency` searches in
 * flight. Results keep the input order; the first transport failure rejects
 * the whole batch, cancels the searches in flight and stops further ones from
 * starting.
 */
export async function findSlotsForTokens(
  backend: ChainBackend,
  tokens: readonly string[],
  options: FindSlotsForTokensOptions = {}
): Promise<FindSlotsResult[]> {
  const { concurrency = DEFAULT_CONCURRENCY, holders = {}, ...rest } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const oracle = rest.oracle ?? new OverrideOracle(backend, rest.blockTag ?? "latest");
  const holdersByToken = new Map(Object.entries(holders).map(([token, list]) => [token.toLowerCase(), list]));

  const results: FindSlotsResult[] = new Array(tokens.length);
  let next = 0;
  let failed = false;

  const batch = new AbortController();
  const onAbort = () => batch.abort();
  rest.signal?.addEventListener("abort", onAbort, { once: true });
  if (rest.signal?.aborted) batch.abort();

  const worker = async () => {
    while (!failed && next < tokens.length) {
      const i = next++;
      const token = tokens[i];
      const accountPolicy: SearchAccountPolicy = {
        ...rest.accountPolicy,
        holders: rest.accountPolicy?.holders ?? holdersByToken.get(token.toLowerCase()),
      };
      try {
        results[i] = await findSlots(backend, token, { ...rest, oracle, accountPolicy, signal: batch.signal });
      } catch (err) {
        failed = true;
        batch.abort();
        throw err;
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: Math.min(concurrency, tokens.length) }, () => worker()));
    return results;
  } finally {
    rest.signal?.removeEventListener("abort", onAbort);
  }
}
