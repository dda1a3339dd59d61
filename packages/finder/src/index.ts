export { findSlots, findSlotsForTokens, PROBE_DELTA, NATIVE_TOKEN_PLACEHOLDER, ROLE_ACCESSORS } from "./finder.js";
export { DEFAULT_MAX_PROXY_DEPTH, DEFAULT_CONCURRENCY } from "./finder.js";
export type { FindSlotsOptions, FindSlotsForTokensOptions } from "./finder.js";
export { selectAccount, DEFAULT_SEARCH_ACCOUNT, DEFAULT_SPENDER } from "./accounts.js";
export type { SearchAccountPolicy } from "./accounts.js";
export { OverrideOracle, readAccessor, tokenInterface } from "./oracle.js";
export type { AccessorCall, VerifyRequest } from "./oracle.js";
export { buildStorageOverrides } from "./overrides.js";
export type { StateOverride, StorageOverrideRequest } from "./overrides.js";
export { detectCompiler, hasOpcode, parseMinimalProxy, DELEGATECALL } from "./bytecode.js";
export {
  LAYOUT_CATALOG,
  OPENZEPPELIN_ERC20_NAMESPACE,
  candidateKey,
  erc7201Slot,
  generateCandidates,
  getScheme,
  schemesFor,
} from "./layouts.js";
export type { MappingKeys } from "./layouts.js";
export { resolveProxy, ProxyType } from "./lib/evm-proxy-detection/index.js";
export { getWord } from "./lib/evm-proxy-detection/utils.js";
export type { Resolution, ProxyDetection, BlockTag, CodeLoader, EIP1193ProviderRequestFunc } from "./lib/evm-proxy-detection/index.js";
export {
  createBackend,
  BACKEND_TYPES,
  JsonRpcBackend,
  RpcBackend,
  AnvilBackend,
  TenderlyBackend,
  GanacheBackend,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from "./backends/index.js";
export type { ChainBackend, BackendType, BackendOptions } from "./backends/index.js";
export { SlotFinderError, TransportError, RequestTimeoutError, RpcCallError, errorMessage } from "./errors.js";
export { KeyedLock } from "./lock.js";
export { logger } from "./logger.js";
export * from "./types.js";
