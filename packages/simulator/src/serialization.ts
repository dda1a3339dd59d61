/**
 * Serialization utilities for converting results to JSON-safe types
 */

import type { CompilerInfo, ProxyLink, RoleResult } from "@token-slots/finder";
import type {
  SerializedProxyLink,
  SerializedRoleResult,
  SerializedTokenReport,
  SerializedTransferCheck,
  TokenReport,
  TransferCheck,
} from "./types";

export function describeCompiler(compiler: CompilerInfo): string {
  if (compiler.kind === "unknown") return "unknown";
  return compiler.version ? `${compiler.compiler} ${compiler.version}` : compiler.compiler;
}

function serializeProxyLink(link: ProxyLink): SerializedProxyLink {
  return {
    proxy: link.proxy,
    implementation: link.implementation,
    method: link.method,
  };
}

export function serializeRoleResult(result: RoleResult): SerializedRoleResult {
  if (!result.found) {
    return {
      found: false,
      role: result.role,
      reason: result.reason,
      contract: result.contract,
      proxyChain: result.proxyChain.map(serializeProxyLink),
    };
  }
  return {
    found: true,
    role: result.role,
    contract: result.contract,
    scheme: result.scheme,
    index: result.index,
    key: result.key,
    accessor: result.accessor,
    injected: result.injected.toString(),
    compiler: describeCompiler(result.compiler),
    proxyChain: result.proxyChain.map(serializeProxyLink),
  };
}

export function serializeTransferCheck(check: TransferCheck): SerializedTransferCheck {
  return {
    owner: check.owner,
    recipient: check.recipient,
    amount: check.amount.toString(),
    complex: check.complex,
    reason: check.reason,
  };
}

export function serializeTokenReport(report: TokenReport): SerializedTokenReport {
  const { result, transfer } = report;
  return {
    token: result.token,
    account: {
      address: result.account.address,
      balance: result.account.balance.toString(),
    },
    spender: result.spender,
    compiler: describeCompiler(result.compiler),
    balance: result.balance ? serializeRoleResult(result.balance) : undefined,
    allowance: result.allowance ? serializeRoleResult(result.allowance) : undefined,
    transfer: transfer ? serializeTransferCheck(transfer) : undefined,
  };
}
