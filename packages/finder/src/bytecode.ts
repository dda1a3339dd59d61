/**
 * Compiler identification from deployed bytecode.
 *
 * Solidity and Vyper append a CBOR-encoded metadata section to runtime code:
 *
 *   <execution bytecode><cbor data><2 byte length>
 *
 * Solidity and Vyper < 0.3.10 do not count the length bytes; Vyper >= 0.3.10
 * does, and stores an array instead of a map. Vyper < 0.3.5 appends a fixed
 * 11-byte map with no length suffix.
 */

import { decode } from "cbor-x";
import { getAddress, isHexString } from "ethers";
import type { Address, Compiler, CompilerInfo } from "./types.js";

export const DELEGATECALL = 0xf4;

const UNKNOWN: CompilerInfo = { kind: "unknown" };

// Creation prologues that survive into runtime code of older contracts without metadata
const PREFIXES: Record<string, Compiler> = {
  "6004361015": "vyper",
  "341561000a": "vyper",
  "6060604052": "solidity",
  "6080604052": "solidity",
};

const VYPER_LEGACY_TRAILER_LENGTH = 11;
const SOLIDITY_HASH_KEYS = ["ipfs", "bzzr0", "bzzr1"];

// 0x363d3d373d3d3d363d73<20 bytes implementation address>5af43d82803e903d91602b57fd5bf3
const MINIMAL_PROXY_PREFIX = "363d3d373d3d3d363d73";
const MINIMAL_PROXY_SUFFIX = "5af43d82803e903d91602b57fd5bf3";

function toBytes(bytecode: string): Uint8Array | null {
  const hex = bytecode.startsWith("0x") ? bytecode : `0x${bytecode}`;
  if (!isHexString(hex) || hex.length % 2 !== 0) return null;
  return Buffer.from(hex.slice(2), "hex");
}

function decodeSlice(bytes: Uint8Array, start: number, end: number): unknown {
  if (start < 0 || start >= end) return undefined;
  try {
    return decode(bytes.subarray(start, end));
  } catch {
    return undefined;
  }
}

function field(value: unknown, key: string): unknown {
  if (value instanceof Map) return value.get(key);
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return (value as Record<string, unknown>)[key];
  }
  return undefined;
}

function versionOf(value: unknown): string | undefined {
  const parts = value instanceof Uint8Array ? Array.from(value) : value;
  if (!Array.isArray(parts) || parts.length === 0) return undefined;
  if (!parts.every((p): p is number => typeof p === "number" && Number.isInteger(p))) {
    return undefined;
  }
  return parts.join(".");
}

function fromMetadataMap(value: unknown): CompilerInfo | null {
  const solc = field(value, "solc");
  if (solc !== undefined) {
    // solc writes its version as 3 bytes; nightly builds write a string
    const version = typeof solc === "string" ? solc : versionOf(solc);
    return { kind: "known", compiler: "solidity", version, source: "metadata" };
  }
  if (SOLIDITY_HASH_KEYS.some((key) => field(value, key) !== undefined)) {
    return { kind: "known", compiler: "solidity", source: "metadata" };
  }
  const vyper = field(value, "vyper");
  if (vyper !== undefined) {
    return { kind: "known", compiler: "vyper", version: versionOf(vyper), source: "metadata" };
  }
  return null;
}

function fromTrailer(bytes: Uint8Array): CompilerInfo | null {
  if (bytes.length < 2) return null;
  const length = (bytes[bytes.length - 2] << 8) | bytes[bytes.length - 1];

  const excludingLength = decodeSlice(bytes, bytes.length - 2 - length, bytes.length - 2);
  const fromMap = fromMetadataMap(excludingLength);
  if (fromMap) return fromMap;

  const includingLength = decodeSlice(bytes, bytes.length - length, bytes.length - 2);
  if (Array.isArray(includingLength) && includingLength.length > 0) {
    const last = fromMetadataMap(includingLength[includingLength.length - 1]);
    if (last?.kind === "known" && last.compiler === "vyper") return last;
  }

  const legacy = decodeSlice(bytes, bytes.length - VYPER_LEGACY_TRAILER_LENGTH, bytes.length);
  const fromLegacy = fromMetadataMap(legacy);
  if (fromLegacy?.kind === "known" && fromLegacy.compiler === "vyper") return fromLegacy;

  return null;
}

function fromPrefix(bytes: Uint8Array): CompilerInfo | null {
  const head = Buffer.from(bytes.subarray(0, 5)).toString("hex");
  const compiler = PREFIXES[head];
  return compiler ? { kind: "known", compiler, source: "prefix" } : null;
}

/**
 * Identify the compiler of deployed bytecode. Never throws: absent or
 * malformed metadata yields `{ kind: "unknown" }`.
 */
export function detectCompiler(bytecode: string): CompilerInfo {
  const bytes = toBytes(bytecode);
  if (!bytes || bytes.length === 0) return UNKNOWN;
  return fromTrailer(bytes) ?? fromPrefix(bytes) ?? UNKNOWN;
}

/** Whether `opcode` occurs as an instruction, skipping PUSH1..PUSH32 immediates. */
export function hasOpcode(bytecode: string, opcode: number): boolean {
  const bytes = toBytes(bytecode);
  if (!bytes) return false;
  for (let i = 0; i < bytes.length; i++) {
    const op = bytes[i];
    if (op === opcode) return true;
    if (op >= 0x60 && op <= 0x7f) i += op - 0x5f;
  }
  return false;
}

/** Implementation address of an EIP-1167 clone, or null for any other code. */
export function parseMinimalProxy(bytecode: string): Address | null {
  const code = bytecode.toLowerCase().replace(/^0x/, "");
  if (
    code.length !== MINIMAL_PROXY_PREFIX.length + 40 + MINIMAL_PROXY_SUFFIX.length ||
    !code.startsWith(MINIMAL_PROXY_PREFIX) ||
    !code.endsWith(MINIMAL_PROXY_SUFFIX)
  ) {
    return null;
  }
  const target = code.slice(MINIMAL_PROXY_PREFIX.length, MINIMAL_PROXY_PREFIX.length + 40);
  return getAddress(`0x${target}`) as Address;
}
