import { beforeAll, describe, it, expect } from "vitest";
import chalk from "chalk";
import { ProxyType } from "@token-slots/finder";
import { renderReport, renderSummary } from "../src/printer.js";
import type { TokenReport } from "../src/types.js";
import { addr } from "../../finder/test/helpers/fake-chain.js";

const token = addr(0x70);
const impl = addr(0x71);

const report: TokenReport = {
  result: {
    token,
    account: { address: addr(0xa), balance: 42n },
    compiler: { kind: "known", compiler: "vyper", version: "0.3.10", source: "metadata" },
    balance: {
      found: true,
      role: "balance",
      scheme: "vyper-hashmap",
      index: 3,
      key: `0x${"ab".repeat(32)}`,
      token,
      contract: impl,
      accessor: "balanceOf",
      injected: 1n,
      observed: 1n,
      compiler: { kind: "unknown" },
      proxyChain: [{ proxy: token, implementation: impl, method: ProxyType.Eip1967Direct }],
    },
    allowance: { found: false, role: "allowance", reason: "CycleDetected", contract: impl, proxyChain: [] },
  },
};

beforeAll(() => {
  chalk.level = 0;
});

describe("renderReport", () => {
  it("shows each role with its slot or reason", () => {
    const out = renderReport(report, 140);

    expect(out).toContain(token);
    expect(out).toContain(`account  ${addr(0xa)} (balance 42)`);
    expect(out).toContain("compiler vyper 0.3.10");
    expect(out).toContain("balance    ✓ vyper-hashmap #3 via balanceOf()");
    expect(out).toContain(`key      0x${"ab".repeat(32)}`);
    expect(out).toContain(`via ${token} → ${impl} (Eip1967Direct)`);
    expect(out).toContain("allowance  ✗ CycleDetected");
    expect(out).toContain(`last contract ${impl}`);
  });

  it("adds the transferFrom outcome", () => {
    const ok = renderReport(
      { ...report, transfer: { token, owner: addr(1), recipient: addr(2), amount: 10n ** 12n, complex: false } },
      140
    );
    const complex = renderReport(
      {
        ...report,
        transfer: { token, owner: addr(1), recipient: addr(2), amount: 1n, complex: true, reason: "balance slot not found" },
      },
      140
    );

    expect(ok).toContain("transferFrom ok (1000000000000 units)");
    expect(complex).toContain("transferFrom complex (balance slot not found)");
  });
});

describe("renderSummary", () => {
  it("includes the complex count only when tokens were checked", () => {
    const base = { tokens: 3, balanceFound: 2, allowanceFound: 1, coverage: 33.33 };

    expect(renderSummary({ ...base, checked: 2, complex: 1 })).toBe(
      "Tokens: 3 | balance: 2 | allowance: 1 | coverage: 33.33% | complex: 1/2"
    );
    expect(renderSummary({ ...base, checked: 0, complex: 0 })).toBe(
      "Tokens: 3 | balance: 2 | allowance: 1 | coverage: 33.33%"
    );
  });
});
