/**
 * Pretty printing for slot reports
 */

import boxen from "boxen";
import chalk from "chalk";
import type { ProxyLink, RoleResult } from "@token-slots/finder";
import { describeCompiler } from "./serialization";
import { summarize, type ReportSummary } from "./summary";
import type { TokenReport, TransferCheck } from "./types";

function termWidth(): number {
    const w = process.stdout.columns ? process.stdout.columns : 120;
    return Math.max(80, w);
}

function renderChain(chain: ProxyLink[]): string[] {
    return chain.map(
        (link) => `    ${chalk.gray("via")} ${link.proxy} → ${link.implementation} ${chalk.gray(`(${link.method})`)}`
    );
}

function renderRole(result: RoleResult): string[] {
    const label = result.role.padEnd(10);
    if (!result.found) {
        const lines = [`${chalk.cyan(label)} ${chalk.red("✗")} ${result.reason}`];
        if (result.contract) lines.push(`    ${chalk.gray("last contract")} ${result.contract}`);
        return [...lines, ...renderChain(result.proxyChain)];
    }
    return [
        `${chalk.cyan(label)} ${chalk.green("✓")} ${result.scheme} #${result.index} ${chalk.gray(`via ${result.accessor}()`)}`,
        `    ${chalk.gray("contract")} ${result.contract}`,
        `    ${chalk.gray("key")}      ${result.key}`,
        ...renderChain(result.proxyChain),
    ];
}

function renderTransfer(check: TransferCheck): string {
    const label = chalk.cyan("transferFrom".padEnd(10));
    return check.complex
        ? `${label} ${chalk.yellow("complex")} ${chalk.gray(`(${check.reason ?? "unknown"})`)}`
        : `${label} ${chalk.green("ok")} ${chalk.gray(`(${check.amount} units)`)}`;
}

function isClean(report: TokenReport): boolean {
    const { balance, allowance } = report.result;
    return balance?.found !== false && allowance?.found !== false && report.transfer?.complex !== true;
}

export function renderReport(report: TokenReport, width = termWidth()): string {
    const { result } = report;
    const lines = [
        `${chalk.gray("account")}  ${result.account.address} ${chalk.gray(`(balance ${result.account.balance})`)}`,
        `${chalk.gray("compiler")} ${describeCompiler(result.compiler)}`,
        "",
    ];
    if (result.balance) lines.push(...renderRole(result.balance));
    if (result.allowance) lines.push(...renderRole(result.allowance));
    if (report.transfer) lines.push(renderTransfer(report.transfer));

    const color = isClean(report) ? "green" : "yellow";
    return boxen(lines.join("\n"), {
        title: chalk.bold(result.token),
        titleAlignment: "left",
        padding: { top: 0, bottom: 0, left: 1, right: 1 },
        margin: 0,
        borderStyle: "round",
        borderColor: color,
        width,
    });
}

export function renderSummary(summary: ReportSummary): string {
    const parts = [
        `Tokens: ${summary.tokens}`,
        `balance: ${summary.balanceFound}`,
        `allowance: ${summary.allowanceFound}`,
        `coverage: ${summary.coverage}%`,
    ];
    if (summary.checked > 0) {
        parts.push(`complex: ${summary.complex}/${summary.checked}`);
    }
    return parts.join(" | ");
}

export function prettyPrint(reports: readonly TokenReport[]): void {
    for (const report of reports) {
        console.log(renderReport(report));
    }
    console.log();
    console.log(chalk.bold(renderSummary(summarize(reports))));
}
