import type { TokenReport } from "./types";

export interface ReportSummary {
    tokens: number;
    balanceFound: number;
    allowanceFound: number;
    /** Tokens with both roles found, as a percentage of all tokens */
    coverage: number;
    checked: number;
    complex: number;
}

const percent = (part: number, total: number): number =>
    total === 0 ? 0 : Math.round((part / total) * 10000) / 100;

export function summarize(reports: readonly TokenReport[]): ReportSummary {
    const balanceFound = reports.filter((r) => r.result.balance?.found === true).length;
    const allowanceFound = reports.filter((r) => r.result.allowance?.found === true).length;
    const both = reports.filter(
        (r) => r.result.balance?.found === true && r.result.allowance?.found === true
    ).length;
    const checked = reports.filter((r) => r.transfer !== undefined).length;
    const complex = reports.filter((r) => r.transfer?.complex === true).length;
    return {
        tokens: reports.length,
        balanceFound,
        allowanceFound,
        coverage: percent(both, reports.length),
        checked,
        complex,
    };
}
