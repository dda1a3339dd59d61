/**
 * Slot discovery plus an optional transferFrom check per token
 *
 * This is the library entry of the simulator package; `main.ts` wraps it in a
 * CLI.
 */

import {
    DEFAULT_SPENDER,
    findSlotsForTokens,
    logger,
    type Address,
    type ChainBackend,
    type FindSlotsForTokensOptions,
} from "@token-slots/finder";
import { DEFAULT_TRANSFER_AMOUNT, simulateTransferFrom } from "./transfer";
import type { TokenReport } from "./types";

export const DEFAULT_TRANSFER_OWNER: Address = "0x000000000000000000000000000000000000c0de";

export interface CheckTokensOptions extends FindSlotsForTokensOptions {
    /** Run transferFrom with the discovered slots after the search */
    simulateTransfer?: boolean;
    owner?: Address;
    /** Defaults to the spender used by the allowance search */
    recipient?: Address;
    amount?: bigint;
}

export async function checkTokens(
    backend: ChainBackend,
    tokens: readonly string[],
    options: CheckTokensOptions = {}
): Promise<TokenReport[]> {
    const { simulateTransfer = false, owner, recipient, amount, ...findOptions } = options;
    const results = await findSlotsForTokens(backend, tokens, findOptions);
    if (!simulateTransfer) {
        return results.map((result) => ({ result }));
    }

    const reports: TokenReport[] = [];
    for (const result of results) {
        const transfer = await simulateTransferFrom({
            backend,
            result,
            owner: owner ?? DEFAULT_TRANSFER_OWNER,
            recipient: recipient ?? result.spender ?? DEFAULT_SPENDER,
            amount: amount ?? DEFAULT_TRANSFER_AMOUNT,
        });
        if (transfer.complex) {
            logger.info({ token: result.token, reason: transfer.reason }, "Token is complex");
        }
        reports.push({ result, transfer });
    }
    return reports;
}

export { simulateTransferFrom, DEFAULT_TRANSFER_AMOUNT } from "./transfer";
export type { TransferFromParams } from "./transfer";
export { serializeTokenReport, serializeRoleResult, serializeTransferCheck, describeCompiler } from "./serialization";
export { summarize } from "./summary";
export type { ReportSummary } from "./summary";
export { renderReport, renderSummary, prettyPrint } from "./printer";
export { loadConfig, parseConfig, clearConfigCache, ConfigError, CONFIG_PATH } from "./config";
export { loadHolders, parseHolders } from "./holders";
export type * from "./types";
