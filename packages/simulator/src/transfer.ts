/**
 * transferFrom simulation
 *
 * Gives `owner` a balance and `recipient` an allowance through the discovered
 * slots, then calls `transferFrom(owner, recipient, amount)` from the
 * recipient. Tokens that still refuse are reported as complex.
 */

import { isHexString } from "ethers";
import {
    RequestTimeoutError,
    RpcCallError,
    buildStorageOverrides,
    errorMessage,
    getWord,
    logger,
    tokenInterface,
    type Address,
    type ChainBackend,
    type FindSlotsResult,
    type Hex,
    type StateOverride,
} from "@token-slots/finder";
import type { TransferCheck } from "./types";

/** Amount moved by the check, in the token's smallest unit */
export const DEFAULT_TRANSFER_AMOUNT = 10n ** 12n;

export interface TransferFromParams {
    backend: ChainBackend;
    result: FindSlotsResult;
    owner: Address;
    recipient: Address;
    amount?: bigint;
}

function decodeSuccess(output: unknown): boolean {
    if (typeof output !== "string" || output === "0x") return false;
    try {
        const [ok] = tokenInterface.decodeFunctionResult("transferFrom", output);
        return ok === true;
    } catch (err) {
        logger.debug({ err: errorMessage(err) }, "transferFrom output is not a bool");
        return false;
    }
}

// Backends without call overrides get the words written and restored around the call
async function callWithWrites(backend: ChainBackend, tx: object, overrides: StateOverride): Promise<unknown> {
    const originals: { address: Address; slot: Hex; value: Hex }[] = [];
    try {
        for (const [address, { stateDiff }] of Object.entries(overrides)) {
            for (const [slot, value] of Object.entries(stateDiff)) {
                if (!isHexString(address, 20) || !isHexString(slot, 32)) {
                    throw new Error(`Malformed storage override ${address}:${slot}`);
                }
                const original = await getWord(backend.request, address, slot, "latest");
                await backend.setStorageAt(address, slot, value);
                originals.push({ address, slot, value: original });
            }
        }
        return await backend.request({ method: "eth_call", params: [tx, "latest"] });
    } finally {
        for (const { address, slot, value } of originals.reverse()) {
            await backend.setStorageAt(address, slot, value);
        }
    }
}

export async function simulateTransferFrom(params: TransferFromParams): Promise<TransferCheck> {
    const { backend, result, owner, recipient, amount = DEFAULT_TRANSFER_AMOUNT } = params;
    const check = { token: result.token, owner, recipient, amount };

    if (!result.balance?.found) {
        return { ...check, complex: true, reason: "balance slot not found" };
    }
    if (!result.allowance?.found) {
        return { ...check, complex: true, reason: "allowance slot not found" };
    }

    const overrides = buildStorageOverrides({
        balance: result.balance,
        allowance: result.allowance,
        owner,
        spender: recipient,
        amount,
    });
    const tx = {
        from: recipient,
        to: result.token,
        data: tokenInterface.encodeFunctionData("transferFrom", [owner, recipient, amount]),
    };

    let output: unknown;
    try {
        output = backend.supportsCallOverrides
            ? await backend.request({ method: "eth_call", params: [tx, "latest", overrides] })
            : await callWithWrites(backend, tx, overrides);
    } catch (err) {
        if (err instanceof RpcCallError || err instanceof RequestTimeoutError) {
            logger.debug({ token: result.token, err: errorMessage(err) }, "transferFrom failed");
            return { ...check, complex: true, reason: `transferFrom reverted: ${errorMessage(err)}` };
        }
        throw err;
    }

    if (!decodeSuccess(output)) {
        return { ...check, complex: true, reason: "transferFrom did not return true" };
    }
    return { ...check, complex: false };
}
