/**
 * Known token holders, used to search from an account with a balance.
 *
 * The source is a JSON object mapping token address to a list of holder
 * addresses, read from a file or fetched from a URL.
 */

import { readFileSync } from "node:fs";
import axios from "axios";
import { getAddress, isAddress } from "ethers";
import { errorMessage, logger, type Address } from "@token-slots/finder";
import { ConfigError } from "./config";
import type { HoldersMap } from "./types";

const FETCH_TIMEOUT_MS = 15000;

export function parseHolders(raw: unknown, source: string): HoldersMap {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new ConfigError(`${source}: holders must be an object of token => address[]`);
    }
    const holders: HoldersMap = {};
    for (const [token, list] of Object.entries(raw)) {
        if (!isAddress(token)) {
            throw new ConfigError(`${source}: "${token}" is not a token address`);
        }
        if (!Array.isArray(list) || !list.every((h): h is string => typeof h === "string" && isAddress(h))) {
            throw new ConfigError(`${source}: holders of ${token} must be a list of addresses`);
        }
        holders[token.toLowerCase()] = list.map((h) => getAddress(h) as Address);
    }
    return holders;
}

async function fetchHolders(url: string): Promise<unknown> {
    try {
        const resp = await axios.get<unknown>(url, { timeout: FETCH_TIMEOUT_MS });
        return resp.data;
    } catch (err) {
        throw new ConfigError(`Cannot fetch holders from ${url}: ${errorMessage(err)}`, { cause: err });
    }
}

function readHolders(path: string): unknown {
    try {
        return JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
        throw new ConfigError(`Cannot read holders from ${path}: ${errorMessage(err)}`, { cause: err });
    }
}

/**
 * Load holders from a path or an http(s) URL.
 */
export async function loadHolders(source: string): Promise<HoldersMap> {
    const raw = /^https?:\/\//i.test(source) ? await fetchHolders(source) : readHolders(source);
    const holders = parseHolders(raw, source);
    logger.debug({ source, tokens: Object.keys(holders).length }, "Loaded holders");
    return holders;
}
