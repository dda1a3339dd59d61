/**
 * CLI entry point for the slot finder
 *
 *   token-slots find <tokens..>    locate balance and allowance slots
 *   token-slots check <tokens..>   locate them, then try transferFrom with them
 */

import process from "node:process";
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { isAddress } from "ethers";
import {
    BACKEND_TYPES,
    ROLES,
    createBackend,
    logger,
    type Address,
    type BackendType,
    type Role,
} from "@token-slots/finder";
import { ConfigError, loadConfig } from "./config";
import { loadHolders } from "./holders";
import { prettyPrint } from "./printer";
import { serializeTokenReport } from "./serialization";
import { checkTokens } from "./simulator";
import type { LogLevel, SlotFinderConfig } from "./types";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

interface CliArgs {
    tokens: string[];
    roles: string[];
    account?: string;
    spender?: string;
    holders?: string;
    backend: BackendType;
    rpcUrl?: string;
    concurrency: number;
    firstMatch: boolean;
    json: boolean;
    logLevel: string;
}

function addressArg(name: string, value: string | undefined): Address | undefined {
    if (value === undefined) return undefined;
    if (!isAddress(value)) {
        throw new ConfigError(`--${name} is not an address: ${value}`);
    }
    return value as Address;
}

function rolesArg(values: string[]): Role[] {
    return ROLES.filter((role) => values.includes(role));
}

function slotOptions(y: Argv, config: SlotFinderConfig) {
    return y
        .positional("tokens", {
            describe: "Token addresses to search",
            type: "string",
            array: true,
            demandOption: true,
        })
        .option("roles", {
            alias: "r",
            describe: "Which slots to look for",
            type: "string",
            array: true,
            choices: ROLES,
            default: [...ROLES],
        })
        .option("account", {
            describe: "Search from this account instead of a holder",
            type: "string",
            default: config.searchAccount,
        })
        .option("spender", {
            describe: "Spender used for allowance keys and as transferFrom recipient",
            type: "string",
            default: config.spender,
        })
        .option("holders", {
            describe: "JSON file or URL mapping token to known holders",
            type: "string",
            default: config.holdersFile ?? config.holdersUrl,
        })
        .option("backend", {
            alias: "b",
            describe: "Node the search runs against",
            choices: BACKEND_TYPES,
            default: config.backend,
        })
        .option("rpc-url", {
            describe: "Override the configured RPC URL",
            type: "string",
        })
        .option("concurrency", {
            alias: "c",
            describe: "Tokens searched at the same time",
            type: "number",
            default: config.concurrency,
        })
        .option("first-match", {
            describe: "Stop a token's search at the first slot found",
            type: "boolean",
            default: false,
        })
        .option("json", {
            describe: "Print results as JSON",
            type: "boolean",
            default: false,
        })
        .option("log-level", {
            alias: "l",
            describe: "The level of logging to display",
            choices: LOG_LEVELS,
            default: "warn",
        });
}

async function run(argv: CliArgs, config: SlotFinderConfig, simulateTransfer: boolean): Promise<void> {
    logger.level = argv.logLevel;

    const tokens = argv.tokens.map((token) => {
        if (!isAddress(token)) throw new ConfigError(`Not a token address: ${token}`);
        return token;
    });
    const account = addressArg("account", argv.account);
    const spender = addressArg("spender", argv.spender);
    const holders = argv.holders ? await loadHolders(argv.holders) : {};

    const backend = createBackend(argv.backend, {
        rpcUrl: argv.rpcUrl ?? config.rpcUrl,
        chainId: config.chainId,
        requestTimeoutMs: config.requestTimeoutMs,
    });
    try {
        const reports = await checkTokens(backend, tokens, {
            roles: rolesArg(argv.roles),
            accountPolicy: { account, spender },
            holders,
            concurrency: argv.concurrency,
            maxProxyDepth: config.maxProxyDepth,
            firstMatchOnly: argv.firstMatch,
            simulateTransfer,
            recipient: spender,
        });
        if (argv.json) {
            console.log(JSON.stringify(reports.map(serializeTokenReport), null, 2));
        } else {
            prettyPrint(reports);
        }
    } finally {
        backend.destroy();
    }
}

async function main() {
    const config = loadConfig();

    await yargs(hideBin(process.argv))
        .scriptName("token-slots")
        .command(
            "find <tokens..>",
            "Find the storage slots of token balances and allowances",
            (y) => slotOptions(y, config),
            async (argv) => {
                try {
                    await run(argv, config, false);
                } catch (err: unknown) {
                    logger.error(err, "An error occurred while searching for slots");
                    process.exitCode = 1;
                }
            }
        )
        .command(
            "check <tokens..>",
            "Find the slots, then check that transferFrom works with them",
            (y) => slotOptions(y, config),
            async (argv) => {
                try {
                    await run(argv, config, true);
                } catch (err: unknown) {
                    logger.error(err, "An error occurred while checking tokens");
                    process.exitCode = 1;
                }
            }
        )
        .demandCommand(1)
        .strict()
        .help()
        .alias("h", "help")
        .fail((msg, err, yargs) => {
            if (err) throw err; // preserve stack
            logger.error(`Error: ${msg}\n`);
            yargs.showHelp();
            process.exit(1);
        }).argv;
}

main().catch((error) => {
    logger.fatal(error, "An unexpected error occurred");
    process.exit(1);
});
