import { Command } from "commander";
import { readFileSync } from "fs";
import { revealBids } from "./bids.ts";
import { formatSchemaIssues, sealedBidSheetSchema } from "./types.ts";
import { formatAmount, parseAddress, parsePrivateKey } from "./utils.ts";
import type { Address } from "@tranche/core";

interface Config {
    sealedBidsJson: string;
    investor?: Address;
    decimals: number;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("decrypt-bids")
        .description("Decrypt sealed auction bids with the sale key (PRIVATE_KEY) and print them as CSV")
        .requiredOption("--sealed-bids-json <path>", "Path to the sealed bids JSON written by encrypt-bids")
        .option("--investor <address>", "Only print this investor's bid", parseAddress)
        .option("--decimals <decimals>", "Ask token decimals for the summary", (v) => parseInt(v, 10), 18)
        .parse();

    return program.opts<Config>();
}

function run() {
    const config = parseCliArgs();
    const privateKey = parsePrivateKey(process.env.PRIVATE_KEY);

    const parsed = sealedBidSheetSchema.safeParse(JSON.parse(readFileSync(config.sealedBidsJson, "utf-8")));
    if (!parsed.success) {
        throw new Error(formatSchemaIssues("sealed bid sheet", parsed.error));
    }

    const bids = revealBids(parsed.data, privateKey).filter(
        (bid) => config.investor === undefined || bid.investor === config.investor,
    );

    // CSV header
    console.log(["INVESTOR", "AMOUNT_OUT"].join(","));
    bids.forEach((bid) => console.log([bid.investor, bid.amountOut.toString()].join(",")));

    const total = bids.reduce((acc, bid) => acc + bid.amountOut, 0n);
    console.error(`\nDecrypted ${bids.length} bids requesting ${formatAmount(total, config.decimals)} tokens`);
}

try {
    run();
} catch (error) {
    console.error(error);
    process.exitCode = 1;
}
