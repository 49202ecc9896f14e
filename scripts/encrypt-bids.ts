import { Command } from "commander";
import { readFileSync, writeFileSync } from "fs";
import { sealBids } from "./bids.ts";
import { bidSheetSchema, formatSchemaIssues } from "./types.ts";
import { parsePrivateKey, stringifyWithBigInts } from "./utils.ts";

interface Config {
    bidsJson: string;
    output?: string;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("encrypt-bids")
        .description("Seal plain auction bids with the sale key (PRIVATE_KEY)")
        .requiredOption("--bids-json <path>", "Path to a JSON file: { fixedSalt, bids: [{ investor, amountOut }] }")
        .option("--output <path>", "Write the sealed bids here instead of stdout")
        .parse();

    return program.opts<Config>();
}

function run() {
    const config = parseCliArgs();
    const privateKey = parsePrivateKey(process.env.PRIVATE_KEY);

    const parsed = bidSheetSchema.safeParse(JSON.parse(readFileSync(config.bidsJson, "utf-8")));
    if (!parsed.success) {
        throw new Error(formatSchemaIssues("bid sheet", parsed.error));
    }

    const sealed = sealBids(parsed.data, privateKey);
    console.error(`Sealed ${sealed.bids.length} bids for public key (${sealed.publicKey.x}, ${sealed.publicKey.y})`);

    const json = stringifyWithBigInts(sealed);
    if (config.output) {
        writeFileSync(config.output, `${json}\n`);
        console.error(`Sealed bids written to ${config.output}`);
    } else {
        console.log(json);
    }
}

try {
    run();
} catch (error) {
    console.error(error);
    process.exitCode = 1;
}
