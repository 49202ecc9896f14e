import { Command } from "commander";
import { assertValidBps } from "@tranche/core";
import { formatAmount, parseBigInt, summarizeSettlement } from "./utils.ts";

interface Config {
    capitalRaised: bigint;
    tokensAllocated: bigint;
    platformFeeOnCapitalRaisedBps: bigint;
    platformFeeOnTokensSoldBps: bigint;
    referrerFeeOnCapitalRaisedBps: bigint;
    referrerFeeOnTokensSoldBps: bigint;
    bidTokenDecimals: number;
    askTokenDecimals: number;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("settlement-summary")
        .description("Preview fees, project proceeds and the token supply a sale's results require")
        .requiredOption("--capital-raised <amount>", "Capital raised, in bid token units", parseBigInt)
        .requiredOption("--tokens-allocated <amount>", "Tokens allocated, in ask token units", parseBigInt)
        .option("--platform-fee-on-capital-raised-bps <bps>", "Platform fee on capital raised", parseBigInt, 0n)
        .option("--platform-fee-on-tokens-sold-bps <bps>", "Platform fee on tokens sold", parseBigInt, 0n)
        .option("--referrer-fee-on-capital-raised-bps <bps>", "Referrer fee on capital raised", parseBigInt, 0n)
        .option("--referrer-fee-on-tokens-sold-bps <bps>", "Referrer fee on tokens sold", parseBigInt, 0n)
        .option("--bid-token-decimals <decimals>", "Bid token decimals", (v) => parseInt(v, 10), 6)
        .option("--ask-token-decimals <decimals>", "Ask token decimals", (v) => parseInt(v, 10), 18)
        .parse();

    return program.opts<Config>();
}

function run() {
    const config = parseCliArgs();
    assertValidBps(config.platformFeeOnCapitalRaisedBps, "platformFeeOnCapitalRaisedBps");
    assertValidBps(config.platformFeeOnTokensSoldBps, "platformFeeOnTokensSoldBps");
    assertValidBps(config.referrerFeeOnCapitalRaisedBps, "referrerFeeOnCapitalRaisedBps");
    assertValidBps(config.referrerFeeOnTokensSoldBps, "referrerFeeOnTokensSoldBps");

    const summary = summarizeSettlement(config.capitalRaised, config.tokensAllocated, config);
    const bid = (amount: bigint) => formatAmount(amount, config.bidTokenDecimals);
    const ask = (amount: bigint) => formatAmount(amount, config.askTokenDecimals);

    console.log("\n=== CAPITAL ===");
    console.log(`Capital raised: ${bid(summary.capitalRaised)}`);
    console.log(`Platform fee: ${bid(summary.capitalFees.platformFee)}`);
    console.log(`Referrer fee: ${bid(summary.capitalFees.referrerFee)}`);
    console.log(`Project proceeds: ${bid(summary.projectProceeds)}`);

    console.log("\n=== TOKENS ===");
    console.log(`Tokens allocated: ${ask(summary.tokensAllocated)}`);
    console.log(`Platform fee: ${ask(summary.tokenFees.platformFee)}`);
    console.log(`Referrer fee: ${ask(summary.tokenFees.referrerFee)}`);
    console.log(`Tokens to supply: ${ask(summary.tokensToSupply)}`);
    console.log();
}

try {
    run();
} catch (error) {
    console.error(error);
    process.exitCode = 1;
}
