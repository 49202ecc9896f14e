import { Command } from "commander";
import { readFileSync, writeFileSync } from "fs";
import { buildMerkleTree, verifyMerkleProof } from "@tranche/core";
import type { Allocation } from "./types.ts";
import {
    calculateTotal,
    formatAmount,
    parseAllocationsCsv,
    parseBoolean,
    serializeMerkleTree,
    toAllocations,
    toInvestedMap,
} from "./utils.ts";
import {
    formatValidationErrors,
    validateAllocationRows,
    validateAllocationsWithinInvested,
} from "./validation.ts";

interface Config {
    allocationsCsv: string;
    investmentsCsv?: string;
    output?: string;
    decimals: number;
    dryRun: boolean;
}

function parseCliArgs(): Config {
    const program = new Command()
        .name("generate-merkle")
        .description("Build a claim or accepted-capital Merkle root and per-investor proofs from a CSV file")
        .requiredOption("--allocations-csv <path>", "Path to the INVESTOR,AMOUNT CSV file")
        .option("--investments-csv <path>", "Invested capital per investor; checks accepted amounts against it")
        .option("--output <path>", "Write the proofs JSON here instead of stdout")
        .option("--decimals <decimals>", "Token decimals for the summary", (v) => parseInt(v, 10), 18)
        .option("--dry-run <boolean>", "Validate and print the summary without emitting proofs", parseBoolean, false)
        .parse();

    return program.opts<Config>();
}

function readValidated(csvPath: string): Allocation[] {
    const rows = parseAllocationsCsv(readFileSync(csvPath, "utf-8"));
    const result = validateAllocationRows(rows);
    if (!result.valid) {
        throw new Error(formatValidationErrors(result));
    }
    return toAllocations(rows);
}

function run() {
    const config = parseCliArgs();

    const allocations = readValidated(config.allocationsCsv);
    console.error(`Read ${allocations.length} allocations from CSV`);

    if (config.investmentsCsv) {
        const invested = toInvestedMap(readValidated(config.investmentsCsv));
        const result = validateAllocationsWithinInvested(allocations, invested);
        if (!result.valid) {
            throw new Error(formatValidationErrors(result));
        }
    }

    const tree = buildMerkleTree(allocations);
    const output = serializeMerkleTree(tree);

    // Every emitted proof must verify against the root before it goes out
    for (const [investor, { leaf, proof }] of tree.proofs) {
        if (!verifyMerkleProof(proof, tree.root, leaf)) {
            throw new Error(`Generated proof for ${investor} does not verify`);
        }
    }

    console.error("\n=== SUMMARY ===");
    console.error(`Merkle root: ${tree.root}`);
    console.error(`Entries: ${output.entries.length}`);
    console.error(`Total: ${formatAmount(calculateTotal(allocations), config.decimals)}`);

    if (config.dryRun) {
        console.error("\n=== DRY RUN MODE ===");
        console.error("Validation passed. No proofs were written.");
        return;
    }

    const json = JSON.stringify(output, null, 4);
    if (config.output) {
        writeFileSync(config.output, `${json}\n`);
        console.error(`Proofs written to ${config.output}`);
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
