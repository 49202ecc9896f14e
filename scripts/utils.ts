import { InvalidArgumentError } from "commander";
import { getAddress, isAddress } from "viem";
import {
    calculateCapitalFees,
    calculateProjectProceeds,
    calculateTokenFees,
    type Address,
    type FeeRates,
    type FeeSplit,
    type Hex,
    type MerkleTree,
} from "@tranche/core";
import type { Allocation, AllocationRow } from "./types.ts";

export function parseBoolean(value: string): boolean {
    if (value === "true") return true;
    if (value === "false") return false;
    throw new InvalidArgumentError(`Invalid boolean "${value}". Expected "true" or "false".`);
}

export function parseAddress(value: string): Address {
    if (!isAddress(value, { strict: false })) {
        throw new InvalidArgumentError(
            `Invalid address "${value}". Expected format: 0x followed by 40 hexadecimal characters.`,
        );
    }
    return getAddress(value);
}

export function parseBigInt(value: string): bigint {
    if (!/^(0x[0-9a-fA-F]+|\d+)$/.test(value)) {
        throw new InvalidArgumentError(`Invalid amount "${value}". Expected an unsigned integer.`);
    }
    return BigInt(value);
}

/** Reads a hex private key, with or without the 0x prefix. */
export function parsePrivateKey(value: string | undefined): bigint {
    if (!value) {
        throw new Error("PRIVATE_KEY environment variable is required");
    }
    const hex = value.startsWith("0x") ? value : `0x${value}`;
    if (!/^0x[0-9a-fA-F]{1,64}$/.test(hex)) {
        throw new Error("PRIVATE_KEY must be a hex string of at most 32 bytes");
    }
    return BigInt(hex);
}

export const formatAmount = (amount: bigint, decimals: number) => {
    const intAmount = amount / 10n ** BigInt(decimals);
    const decimalAmount = amount % 10n ** BigInt(decimals);
    if (decimals === 0) {
        return intAmount.toLocaleString("en-US");
    }
    return `${intAmount.toLocaleString("en-US")}.${decimalAmount.toString().padStart(decimals, "0")}`;
};

// expects a CSV file with the following format:
// INVESTOR,AMOUNT
// 0x...,...
export function parseAllocationsCsv(content: string): AllocationRow[] {
    const lines = content.split(/\r?\n/);

    // Check if first line is a header (doesn't start with 0x)
    const startIndex = lines.length > 0 && !lines[0].trim().startsWith("0x") ? 1 : 0;

    const rows: AllocationRow[] = [];
    for (let i = startIndex; i < lines.length; i++) {
        if (lines[i].trim().length === 0) continue;
        const [investor = "", amount = ""] = lines[i].split(",").map((s) => s.trim());
        rows.push({ line: i + 1, investor, amount });
    }
    return rows;
}

/** Converts rows that passed `validateAllocationRows`. */
export function toAllocations(rows: AllocationRow[]): Allocation[] {
    return rows.map((row) => ({ investor: getAddress(row.investor), amount: BigInt(row.amount) }));
}

export function calculateTotal(allocations: Allocation[]): bigint {
    return allocations.reduce((acc, allocation) => acc + allocation.amount, 0n);
}

export function toInvestedMap(allocations: Allocation[]): Map<Address, bigint> {
    return new Map(allocations.map((a) => [a.investor, a.amount]));
}

export interface MerkleOutput {
    root: Hex;
    total: string;
    entries: { investor: Address; amount: string; leaf: Hex; proof: Hex[] }[];
}

/** JSON shape handed to investors: one proof per entry, amounts as decimal strings. */
export function serializeMerkleTree(tree: MerkleTree): MerkleOutput {
    const entries = [...tree.proofs.entries()].map(([investor, { amount, leaf, proof }]) => ({
        investor,
        amount: amount.toString(),
        leaf,
        proof,
    }));
    const total = [...tree.proofs.values()].reduce((acc, { amount }) => acc + amount, 0n);
    return { root: tree.root, total: total.toString(), entries };
}

export function stringifyWithBigInts(value: unknown): string {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v), 4);
}

export interface SettlementSummary {
    capitalRaised: bigint;
    tokensAllocated: bigint;
    capitalFees: FeeSplit;
    tokenFees: FeeSplit;
    projectProceeds: bigint;
    tokensToSupply: bigint;
}

/** What a project receives and what it must supply, given the published results. */
export function summarizeSettlement(
    capitalRaised: bigint,
    tokensAllocated: bigint,
    rates: FeeRates,
): SettlementSummary {
    const tokenFees = calculateTokenFees(tokensAllocated, rates);
    return {
        capitalRaised,
        tokensAllocated,
        capitalFees: calculateCapitalFees(capitalRaised, rates),
        tokenFees,
        projectProceeds: calculateProjectProceeds(capitalRaised, rates),
        tokensToSupply: tokensAllocated + tokenFees.platformFee + tokenFees.referrerFee,
    };
}
