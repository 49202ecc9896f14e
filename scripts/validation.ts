import { isAddress } from "viem";
import type { Address } from "@tranche/core";
import type { Allocation, AllocationRow } from "./types.ts";

export type ValidationError = {
    type:
        | "invalid_address"
        | "invalid_amount"
        | "zero_amount"
        | "duplicate_investor"
        | "investor_not_found"
        | "exceeds_invested";
    message: string;
    details?: Record<string, unknown>;
};

export type ValidationResult = {
    valid: boolean;
    errors: ValidationError[];
};

export function validateAddresses(rows: AllocationRow[]): ValidationResult {
    const errors: ValidationError[] = [];

    for (const row of rows) {
        if (!isAddress(row.investor, { strict: false })) {
            errors.push({
                type: "invalid_address",
                message: `Investor is not a valid address`,
                details: { line: row.line, investor: row.investor },
            });
        }
    }

    return { valid: errors.length === 0, errors };
}

export function validateAmounts(rows: AllocationRow[]): ValidationResult {
    const errors: ValidationError[] = [];

    for (const row of rows) {
        if (!/^\d+$/.test(row.amount)) {
            errors.push({
                type: "invalid_amount",
                message: `Amount is not an unsigned integer`,
                details: { line: row.line, amount: row.amount },
            });
            continue;
        }

        if (BigInt(row.amount) === 0n) {
            errors.push({
                type: "zero_amount",
                message: `Allocation has 0 amount`,
                details: { line: row.line, investor: row.investor },
            });
        }
    }

    return { valid: errors.length === 0, errors };
}

export function validateNoDuplicateInvestors(rows: AllocationRow[]): ValidationResult {
    const errors: ValidationError[] = [];
    const seen = new Set<string>();

    for (const row of rows) {
        const key = row.investor.toLowerCase();
        if (seen.has(key)) {
            errors.push({
                type: "duplicate_investor",
                message: `Duplicate investor in CSV`,
                details: { line: row.line, investor: row.investor },
            });
        }
        seen.add(key);
    }

    return { valid: errors.length === 0, errors };
}

export function validateAllocationRows(rows: AllocationRow[]): ValidationResult {
    const allErrors: ValidationError[] = [];

    allErrors.push(...validateAddresses(rows).errors);
    allErrors.push(...validateAmounts(rows).errors);
    allErrors.push(...validateNoDuplicateInvestors(rows).errors);

    return { valid: allErrors.length === 0, errors: allErrors };
}

/** Accepted capital can never exceed what the investor put in. */
export function validateAllocationsWithinInvested(
    allocations: Allocation[],
    invested: Map<Address, bigint>,
): ValidationResult {
    const errors: ValidationError[] = [];

    for (const allocation of allocations) {
        const investedCapital = invested.get(allocation.investor);

        if (investedCapital === undefined) {
            errors.push({
                type: "investor_not_found",
                message: `Investor has no invested capital`,
                details: { investor: allocation.investor },
            });
            continue;
        }

        if (allocation.amount > investedCapital) {
            errors.push({
                type: "exceeds_invested",
                message: `Allocation exceeds invested capital`,
                details: {
                    investor: allocation.investor,
                    amount: allocation.amount.toString(),
                    investedCapital: investedCapital.toString(),
                },
            });
        }
    }

    return { valid: errors.length === 0, errors };
}

export function formatValidationErrors(result: ValidationResult): string {
    const errorMessages = result.errors
        .map((e) => `  - [${e.type}] ${e.message}: ${JSON.stringify(e.details)}`)
        .join("\n");
    return `Validation failed with ${result.errors.length} error(s):\n${errorMessages}`;
}
