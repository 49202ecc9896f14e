import { ValidationError } from "./errors";
import type { SaleConfigInput } from "./types";

export const BPS_DENOMINATOR = 10_000n;

export type FeeSplit = {
    platformFee: bigint;
    referrerFee: bigint;
};

export type FeeRates = Pick<
    SaleConfigInput,
    | "platformFeeOnCapitalRaisedBps"
    | "platformFeeOnTokensSoldBps"
    | "referrerFeeOnCapitalRaisedBps"
    | "referrerFeeOnTokensSoldBps"
>;

/** `total * bps / 10_000`, rounded down. */
export function calculateFee(total: bigint, bps: bigint): bigint {
    if (total < 0n) {
        throw new ValidationError("InvalidCapitalRaised", "Fee base cannot be negative", { total });
    }
    assertValidBps(bps, "fee");
    return (total * bps) / BPS_DENOMINATOR;
}

export function assertValidBps(bps: bigint, name: string): void {
    if (bps < 0n || bps > BPS_DENOMINATOR) {
        throw new ValidationError("InvalidFeeConfig", `${name} must be between 0 and ${BPS_DENOMINATOR} bps`, {
            name,
            actual: bps,
        });
    }
}

export function calculateCapitalFees(capitalRaised: bigint, rates: FeeRates): FeeSplit {
    return {
        platformFee: calculateFee(capitalRaised, rates.platformFeeOnCapitalRaisedBps),
        referrerFee: calculateFee(capitalRaised, rates.referrerFeeOnCapitalRaisedBps),
    };
}

export function calculateTokenFees(tokensAllocated: bigint, rates: FeeRates): FeeSplit {
    return {
        platformFee: calculateFee(tokensAllocated, rates.platformFeeOnTokensSoldBps),
        referrerFee: calculateFee(tokensAllocated, rates.referrerFeeOnTokensSoldBps),
    };
}

/** What the project receives from `withdrawRaisedCapital`. */
export function calculateProjectProceeds(capitalRaised: bigint, rates: FeeRates): bigint {
    const { platformFee, referrerFee } = calculateCapitalFees(capitalRaised, rates);
    return capitalRaised - platformFee - referrerFee;
}

/**
 * Checks the fee values a project hands to `supplyTokens` against the recomputed ones.
 * Equality is strict: one unit off in either direction is rejected.
 */
export function assertTokenFeesMatch(tokensAllocated: bigint, supplied: FeeSplit, rates: FeeRates): void {
    const expected = calculateTokenFees(tokensAllocated, rates);
    if (supplied.platformFee !== expected.platformFee) {
        throw new ValidationError("InvalidFeeAmount", "Platform fee does not match the expected amount", {
            fee: "platform",
            expected: expected.platformFee,
            actual: supplied.platformFee,
        });
    }
    if (supplied.referrerFee !== expected.referrerFee) {
        throw new ValidationError("InvalidFeeAmount", "Referrer fee does not match the expected amount", {
            fee: "referrer",
            expected: expected.referrerFee,
            actual: supplied.referrerFee,
        });
    }
}
