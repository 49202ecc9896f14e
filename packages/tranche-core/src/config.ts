import { getAddress, isAddress, zeroAddress } from "viem";
import { ValidationError } from "./errors";
import { assertValidBps } from "./fees";
import type { Address, SaleConfig, SaleConfigInput } from "./types";

const HOUR = 3_600n;
const WEEK = 604_800n;

export const MIN_SALE_PERIOD_SECONDS = HOUR;
export const MAX_SALE_PERIOD_SECONDS = 12n * WEEK;
export const MIN_REFUND_PERIOD_SECONDS = HOUR;
export const MAX_REFUND_PERIOD_SECONDS = 2n * WEEK;

function requireAddress(value: Address | undefined, name: string, { allowZero = false } = {}): Address {
    if (value === undefined || !isAddress(value, { strict: false })) {
        throw new ValidationError("ZeroAddressProvided", `${name} is not a valid address`, { name, actual: value });
    }
    const address = getAddress(value);
    if (!allowZero && address === zeroAddress) {
        throw new ValidationError("ZeroAddressProvided", `${name} cannot be the zero address`, { name });
    }
    return address;
}

function requirePeriod(value: bigint, min: bigint, max: bigint, name: string): void {
    if (value < min || value > max) {
        throw new ValidationError("InvalidPeriodConfig", `${name} must be between ${min} and ${max} seconds`, {
            name,
            actual: value,
            min,
            max,
        });
    }
}

/** Validates the caller's input and freezes it together with the computed timestamps. */
export function createSaleConfig(input: SaleConfigInput, now: bigint): SaleConfig {
    requirePeriod(input.salePeriodSeconds, MIN_SALE_PERIOD_SECONDS, MAX_SALE_PERIOD_SECONDS, "salePeriodSeconds");
    requirePeriod(
        input.refundPeriodSeconds,
        MIN_REFUND_PERIOD_SECONDS,
        MAX_REFUND_PERIOD_SECONDS,
        "refundPeriodSeconds",
    );

    if (input.minimumInvestAmount <= 0n) {
        throw new ValidationError("ZeroValueProvided", "minimumInvestAmount must be positive", {
            actual: input.minimumInvestAmount,
        });
    }
    if (input.chainId <= 0n) {
        throw new ValidationError("ZeroValueProvided", "chainId must be positive", { actual: input.chainId });
    }

    assertValidBps(input.platformFeeOnCapitalRaisedBps, "platformFeeOnCapitalRaisedBps");
    assertValidBps(input.platformFeeOnTokensSoldBps, "platformFeeOnTokensSoldBps");
    assertValidBps(input.referrerFeeOnCapitalRaisedBps, "referrerFeeOnCapitalRaisedBps");
    assertValidBps(input.referrerFeeOnTokensSoldBps, "referrerFeeOnTokensSoldBps");
    if (input.platformFeeOnCapitalRaisedBps + input.referrerFeeOnCapitalRaisedBps > 10_000n) {
        throw new ValidationError("InvalidFeeConfig", "Capital fees exceed 100%", {
            platform: input.platformFeeOnCapitalRaisedBps,
            referrer: input.referrerFeeOnCapitalRaisedBps,
        });
    }

    const hasReferrerFees = input.referrerFeeOnCapitalRaisedBps > 0n || input.referrerFeeOnTokensSoldBps > 0n;
    const endTime = now + input.salePeriodSeconds;

    return Object.freeze({
        ...input,
        bidToken: requireAddress(input.bidToken, "bidToken"),
        askToken: input.askToken === undefined ? undefined : requireAddress(input.askToken, "askToken"),
        projectAdmin: requireAddress(input.projectAdmin, "projectAdmin"),
        referrerFeeReceiver: requireAddress(input.referrerFeeReceiver, "referrerFeeReceiver", {
            allowZero: !hasReferrerFees,
        }),
        saleAddress: requireAddress(input.saleAddress, "saleAddress"),
        startTime: now,
        endTime,
        refundEndTime: endTime + input.refundPeriodSeconds,
    });
}
