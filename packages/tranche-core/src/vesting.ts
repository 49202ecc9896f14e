import { getAddress, getContractAddress } from "viem";
import { ValidationError } from "./errors";
import type { TokenLedger } from "./tokens";
import { VestingType } from "./types";
import type { Address, VestingConfig, VestingStatus } from "./types";

const WEEK = 604_800n;

export const MAX_VESTING_DURATION_SECONDS = 520n * WEEK;
export const MAX_VESTING_LOCKUP_SECONDS = 520n * WEEK;
export const RATE_DENOMINATOR = 10n ** 18n;

function invalid(reason: string, details: Record<string, unknown>): never {
    throw new ValidationError("InvalidVestingConfig", `Invalid vesting config: ${reason}`, details);
}

export function validateVestingConfig(config: VestingConfig, now: bigint): void {
    const {
        vestingType,
        vestingStartTime,
        vestingDurationSeconds,
        vestingCliffDurationSeconds,
        epochDurationSeconds,
        numberOfEpochs,
        tokenAllocationOnTGERate,
    } = config;

    if (vestingStartTime < 0n || vestingStartTime > now + MAX_VESTING_LOCKUP_SECONDS) {
        invalid("start exceeds the maximum lockup", { vestingStartTime, maximum: now + MAX_VESTING_LOCKUP_SECONDS });
    }
    if (vestingDurationSeconds <= 0n || vestingDurationSeconds > MAX_VESTING_DURATION_SECONDS) {
        invalid("duration out of bounds", { vestingDurationSeconds, maximum: MAX_VESTING_DURATION_SECONDS });
    }
    if (vestingCliffDurationSeconds < 0n || vestingCliffDurationSeconds > vestingDurationSeconds) {
        invalid("cliff exceeds duration", { vestingCliffDurationSeconds, vestingDurationSeconds });
    }
    if (tokenAllocationOnTGERate < 0n || tokenAllocationOnTGERate > RATE_DENOMINATOR) {
        invalid("initial release rate above 100%", { tokenAllocationOnTGERate });
    }
    if (vestingType === VestingType.LINEAR_EPOCH) {
        if (epochDurationSeconds <= 0n || numberOfEpochs <= 0n) {
            invalid("epoch parameters must be positive", { epochDurationSeconds, numberOfEpochs });
        }
        if (epochDurationSeconds * numberOfEpochs > vestingDurationSeconds) {
            invalid("epochs do not fit in the duration", {
                epochDurationSeconds,
                numberOfEpochs,
                vestingDurationSeconds,
            });
        }
    }
}

export function cliffEnd(config: VestingConfig): bigint {
    return config.vestingStartTime + config.vestingCliffDurationSeconds;
}

export function linearVestedAmount(total: bigint, config: VestingConfig, timestamp: bigint): bigint {
    if (timestamp < cliffEnd(config) || timestamp < config.vestingStartTime) {
        return 0n;
    }
    const elapsed = timestamp - config.vestingStartTime;
    if (elapsed >= config.vestingDurationSeconds) {
        return total;
    }
    return (total * elapsed) / config.vestingDurationSeconds;
}

export function linearEpochVestedAmount(total: bigint, config: VestingConfig, timestamp: bigint): bigint {
    if (timestamp < cliffEnd(config) || timestamp < config.vestingStartTime) {
        return 0n;
    }
    const elapsedEpochs = (timestamp - config.vestingStartTime) / config.epochDurationSeconds;
    if (elapsedEpochs >= config.numberOfEpochs) {
        // the final epoch absorbs the rounding remainder
        return total;
    }
    return elapsedEpochs * (total / config.numberOfEpochs);
}

export function vestedAmount(total: bigint, config: VestingConfig, timestamp: bigint): bigint {
    switch (config.vestingType) {
        case VestingType.LINEAR:
            return linearVestedAmount(total, config, timestamp);
        case VestingType.LINEAR_EPOCH:
            return linearEpochVestedAmount(total, config, timestamp);
    }
}

/** Split a token allocation into the part paid at claim time and the part that vests. */
export function splitInitialRelease(amount: bigint, config: VestingConfig): { initialRelease: bigint; vested: bigint } {
    const initialRelease = (amount * config.tokenAllocationOnTGERate) / RATE_DENOMINATOR;
    return { initialRelease, vested: amount - initialRelease };
}

/**
 * Holds an investor's vesting tokens at its own ledger address. The vesting total is the
 * current balance plus everything already released, so tokens arriving later vest on the
 * same schedule.
 */
export class VestingWallet {
    readonly address: Address;
    readonly beneficiary: Address;
    readonly token: Address;
    readonly config: Readonly<VestingConfig>;
    private readonly ledger: TokenLedger;
    private releasedAmount = 0n;

    constructor(args: {
        address: Address;
        beneficiary: Address;
        token: Address;
        config: VestingConfig;
        ledger: TokenLedger;
    }) {
        this.address = getAddress(args.address);
        this.beneficiary = getAddress(args.beneficiary);
        this.token = getAddress(args.token);
        this.config = Object.freeze({ ...args.config });
        this.ledger = args.ledger;
    }

    get released(): bigint {
        return this.releasedAmount;
    }

    private totalAllocation(): bigint {
        return this.ledger.balanceOf(this.token, this.address) + this.releasedAmount;
    }

    vestedAmount(timestamp: bigint): bigint {
        return vestedAmount(this.totalAllocation(), this.config, timestamp);
    }

    releasable(timestamp: bigint): bigint {
        return this.vestedAmount(timestamp) - this.releasedAmount;
    }

    release(timestamp: bigint): bigint {
        const amount = this.releasable(timestamp);
        if (amount === 0n) {
            return 0n;
        }
        this.ledger.transfer([{ token: this.token, from: this.address, to: this.beneficiary, amount }]);
        this.releasedAmount += amount;
        return amount;
    }

    status(timestamp: bigint): VestingStatus {
        return {
            start: this.config.vestingStartTime,
            end: this.config.vestingStartTime + this.config.vestingDurationSeconds,
            cliffEnd: cliffEnd(this.config),
            duration: this.config.vestingDurationSeconds,
            released: this.releasedAmount,
            releasable: this.releasable(timestamp),
            vestedAmount: this.vestedAmount(timestamp),
        };
    }
}

export interface VestingFactory {
    createVesting(args: { beneficiary: Address; token: Address; config: VestingConfig }): VestingWallet;
}

export class InMemoryVestingFactory implements VestingFactory {
    private readonly address: Address;
    private readonly ledger: TokenLedger;
    private nonce = 1n;

    constructor(args: { address: Address; ledger: TokenLedger }) {
        this.address = getAddress(args.address);
        this.ledger = args.ledger;
    }

    createVesting(args: { beneficiary: Address; token: Address; config: VestingConfig }): VestingWallet {
        const address = getContractAddress({ from: this.address, nonce: this.nonce });
        this.nonce += 1n;
        return new VestingWallet({ ...args, address, ledger: this.ledger });
    }
}
