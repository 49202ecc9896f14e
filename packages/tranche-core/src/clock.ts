import { ValidationError } from "./errors";

export interface Clock {
    /** Current time in unix seconds. Never decreases. */
    now(): bigint;
}

export class SystemClock implements Clock {
    private last = 0n;

    now(): bigint {
        const current = BigInt(Math.floor(Date.now() / 1000));
        // wall clock can step backwards (NTP); hold the high-water mark
        if (current > this.last) {
            this.last = current;
        }
        return this.last;
    }
}

export class ManualClock implements Clock {
    private current: bigint;

    constructor(start: bigint = 1_700_000_000n) {
        this.current = start;
    }

    now(): bigint {
        return this.current;
    }

    set(timestamp: bigint): void {
        if (timestamp < this.current) {
            throw new ValidationError("NonMonotonicClock", "Clock cannot move backwards", {
                current: this.current,
                requested: timestamp,
            });
        }
        this.current = timestamp;
    }

    advance(seconds: bigint): void {
        this.set(this.current + seconds);
    }
}
