import { getAddress } from "viem";
import { ValidationError } from "./errors";
import type { Address } from "./types";

export type TokenTransfer = {
    token: Address;
    from: Address;
    to: Address;
    amount: bigint;
};

/**
 * Value-token movements. `transfer` applies the whole batch or nothing, which is what lets
 * a sale action stay all-or-nothing when it pays several parties.
 */
export interface TokenLedger {
    balanceOf(token: Address, account: Address): bigint;
    transfer(transfers: readonly TokenTransfer[]): void;
}

export class InMemoryTokenLedger implements TokenLedger {
    private readonly balances = new Map<string, bigint>();

    private key(token: Address, account: Address): string {
        return `${getAddress(token)}:${getAddress(account)}`;
    }

    balanceOf(token: Address, account: Address): bigint {
        return this.balances.get(this.key(token, account)) ?? 0n;
    }

    mint(token: Address, account: Address, amount: bigint): void {
        const key = this.key(token, account);
        this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    }

    transfer(transfers: readonly TokenTransfer[]): void {
        // Work on a scratch copy of the touched balances so a failing leg leaves nothing applied.
        const pending = new Map<string, bigint>();
        const read = (key: string) => pending.get(key) ?? this.balances.get(key) ?? 0n;

        for (const t of transfers) {
            if (t.amount < 0n) {
                throw new ValidationError("InvalidWithdrawAmount", "Transfer amount cannot be negative", {
                    token: t.token,
                    amount: t.amount,
                });
            }
            if (t.amount === 0n) {
                continue;
            }
            const fromKey = this.key(t.token, t.from);
            const toKey = this.key(t.token, t.to);
            const available = read(fromKey);
            if (available < t.amount) {
                throw new ValidationError("InsufficientBalance", `Insufficient balance of ${t.token} for ${t.from}`, {
                    token: t.token,
                    account: t.from,
                    expected: t.amount,
                    actual: available,
                });
            }
            pending.set(fromKey, available - t.amount);
            pending.set(toKey, read(toKey) + t.amount);
        }

        for (const [key, value] of pending) {
            this.balances.set(key, value);
        }
    }
}
