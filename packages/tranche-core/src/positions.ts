import { getAddress, isAddressEqual, zeroAddress } from "viem";
import { StateError, ValidationError } from "./errors";
import type { Address, InvestorPosition } from "./types";

export function emptyPosition(): InvestorPosition {
    return {
        investedCapital: 0n,
        cachedInvestAmount: 0n,
        cachedTokenAllocationRate: 0n,
        hasRefunded: false,
        hasClaimedExcess: false,
        hasSettled: false,
    };
}

/** Share of the ask-token supply a position has actually bought: its rate scaled to the invested part. */
function effectiveAllocationRate(position: InvestorPosition): bigint {
    if (position.cachedInvestAmount === 0n) {
        return 0n;
    }
    return (position.cachedTokenAllocationRate * position.investedCapital) / position.cachedInvestAmount;
}

/**
 * Combines `source` into `destination`. The merged position is fully invested at the sum of both
 * effective rates, so its allocation matches what the two positions were owed apart. The flags
 * that block further excess claims carry over from either side.
 */
export function mergePositions(destination: InvestorPosition, source: InvestorPosition): InvestorPosition {
    const investedCapital = destination.investedCapital + source.investedCapital;
    return {
        investedCapital,
        cachedInvestAmount: investedCapital,
        cachedTokenAllocationRate: effectiveAllocationRate(destination) + effectiveAllocationRate(source),
        hasRefunded: false,
        hasClaimedExcess: destination.hasClaimedExcess || source.hasClaimedExcess,
        hasSettled: destination.hasSettled || source.hasSettled,
        vestingAddress: destination.vestingAddress,
    };
}

export type TransferResult = {
    positionId: bigint;
    merged: boolean;
};

/**
 * Arena of investor positions addressed by integer id, with an explicit owner map.
 * Each investor owns at most one live position; ids are never reused.
 */
export class PositionLedger {
    private lastPositionId = 0n;
    private readonly positions = new Map<bigint, InvestorPosition>();
    private readonly owners = new Map<bigint, Address>();
    private readonly positionIdByInvestor = new Map<Address, bigint>();

    get totalPositions(): number {
        return this.positions.size;
    }

    positionIdOf(investor: Address): bigint | undefined {
        return this.positionIdByInvestor.get(getAddress(investor));
    }

    ownerOf(positionId: bigint): Address | undefined {
        return this.owners.get(positionId);
    }

    get(positionId: bigint): InvestorPosition | undefined {
        const position = this.positions.get(positionId);
        return position ? { ...position } : undefined;
    }

    getByInvestor(investor: Address): InvestorPosition | undefined {
        const positionId = this.positionIdOf(investor);
        return positionId === undefined ? undefined : this.get(positionId);
    }

    /** Looks up an investor's position or fails with InvestorPositionDoesNotExist. */
    require(investor: Address): { positionId: bigint; position: InvestorPosition } {
        const positionId = this.positionIdOf(investor);
        const position = positionId === undefined ? undefined : this.get(positionId);
        if (positionId === undefined || !position) {
            throw new StateError("InvestorPositionDoesNotExist", "Investor has no position in this sale", {
                investor,
            });
        }
        return { positionId, position };
    }

    /** Returns the investor's position id, minting an empty position first if needed. */
    ensure(investor: Address): bigint {
        const owner = getAddress(investor);
        const existing = this.positionIdByInvestor.get(owner);
        if (existing !== undefined) {
            return existing;
        }
        this.lastPositionId += 1n;
        const positionId = this.lastPositionId;
        this.positions.set(positionId, emptyPosition());
        this.owners.set(positionId, owner);
        this.positionIdByInvestor.set(owner, positionId);
        return positionId;
    }

    update(positionId: bigint, patch: Partial<InvestorPosition>): void {
        const position = this.positions.get(positionId);
        if (!position) {
            throw new StateError("InvestorPositionDoesNotExist", "Position does not exist", { positionId });
        }
        if (patch.vestingAddress && position.vestingAddress) {
            throw new StateError("AlreadySettled", "Vesting address is already set", { positionId });
        }
        this.positions.set(positionId, { ...position, ...patch });
    }

    /**
     * Checks that `positionId`, owned by `from`, can move to `to`. Throws without touching
     * the arena; `transfer` runs the same checks.
     */
    assertTransferable(from: Address, to: Address, positionId: bigint): void {
        if (isAddressEqual(to, zeroAddress)) {
            throw new ValidationError("ZeroAddressProvided", "Cannot transfer a position to the zero address");
        }
        const owner = this.owners.get(positionId);
        const source = this.positions.get(positionId);
        if (!owner || !source) {
            throw new StateError("InvestorPositionDoesNotExist", "Position does not exist", { positionId });
        }
        if (!isAddressEqual(owner, from) || isAddressEqual(from, to) || source.hasRefunded) {
            throw new StateError("UnableToTransferInvestorPosition", "Position cannot be transferred", {
                positionId,
                owner,
                from,
                to,
                hasRefunded: source.hasRefunded,
            });
        }

        const destinationId = this.positionIdOf(to);
        const destination = destinationId === undefined ? undefined : this.positions.get(destinationId);
        if (destination?.hasRefunded) {
            throw new StateError("UnableToMergeInvestorPosition", "Destination position has refunded", {
                positionId,
                destinationPositionId: destinationId,
                to,
            });
        }
    }

    transfer(from: Address, to: Address, positionId: bigint): TransferResult {
        this.assertTransferable(from, to, positionId);

        const sender = getAddress(from);
        const receiver = getAddress(to);
        const source = this.positions.get(positionId);
        if (!source) {
            throw new StateError("InvestorPositionDoesNotExist", "Position does not exist", { positionId });
        }
        const destinationId = this.positionIdByInvestor.get(receiver);
        const destination = destinationId === undefined ? undefined : this.positions.get(destinationId);

        this.positionIdByInvestor.delete(sender);

        if (destinationId === undefined || !destination) {
            this.owners.set(positionId, receiver);
            this.positionIdByInvestor.set(receiver, positionId);
            return { positionId, merged: false };
        }

        this.positions.set(destinationId, mergePositions(destination, source));
        this.positions.delete(positionId);
        this.owners.delete(positionId);
        return { positionId: destinationId, merged: true };
    }
}
