import type { Address, Hex } from "viem";

export type { Address, Hex };

export enum SaleVariant {
    PRE_LIQUID_APPROVED = "pre-liquid-approved",
    SEALED_BID_AUCTION = "sealed-bid-auction",
    OPEN_APPLICATION = "open-application",
    FIXED_PRICE = "fixed-price",
}

export enum SalePhase {
    ACTIVE = "active",
    ENDED = "ended",
    RESULTS_PUBLISHED = "results-published",
    TOKENS_SUPPLIED = "tokens-supplied",
    CANCELED = "canceled",
}

export enum Capability {
    PLATFORM_ADMIN = "platform-admin",
    PROJECT_ADMIN = "project-admin",
    EITHER = "either",
    POSITION_OWNER = "position-owner",
}

// Discriminant values are part of signed messages; do not reorder.
export enum SaleAction {
    INVEST = 0,
    WITHDRAW_EXCESS_CAPITAL = 1,
    CLAIM_TOKEN_ALLOCATION = 2,
    APPROVE_VESTING_CONFIG = 3,
    TRANSFER_POSITION = 4,
}

export enum VestingType {
    LINEAR = "linear",
    LINEAR_EPOCH = "linear-epoch",
}

/** Affine elliptic-curve point. */
export type CurvePoint = {
    x: bigint;
    y: bigint;
};

export type SaleConfigInput = {
    salePeriodSeconds: bigint;
    refundPeriodSeconds: bigint;
    minimumInvestAmount: bigint;
    bidToken: Address;
    askToken?: Address;
    platformFeeOnCapitalRaisedBps: bigint;
    platformFeeOnTokensSoldBps: bigint;
    referrerFeeOnCapitalRaisedBps: bigint;
    referrerFeeOnTokensSoldBps: bigint;
    projectAdmin: Address;
    referrerFeeReceiver: Address;
    saleAddress: Address;
    chainId: bigint;
};

export type SaleConfig = Readonly<
    SaleConfigInput & {
        startTime: bigint;
        endTime: bigint;
        refundEndTime: bigint;
    }
>;

export type SaleStatus = {
    askToken?: Address;
    endTime: bigint;
    refundEndTime: bigint;
    hasEnded: boolean;
    isCanceled: boolean;
    totalCapitalInvested: bigint;
    totalTokensAllocated: bigint;
    totalCapitalRaised: bigint;
    totalCapitalWithdrawn: bigint;
    capitalRaisedPublished: boolean;
    resultsPublished: boolean;
    tokensSupplied: boolean;
    claimTokensRoot?: Hex;
    acceptedCapitalRoot?: Hex;
};

export type InvestorPosition = {
    investedCapital: bigint;
    cachedInvestAmount: bigint;
    cachedTokenAllocationRate: bigint;
    hasRefunded: boolean;
    hasClaimedExcess: boolean;
    hasSettled: boolean;
    vestingAddress?: Address;
};

export type VestingConfig = {
    vestingType: VestingType;
    vestingStartTime: bigint;
    vestingDurationSeconds: bigint;
    vestingCliffDurationSeconds: bigint;
    epochDurationSeconds: bigint;
    numberOfEpochs: bigint;
    /** Share released at claim time, 18 decimals (1e18 = 100%). */
    tokenAllocationOnTGERate: bigint;
};

export type VestingStatus = {
    start: bigint;
    end: bigint;
    cliffEnd: bigint;
    duration: bigint;
    released: bigint;
    releasable: bigint;
    vestedAmount: bigint;
};

export type SealedBid = {
    encryptedAmountOut: bigint;
    salt: bigint;
    publicKey: CurvePoint;
};

export type PlatformAddresses = {
    platformAdmin: Address;
    platformSigner: Address;
    platformFeeReceiver: Address;
};

export type DomainContext = {
    chainId: bigint;
    verifyingContract: Address;
};

export type SaleEvent =
    | { type: "CapitalInvested"; investor: Address; positionId: bigint; amount: bigint; timestamp: bigint }
    | { type: "CapitalRefunded"; investor: Address; positionId: bigint; amount: bigint }
    | { type: "ExcessCapitalWithdrawn"; investor: Address; positionId: bigint; amount: bigint }
    | { type: "CapitalRefundedAfterCancel"; investor: Address; positionId: bigint; amount: bigint }
    | { type: "SaleEnded"; endTime: bigint; refundEndTime: bigint }
    | { type: "SaleCanceled"; capitalReturned: bigint }
    | { type: "CapitalRaisedPublished"; capitalRaised: bigint }
    | { type: "SaleResultsPublished"; tokensAllocated: bigint; claimTokensRoot?: Hex }
    | { type: "AcceptedCapitalSet"; root: Hex }
    | { type: "TokensSuppliedForDistribution"; amount: bigint; platformFee: bigint; referrerFee: bigint }
    | { type: "CapitalWithdrawn"; amount: bigint; platformFee: bigint; referrerFee: bigint }
    | {
          type: "TokenAllocationClaimed";
          investor: Address;
          positionId: bigint;
          amount: bigint;
          initialRelease: bigint;
          vestingAddress?: Address;
      }
    | { type: "VestedTokensReleased"; investor: Address; vestingAddress: Address; amount: bigint }
    | { type: "InvestorPositionTransferred"; from: Address; to: Address; positionId: bigint; merged: boolean }
    | { type: "PlatformAddressesSynced"; addresses: PlatformAddresses }
    | { type: "EmergencyWithdraw"; receiver: Address; token: Address; amount: bigint };

export type SaleEventListener = (event: SaleEvent) => void;
