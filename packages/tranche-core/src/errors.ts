export type AuthorizationErrorCode =
    | "NotCalledByPlatform"
    | "NotCalledByProject"
    | "NotCalledByPlatformOrProject"
    | "NotPositionOwner"
    | "InvalidSignature";

export type StateErrorCode =
    | "SaleHasEnded"
    | "SaleHasNotEnded"
    | "SaleIsCanceled"
    | "SaleIsNotCanceled"
    | "RefundPeriodIsNotOver"
    | "RefundPeriodIsOver"
    | "CapitalRaisedAlreadyPublished"
    | "CapitalRaisedNotPublished"
    | "CapitalAlreadyWithdrawn"
    | "SaleResultsAlreadyPublished"
    | "SaleResultsNotPublished"
    | "TokensAlreadySupplied"
    | "TokensNotSupplied"
    | "AcceptedCapitalAlreadySet"
    | "AcceptedCapitalNotSet"
    | "CancelLocked"
    | "CancelNotLocked"
    | "PrivateKeyNotPublished"
    | "InvestorPositionDoesNotExist"
    | "InvestorHasRefunded"
    | "InvestorHasClaimedExcess"
    | "AlreadySettled"
    | "VestingNotCreated"
    | "UnableToTransferInvestorPosition"
    | "UnableToMergeInvestorPosition";

export type ValidationErrorCode =
    | "ZeroAddressProvided"
    | "ZeroValueProvided"
    | "InvalidPeriodConfig"
    | "InvalidFeeConfig"
    | "InvalidInvestAmount"
    | "InvalidPositionAmount"
    | "InvalidRefundAmount"
    | "InvalidWithdrawAmount"
    | "InvalidClaimAmount"
    | "InvalidCapitalRaised"
    | "InvalidTokenAmountSupplied"
    | "InvalidFeeAmount"
    | "InvalidVestingConfig"
    | "InvalidSalt"
    | "AskTokenUnavailable"
    | "InsufficientBalance"
    | "NonMonotonicClock"
    | "InvalidAskTokenDecimals"
    | "EmptyMerkleEntries"
    | "DuplicateMerkleEntry";

export type ReplayErrorCode = "SignatureAlreadyUsed" | "ExcessCapitalAlreadyClaimed";

export type CryptoErrorCode = "InvalidBidPublicKey" | "InvalidBidPrivateKey";

export type MerkleErrorCode = "InvalidMerkleProof";

export type SaleErrorCode =
    | AuthorizationErrorCode
    | StateErrorCode
    | ValidationErrorCode
    | ReplayErrorCode
    | CryptoErrorCode
    | MerkleErrorCode;

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure raised by the engine. Actions throw before any state is
 * written, so catching a SaleError always leaves the sale exactly as it was.
 */
export class SaleError extends Error {
    public readonly code: SaleErrorCode;
    public readonly details?: ErrorDetails;

    constructor(code: SaleErrorCode, message: string, details?: ErrorDetails) {
        super(message);
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = "SaleError";
        this.code = code;
        this.details = details;
    }
}

export class AuthorizationError extends SaleError {
    declare readonly code: AuthorizationErrorCode;

    constructor(code: AuthorizationErrorCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
        this.name = "AuthorizationError";
    }
}

export class StateError extends SaleError {
    declare readonly code: StateErrorCode;

    constructor(code: StateErrorCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
        this.name = "StateError";
    }
}

export class ValidationError extends SaleError {
    declare readonly code: ValidationErrorCode;

    constructor(code: ValidationErrorCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
        this.name = "ValidationError";
    }
}

export class ReplayError extends SaleError {
    declare readonly code: ReplayErrorCode;

    constructor(code: ReplayErrorCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
        this.name = "ReplayError";
    }
}

export class CryptoError extends SaleError {
    declare readonly code: CryptoErrorCode;

    constructor(code: CryptoErrorCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
        this.name = "CryptoError";
    }
}

export class MerkleError extends SaleError {
    declare readonly code: MerkleErrorCode;

    constructor(code: MerkleErrorCode, message: string, details?: ErrorDetails) {
        super(code, message, details);
        this.name = "MerkleError";
    }
}
