import { getAddress, hexToBigInt, isAddressEqual, isHex, size } from "viem";
import type { Clock } from "./clock";
import { createSaleConfig } from "./config";
import { AuthorizationError, StateError, ValidationError } from "./errors";
import { assertTokenFeesMatch, calculateCapitalFees } from "./fees";
import { makeLogger } from "./logger";
import type { Logger } from "./logger";
import { PositionLedger } from "./positions";
import { readPlatformAddresses } from "./registry";
import type { AddressRegistry } from "./registry";
import { SignatureVerifier, vestingConfigParams } from "./signatures";
import type { VerifiedAuthorization } from "./signatures";
import type { TokenLedger } from "./tokens";
import { Capability, SaleAction, SalePhase } from "./types";
import type {
    Address,
    DomainContext,
    Hex,
    InvestorPosition,
    PlatformAddresses,
    SaleConfig,
    SaleConfigInput,
    SaleEvent,
    SaleEventListener,
    SaleStatus,
    SaleVariant,
    VestingConfig,
    VestingStatus,
} from "./types";
import { splitInitialRelease, validateVestingConfig } from "./vesting";
import type { VestingFactory, VestingWallet } from "./vesting";

export type SaleDependencies = {
    registry: AddressRegistry;
    tokens: TokenLedger;
    vestingFactory: VestingFactory;
    clock: Clock;
    logger?: Logger;
};

export type SupplyTokensParams = {
    amount: bigint;
    platformFee: bigint;
    referrerFee: bigint;
};

/**
 * Lifecycle controller shared by every sale variant.
 *
 * Active → Ended → ResultsPublished → TokensSupplied, with Canceled reachable until tokens
 * are supplied. Each public action takes the caller first, checks sale state, then
 * arguments, then authorization, and only then writes. Nothing is written by an action
 * that throws.
 */
export abstract class Sale {
    abstract readonly variant: SaleVariant;

    protected readonly config: SaleConfig;
    protected readonly status: SaleStatus;
    protected readonly positions = new PositionLedger();
    protected readonly verifier: SignatureVerifier;
    protected readonly tokens: TokenLedger;
    protected readonly clock: Clock;
    protected readonly logger: Logger;
    protected platform: PlatformAddresses;

    private readonly registry: AddressRegistry;
    private readonly vestingFactory: VestingFactory;
    private readonly vestingWallets = new Map<Address, VestingWallet>();
    private readonly listeners = new Set<SaleEventListener>();
    private capitalWithdrawn = false;

    constructor(input: SaleConfigInput, deps: SaleDependencies) {
        this.clock = deps.clock;
        this.tokens = deps.tokens;
        this.registry = deps.registry;
        this.vestingFactory = deps.vestingFactory;
        this.config = createSaleConfig(input, this.clock.now());
        this.platform = readPlatformAddresses(this.registry);
        this.verifier = new SignatureVerifier({
            domain: { chainId: this.config.chainId, verifyingContract: this.config.saleAddress },
        });
        this.logger = deps.logger ?? makeLogger({ sale: this.config.saleAddress });
        this.status = {
            askToken: this.config.askToken,
            endTime: this.config.endTime,
            refundEndTime: this.config.refundEndTime,
            hasEnded: false,
            isCanceled: false,
            totalCapitalInvested: 0n,
            totalTokensAllocated: 0n,
            totalCapitalRaised: 0n,
            totalCapitalWithdrawn: 0n,
            capitalRaisedPublished: false,
            resultsPublished: false,
            tokensSupplied: false,
        };
    }

    // ---------------------------------------------------------------------------------
    // Views

    saleConfiguration(): SaleConfig {
        return this.config;
    }

    saleStatus(): SaleStatus {
        return { ...this.status };
    }

    /** Chain and sale address every authorization for this sale is signed over. */
    signingDomain(): DomainContext {
        return this.verifier.domainContext;
    }

    platformAddresses(): PlatformAddresses {
        return { ...this.platform };
    }

    phase(): SalePhase {
        if (this.status.isCanceled) return SalePhase.CANCELED;
        if (this.status.tokensSupplied) return SalePhase.TOKENS_SUPPLIED;
        if (this.status.resultsPublished) return SalePhase.RESULTS_PUBLISHED;
        if (this.isEnded()) return SalePhase.ENDED;
        return SalePhase.ACTIVE;
    }

    investorPosition(investor: Address): InvestorPosition | undefined {
        return this.positions.getByInvestor(investor);
    }

    investorPositionById(positionId: bigint): InvestorPosition | undefined {
        return this.positions.get(positionId);
    }

    positionIdOf(investor: Address): bigint | undefined {
        return this.positions.positionIdOf(investor);
    }

    ownerOf(positionId: bigint): Address | undefined {
        return this.positions.ownerOf(positionId);
    }

    vestingStatus(investor: Address): VestingStatus | undefined {
        const vestingAddress = this.positions.getByInvestor(investor)?.vestingAddress;
        const wallet = vestingAddress ? this.vestingWallets.get(vestingAddress) : undefined;
        return wallet?.status(this.clock.now());
    }

    onEvent(listener: SaleEventListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    // ---------------------------------------------------------------------------------
    // Lifecycle

    end(caller: Address): void {
        this.requireNotCanceled();
        if (this.isEnded()) {
            throw new StateError("SaleHasEnded", "Sale has already ended", { endTime: this.status.endTime });
        }
        this.requireCapability(caller, Capability.EITHER);

        const now = this.clock.now();
        this.status.hasEnded = true;
        this.status.endTime = now;
        this.status.refundEndTime = now + this.config.refundPeriodSeconds;
        this.emit({ type: "SaleEnded", endTime: now, refundEndTime: this.status.refundEndTime });
    }

    cancel(caller: Address): void {
        this.requireCapability(caller, Capability.PROJECT_ADMIN);
        this.requireNotCanceled();
        if (this.status.tokensSupplied) {
            throw new StateError("TokensAlreadySupplied", "Sale cannot be canceled once tokens are supplied");
        }
        this.assertCancelable();

        // Withdrawn capital has to come back before investors can be repaid.
        const capitalReturned = this.status.totalCapitalWithdrawn;
        if (capitalReturned > 0n) {
            this.tokens.transfer([
                {
                    token: this.config.bidToken,
                    from: this.config.projectAdmin,
                    to: this.config.saleAddress,
                    amount: capitalReturned,
                },
            ]);
        }

        this.status.totalCapitalWithdrawn = 0n;
        this.status.isCanceled = true;
        this.emit({ type: "SaleCanceled", capitalReturned });
    }

    /** Variant hook: extra conditions under which the project may no longer cancel. */
    protected assertCancelable(): void {}

    // ---------------------------------------------------------------------------------
    // Investor capital

    refund(caller: Address): bigint {
        const investor = getAddress(caller);
        this.requireNotCanceled();
        this.requireEnded();
        if (this.clock.now() >= this.status.refundEndTime) {
            throw new StateError("RefundPeriodIsOver", "Refund period is over", {
                refundEndTime: this.status.refundEndTime,
            });
        }

        const { positionId, position } = this.requirePosition(investor);
        if (position.hasRefunded) {
            throw new StateError("InvestorHasRefunded", "Investor has already refunded", { investor });
        }
        if (position.hasClaimedExcess) {
            throw new StateError("InvestorHasClaimedExcess", "Investor has already withdrawn excess capital", {
                investor,
            });
        }
        const amount = position.investedCapital;
        if (amount === 0n) {
            throw new ValidationError("InvalidRefundAmount", "Investor has no capital to refund", { investor });
        }

        this.payOut(investor, amount);
        this.positions.update(positionId, { investedCapital: 0n, hasRefunded: true });
        this.status.totalCapitalInvested -= amount;
        this.emit({ type: "CapitalRefunded", investor, positionId, amount });
        return amount;
    }

    withdrawInvestedCapitalIfCanceled(caller: Address): bigint {
        const investor = getAddress(caller);
        if (!this.status.isCanceled) {
            throw new StateError("SaleIsNotCanceled", "Sale is not canceled");
        }

        const { positionId, position } = this.requirePosition(investor);
        if (position.hasRefunded) {
            throw new StateError("InvestorHasRefunded", "Investor has already refunded", { investor });
        }
        const amount = position.investedCapital;
        if (amount === 0n) {
            throw new ValidationError("InvalidWithdrawAmount", "No invested capital left to withdraw", { investor });
        }

        this.payOut(investor, amount);
        this.positions.update(positionId, { investedCapital: 0n });
        this.status.totalCapitalInvested -= amount;
        this.emit({ type: "CapitalRefundedAfterCancel", investor, positionId, amount });
        return amount;
    }

    // ---------------------------------------------------------------------------------
    // Settlement

    setAcceptedCapital(caller: Address, root: Hex): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        this.requireNotCanceled();
        if (this.status.acceptedCapitalRoot !== undefined) {
            throw new StateError("AcceptedCapitalAlreadySet", "Accepted capital root is already set");
        }
        this.assertRoot(root, "acceptedCapitalRoot");

        this.status.acceptedCapitalRoot = root;
        this.emit({ type: "AcceptedCapitalSet", root });
    }

    supplyTokens(caller: Address, params: SupplyTokensParams): void {
        this.requireCapability(caller, Capability.PROJECT_ADMIN);
        this.requireNotCanceled();
        if (!this.status.resultsPublished) {
            throw new StateError("SaleResultsNotPublished", "Sale results have not been published");
        }
        if (this.status.tokensSupplied) {
            throw new StateError("TokensAlreadySupplied", "Tokens have already been supplied");
        }
        const askToken = this.requireAskToken();
        if (params.amount !== this.status.totalTokensAllocated) {
            throw new ValidationError("InvalidTokenAmountSupplied", "Supplied amount does not match allocation", {
                expected: this.status.totalTokensAllocated,
                actual: params.amount,
            });
        }
        assertTokenFeesMatch(this.status.totalTokensAllocated, params, this.config);

        const from = this.config.projectAdmin;
        this.tokens.transfer([
            { token: askToken, from, to: this.config.saleAddress, amount: params.amount },
            { token: askToken, from, to: this.platform.platformFeeReceiver, amount: params.platformFee },
            { token: askToken, from, to: this.config.referrerFeeReceiver, amount: params.referrerFee },
        ]);
        this.status.tokensSupplied = true;
        this.emit({ type: "TokensSuppliedForDistribution", ...params });
    }

    withdrawRaisedCapital(caller: Address): bigint {
        this.requireCapability(caller, Capability.PROJECT_ADMIN);
        this.requireNotCanceled();
        this.requireRefundPeriodOver();
        if (!this.status.capitalRaisedPublished) {
            throw new StateError("CapitalRaisedNotPublished", "Capital raised has not been published");
        }
        if (this.capitalWithdrawn) {
            throw new StateError("CapitalAlreadyWithdrawn", "Capital has already been withdrawn");
        }

        const capitalRaised = this.status.totalCapitalRaised;
        const { platformFee, referrerFee } = calculateCapitalFees(capitalRaised, this.config);
        const amount = capitalRaised - platformFee - referrerFee;
        const token = this.config.bidToken;
        const from = this.config.saleAddress;
        this.tokens.transfer([
            { token, from, to: this.config.projectAdmin, amount },
            { token, from, to: this.platform.platformFeeReceiver, amount: platformFee },
            { token, from, to: this.config.referrerFeeReceiver, amount: referrerFee },
        ]);

        this.capitalWithdrawn = true;
        this.status.totalCapitalWithdrawn = capitalRaised;
        this.emit({ type: "CapitalWithdrawn", amount, platformFee, referrerFee });
        return amount;
    }

    releaseVestedTokens(caller: Address): bigint {
        const investor = getAddress(caller);
        const { position } = this.requirePosition(investor);
        const wallet = position.vestingAddress ? this.vestingWallets.get(position.vestingAddress) : undefined;
        if (!wallet) {
            throw new StateError("VestingNotCreated", "Investor has no vesting wallet", { investor });
        }

        const amount = wallet.release(this.clock.now());
        if (amount > 0n) {
            this.emit({ type: "VestedTokensReleased", investor, vestingAddress: wallet.address, amount });
        }
        return amount;
    }

    // ---------------------------------------------------------------------------------
    // Positions

    transferInvestorPosition(caller: Address, from: Address, to: Address, positionId: bigint): void {
        this.requireTransferWindow();
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);

        const result = this.positions.transfer(from, to, positionId);
        this.emit({
            type: "InvestorPositionTransferred",
            from: getAddress(from),
            to: getAddress(to),
            positionId,
            merged: result.merged,
        });
    }

    /** Owner-signed transfer; anyone may relay it. */
    transferInvestorPositionWithAuthorization(
        caller: Address,
        from: Address,
        to: Address,
        positionId: bigint,
        signature: Hex,
    ): void {
        this.requireTransferWindow();
        this.positions.assertTransferable(from, to, positionId);
        const owner = this.positions.ownerOf(positionId);
        if (!owner) {
            throw new StateError("InvestorPositionDoesNotExist", "Position does not exist", { positionId });
        }
        const authorization = this.verifier.verify({
            action: SaleAction.TRANSFER_POSITION,
            investor: owner,
            params: [hexToBigInt(getAddress(to)), positionId],
            signature,
            expectedSigner: owner,
        });
        this.requireCapability(authorization.signer, Capability.POSITION_OWNER, owner);

        const result = this.positions.transfer(from, to, positionId);
        this.verifier.consume(authorization);
        this.logger.debug({ relayer: getAddress(caller), positionId }, "relayed position transfer");
        this.emit({
            type: "InvestorPositionTransferred",
            from: getAddress(from),
            to: getAddress(to),
            positionId,
            merged: result.merged,
        });
    }

    // ---------------------------------------------------------------------------------
    // Platform

    syncPlatformAddresses(caller: Address): PlatformAddresses {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        const addresses = readPlatformAddresses(this.registry);
        this.platform = addresses;
        this.emit({ type: "PlatformAddressesSynced", addresses: { ...addresses } });
        return { ...addresses };
    }

    emergencyWithdraw(caller: Address, receiver: Address, token: Address, amount: bigint): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        if (amount <= 0n) {
            throw new ValidationError("ZeroValueProvided", "Amount must be positive", { amount });
        }
        this.tokens.transfer([{ token, from: this.config.saleAddress, to: getAddress(receiver), amount }]);
        this.emit({ type: "EmergencyWithdraw", receiver: getAddress(receiver), token, amount });
    }

    // ---------------------------------------------------------------------------------
    // Shared steps for variants

    protected isEnded(): boolean {
        return this.status.hasEnded || this.clock.now() >= this.status.endTime;
    }

    protected requireCapability(caller: Address, capability: Capability, positionOwner?: Address): void {
        const isPlatform = isAddressEqual(caller, this.platform.platformAdmin);
        const isProject = isAddressEqual(caller, this.config.projectAdmin);

        switch (capability) {
            case Capability.PLATFORM_ADMIN:
                if (!isPlatform) {
                    throw new AuthorizationError("NotCalledByPlatform", "Caller is not the platform admin", {
                        caller,
                    });
                }
                return;
            case Capability.PROJECT_ADMIN:
                if (!isProject) {
                    throw new AuthorizationError("NotCalledByProject", "Caller is not the project admin", { caller });
                }
                return;
            case Capability.EITHER:
                if (!isPlatform && !isProject) {
                    throw new AuthorizationError(
                        "NotCalledByPlatformOrProject",
                        "Caller is neither the platform nor the project admin",
                        { caller },
                    );
                }
                return;
            case Capability.POSITION_OWNER:
                if (!positionOwner || !isAddressEqual(caller, positionOwner)) {
                    throw new AuthorizationError("NotPositionOwner", "Caller does not own the position", {
                        caller,
                        owner: positionOwner,
                    });
                }
                return;
        }
    }

    protected requireNotCanceled(): void {
        if (this.status.isCanceled) {
            throw new StateError("SaleIsCanceled", "Sale is canceled");
        }
    }

    protected requireActive(): void {
        this.requireNotCanceled();
        if (this.isEnded()) {
            throw new StateError("SaleHasEnded", "Sale has ended", { endTime: this.status.endTime });
        }
    }

    protected requireEnded(): void {
        if (!this.isEnded()) {
            throw new StateError("SaleHasNotEnded", "Sale has not ended", { endTime: this.status.endTime });
        }
    }

    protected requireRefundPeriodOver(): void {
        this.requireEnded();
        if (this.clock.now() < this.status.refundEndTime) {
            throw new StateError("RefundPeriodIsNotOver", "Refund period is not over", {
                refundEndTime: this.status.refundEndTime,
            });
        }
    }

    /** Positions move only between the close of the refund window and result publication. */
    protected requireTransferWindow(): void {
        this.requireNotCanceled();
        this.requireRefundPeriodOver();
        if (this.status.resultsPublished) {
            throw new StateError("SaleResultsAlreadyPublished", "Positions are locked once results are published");
        }
    }

    protected requirePosition(investor: Address): { positionId: bigint; position: InvestorPosition } {
        return this.positions.require(investor);
    }

    protected requireAskToken(): Address {
        if (!this.status.askToken) {
            throw new ValidationError("AskTokenUnavailable", "Ask token is not known yet");
        }
        return this.status.askToken;
    }

    protected assertRoot(root: Hex, name: string): void {
        if (!isHex(root) || size(root) !== 32 || hexToBigInt(root) === 0n) {
            throw new ValidationError("ZeroValueProvided", `${name} must be a non-zero 32-byte hash`, { root });
        }
    }

    /** Records the ask token for the sale, or checks it against the configured one. */
    protected resolveAskToken(askToken: Address | undefined): Address | undefined {
        if (askToken === undefined) {
            return this.status.askToken;
        }
        if (this.status.askToken !== undefined && !isAddressEqual(askToken, this.status.askToken)) {
            throw new ValidationError("AskTokenUnavailable", "Ask token differs from the configured one", {
                expected: this.status.askToken,
                actual: askToken,
            });
        }
        return getAddress(askToken);
    }

    protected assertInvestable(investor: Address, amount: bigint): void {
        this.requireActive();
        if (amount <= 0n || amount < this.config.minimumInvestAmount) {
            throw new ValidationError("InvalidInvestAmount", "Investment is below the minimum", {
                investor,
                minimum: this.config.minimumInvestAmount,
                actual: amount,
            });
        }
        if (this.positions.getByInvestor(investor)?.hasRefunded) {
            throw new StateError("InvestorHasRefunded", "Investor has refunded and cannot invest again", {
                investor,
            });
        }
    }

    /** Pulls `amount` from the investor and books it on their position. */
    protected commitInvestment(
        investor: Address,
        amount: bigint,
        authorization: VerifiedAuthorization,
        patch: (position: InvestorPosition) => Partial<InvestorPosition> = () => ({}),
    ): bigint {
        this.tokens.transfer([{ token: this.config.bidToken, from: investor, to: this.config.saleAddress, amount }]);

        const positionId = this.positions.ensure(investor);
        const position = this.positions.get(positionId);
        if (!position) {
            throw new StateError("InvestorPositionDoesNotExist", "Position does not exist", { positionId });
        }
        this.positions.update(positionId, {
            ...patch(position),
            investedCapital: position.investedCapital + amount,
        });
        this.status.totalCapitalInvested += amount;
        this.verifier.consume(authorization);

        const timestamp = this.clock.now();
        this.emit({ type: "CapitalInvested", investor, positionId, amount, timestamp });
        return positionId;
    }

    protected assertExcessWithdrawable(investor: Address, amount: bigint): {
        positionId: bigint;
        position: InvestorPosition;
    } {
        this.requireNotCanceled();
        const found = this.requirePosition(investor);
        if (found.position.hasRefunded) {
            throw new StateError("InvestorHasRefunded", "Investor has already refunded", { investor });
        }
        if (found.position.hasClaimedExcess) {
            throw new StateError("InvestorHasClaimedExcess", "Excess capital has already been withdrawn", {
                investor,
            });
        }
        if (amount <= 0n || amount > found.position.investedCapital) {
            throw new ValidationError("InvalidWithdrawAmount", "Excess amount is out of range", {
                investor,
                invested: found.position.investedCapital,
                actual: amount,
            });
        }
        return found;
    }

    protected commitExcessWithdrawal(
        investor: Address,
        positionId: bigint,
        amount: bigint,
        patch: Partial<InvestorPosition> = {},
    ): void {
        const position = this.positions.get(positionId);
        if (!position) {
            throw new StateError("InvestorPositionDoesNotExist", "Position does not exist", { positionId });
        }
        this.payOut(investor, amount);
        this.positions.update(positionId, {
            ...patch,
            investedCapital: position.investedCapital - amount,
            hasClaimedExcess: true,
        });
        this.status.totalCapitalInvested -= amount;
        this.emit({ type: "ExcessCapitalWithdrawn", investor, positionId, amount });
    }

    protected publishCapitalRaised(capitalRaised: bigint): void {
        if (this.status.capitalRaisedPublished) {
            throw new StateError("CapitalRaisedAlreadyPublished", "Capital raised has already been published");
        }
        if (capitalRaised < 0n || capitalRaised > this.status.totalCapitalInvested) {
            throw new ValidationError("InvalidCapitalRaised", "Capital raised exceeds capital invested", {
                expected: this.status.totalCapitalInvested,
                actual: capitalRaised,
            });
        }
    }

    protected assertClaimable(investor: Address): { positionId: bigint; position: InvestorPosition } {
        this.requireNotCanceled();
        if (!this.status.tokensSupplied) {
            throw new StateError("TokensNotSupplied", "Tokens have not been supplied");
        }
        const found = this.requirePosition(investor);
        if (found.position.hasRefunded) {
            throw new StateError("InvestorHasRefunded", "Investor has refunded", { investor });
        }
        if (found.position.hasSettled) {
            throw new StateError("AlreadySettled", "Token allocation has already been claimed", { investor });
        }
        return found;
    }

    protected verifyVestingConfig(investor: Address, config: VestingConfig, signature: Hex): VerifiedAuthorization {
        validateVestingConfig(config, this.clock.now());
        return this.verifier.verify({
            action: SaleAction.APPROVE_VESTING_CONFIG,
            investor,
            params: vestingConfigParams(config),
            signature,
            expectedSigner: this.platform.platformSigner,
        });
    }

    /**
     * Pays the initial release to the investor and locks the remainder in a new vesting
     * wallet. The vesting wallet is created only when something is left to vest.
     */
    protected settleTokenAllocation(
        investor: Address,
        positionId: bigint,
        amount: bigint,
        vestingConfig: VestingConfig,
        authorizations: readonly VerifiedAuthorization[],
    ): void {
        if (amount <= 0n) {
            throw new ValidationError("InvalidClaimAmount", "Nothing to claim", { investor, actual: amount });
        }
        const askToken = this.requireAskToken();
        const available = this.tokens.balanceOf(askToken, this.config.saleAddress);
        if (available < amount) {
            throw new ValidationError("InsufficientBalance", "Sale holds fewer tokens than the claim", {
                expected: amount,
                actual: available,
            });
        }

        const { initialRelease, vested } = splitInitialRelease(amount, vestingConfig);
        const wallet =
            vested > 0n
                ? this.vestingFactory.createVesting({ beneficiary: investor, token: askToken, config: vestingConfig })
                : undefined;
        const from = this.config.saleAddress;
        this.tokens.transfer([
            { token: askToken, from, to: investor, amount: initialRelease },
            ...(wallet ? [{ token: askToken, from, to: wallet.address, amount: vested }] : []),
        ]);

        if (wallet) {
            this.vestingWallets.set(wallet.address, wallet);
        }
        this.positions.update(positionId, { hasSettled: true, vestingAddress: wallet?.address });
        for (const authorization of authorizations) {
            this.verifier.consume(authorization);
        }
        this.emit({
            type: "TokenAllocationClaimed",
            investor,
            positionId,
            amount,
            initialRelease,
            vestingAddress: wallet?.address,
        });
    }

    protected payOut(investor: Address, amount: bigint): void {
        this.tokens.transfer([{ token: this.config.bidToken, from: this.config.saleAddress, to: investor, amount }]);
    }

    protected emit(event: SaleEvent): void {
        this.logger.info({ ...event }, event.type);
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (err) {
                this.logger.warn({ err, event: event.type }, "sale event listener failed");
            }
        }
    }
}
