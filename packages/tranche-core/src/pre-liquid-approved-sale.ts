import { getAddress } from "viem";
import { StateError, ValidationError } from "./errors";
import { Sale } from "./sale";
import { Capability, SaleAction, SaleVariant } from "./types";
import type { Address, Hex, SaleStatus, VestingConfig } from "./types";
import { RATE_DENOMINATOR } from "./vesting";

export type PreLiquidApprovedStatus = SaleStatus & {
    askTokenTotalSupply: bigint;
};

export type PreLiquidInvestParams = {
    amount: bigint;
    /** Maximum capital the investor may hold after this investment. */
    investAmount: bigint;
    /** Share of the ask-token supply bought with `investAmount`, 18 decimals. */
    tokenAllocationRate: bigint;
    signature: Hex;
};

export type PreLiquidExcessCapitalParams = {
    amount: bigint;
    investAmount: bigint;
    tokenAllocationRate: bigint;
    signature: Hex;
};

export type PublishPreLiquidResultsParams = {
    tokensAllocated: bigint;
    askTokenTotalSupply: bigint;
    askToken?: Address;
};

export type PreLiquidClaimParams = {
    vestingConfig: VestingConfig;
    vestingSignature: Hex;
};

/**
 * Sale for a token that does not exist yet. Every investment carries a signed cap and
 * allocation rate; the token supply becomes known only when results are published.
 */
export class PreLiquidApprovedSale extends Sale {
    readonly variant = SaleVariant.PRE_LIQUID_APPROVED;

    private askTokenTotalSupply = 0n;

    override saleStatus(): PreLiquidApprovedStatus {
        return { ...super.saleStatus(), askTokenTotalSupply: this.askTokenTotalSupply };
    }

    invest(caller: Address, params: PreLiquidInvestParams): bigint {
        const investor = getAddress(caller);
        this.assertInvestable(investor, params.amount);
        this.assertAllocationRate(params.tokenAllocationRate);
        const authorization = this.verifier.verify({
            action: SaleAction.INVEST,
            investor,
            params: [params.amount, params.investAmount, params.tokenAllocationRate],
            signature: params.signature,
            expectedSigner: this.platform.platformSigner,
        });

        const invested = (this.positions.getByInvestor(investor)?.investedCapital ?? 0n) + params.amount;
        if (invested > params.investAmount) {
            throw new ValidationError("InvalidPositionAmount", "Investment exceeds the authorized amount", {
                investor,
                expected: params.investAmount,
                actual: invested,
            });
        }

        return this.commitInvestment(investor, params.amount, authorization, () => ({
            cachedInvestAmount: params.investAmount,
            cachedTokenAllocationRate: params.tokenAllocationRate,
        }));
    }

    withdrawExcessInvestedCapital(caller: Address, params: PreLiquidExcessCapitalParams): bigint {
        const investor = getAddress(caller);
        const { positionId, position } = this.assertExcessWithdrawable(investor, params.amount);
        this.assertAllocationRate(params.tokenAllocationRate);
        const authorization = this.verifier.verify({
            action: SaleAction.WITHDRAW_EXCESS_CAPITAL,
            investor,
            params: [params.amount, params.investAmount, params.tokenAllocationRate],
            signature: params.signature,
            expectedSigner: this.platform.platformSigner,
        });

        const remaining = position.investedCapital - params.amount;
        if (remaining !== params.investAmount) {
            throw new ValidationError("InvalidPositionAmount", "Remaining capital must equal the authorized amount", {
                investor,
                expected: params.investAmount,
                actual: remaining,
            });
        }

        this.commitExcessWithdrawal(investor, positionId, params.amount, {
            cachedInvestAmount: params.investAmount,
            cachedTokenAllocationRate: params.tokenAllocationRate,
        });
        this.verifier.consume(authorization);
        return params.amount;
    }

    publishRaisedCapital(caller: Address, capitalRaised: bigint): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        this.requireNotCanceled();
        this.requireRefundPeriodOver();
        this.publishCapitalRaised(capitalRaised);

        this.status.totalCapitalRaised = capitalRaised;
        this.status.capitalRaisedPublished = true;
        this.emit({ type: "CapitalRaisedPublished", capitalRaised });
    }

    publishSaleResults(caller: Address, params: PublishPreLiquidResultsParams): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        this.requireNotCanceled();
        this.requireRefundPeriodOver();
        if (this.status.resultsPublished) {
            throw new StateError("SaleResultsAlreadyPublished", "Sale results have already been published");
        }
        if (params.tokensAllocated <= 0n || params.askTokenTotalSupply <= 0n) {
            throw new ValidationError("ZeroValueProvided", "Token amounts must be positive", {
                tokensAllocated: params.tokensAllocated,
                askTokenTotalSupply: params.askTokenTotalSupply,
            });
        }
        if (params.tokensAllocated > params.askTokenTotalSupply) {
            throw new ValidationError("InvalidTokenAmountSupplied", "Allocation exceeds the total supply", {
                expected: params.askTokenTotalSupply,
                actual: params.tokensAllocated,
            });
        }
        const askToken = this.resolveAskToken(params.askToken);
        if (askToken === undefined) {
            throw new ValidationError("AskTokenUnavailable", "Ask token must be provided with the results");
        }

        this.askTokenTotalSupply = params.askTokenTotalSupply;
        this.status.askToken = askToken;
        this.status.totalTokensAllocated = params.tokensAllocated;
        this.status.resultsPublished = true;
        this.emit({ type: "SaleResultsPublished", tokensAllocated: params.tokensAllocated });
    }

    /**
     * Tokens owed to a position: its allocation rate applied to the total supply, scaled by
     * how much of the authorized amount is actually invested.
     */
    tokenAllocationOf(investor: Address): bigint {
        const position = this.positions.getByInvestor(investor);
        if (!position || position.cachedInvestAmount === 0n) {
            return 0n;
        }
        return (
            (this.askTokenTotalSupply * position.cachedTokenAllocationRate * position.investedCapital) /
            (RATE_DENOMINATOR * position.cachedInvestAmount)
        );
    }

    claimTokenAllocation(caller: Address, params: PreLiquidClaimParams): bigint {
        const investor = getAddress(caller);
        const { positionId } = this.assertClaimable(investor);
        const amount = this.tokenAllocationOf(investor);
        const vestingAuthorization = this.verifyVestingConfig(investor, params.vestingConfig, params.vestingSignature);

        this.settleTokenAllocation(investor, positionId, amount, params.vestingConfig, [vestingAuthorization]);
        return amount;
    }

    private assertAllocationRate(rate: bigint): void {
        if (rate < 0n || rate > RATE_DENOMINATOR) {
            throw new ValidationError("InvalidPositionAmount", "Token allocation rate must be between 0 and 1e18", {
                actual: rate,
            });
        }
    }
}
