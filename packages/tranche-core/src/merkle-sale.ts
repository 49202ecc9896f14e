import { getAddress } from "viem";
import { MerkleError, ReplayError, StateError, ValidationError } from "./errors";
import { hashLeaf, verifyMerkleProof } from "./merkle";
import { Sale } from "./sale";
import type { Address, Hex, VestingConfig } from "./types";

export type PublishMerkleResultsParams = {
    claimTokensRoot: Hex;
    acceptedCapitalRoot?: Hex;
    tokensAllocated: bigint;
    capitalRaised: bigint;
    askToken?: Address;
};

export type MerkleExcessCapitalParams = {
    /** Capital to take back; what remains must be the Merkle-proven accepted amount. */
    amount: bigint;
    proof: readonly Hex[];
};

export type MerkleClaimParams = {
    amount: bigint;
    proof: readonly Hex[];
    vestingConfig: VestingConfig;
    vestingSignature: Hex;
};

/**
 * Sales settled against published Merkle roots: one root caps each investor's accepted
 * capital, the other fixes their token allocation.
 */
export abstract class MerkleSale extends Sale {
    private readonly usedExcessClaims = new Set<Hex>();

    withdrawExcessInvestedCapital(caller: Address, params: MerkleExcessCapitalParams): bigint {
        const investor = getAddress(caller);
        const { positionId, position } = this.assertExcessWithdrawable(investor, params.amount);
        const root = this.status.acceptedCapitalRoot;
        if (root === undefined) {
            throw new StateError("AcceptedCapitalNotSet", "Accepted capital has not been published");
        }

        const leaf = hashLeaf(investor, position.investedCapital - params.amount);
        if (this.usedExcessClaims.has(leaf)) {
            throw new ReplayError("ExcessCapitalAlreadyClaimed", "Excess capital claim has already been used", {
                investor,
            });
        }
        if (!verifyMerkleProof(params.proof, root, leaf)) {
            throw new MerkleError("InvalidMerkleProof", "Proof does not match the accepted capital root", {
                investor,
            });
        }

        this.commitExcessWithdrawal(investor, positionId, params.amount);
        this.usedExcessClaims.add(leaf);
        return params.amount;
    }

    claimTokenAllocation(caller: Address, params: MerkleClaimParams): void {
        const investor = getAddress(caller);
        const { positionId } = this.assertClaimable(investor);
        const root = this.status.claimTokensRoot;
        if (root === undefined) {
            throw new StateError("SaleResultsNotPublished", "Sale results have not been published");
        }
        if (!verifyMerkleProof(params.proof, root, hashLeaf(investor, params.amount))) {
            throw new MerkleError("InvalidMerkleProof", "Proof does not match the token claim root", { investor });
        }

        const vestingAuthorization = this.verifyVestingConfig(investor, params.vestingConfig, params.vestingSignature);
        this.settleTokenAllocation(investor, positionId, params.amount, params.vestingConfig, [vestingAuthorization]);
    }

    /** Every check of a Merkle result publication; returns the resolved ask token. */
    protected assertMerkleResults(params: PublishMerkleResultsParams): Address | undefined {
        this.requireNotCanceled();
        this.requireRefundPeriodOver();
        if (this.status.resultsPublished) {
            throw new StateError("SaleResultsAlreadyPublished", "Sale results have already been published");
        }
        this.assertRoot(params.claimTokensRoot, "claimTokensRoot");
        if (params.acceptedCapitalRoot !== undefined) {
            if (this.status.acceptedCapitalRoot !== undefined) {
                throw new StateError("AcceptedCapitalAlreadySet", "Accepted capital root is already set");
            }
            this.assertRoot(params.acceptedCapitalRoot, "acceptedCapitalRoot");
        }
        if (params.tokensAllocated <= 0n) {
            throw new ValidationError("ZeroValueProvided", "tokensAllocated must be positive", {
                actual: params.tokensAllocated,
            });
        }
        this.publishCapitalRaised(params.capitalRaised);
        return this.resolveAskToken(params.askToken);
    }

    protected commitMerkleResults(params: PublishMerkleResultsParams, askToken: Address | undefined): void {
        this.status.claimTokensRoot = params.claimTokensRoot;
        this.status.totalTokensAllocated = params.tokensAllocated;
        this.status.totalCapitalRaised = params.capitalRaised;
        this.status.capitalRaisedPublished = true;
        this.status.resultsPublished = true;
        this.status.askToken = askToken;

        this.emit({ type: "CapitalRaisedPublished", capitalRaised: params.capitalRaised });
        if (params.acceptedCapitalRoot !== undefined) {
            this.status.acceptedCapitalRoot = params.acceptedCapitalRoot;
            this.emit({ type: "AcceptedCapitalSet", root: params.acceptedCapitalRoot });
        }
        this.emit({
            type: "SaleResultsPublished",
            tokensAllocated: params.tokensAllocated,
            claimTokensRoot: params.claimTokensRoot,
        });
    }
}
