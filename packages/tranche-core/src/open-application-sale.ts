import { getAddress } from "viem";
import { MerkleSale } from "./merkle-sale";
import type { PublishMerkleResultsParams } from "./merkle-sale";
import { Capability, SaleAction, SaleVariant } from "./types";
import type { Address, Hex } from "./types";

export type OpenApplicationInvestParams = {
    amount: bigint;
    signature: Hex;
};

/**
 * Anyone the platform signer approves may apply with capital while the sale runs. Accepted
 * capital and token allocations are decided off-chain and published as Merkle roots.
 */
export class OpenApplicationSale extends MerkleSale {
    readonly variant = SaleVariant.OPEN_APPLICATION;

    invest(caller: Address, params: OpenApplicationInvestParams): bigint {
        const investor = getAddress(caller);
        this.assertInvestable(investor, params.amount);
        const authorization = this.verifier.verify({
            action: SaleAction.INVEST,
            investor,
            params: [params.amount],
            signature: params.signature,
            expectedSigner: this.platform.platformSigner,
        });
        return this.commitInvestment(investor, params.amount, authorization);
    }

    publishSaleResults(caller: Address, params: PublishMerkleResultsParams): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        const askToken = this.assertMerkleResults(params);
        this.commitMerkleResults(params, askToken);
    }
}
