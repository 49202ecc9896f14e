import { getAddress } from "viem";
import { ValidationError } from "./errors";
import { MerkleSale } from "./merkle-sale";
import type { PublishMerkleResultsParams } from "./merkle-sale";
import type { SaleDependencies } from "./sale";
import { Capability, SaleAction, SaleVariant } from "./types";
import type { Address, Hex, SaleConfigInput } from "./types";

const MAX_TOKEN_DECIMALS = 255;

export type FixedPriceSaleConfigInput = SaleConfigInput & {
    /** Bid-token units paid for one whole ask token. */
    tokenPrice: bigint;
};

export type FixedPriceInvestParams = {
    amount: bigint;
    signature: Hex;
};

/** Capital raised is not published; it follows from the allocation at the fixed price. */
export type PublishFixedPriceResultsParams = Omit<PublishMerkleResultsParams, "capitalRaised"> & {
    askTokenDecimals: number;
};

/**
 * Tokens sold at a price fixed when the sale is created. Investors apply with signed capital,
 * the platform publishes who gets how many tokens, and the capital kept is what those tokens cost.
 */
export class FixedPriceSale extends MerkleSale {
    readonly variant = SaleVariant.FIXED_PRICE;

    private readonly price: bigint;

    constructor(input: FixedPriceSaleConfigInput, deps: SaleDependencies) {
        const { tokenPrice, ...config } = input;
        if (tokenPrice <= 0n) {
            throw new ValidationError("ZeroValueProvided", "tokenPrice must be positive", { actual: tokenPrice });
        }
        super(config, deps);
        this.price = tokenPrice;
    }

    tokenPrice(): bigint {
        return this.price;
    }

    /** Bid-token cost of `tokens` base units of an ask token with `askTokenDecimals` decimals, rounded down. */
    capitalForTokens(tokens: bigint, askTokenDecimals: number): bigint {
        if (!Number.isInteger(askTokenDecimals) || askTokenDecimals < 0 || askTokenDecimals > MAX_TOKEN_DECIMALS) {
            throw new ValidationError("InvalidAskTokenDecimals", "Ask token decimals must be an integer in 0..255", {
                actual: askTokenDecimals,
            });
        }
        return (tokens * this.price) / 10n ** BigInt(askTokenDecimals);
    }

    invest(caller: Address, params: FixedPriceInvestParams): bigint {
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

    publishSaleResults(caller: Address, params: PublishFixedPriceResultsParams): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        const { askTokenDecimals, ...rest } = params;
        const results = { ...rest, capitalRaised: this.capitalForTokens(params.tokensAllocated, askTokenDecimals) };
        const askToken = this.assertMerkleResults(results);
        this.commitMerkleResults(results, askToken);
    }
}
