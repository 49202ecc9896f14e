import { getAddress } from "viem";
import { CryptoError, StateError } from "./errors";
import { MerkleSale } from "./merkle-sale";
import type { PublishMerkleResultsParams } from "./merkle-sale";
import type { SaleDependencies } from "./sale";
import {
    assertBidSalt,
    assertValidBidPrivateKey,
    assertValidBidPublicKey,
    decryptBidAmount,
    isValidPublicKey,
    maskingSalt,
} from "./sealed-bid";
import { Capability, SaleAction, SaleVariant } from "./types";
import type { Address, CurvePoint, Hex, SaleConfigInput, SaleStatus, SealedBid } from "./types";

export type SealedBidAuctionConfigInput = SaleConfigInput & {
    /** Key every bid must be encrypted under. */
    publicKey: CurvePoint;
};

export type SealedBidAuctionStatus = SaleStatus & {
    cancelLocked: boolean;
    privateKey?: bigint;
    fixedSalt?: bigint;
};

export type SealedBidInvestParams = {
    amount: bigint;
    sealedBid: SealedBid;
    signature: Hex;
};

export type PublishAuctionResultsParams = PublishMerkleResultsParams & {
    privateKey: bigint;
    fixedSalt: bigint;
};

export class SealedBidAuctionSale extends MerkleSale {
    readonly variant = SaleVariant.SEALED_BID_AUCTION;

    private readonly publicKey: CurvePoint;
    private readonly sealedBids = new Map<Address, SealedBid>();
    private cancelLocked = false;
    private privateKey?: bigint;
    private fixedSalt?: bigint;

    constructor(input: SealedBidAuctionConfigInput, deps: SaleDependencies) {
        const { publicKey, ...config } = input;
        if (!isValidPublicKey(publicKey)) {
            throw new CryptoError("InvalidBidPublicKey", "Sale public key is not a valid curve point");
        }
        super(config, deps);
        this.publicKey = { x: publicKey.x, y: publicKey.y };
    }

    override saleStatus(): SealedBidAuctionStatus {
        return {
            ...super.saleStatus(),
            cancelLocked: this.cancelLocked,
            privateKey: this.privateKey,
            fixedSalt: this.fixedSalt,
        };
    }

    bidPublicKey(): CurvePoint {
        return { ...this.publicKey };
    }

    sealedBidOf(investor: Address): SealedBid | undefined {
        const bid = this.sealedBids.get(getAddress(investor));
        return bid ? { ...bid, publicKey: { ...bid.publicKey } } : undefined;
    }

    invest(caller: Address, params: SealedBidInvestParams): bigint {
        const investor = getAddress(caller);
        this.assertInvestable(investor, params.amount);
        assertValidBidPublicKey(params.sealedBid.publicKey, this.publicKey);
        assertBidSalt(investor, params.sealedBid.salt);
        const authorization = this.verifier.verify({
            action: SaleAction.INVEST,
            investor,
            params: [params.amount],
            signature: params.signature,
            expectedSigner: this.platform.platformSigner,
        });

        const positionId = this.commitInvestment(investor, params.amount, authorization);
        // a later bid replaces the earlier one
        this.sealedBids.set(investor, {
            encryptedAmountOut: params.sealedBid.encryptedAmountOut,
            salt: params.sealedBid.salt,
            publicKey: { ...params.sealedBid.publicKey },
        });
        return positionId;
    }

    /** First step of result publication; from here on the project can no longer cancel. */
    initializePublishSaleResults(caller: Address): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        this.requireNotCanceled();
        this.requireRefundPeriodOver();
        if (this.cancelLocked) {
            throw new StateError("CancelLocked", "Result publication has already been initialized");
        }
        this.cancelLocked = true;
    }

    publishSaleResults(caller: Address, params: PublishAuctionResultsParams): void {
        this.requireCapability(caller, Capability.PLATFORM_ADMIN);
        if (!this.cancelLocked) {
            throw new StateError("CancelNotLocked", "Result publication has not been initialized");
        }
        const askToken = this.assertMerkleResults(params);
        assertValidBidPrivateKey(params.privateKey, this.publicKey);

        this.privateKey = params.privateKey;
        this.fixedSalt = params.fixedSalt;
        this.commitMerkleResults(params, askToken);
    }

    /** Reveals a bid once the private key is public. Read-only. */
    decryptSealedBid(encryptedAmountOut: bigint, investor: Address): bigint {
        if (this.privateKey === undefined || this.fixedSalt === undefined) {
            throw new StateError("PrivateKeyNotPublished", "Private key has not been published");
        }
        return decryptBidAmount(
            encryptedAmountOut,
            this.publicKey,
            this.privateKey,
            maskingSalt(getAddress(investor), this.fixedSalt),
        );
    }

    protected override assertCancelable(): void {
        if (this.cancelLocked) {
            throw new StateError("CancelLocked", "Sale cannot be canceled while results are being published");
        }
    }
}
