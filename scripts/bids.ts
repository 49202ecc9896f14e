import {
    assertValidBidPrivateKey,
    bidSalt,
    decryptBidAmount,
    encryptBidAmount,
    maskingSalt,
    publicKeyFromPrivateKey,
    type Address,
    type CurvePoint,
} from "@tranche/core";
import type { BidSheet, SealedBidSheet } from "./types.ts";

export interface SealedBidOutput {
    publicKey: CurvePoint;
    fixedSalt: bigint;
    bids: { investor: Address; encryptedAmountOut: bigint; salt: bigint }[];
}

/** Seals every bid in the sheet for the sale whose key is `privateKey`. */
export function sealBids(sheet: BidSheet, privateKey: bigint): SealedBidOutput {
    const publicKey = publicKeyFromPrivateKey(privateKey);
    return {
        publicKey,
        fixedSalt: sheet.fixedSalt,
        bids: sheet.bids.map(({ investor, amountOut }) => ({
            investor,
            encryptedAmountOut: encryptBidAmount(
                amountOut,
                publicKey,
                privateKey,
                maskingSalt(investor, sheet.fixedSalt),
            ),
            salt: bidSalt(investor),
        })),
    };
}

export interface RevealedBid {
    investor: Address;
    amountOut: bigint;
}

/**
 * Decrypts a sealed sheet. The key must match the sheet's public key and each bid must
 * carry its investor's salt.
 */
export function revealBids(sheet: SealedBidSheet, privateKey: bigint): RevealedBid[] {
    assertValidBidPrivateKey(privateKey, sheet.publicKey);
    return sheet.bids.map(({ investor, encryptedAmountOut, salt }) => {
        if (salt !== bidSalt(investor)) {
            throw new Error(`Bid for ${investor} carries a salt that is not its own`);
        }
        return {
            investor,
            amountOut: decryptBidAmount(
                encryptedAmountOut,
                sheet.publicKey,
                privateKey,
                maskingSalt(investor, sheet.fixedSalt),
            ),
        };
    });
}
