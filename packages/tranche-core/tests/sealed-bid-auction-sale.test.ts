import type { PrivateKeyAccount } from "viem/accounts";
import { describe, expect, it } from "vitest";
import { buildMerkleTree } from "../src/merkle";
import { SealedBidAuctionSale } from "../src/sealed-bid-auction-sale";
import type { PublishAuctionResultsParams } from "../src/sealed-bid-auction-sale";
import { bidSalt, encryptBidAmount, maskingSalt, publicKeyFromPrivateKey } from "../src/sealed-bid";
import { SaleAction, SalePhase } from "../src/types";
import type { SealedBid } from "../src/types";
import {
    BID_TOKEN,
    DAY,
    PLATFORM_ADMIN,
    PROJECT_ADMIN,
    alice,
    bob,
    catchSaleError,
    makeHarness,
    makeSaleInput,
    platformSigner,
    signFor,
} from "./helpers";

const PRIVATE_KEY = 987_654_321n;
const PUBLIC_KEY = publicKeyFromPrivateKey(PRIVATE_KEY);
const FIXED_SALT = 42n;

function setup() {
    const harness = makeHarness();
    const sale = new SealedBidAuctionSale({ ...makeSaleInput(), publicKey: PUBLIC_KEY }, harness.deps);
    harness.tokens.mint(BID_TOKEN, alice.address, 20_000n);
    harness.tokens.mint(BID_TOKEN, bob.address, 20_000n);
    return { ...harness, sale };
}

function sealBid(investor: PrivateKeyAccount, amountOut: bigint): SealedBid {
    return {
        encryptedAmountOut: encryptBidAmount(
            amountOut,
            PUBLIC_KEY,
            PRIVATE_KEY,
            maskingSalt(investor.address, FIXED_SALT),
        ),
        salt: bidSalt(investor.address),
        publicKey: PUBLIC_KEY,
    };
}

async function bid(sale: SealedBidAuctionSale, investor: PrivateKeyAccount, amount: bigint, sealedBid: SealedBid) {
    const signature = await signFor(platformSigner, sale, SaleAction.INVEST, investor.address, [amount]);
    return sale.invest(investor.address, { amount, sealedBid, signature });
}

function resultsFor(overrides: Partial<PublishAuctionResultsParams> = {}): PublishAuctionResultsParams {
    const claims = buildMerkleTree([{ investor: alice.address, amount: 3_000n }]);
    const accepted = buildMerkleTree([{ investor: alice.address, amount: 7_500n }]);
    return {
        claimTokensRoot: claims.root,
        acceptedCapitalRoot: accepted.root,
        tokensAllocated: 3_000n,
        capitalRaised: 7_500n,
        privateKey: PRIVATE_KEY,
        fixedSalt: FIXED_SALT,
        ...overrides,
    };
}

describe("SealedBidAuctionSale", () => {
    it("refuses an invalid sale key", () => {
        const { deps } = makeHarness();
        const err = catchSaleError(
            () => new SealedBidAuctionSale({ ...makeSaleInput(), publicKey: { x: 1n, y: 1n } }, deps),
        );
        expect(err.code).toBe("InvalidBidPublicKey");
    });

    it("exposes the key bids are sealed to", () => {
        const { sale } = setup();
        const key = sale.bidPublicKey();
        expect(key).toEqual(PUBLIC_KEY);

        key.x = 1n;
        expect(sale.bidPublicKey()).toEqual(PUBLIC_KEY);
    });

    describe("bidding", () => {
        it("stores the latest sealed bid with the capital", async () => {
            const { sale, tokens } = setup();
            await bid(sale, alice, 10_000n, sealBid(alice, 1_000n));
            const latest = sealBid(alice, 7_500n);
            expect(await bid(sale, alice, 500n, latest)).toBe(1n);

            expect(sale.sealedBidOf(alice.address)).toEqual(latest);
            expect(sale.investorPosition(alice.address)?.investedCapital).toBe(10_500n);
            expect(tokens.balanceOf(BID_TOKEN, alice.address)).toBe(9_500n);
        });

        it("rejects a bid sealed for another key", async () => {
            const { sale } = setup();
            const sealedBid = { ...sealBid(alice, 7_500n), publicKey: publicKeyFromPrivateKey(7n) };
            const signature = await signFor(platformSigner, sale, SaleAction.INVEST, alice.address, [10_000n]);

            expect(catchSaleError(() => sale.invest(alice.address, { amount: 10_000n, sealedBid, signature })).code).toBe(
                "InvalidBidPublicKey",
            );
            expect(sale.sealedBidOf(alice.address)).toBeUndefined();
        });

        it("rejects a bid carrying another investor's salt", async () => {
            const { sale } = setup();
            const sealedBid = sealBid(bob, 7_500n);
            const signature = await signFor(platformSigner, sale, SaleAction.INVEST, alice.address, [10_000n]);

            expect(catchSaleError(() => sale.invest(alice.address, { amount: 10_000n, sealedBid, signature })).code).toBe(
                "InvalidSalt",
            );
        });
    });

    describe("result publication", () => {
        it("must be initialized first, which locks cancellation", async () => {
            const { sale, clock } = setup();
            await bid(sale, alice, 10_000n, sealBid(alice, 7_500n));
            expect(catchSaleError(() => sale.initializePublishSaleResults(PLATFORM_ADMIN)).code).toBe(
                "SaleHasNotEnded",
            );
            clock.advance(2n * DAY);

            expect(catchSaleError(() => sale.publishSaleResults(PLATFORM_ADMIN, resultsFor())).code).toBe(
                "CancelNotLocked",
            );
            expect(catchSaleError(() => sale.initializePublishSaleResults(PROJECT_ADMIN)).code).toBe(
                "NotCalledByPlatform",
            );

            sale.initializePublishSaleResults(PLATFORM_ADMIN);
            expect(sale.saleStatus().cancelLocked).toBe(true);
            expect(catchSaleError(() => sale.initializePublishSaleResults(PLATFORM_ADMIN)).code).toBe("CancelLocked");
            expect(catchSaleError(() => sale.cancel(PROJECT_ADMIN)).code).toBe("CancelLocked");
        });

        it("rejects a private key that does not match, writing nothing", async () => {
            const { sale, clock } = setup();
            await bid(sale, alice, 10_000n, sealBid(alice, 7_500n));
            clock.advance(2n * DAY);
            sale.initializePublishSaleResults(PLATFORM_ADMIN);

            const err = catchSaleError(() =>
                sale.publishSaleResults(PLATFORM_ADMIN, resultsFor({ privateKey: PRIVATE_KEY + 1n })),
            );
            expect(err.code).toBe("InvalidBidPrivateKey");
            expect(sale.saleStatus()).toMatchObject({
                resultsPublished: false,
                capitalRaisedPublished: false,
                privateKey: undefined,
            });
            expect(sale.saleStatus().acceptedCapitalRoot).toBeUndefined();
        });

        it("reveals bids once the key is published", async () => {
            const { sale, clock } = setup();
            const sealedBid = sealBid(alice, 7_500n);
            await bid(sale, alice, 10_000n, sealedBid);
            expect(catchSaleError(() => sale.decryptSealedBid(sealedBid.encryptedAmountOut, alice.address)).code).toBe(
                "PrivateKeyNotPublished",
            );

            clock.advance(2n * DAY);
            sale.initializePublishSaleResults(PLATFORM_ADMIN);
            sale.publishSaleResults(PLATFORM_ADMIN, resultsFor());

            expect(sale.phase()).toBe(SalePhase.RESULTS_PUBLISHED);
            expect(sale.saleStatus()).toMatchObject({ privateKey: PRIVATE_KEY, fixedSalt: FIXED_SALT });
            expect(sale.decryptSealedBid(sealedBid.encryptedAmountOut, alice.address)).toBe(7_500n);
        });

        it("settles excess capital against the accepted root", async () => {
            const { sale, clock, tokens } = setup();
            await bid(sale, alice, 10_000n, sealBid(alice, 7_500n));
            clock.advance(2n * DAY);
            sale.initializePublishSaleResults(PLATFORM_ADMIN);
            sale.publishSaleResults(PLATFORM_ADMIN, resultsFor());

            expect(sale.withdrawExcessInvestedCapital(alice.address, { amount: 2_500n, proof: [] })).toBe(2_500n);
            expect(tokens.balanceOf(BID_TOKEN, alice.address)).toBe(12_500n);
            expect(sale.withdrawRaisedCapital(PROJECT_ADMIN)).toBe(7_500n - 187n - 75n);
        });
    });
});
