import { describe, it, expect } from "vitest";
import { CryptoError, decryptBidAmount, maskingSalt, publicKeyFromPrivateKey } from "@tranche/core";
import { revealBids, sealBids } from "./bids.ts";
import { bidSheetSchema, formatSchemaIssues, sealedBidSheetSchema } from "./types.ts";
import { stringifyWithBigInts } from "./utils.ts";

const SALE_KEY = 987_654_321n;
const FIXED_SALT = 42n;
const INVESTOR_1 = "0x0000000000000000000000000000000000000001" as const;
const INVESTOR_2 = "0x0000000000000000000000000000000000000002" as const;

const sheet = bidSheetSchema.parse({
    fixedSalt: "42",
    bids: [
        { investor: INVESTOR_1, amountOut: "7500" },
        { investor: INVESTOR_2, amountOut: 1200 },
    ],
});

describe("bidSheetSchema", () => {
    it("reads amounts from strings and numbers", () => {
        expect(sheet).toEqual({
            fixedSalt: 42n,
            bids: [
                { investor: INVESTOR_1, amountOut: 7500n },
                { investor: INVESTOR_2, amountOut: 1200n },
            ],
        });
    });

    it("reports each bad field by path", () => {
        const parsed = bidSheetSchema.safeParse({ fixedSalt: "42", bids: [{ investor: "0x12", amountOut: "-1" }] });

        expect(parsed.success).toBe(false);
        if (!parsed.success) {
            expect(formatSchemaIssues("bid sheet", parsed.error)).toBe(
                "Invalid bid sheet:\n" +
                    "  - bids.0.investor: Expected a 0x-prefixed 20-byte address\n" +
                    "  - bids.0.amountOut: Invalid input",
            );
        }
    });

    it("rejects an empty sheet", () => {
        expect(bidSheetSchema.safeParse({ fixedSalt: 1, bids: [] }).success).toBe(false);
    });
});

describe("sealBids", () => {
    it("seals each bid for the sale key with the investor's salt", () => {
        const sealed = sealBids(sheet, SALE_KEY);
        const publicKey = publicKeyFromPrivateKey(SALE_KEY);

        expect(sealed.publicKey).toEqual(publicKey);
        expect(sealed.fixedSalt).toBe(FIXED_SALT);
        expect(sealed.bids.map((b) => b.salt)).toEqual([1n, 2n]);
        expect(
            decryptBidAmount(
                sealed.bids[0].encryptedAmountOut,
                publicKey,
                SALE_KEY,
                maskingSalt(INVESTOR_1, FIXED_SALT),
            ),
        ).toBe(7500n);
        expect(sealed.bids[0].encryptedAmountOut).not.toBe(7500n);
    });
});

describe("revealBids", () => {
    const sealed = sealedBidSheetSchema.parse(JSON.parse(stringifyWithBigInts(sealBids(sheet, SALE_KEY))));

    it("recovers the requested amounts", () => {
        expect(revealBids(sealed, SALE_KEY)).toEqual([
            { investor: INVESTOR_1, amountOut: 7500n },
            { investor: INVESTOR_2, amountOut: 1200n },
        ]);
    });

    it("refuses a key that does not match the sheet", () => {
        let caught: unknown;
        try {
            revealBids(sealed, SALE_KEY + 1n);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(CryptoError);
        expect(caught).toMatchObject({ code: "InvalidBidPrivateKey" });
    });

    it("refuses a bid carrying another investor's salt", () => {
        const swapped = { ...sealed, bids: [{ ...sealed.bids[0], salt: 2n }] };

        expect(() => revealBids(swapped, SALE_KEY)).toThrow(`Bid for ${INVESTOR_1} carries a salt that is not its own`);
    });
});
