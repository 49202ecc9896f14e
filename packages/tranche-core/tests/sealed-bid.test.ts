import { hexToBigInt } from "viem";
import { describe, expect, it } from "vitest";
import {
    assertBidSalt,
    assertValidBidPrivateKey,
    assertValidBidPublicKey,
    bidSalt,
    decryptBidAmount,
    encryptBidAmount,
    generateBidKeyPair,
    isValidPublicKey,
    maskingSalt,
    publicKeyFromPrivateKey,
} from "../src/sealed-bid";
import { alice, bob, catchSaleError } from "./helpers";

const PRIVATE_KEY = 123_456_789n;
const FIXED_SALT = 42n;

describe("bid keys", () => {
    it("derives a valid public key", () => {
        const publicKey = publicKeyFromPrivateKey(PRIVATE_KEY);
        expect(isValidPublicKey(publicKey)).toBe(true);
        expect(() => assertValidBidPrivateKey(PRIVATE_KEY, publicKey)).not.toThrow();
    });

    it("generates matching key pairs", () => {
        const { privateKey, publicKey } = generateBidKeyPair();
        expect(publicKeyFromPrivateKey(privateKey)).toEqual(publicKey);
    });

    it("rejects off-curve points and keys outside the curve order", () => {
        expect(isValidPublicKey({ x: 1n, y: 1n })).toBe(false);
        expect(catchSaleError(() => publicKeyFromPrivateKey(0n)).code).toBe("InvalidBidPrivateKey");
    });

    it("rejects a public key other than the registered one", () => {
        const registered = publicKeyFromPrivateKey(PRIVATE_KEY);
        const other = publicKeyFromPrivateKey(7n);
        expect(catchSaleError(() => assertValidBidPublicKey(other, registered)).code).toBe("InvalidBidPublicKey");
        expect(catchSaleError(() => assertValidBidPublicKey({ x: 1n, y: 1n }, registered)).code).toBe(
            "InvalidBidPublicKey",
        );
    });

    it("rejects a private key that does not match", () => {
        const registered = publicKeyFromPrivateKey(PRIVATE_KEY);
        expect(catchSaleError(() => assertValidBidPrivateKey(PRIVATE_KEY + 1n, registered)).code).toBe(
            "InvalidBidPrivateKey",
        );
    });
});

describe("salts", () => {
    it("uses the investor address as the bid salt", () => {
        expect(bidSalt(alice.address)).toBe(hexToBigInt(alice.address));
        expect(maskingSalt(alice.address, FIXED_SALT)).toBe(hexToBigInt(alice.address) + FIXED_SALT);
        expect(() => assertBidSalt(alice.address, bidSalt(alice.address))).not.toThrow();
    });

    it("rejects another investor's salt", () => {
        const err = catchSaleError(() => assertBidSalt(alice.address, bidSalt(bob.address)));
        expect(err.code).toBe("InvalidSalt");
        expect(err.details).toEqual({
            investor: alice.address,
            expected: bidSalt(alice.address),
            actual: bidSalt(bob.address),
        });
    });
});

describe("bid encryption", () => {
    const publicKey = publicKeyFromPrivateKey(PRIVATE_KEY);
    const salt = maskingSalt(alice.address, FIXED_SALT);

    it("recovers the amount with the sale key", () => {
        const cipher = encryptBidAmount(7_500n, publicKey, PRIVATE_KEY, salt);
        expect(cipher).not.toBe(7_500n);
        expect(decryptBidAmount(cipher, publicKey, PRIVATE_KEY, salt)).toBe(7_500n);
    });

    it("wraps around 2^256", () => {
        const amount = (1n << 256n) - 1n;
        const cipher = encryptBidAmount(amount, publicKey, PRIVATE_KEY, salt);
        expect(cipher < 1n << 256n).toBe(true);
        expect(decryptBidAmount(cipher, publicKey, PRIVATE_KEY, salt)).toBe(amount);
    });

    it("does not reveal the amount with another key or salt", () => {
        const cipher = encryptBidAmount(7_500n, publicKey, PRIVATE_KEY, salt);
        expect(decryptBidAmount(cipher, publicKey, PRIVATE_KEY + 1n, salt)).not.toBe(7_500n);
        expect(decryptBidAmount(cipher, publicKey, PRIVATE_KEY, maskingSalt(bob.address, FIXED_SALT))).not.toBe(
            7_500n,
        );
    });

    it("rejects amounts that do not fit in 256 bits", () => {
        expect(catchSaleError(() => encryptBidAmount(-1n, publicKey, PRIVATE_KEY, salt)).code).toBe(
            "InvalidInvestAmount",
        );
    });
});
