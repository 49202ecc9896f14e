import { secp256k1 } from "@noble/curves/secp256k1";
import { bytesToBigInt, encodePacked, hexToBigInt, keccak256 } from "viem";
import { CryptoError, ValidationError } from "./errors";
import type { Address, CurvePoint } from "./types";

const Point = secp256k1.ProjectivePoint;
const UINT256_MODULUS = 1n << 256n;

/**
 * Sealed bids hide the requested amount behind an additive mask:
 *
 *   shared = publicKey * privateKey
 *   mask   = keccak256(shared.x || shared.y || salt)
 *   cipher = amount + mask  (mod 2^256)
 *
 * Only the holder of the sale's private key can rebuild `mask` before the key is revealed.
 */

export function isValidPublicKey(point: CurvePoint): boolean {
    try {
        const p = Point.fromAffine(point);
        // rejects off-curve points and the identity
        p.assertValidity();
        return true;
    } catch {
        return false;
    }
}

export function publicKeyFromPrivateKey(privateKey: bigint): CurvePoint {
    if (privateKey <= 0n || privateKey >= secp256k1.CURVE.n) {
        throw new CryptoError("InvalidBidPrivateKey", "Private key is outside the curve order");
    }
    return Point.BASE.multiply(privateKey).toAffine();
}

export function generateBidKeyPair(): { privateKey: bigint; publicKey: CurvePoint } {
    const privateKey = bytesToBigInt(secp256k1.utils.randomPrivateKey());
    return { privateKey, publicKey: publicKeyFromPrivateKey(privateKey) };
}

export function pointsEqual(a: CurvePoint, b: CurvePoint): boolean {
    return a.x === b.x && a.y === b.y;
}

export function assertValidBidPublicKey(candidate: CurvePoint, registered: CurvePoint): void {
    if (!isValidPublicKey(candidate) || !pointsEqual(candidate, registered)) {
        throw new CryptoError("InvalidBidPublicKey", "Sealed bid was not encrypted for this sale's public key", {
            x: candidate.x,
            y: candidate.y,
        });
    }
}

export function assertValidBidPrivateKey(privateKey: bigint, registered: CurvePoint): void {
    const derived = publicKeyFromPrivateKey(privateKey);
    if (!pointsEqual(derived, registered)) {
        throw new CryptoError("InvalidBidPrivateKey", "Private key does not match the sale's public key");
    }
}

/** Salt an investor attaches to a bid: its address as an integer. */
export function bidSalt(investor: Address): bigint {
    return hexToBigInt(investor);
}

/** Salt used for masking, mixing the investor salt with the per-sale constant. */
export function maskingSalt(investor: Address, fixedSalt: bigint): bigint {
    return (bidSalt(investor) + fixedSalt) % UINT256_MODULUS;
}

export function assertBidSalt(investor: Address, salt: bigint): void {
    const expected = bidSalt(investor);
    if (salt !== expected) {
        throw new ValidationError("InvalidSalt", "Sealed bid salt does not belong to the investor", {
            investor,
            expected,
            actual: salt,
        });
    }
}

function bidMask(publicKey: CurvePoint, privateKey: bigint, salt: bigint): bigint {
    if (!isValidPublicKey(publicKey)) {
        throw new CryptoError("InvalidBidPublicKey", "Public key is not a valid curve point");
    }
    if (privateKey <= 0n || privateKey >= secp256k1.CURVE.n) {
        throw new CryptoError("InvalidBidPrivateKey", "Private key is outside the curve order");
    }
    const shared = Point.fromAffine(publicKey).multiply(privateKey).toAffine();
    return hexToBigInt(
        keccak256(encodePacked(["uint256", "uint256", "uint256"], [shared.x, shared.y, salt % UINT256_MODULUS])),
    );
}

export function encryptBidAmount(amount: bigint, publicKey: CurvePoint, privateKey: bigint, salt: bigint): bigint {
    if (amount < 0n || amount >= UINT256_MODULUS) {
        throw new ValidationError("InvalidInvestAmount", "Bid amount must fit in 256 bits", { amount });
    }
    return (amount + bidMask(publicKey, privateKey, salt)) % UINT256_MODULUS;
}

export function decryptBidAmount(cipher: bigint, publicKey: CurvePoint, privateKey: bigint, salt: bigint): bigint {
    const mask = bidMask(publicKey, privateKey, salt);
    return (((cipher - mask) % UINT256_MODULUS) + UINT256_MODULUS) % UINT256_MODULUS;
}
