import { secp256k1 } from "@noble/curves/secp256k1";
import {
    encodeAbiParameters,
    hashMessage,
    hexToBigInt,
    hexToBytes,
    hexToNumber,
    isAddressEqual,
    isHex,
    keccak256,
    size,
    slice,
    toHex,
} from "viem";
import { publicKeyToAddress } from "viem/accounts";
import { AuthorizationError, ReplayError } from "./errors";
import { SaleAction, VestingType } from "./types";
import type { Address, DomainContext, Hex, VestingConfig } from "./types";

const AUTHORIZATION_PARAMETERS = [
    { name: "investor", type: "address" },
    { name: "sale", type: "address" },
    { name: "chainId", type: "uint256" },
    { name: "action", type: "uint8" },
    { name: "params", type: "uint256[]" },
] as const;

/**
 * Message an authorizer signs for one action. Binding the sale address and chain id keeps a
 * signature from being reused on another sale or network.
 */
export function hashAuthorization(
    domain: DomainContext,
    action: SaleAction,
    investor: Address,
    params: readonly bigint[],
): Hex {
    return keccak256(
        encodeAbiParameters(AUTHORIZATION_PARAMETERS, [
            investor,
            domain.verifyingContract,
            domain.chainId,
            action,
            params,
        ]),
    );
}

export function vestingConfigParams(config: VestingConfig): bigint[] {
    return [
        config.vestingType === VestingType.LINEAR ? 0n : 1n,
        config.vestingStartTime,
        config.vestingDurationSeconds,
        config.vestingCliffDurationSeconds,
        config.epochDurationSeconds,
        config.numberOfEpochs,
        config.tokenAllocationOnTGERate,
    ];
}

/**
 * Recovers the address that signed `messageHash` as an EIP-191 personal message.
 * Returns undefined for malformed or malleable signatures: high-s values, and a recovery byte other
 * than 27 or 28.
 */
export function tryRecoverSigner(messageHash: Hex, signature: Hex): Address | undefined {
    if (!isHex(signature) || size(signature) !== 65) {
        return undefined;
    }
    try {
        const v = hexToNumber(slice(signature, 64, 65));
        if (v !== 27 && v !== 28) {
            return undefined;
        }
        const r = hexToBigInt(slice(signature, 0, 32));
        const s = hexToBigInt(slice(signature, 32, 64));
        const sig = new secp256k1.Signature(r, s);
        if (sig.hasHighS()) {
            return undefined;
        }
        const digest = hashMessage({ raw: messageHash });
        const publicKey = sig.addRecoveryBit(v - 27).recoverPublicKey(hexToBytes(digest));
        return publicKeyToAddress(toHex(publicKey.toRawBytes(false)));
    } catch {
        return undefined;
    }
}

export function signatureKey(signature: Hex): Hex {
    return keccak256(hexToBytes(signature));
}

export type VerifiedAuthorization = {
    key: Hex;
    signer: Address;
};

export type AuthorizationRequest = {
    action: SaleAction;
    investor: Address;
    params: readonly bigint[];
    signature: Hex;
    expectedSigner: Address;
};

export class SignatureVerifier {
    private readonly domain: DomainContext;
    private readonly usedSignatures: Set<Hex>;

    constructor(args: { domain: DomainContext; usedSignatures?: Set<Hex> }) {
        this.domain = { ...args.domain };
        this.usedSignatures = args.usedSignatures ?? new Set();
    }

    get domainContext(): DomainContext {
        return { ...this.domain };
    }

    isUsed(signature: Hex): boolean {
        return this.usedSignatures.has(signatureKey(signature));
    }

    /** Checks a signature without consuming it. */
    verify(request: AuthorizationRequest): VerifiedAuthorization {
        if (!isHex(request.signature)) {
            throw new AuthorizationError("InvalidSignature", "Signature is not valid hex", {
                investor: request.investor,
            });
        }
        const key = signatureKey(request.signature);
        if (this.usedSignatures.has(key)) {
            throw new ReplayError("SignatureAlreadyUsed", "Signature has already been used", {
                investor: request.investor,
                signature: request.signature,
            });
        }

        const messageHash = hashAuthorization(this.domain, request.action, request.investor, request.params);
        const signer = tryRecoverSigner(messageHash, request.signature);
        if (!signer || !isAddressEqual(signer, request.expectedSigner)) {
            throw new AuthorizationError("InvalidSignature", "Signature was not produced by the expected signer", {
                investor: request.investor,
                action: SaleAction[request.action],
                expected: request.expectedSigner,
                actual: signer,
            });
        }
        return { key, signer };
    }

    /** Marks a verified signature as spent. Call only once the guarded action commits. */
    consume(authorization: VerifiedAuthorization): void {
        if (this.usedSignatures.has(authorization.key)) {
            throw new ReplayError("SignatureAlreadyUsed", "Signature has already been used", {
                key: authorization.key,
            });
        }
        this.usedSignatures.add(authorization.key);
    }
}
