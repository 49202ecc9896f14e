import { concat, encodeAbiParameters, getAddress, keccak256 } from "viem";
import { ValidationError } from "./errors";
import type { Address, Hex } from "./types";

export type MerkleEntry = {
    investor: Address;
    amount: bigint;
};

export type MerkleTree = {
    root: Hex;
    layers: Hex[][];
    proofs: Map<Address, { amount: bigint; leaf: Hex; proof: Hex[] }>;
};

/** Double-hashed so a leaf can never be mistaken for an inner node. */
export function hashLeaf(investor: Address, amount: bigint): Hex {
    return keccak256(
        keccak256(encodeAbiParameters([{ type: "address" }, { type: "uint256" }], [investor, amount])),
    );
}

export function hashPair(a: Hex, b: Hex): Hex {
    // Sort to ensure consistent ordering
    const [first, second] = a.toLowerCase() < b.toLowerCase() ? [a, b] : [b, a];
    return keccak256(concat([first, second]));
}

export function processProof(proof: readonly Hex[], leaf: Hex): Hex {
    return proof.reduce<Hex>((computed, sibling) => hashPair(computed, sibling), leaf);
}

export function verifyMerkleProof(proof: readonly Hex[], root: Hex, leaf: Hex): boolean {
    return processProof(proof, leaf).toLowerCase() === root.toLowerCase();
}

/**
 * Builds a sorted-pair tree over `(investor, amount)` leaves. Leaves are sorted and an odd
 * node at the end of a layer is promoted unchanged. One entry per investor.
 */
export function buildMerkleTree(entries: readonly MerkleEntry[]): MerkleTree {
    if (entries.length === 0) {
        throw new ValidationError("EmptyMerkleEntries", "Cannot build a Merkle tree without entries");
    }

    const byLeaf = new Map<Hex, MerkleEntry>();
    const seen = new Set<Address>();
    for (const entry of entries) {
        const investor = getAddress(entry.investor);
        if (seen.has(investor)) {
            throw new ValidationError("DuplicateMerkleEntry", `Duplicate Merkle entry for ${investor}`, { investor });
        }
        seen.add(investor);
        byLeaf.set(hashLeaf(investor, entry.amount), { investor, amount: entry.amount });
    }

    const sortedLeaves = [...byLeaf.keys()].sort();
    const layers: Hex[][] = [sortedLeaves];

    let currentLayer = sortedLeaves;
    while (currentLayer.length > 1) {
        const nextLayer: Hex[] = [];
        for (let i = 0; i < currentLayer.length; i += 2) {
            if (i + 1 < currentLayer.length) {
                nextLayer.push(hashPair(currentLayer[i], currentLayer[i + 1]));
            } else {
                nextLayer.push(currentLayer[i]);
            }
        }
        layers.push(nextLayer);
        currentLayer = nextLayer;
    }

    const proofs: MerkleTree["proofs"] = new Map();
    sortedLeaves.forEach((leaf, leafIndex) => {
        const proof: Hex[] = [];
        let index = leafIndex;
        for (let depth = 0; depth < layers.length - 1; depth++) {
            const layer = layers[depth];
            const siblingIndex = index % 2 === 0 ? index + 1 : index - 1;
            if (siblingIndex < layer.length) {
                proof.push(layer[siblingIndex]);
            }
            index = Math.floor(index / 2);
        }
        const entry = byLeaf.get(leaf);
        if (entry) {
            proofs.set(entry.investor, { amount: entry.amount, leaf, proof });
        }
    });

    return { root: currentLayer[0], layers, proofs };
}
