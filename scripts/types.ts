import { getAddress, isAddress } from "viem";
import { z } from "zod";
import type { Address } from "@tranche/core";

/** A row as it appears in an allocations CSV, before validation. */
export interface AllocationRow {
    line: number;
    investor: string;
    amount: string;
}

export interface Allocation {
    investor: Address;
    amount: bigint;
}

const address = z
    .string()
    .refine((value) => isAddress(value), "Expected a 0x-prefixed 20-byte address")
    .transform((value) => getAddress(value));

const uint = z
    .union([z.string().regex(/^(0x[0-9a-fA-F]+|\d+)$/, "Expected an unsigned integer"), z.number().int().nonnegative()])
    .transform((value) => BigInt(value));

export const curvePointSchema = z.object({
    x: uint,
    y: uint,
});

/** Plain bids an operator seals with the sale key. */
export const bidSheetSchema = z.object({
    fixedSalt: uint,
    bids: z
        .array(
            z.object({
                investor: address,
                amountOut: uint,
            }),
        )
        .min(1, "Bid sheet has no bids"),
});

export type BidSheet = z.infer<typeof bidSheetSchema>;

export const sealedBidSheetSchema = z.object({
    publicKey: curvePointSchema,
    fixedSalt: uint,
    bids: z
        .array(
            z.object({
                investor: address,
                encryptedAmountOut: uint,
                salt: uint,
            }),
        )
        .min(1, "Sealed bid sheet has no bids"),
});

export type SealedBidSheet = z.infer<typeof sealedBidSheetSchema>;

export function formatSchemaIssues(label: string, error: z.ZodError): string {
    const issues = error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n");
    return `Invalid ${label}:\n${issues}`;
}
