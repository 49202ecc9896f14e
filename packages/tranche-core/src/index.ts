import { getAddress } from "viem";
import { SystemClock } from "./clock";
import type { Clock } from "./clock";
import { makeLogger } from "./logger";
import type { Logger } from "./logger";
import { InMemoryAddressRegistry } from "./registry";
import type { AddressRegistry } from "./registry";
import type { SaleDependencies } from "./sale";
import { InMemoryTokenLedger } from "./tokens";
import type { TokenLedger } from "./tokens";
import type { Address } from "./types";
import { InMemoryVestingFactory } from "./vesting";
import type { VestingFactory } from "./vesting";

export * from "./clock";
export * from "./config";
export * from "./errors";
export * from "./fees";
export * from "./fixed-price-sale";
export * from "./logger";
export * from "./merkle";
export * from "./merkle-sale";
export * from "./open-application-sale";
export * from "./positions";
export * from "./pre-liquid-approved-sale";
export * from "./registry";
export * from "./sale";
export * from "./sealed-bid";
export * from "./sealed-bid-auction-sale";
export * from "./signatures";
export * from "./tokens";
export * from "./types";
export * from "./vesting";

const DEFAULT_VESTING_FACTORY_ADDRESS: Address = "0x00000000000000000000000000000000000Fac70";

export type CreateSaleDependenciesOptions = {
    registry?: AddressRegistry;
    tokens?: TokenLedger;
    vestingFactory?: VestingFactory;
    vestingFactoryAddress?: Address;
    clock?: Clock;
    logger?: Logger;
};

/** Wires the in-memory collaborators for anything the caller does not supply. */
export function createSaleDependencies(options: CreateSaleDependenciesOptions = {}): SaleDependencies {
    const {
        registry = new InMemoryAddressRegistry(),
        tokens = new InMemoryTokenLedger(),
        vestingFactoryAddress = DEFAULT_VESTING_FACTORY_ADDRESS,
        clock = new SystemClock(),
        logger = makeLogger(),
    } = options;

    const vestingFactory =
        options.vestingFactory ??
        new InMemoryVestingFactory({ address: getAddress(vestingFactoryAddress), ledger: tokens });

    return { registry, tokens, vestingFactory, clock, logger };
}
