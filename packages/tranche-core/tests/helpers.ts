import { getAddress } from "viem";
import type { Address, Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import { ManualClock } from "../src/clock";
import { SaleError } from "../src/errors";
import { makeNoopLogger } from "../src/logger";
import { InMemoryAddressRegistry, RegistryKey } from "../src/registry";
import type { Sale, SaleDependencies } from "../src/sale";
import { hashAuthorization, vestingConfigParams } from "../src/signatures";
import { InMemoryTokenLedger } from "../src/tokens";
import { SaleAction, VestingType } from "../src/types";
import type { SaleConfigInput, VestingConfig } from "../src/types";
import { InMemoryVestingFactory } from "../src/vesting";

export const START = 1_700_000_000n;
export const DAY = 86_400n;

export const PLATFORM_ADMIN = getAddress("0x1000000000000000000000000000000000000001");
export const PLATFORM_FEE_RECEIVER = getAddress("0x1000000000000000000000000000000000000002");
export const PROJECT_ADMIN = getAddress("0x2000000000000000000000000000000000000001");
export const REFERRER = getAddress("0x3000000000000000000000000000000000000001");
export const SALE_ADDRESS = getAddress("0x4000000000000000000000000000000000000001");
export const BID_TOKEN = getAddress("0x5000000000000000000000000000000000000001");
export const ASK_TOKEN = getAddress("0x6000000000000000000000000000000000000001");
export const VESTING_FACTORY = getAddress("0x7000000000000000000000000000000000000001");

export const platformSigner = privateKeyToAccount("0x1111111111111111111111111111111111111111111111111111111111111111");
export const alice = privateKeyToAccount("0x2222222222222222222222222222222222222222222222222222222222222222");
export const bob = privateKeyToAccount("0x3333333333333333333333333333333333333333333333333333333333333333");
export const carol = privateKeyToAccount("0x4444444444444444444444444444444444444444444444444444444444444444");

export function makeSaleInput(overrides: Partial<SaleConfigInput> = {}): SaleConfigInput {
    return {
        salePeriodSeconds: DAY,
        refundPeriodSeconds: DAY,
        minimumInvestAmount: 100n,
        bidToken: BID_TOKEN,
        askToken: ASK_TOKEN,
        platformFeeOnCapitalRaisedBps: 250n,
        platformFeeOnTokensSoldBps: 250n,
        referrerFeeOnCapitalRaisedBps: 100n,
        referrerFeeOnTokensSoldBps: 100n,
        projectAdmin: PROJECT_ADMIN,
        referrerFeeReceiver: REFERRER,
        saleAddress: SALE_ADDRESS,
        chainId: 1n,
        ...overrides,
    };
}

export function makeVestingConfig(overrides: Partial<VestingConfig> = {}): VestingConfig {
    return {
        vestingType: VestingType.LINEAR,
        vestingStartTime: START,
        vestingDurationSeconds: 1_000n,
        vestingCliffDurationSeconds: 0n,
        epochDurationSeconds: 0n,
        numberOfEpochs: 0n,
        tokenAllocationOnTGERate: 0n,
        ...overrides,
    };
}

export type Harness = {
    clock: ManualClock;
    tokens: InMemoryTokenLedger;
    registry: InMemoryAddressRegistry;
    deps: SaleDependencies;
};

export function makeHarness(): Harness {
    const clock = new ManualClock(START);
    const tokens = new InMemoryTokenLedger();
    const registry = new InMemoryAddressRegistry({
        [RegistryKey.PLATFORM_ADMIN]: PLATFORM_ADMIN,
        [RegistryKey.PLATFORM_SIGNER]: platformSigner.address,
        [RegistryKey.PLATFORM_FEE_RECEIVER]: PLATFORM_FEE_RECEIVER,
    });
    const vestingFactory = new InMemoryVestingFactory({ address: VESTING_FACTORY, ledger: tokens });
    return {
        clock,
        tokens,
        registry,
        deps: { registry, tokens, vestingFactory, clock, logger: makeNoopLogger() },
    };
}

/** Signs an authorization for `sale` the way the platform backend would. */
export function signFor(
    signer: PrivateKeyAccount,
    sale: Sale,
    action: SaleAction,
    investor: Address,
    params: readonly bigint[],
): Promise<Hex> {
    const hash = hashAuthorization(sale.signingDomain(), action, investor, params);
    return signer.signMessage({ message: { raw: hash } });
}

export function signVestingConfig(sale: Sale, investor: Address, config: VestingConfig): Promise<Hex> {
    return signFor(platformSigner, sale, SaleAction.APPROVE_VESTING_CONFIG, investor, vestingConfigParams(config));
}

/** Runs `fn` and returns the SaleError it throws. */
export function catchSaleError(fn: () => unknown): SaleError {
    try {
        fn();
    } catch (err) {
        if (err instanceof SaleError) {
            return err;
        }
        throw err;
    }
    throw new Error("expected a SaleError to be thrown");
}
