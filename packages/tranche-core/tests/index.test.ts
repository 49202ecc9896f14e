import { describe, expect, it } from "vitest";
import {
    InMemoryAddressRegistry,
    InMemoryTokenLedger,
    InMemoryVestingFactory,
    ManualClock,
    OpenApplicationSale,
    SystemClock,
    createSaleDependencies,
    makeNoopLogger,
} from "../src";
import { ASK_TOKEN, START, alice, makeSaleInput, makeVestingConfig } from "./helpers";

describe("createSaleDependencies", () => {
    it("fills in the in-memory collaborators", () => {
        const deps = createSaleDependencies();
        expect(deps.registry).toBeInstanceOf(InMemoryAddressRegistry);
        expect(deps.tokens).toBeInstanceOf(InMemoryTokenLedger);
        expect(deps.vestingFactory).toBeInstanceOf(InMemoryVestingFactory);
        expect(deps.clock).toBeInstanceOf(SystemClock);
    });

    it("keeps what the caller supplies", () => {
        const clock = new ManualClock(START);
        const tokens = new InMemoryTokenLedger();
        const logger = makeNoopLogger();
        const deps = createSaleDependencies({ clock, tokens, logger });
        expect(deps.clock).toBe(clock);
        expect(deps.tokens).toBe(tokens);
        expect(deps.logger).toBe(logger);
    });

    it("vests into the ledger it was given", () => {
        const tokens = new InMemoryTokenLedger();
        const { vestingFactory } = createSaleDependencies({ tokens });
        const wallet = vestingFactory.createVesting({
            beneficiary: alice.address,
            token: ASK_TOKEN,
            config: makeVestingConfig({ vestingDurationSeconds: 100n }),
        });
        tokens.mint(ASK_TOKEN, wallet.address, 100n);
        expect(wallet.vestedAmount(START + 50n)).toBe(50n);
    });

    it("needs platform addresses before a sale can be created", () => {
        expect(() => new OpenApplicationSale(makeSaleInput(), createSaleDependencies())).toThrow(
            "Registry has no address for PLATFORM_ADMIN",
        );
    });
});
