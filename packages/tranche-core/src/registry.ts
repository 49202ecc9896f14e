import { getAddress, zeroAddress } from "viem";
import { ValidationError } from "./errors";
import type { Address, PlatformAddresses } from "./types";

export enum RegistryKey {
    PLATFORM_ADMIN = "PLATFORM_ADMIN",
    PLATFORM_SIGNER = "PLATFORM_SIGNER",
    PLATFORM_FEE_RECEIVER = "PLATFORM_FEE_RECEIVER",
}

export interface AddressRegistry {
    getAddress(key: RegistryKey): Address;
}

export class InMemoryAddressRegistry implements AddressRegistry {
    private readonly entries = new Map<RegistryKey, Address>();

    constructor(initial: Partial<Record<RegistryKey, Address>> = {}) {
        for (const key of Object.values(RegistryKey)) {
            const value = initial[key];
            if (value) {
                this.setAddress(key, value);
            }
        }
    }

    setAddress(key: RegistryKey, address: Address): void {
        this.entries.set(key, getAddress(address));
    }

    getAddress(key: RegistryKey): Address {
        return this.entries.get(key) ?? zeroAddress;
    }
}

/** Snapshot the platform addresses a sale depends on. Unset entries are rejected. */
export function readPlatformAddresses(registry: AddressRegistry): PlatformAddresses {
    const read = (key: RegistryKey) => {
        const address = registry.getAddress(key);
        if (address === zeroAddress) {
            throw new ValidationError("ZeroAddressProvided", `Registry has no address for ${key}`, { key });
        }
        return getAddress(address);
    };

    return {
        platformAdmin: read(RegistryKey.PLATFORM_ADMIN),
        platformSigner: read(RegistryKey.PLATFORM_SIGNER),
        platformFeeReceiver: read(RegistryKey.PLATFORM_FEE_RECEIVER),
    };
}
