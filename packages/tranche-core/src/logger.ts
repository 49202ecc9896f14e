import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
    const isVitest = process.env.VITEST === "true";
    const nodeEnv = process.env.NODE_ENV ?? "development";
    const level = process.env.PINO_LOG_LEVEL ?? "info";

    return pino({
        level,
        // Silence logs in test tooling
        enabled: !(isVitest || nodeEnv === "test"),
        base: { ...bindings, service: "tranche" },
        messageKey: "msg",
        timestamp: pino.stdTimeFunctions.isoTime,
        // bigint is not JSON-serialisable
        formatters: {
            log: (object) => stringifyBigInts(object),
        },
    });
}

export function makeNoopLogger(): Logger {
    return pino({ enabled: false });
}

function stringifyBigInts(object: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(object)) {
        out[key] = typeof value === "bigint" ? value.toString() : value;
    }
    return out;
}
