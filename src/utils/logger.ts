// src/utils/logger.ts
// Console logger for the oracle decoder

export interface AnomalyLog {
    type: string;
    account?: string;
    related?: string;
    reason?: string;
    [key: string]: unknown;
}

/**
 * Single-line anomaly record: [type] | account=... | related=... | reason=...
 */
export function formatAnomaly(log: AnomalyLog): string {
    const parts: string[] = [`[${log.type}]`];

    if (log.account) parts.push(`account=${log.account}`);
    if (log.related) parts.push(`related=${log.related}`);
    if (log.reason) parts.push(`reason=${log.reason}`);

    return parts.join(" | ");
}

export function logAnomaly(log: AnomalyLog): void {
    logger.warn(formatAnomaly(log));
}

let debugOverride: boolean | null = null;

/**
 * Force debug output on or off; null falls back to DEBUG=1
 */
export function setDebugLogging(enabled: boolean | null): void {
    debugOverride = enabled;
}

function debugEnabled(): boolean {
    return debugOverride ?? process.env.DEBUG === "1";
}

export const logger = {
    info: (...args: unknown[]) => console.log("[INFO]", ...args),
    warn: (...args: unknown[]) => console.warn("[WARN]", ...args),
    error: (...args: unknown[]) => console.error("[ERROR]", ...args),
    debug: (...args: unknown[]) => {
        if (debugEnabled()) {
            console.log("[DEBUG]", ...args);
        }
    },
};

export default logger;
