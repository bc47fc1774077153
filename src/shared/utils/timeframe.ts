const UNIT_MS: Record<string, number> = {
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000
};

/** '1m' -> 60000, '15m' -> 900000, '4h' -> 14400000. */
export function timeframeToMs(timeframe: string): number {
    const match = /^(\d+)([mhd])$/.exec(timeframe.trim());
    if (!match) {
        throw new Error(`Unsupported timeframe: ${timeframe}`);
    }
    const amount = Number(match[1]);
    if (amount <= 0) {
        throw new Error(`Unsupported timeframe: ${timeframe}`);
    }
    return amount * UNIT_MS[match[2]];
}

export function bucketTimestamp(timestampMs: number, bucketMs: number): number {
    return Math.floor(timestampMs / bucketMs) * bucketMs;
}
