/** [startTime, open, high, low, close, volume, turnover], all strings. */
export type BybitKlineData = [string, string, string, string, string, string, string];

/** v5 REST envelope; `retCode` 0 means success. */
export interface BybitEnvelope<T> {
    retCode: number;
    retMsg: string;
    result: T;
}

export type BybitKlineResponse = BybitEnvelope<{
    symbol: string;
    category: string;
    list: BybitKlineData[];
}>;

export type BybitTickerResponse = BybitEnvelope<{
    list: Array<{
        symbol: string;
        lastPrice: string;
    }>;
}>;
