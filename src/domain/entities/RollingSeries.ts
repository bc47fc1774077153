export interface SeriesArrays {
    readonly highs: readonly number[];
    readonly lows: readonly number[];
    readonly closes: readonly number[];
    readonly volumes: readonly number[];
}

/**
 * Fixed-capacity OHLCV buffer for one timeframe.
 *
 * The four sequences always share a length. Input is not validated here;
 * candles are checked at the gateway boundary before they are appended.
 * Evicted samples are dropped in batches once `capacity` of them have piled up.
 */
export class RollingSeries {
    private readonly highs: number[] = [];
    private readonly lows: number[] = [];
    private readonly closes: number[] = [];
    private readonly volumes: number[] = [];
    // Index of the oldest retained sample.
    private start = 0;

    constructor(
        public readonly timeframe: string,
        public readonly capacity: number = 200
    ) {}

    get length(): number {
        return this.closes.length - this.start;
    }

    append(high: number, low: number, close: number, volume: number): void {
        this.highs.push(high);
        this.lows.push(low);
        this.closes.push(close);
        this.volumes.push(volume);

        if (this.length > this.capacity) {
            this.start++;
            if (this.start >= this.capacity) this.compact();
        }
    }

    asArrays(): SeriesArrays {
        return {
            highs: this.highs.slice(this.start),
            lows: this.lows.slice(this.start),
            closes: this.closes.slice(this.start),
            volumes: this.volumes.slice(this.start)
        };
    }

    lastClose(): number {
        return this.closes[this.closes.length - 1] ?? 0;
    }

    private compact(): void {
        for (const values of [this.highs, this.lows, this.closes, this.volumes]) {
            values.splice(0, this.start);
        }
        this.start = 0;
    }
}
