import { Candle } from '../../../domain/entities/Candle';
import { bucketTimestamp, timeframeToMs } from '../../../shared/utils/timeframe';

/**
 * Folds base candles into one candle: max high, min low, last close, summed volume.
 * Returns null for an empty bucket.
 */
export function aggregateCandle(candles: readonly Candle[], bucketStart: number, sequenceIndex: number): Candle | null {
    if (candles.length === 0) {
        return null;
    }

    const high = Math.max(...candles.map(c => c.high));
    const low = Math.min(...candles.map(c => c.low));
    const close = candles[candles.length - 1].close;
    const volume = candles.reduce((sum, c) => sum + c.volume, 0);

    return new Candle(sequenceIndex, bucketStart, high, low, close, volume);
}

/**
 * Builds higher-timeframe candles from a stream of base candles.
 * A bucket is emitted once the first candle of the next bucket arrives.
 */
export class CandleAggregator {
    private readonly bucketMs: number;
    private bucket: Candle[] = [];
    private bucketStart: number | null = null;
    private emitted = 0;

    constructor(public readonly targetTimeframe: string) {
        this.bucketMs = timeframeToMs(targetTimeframe);
    }

    push(candle: Candle): Candle | null {
        const start = bucketTimestamp(candle.timestamp, this.bucketMs);
        let closed: Candle | null = null;

        if (this.bucketStart === null) {
            this.bucketStart = start;
        } else if (start > this.bucketStart) {
            closed = aggregateCandle(this.bucket, this.bucketStart, this.emitted);
            if (closed) this.emitted++;
            this.bucket = [];
            this.bucketStart = start;
        }

        // Late candles (start < bucketStart) are folded into the open bucket.
        this.bucket.push(candle);
        return closed;
    }

    /** Candles collected for the bucket that has not closed yet. */
    get pending(): number {
        return this.bucket.length;
    }
}
