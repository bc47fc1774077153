import { CandleAggregator, aggregateCandle } from './CandleAggregator';
import { Candle } from '../../../domain/entities/Candle';

const MINUTE = 60_000;

describe('aggregateCandle', () => {
    it('takes the max high, min low, last close and summed volume', () => {
        const candles = [
            new Candle(0, 0, 10, 8, 9, 100),
            new Candle(1, MINUTE, 12, 9, 11, 50),
            new Candle(2, 2 * MINUTE, 11, 7, 10, 25)
        ];

        const merged = aggregateCandle(candles, 0, 3);

        expect(merged).toEqual(new Candle(3, 0, 12, 7, 10, 175));
    });

    it('returns null for an empty bucket', () => {
        expect(aggregateCandle([], 0, 0)).toBeNull();
    });
});

describe('CandleAggregator', () => {
    it('emits a 15m candle when the next bucket opens', () => {
        const aggregator = new CandleAggregator('15m');
        const emitted: Candle[] = [];

        for (let i = 0; i < 31; i++) {
            const closed = aggregator.push(new Candle(i, i * MINUTE, 100 + i, 90 + i, 95 + i, 10));
            if (closed) emitted.push(closed);
        }

        expect(emitted).toEqual([
            new Candle(0, 0, 114, 90, 109, 150),
            new Candle(1, 15 * MINUTE, 129, 105, 124, 150)
        ]);
        expect(aggregator.pending).toBe(1);
    });

    it('buckets by wall-clock boundary, not by count', () => {
        const aggregator = new CandleAggregator('15m');

        expect(aggregator.push(new Candle(0, 14 * MINUTE, 1, 1, 1, 1))).toBeNull();
        const closed = aggregator.push(new Candle(1, 15 * MINUTE, 2, 2, 2, 1));

        expect(closed?.timestamp).toBe(0);
        expect(closed?.close).toBe(1);
    });

    it('folds a late candle into the open bucket', () => {
        const aggregator = new CandleAggregator('15m');
        aggregator.push(new Candle(0, 15 * MINUTE, 5, 5, 5, 1));
        aggregator.push(new Candle(1, 14 * MINUTE, 6, 4, 5, 1));

        expect(aggregator.pending).toBe(2);
    });

    it('rejects an unknown timeframe', () => {
        expect(() => new CandleAggregator('15x')).toThrow('Unsupported timeframe: 15x');
    });
});
