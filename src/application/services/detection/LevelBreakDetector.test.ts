import { LevelBreakDetector } from './LevelBreakDetector';
import { StrategyConfig } from '../../../config/strategy.config';
import { TradeDirection } from '../../../domain/enums/TradeDirection';

describe('LevelBreakDetector', () => {
    const detector = new LevelBreakDetector(StrategyConfig);

    it('reports a LONG break above resistance beyond the tolerance', () => {
        const event = detector.check(100.2, [100], []);

        expect(event).not.toBeNull();
        expect(event?.direction).toBe(TradeDirection.LONG);
        expect(event?.level).toBe(100);
        expect(event?.price).toBe(100.2);
    });

    it('reports a SHORT break below support beyond the tolerance', () => {
        const event = detector.check(99.8, [], [100]);

        expect(event?.direction).toBe(TradeDirection.SHORT);
        expect(event?.level).toBe(100);
    });

    it('ignores a close inside the tolerance band', () => {
        expect(detector.check(100.05, [100], [])).toBeNull();
        expect(detector.check(99.95, [], [100])).toBeNull();
    });

    it('returns null without levels', () => {
        expect(detector.check(100, [], [])).toBeNull();
    });

    it('scans resistance before support', () => {
        const event = detector.check(100, [99], [101]);

        expect(event?.direction).toBe(TradeDirection.LONG);
        expect(event?.level).toBe(99);
    });

    it('reports the first broken level in list order', () => {
        expect(detector.check(110, [95, 100, 105], [])?.level).toBe(95);
    });

    it('measures how far the price closed beyond the level', () => {
        expect(detector.check(102, [100], [])?.distance).toBeCloseTo(0.02, 10);
    });
});
