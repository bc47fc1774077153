import { TrendFlipExitDetector } from './TrendFlipExitDetector';
import { StrategyConfig } from '../../../config/strategy.config';
import { SignalKind } from '../../../domain/enums/SignalKind';
import { IndicatorSnapshot, NEUTRAL_SNAPSHOT, TrendSignal } from '../../../domain/value-objects/IndicatorSnapshot';

const withFlow = (trendSignalShort: TrendSignal): IndicatorSnapshot => ({
    ...NEUTRAL_SNAPSHOT,
    trendSignalShort,
    lastClose: 250
});

describe('TrendFlipExitDetector', () => {
    const detector = new TrendFlipExitDetector(StrategyConfig);

    it('exits a long when the fast flow turns bearish', () => {
        const exit = detector.check(1, withFlow(-1), 1000);

        expect(exit?.kind).toBe(SignalKind.EXIT);
        expect(exit?.strength).toBe(0.8);
        expect(exit?.price).toBe(250);
        expect(exit?.timestamp).toBe(1000);
        expect(exit?.reasons).toEqual(['trend flow flipped bearish']);
    });

    it('exits a short when the fast flow turns bullish', () => {
        expect(detector.check(-2, withFlow(1), 1000)?.reasons).toEqual(['trend flow flipped bullish']);
    });

    it('stays quiet while the flow agrees or is neutral', () => {
        expect(detector.check(1, withFlow(1), 1000)).toBeNull();
        expect(detector.check(1, withFlow(0), 1000)).toBeNull();
        expect(detector.check(-1, withFlow(-1), 1000)).toBeNull();
    });

    it('never exits a flat book', () => {
        expect(detector.check(0, withFlow(-1), 1000)).toBeNull();
        expect(detector.check(0, withFlow(1), 1000)).toBeNull();
    });
});
