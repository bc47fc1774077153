import { injectable, inject } from 'inversify';
import { ConfluenceInput, IConfluenceEvaluator } from '../../../domain/interfaces/IConfluenceEvaluator';
import { ConfluenceScore } from '../../../domain/value-objects/ConfluenceScore';
import { TrendSignal } from '../../../domain/value-objects/IndicatorSnapshot';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { StrategyConfigType } from '../../../config/strategy.config';
import { TYPES } from '../../../config/types';

@injectable()
export class ConfluenceEvaluator implements IConfluenceEvaluator {
    constructor(
        @inject(TYPES.StrategyConfig) private readonly config: StrategyConfigType
    ) { }

    score(input: ConfluenceInput): ConfluenceScore {
        const { direction, breakLevel, price, snapshot, slowSnapshot } = input;
        const isLong = direction === TradeDirection.LONG;
        const slowTrend = (slowSnapshot ?? snapshot).trendSignalLong;

        return new ConfluenceScore({
            squeeze_release: !snapshot.squeeze.inSqueeze,
            momentum_alignment: isLong ? snapshot.squeeze.momentum > 0 : snapshot.squeeze.momentum < 0,
            fast_trend_alignment: this.trendAgrees(snapshot.trendSignalShort, isLong),
            slow_trend_alignment: this.trendAgrees(slowTrend, isLong),
            break_strength: this.breakIsStrong(price, breakLevel)
        });
    }

    // Neutral flow does not disagree.
    private trendAgrees(signal: TrendSignal, isLong: boolean): boolean {
        return isLong ? signal >= 0 : signal <= 0;
    }

    private breakIsStrong(price: number, level: number): boolean {
        if (level <= 0 || price <= 0) return false;
        return Math.abs(price - level) / level >= this.config.breakTolerance;
    }
}
