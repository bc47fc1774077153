import { injectable, inject } from 'inversify';
import { IExitDetector } from '../../../domain/interfaces/IExitDetector';
import { IndicatorSnapshot } from '../../../domain/value-objects/IndicatorSnapshot';
import { TradingSignal } from '../../../domain/value-objects/TradingSignal';
import { StrategyConfigType } from '../../../config/strategy.config';
import { TYPES } from '../../../config/types';

/** Exit when the fast trend flow turns against the open position. */
@injectable()
export class TrendFlipExitDetector implements IExitDetector {
    constructor(
        @inject(TYPES.StrategyConfig) private readonly config: StrategyConfigType
    ) { }

    check(position: number, snapshot: IndicatorSnapshot, timestamp: number): TradingSignal | null {
        const flow = snapshot.trendSignalShort;
        const price = snapshot.lastClose;

        if (position > 0 && flow < 0) {
            return TradingSignal.exit(this.config.exitStrength, price, 'trend flow flipped bearish', timestamp);
        }
        if (position < 0 && flow > 0) {
            return TradingSignal.exit(this.config.exitStrength, price, 'trend flow flipped bullish', timestamp);
        }
        return null;
    }
}
