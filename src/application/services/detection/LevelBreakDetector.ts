import { injectable, inject } from 'inversify';
import { ILevelBreakDetector } from '../../../domain/interfaces/ILevelBreakDetector';
import { BreakEvent } from '../../../domain/value-objects/BreakEvent';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { StrategyConfigType } from '../../../config/strategy.config';
import { TYPES } from '../../../config/types';

@injectable()
export class LevelBreakDetector implements ILevelBreakDetector {
    constructor(
        @inject(TYPES.StrategyConfig) private readonly config: StrategyConfigType
    ) { }

    /**
     * Resistance is scanned first and wins when both sides break on the same bar.
     * Within a side, the first level in list order (oldest pivot) is reported.
     */
    check(
        price: number,
        resistanceLevels: readonly number[],
        supportLevels: readonly number[]
    ): BreakEvent | null {
        const tolerance = this.config.breakTolerance;

        // LONG: close > resistance * (1 + tolerance)
        for (const resistance of resistanceLevels) {
            if (price > resistance * (1 + tolerance)) {
                return new BreakEvent(resistance, TradeDirection.LONG, price);
            }
        }

        // SHORT: close < support * (1 - tolerance)
        for (const support of supportLevels) {
            if (price < support * (1 - tolerance)) {
                return new BreakEvent(support, TradeDirection.SHORT, price);
            }
        }

        return null;
    }
}
