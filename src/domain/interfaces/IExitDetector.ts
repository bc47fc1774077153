import { IndicatorSnapshot } from '../value-objects/IndicatorSnapshot';
import { TradingSignal } from '../value-objects/TradingSignal';

export interface IExitDetector {
    check(position: number, snapshot: IndicatorSnapshot, timestamp: number): TradingSignal | null;
}
