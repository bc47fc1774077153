import { StrategyState } from '../types/StrategyTypes';
import { IndicatorSnapshot } from '../value-objects/IndicatorSnapshot';
import { TradingSignal } from '../value-objects/TradingSignal';

export interface IStateMachine {
    getState(): StrategyState;
    step(snapshot: IndicatorSnapshot, slowSnapshot: IndicatorSnapshot | null, timestamp: number): TradingSignal;
    reset(): void;
}
