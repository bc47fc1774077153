import { TradeDirection, WindowState, SignalKind } from '../enums';
import { TradingSignal } from '../value-objects/TradingSignal';
export { TradeDirection, WindowState, SignalKind };

export interface IdleState {
    readonly state: WindowState.IDLE;
}

/** `breakLevel` and `breakDirection` only exist while a window is armed. */
export interface ArmedState {
    readonly state: WindowState.ARMED;
    readonly windowRemaining: number;
    readonly breakLevel: number;
    readonly breakDirection: TradeDirection;
}

export type StrategyState = IdleState | ArmedState;

export const IDLE: IdleState = { state: WindowState.IDLE };

/** One evaluation cycle's output: the entry path always answers, the exit path may. */
export interface EvaluationResult {
    readonly entry: TradingSignal;
    readonly exit: TradingSignal | null;
}

export interface EngineStatus {
    readonly windowActive: boolean;
    readonly windowRemaining: number;
    readonly breakLevel: number;
    readonly breakDirection: TradeDirection | 'NONE';
    readonly bufferedBarCountPerTimeframe: Readonly<Record<string, number>>;
    readonly lastSignalKind: SignalKind | 'NONE';
}
