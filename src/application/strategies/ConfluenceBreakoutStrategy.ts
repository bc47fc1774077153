/**
 * Confluence Breakout Strategy
 *
 * Per primary candle:
 * 1. Buffer the candle (and any completed slow-timeframe candle built from it)
 * 2. Compute indicators for both timeframes
 * 3. Step the momentum window: arm on a support/resistance break, fire when
 *    enough confluence factors agree, expire after the countdown
 * 4. Independently, flag an exit when the fast trend flow turns against the position
 */

import { injectable, inject } from 'inversify';
import { IStrategyEngine } from '../../domain/interfaces/IStrategyEngine';
import { IIndicatorEngine } from '../../domain/interfaces/IIndicatorEngine';
import { IStateMachine } from '../../domain/interfaces/IStateMachine';
import { IExitDetector } from '../../domain/interfaces/IExitDetector';
import { Candle } from '../../domain/entities/Candle';
import { RollingSeries } from '../../domain/entities/RollingSeries';
import { IndicatorSnapshot } from '../../domain/value-objects/IndicatorSnapshot';
import { TradingSignal } from '../../domain/value-objects/TradingSignal';
import { EngineStatus, EvaluationResult, SignalKind, WindowState } from '../../domain/types/StrategyTypes';
import { CandleAggregator } from '../services/market/CandleAggregator';
import { StrategyConfigType } from '../../config/strategy.config';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';

@injectable()
export class ConfluenceBreakoutStrategy implements IStrategyEngine {
    private readonly primary: RollingSeries;
    private readonly slow: RollingSeries;
    private readonly aggregator: CandleAggregator;
    private readonly logger: Logger;
    private lastSignalKind: SignalKind | 'NONE' = 'NONE';

    constructor(
        @inject(TYPES.StrategyConfig) private readonly config: StrategyConfigType,
        @inject(TYPES.IIndicatorEngine) private readonly indicators: IIndicatorEngine,
        @inject(TYPES.IStateMachine) private readonly stateMachine: IStateMachine,
        @inject(TYPES.IExitDetector) private readonly exitDetector: IExitDetector,
        @inject(TYPES.Logger) logger: Logger
    ) {
        const { timeframes, series } = config;
        this.primary = new RollingSeries(timeframes.primary, series.capacity);
        this.slow = new RollingSeries(timeframes.slow, series.capacity);
        this.aggregator = new CandleAggregator(timeframes.slow);
        this.logger = logger.withScope('StrategyEngine');
        this.logger.info(`Initialized (primary ${timeframes.primary}, slow ${timeframes.slow}, window ${config.momentumWindow})`);
    }

    /**
     * Runs one cycle for a validated primary-timeframe candle. Never throws:
     * a failing cycle is logged and answered with NO_SIGNAL.
     */
    evaluate(candle: Candle, position: number): EvaluationResult {
        this.ingest(candle);

        if (this.primary.length < this.config.series.minBars) {
            this.logger.debug(`Insufficient data: ${this.primary.length}/${this.config.series.minBars} bars`);
            return { entry: TradingSignal.noSignal(candle.close, 'insufficient data', candle.timestamp), exit: null };
        }

        try {
            const snapshot = this.indicators.compute(this.primary.asArrays());
            if (snapshot.kind === 'fault') {
                return this.faulted(candle, snapshot.error);
            }

            const entry = this.stateMachine.step(snapshot.value, this.slowSnapshot(), candle.timestamp);
            const exit = this.exitDetector.check(position, snapshot.value, candle.timestamp);

            if (entry.isActionable) this.lastSignalKind = entry.kind;
            if (exit) {
                this.logger.info(`EXIT signal: ${exit.reasons.join(', ')}`);
                this.lastSignalKind = exit.kind;
            }

            return { entry, exit };
        } catch (error) {
            return this.faulted(candle, error);
        }
    }

    getStatus(): EngineStatus {
        const state = this.stateMachine.getState();
        const armed = state.state === WindowState.ARMED ? state : null;

        return {
            windowActive: armed !== null,
            windowRemaining: armed?.windowRemaining ?? 0,
            breakLevel: armed?.breakLevel ?? 0,
            breakDirection: armed?.breakDirection ?? 'NONE',
            bufferedBarCountPerTimeframe: {
                [this.primary.timeframe]: this.primary.length,
                [this.slow.timeframe]: this.slow.length
            },
            lastSignalKind: this.lastSignalKind
        };
    }

    private ingest(candle: Candle): void {
        this.primary.append(candle.high, candle.low, candle.close, candle.volume);

        const closed = this.aggregator.push(candle);
        if (closed) {
            this.slow.append(closed.high, closed.low, closed.close, closed.volume);
            this.logger.debug(`Closed ${this.slow.timeframe} candle #${closed.sequenceIndex} (close ${closed.close})`);
        }
    }

    /** Null until the slow series can support its own trend flow reading. */
    private slowSnapshot(): IndicatorSnapshot | null {
        const { main, smooth } = this.config.trendFlow.slow;
        if (this.slow.length < Math.max(main, smooth)) {
            return null;
        }

        const result = this.indicators.compute(this.slow.asArrays());
        if (result.kind === 'fault') {
            this.logger.warn(`Slow timeframe indicators failed, falling back to primary: ${result.error.message}`);
            return null;
        }
        return result.value;
    }

    private faulted(candle: Candle, error: unknown): EvaluationResult {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('Evaluation cycle failed', error);
        return {
            entry: TradingSignal.noSignal(candle.close, `computation fault: ${message}`, candle.timestamp),
            exit: null
        };
    }
}
