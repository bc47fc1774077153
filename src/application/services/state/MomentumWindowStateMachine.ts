import { injectable, inject } from 'inversify';
import { IStateMachine } from '../../../domain/interfaces/IStateMachine';
import { ILevelBreakDetector } from '../../../domain/interfaces/ILevelBreakDetector';
import { IConfluenceEvaluator } from '../../../domain/interfaces/IConfluenceEvaluator';
import { ArmedState, IDLE, StrategyState, WindowState } from '../../../domain/types/StrategyTypes';
import { IndicatorSnapshot } from '../../../domain/value-objects/IndicatorSnapshot';
import { TradingSignal } from '../../../domain/value-objects/TradingSignal';
import { StrategyConfigType } from '../../../config/strategy.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

interface StateTransition {
    from: WindowState;
    to: WindowState;
    timestamp: number;
    reason: string;
}

interface Decision {
    next: StrategyState;
    signal: TradingSignal;
    reason: string;
}

const MAX_HISTORY = 100;

/**
 * IDLE -> ARMED on a level break, ARMED -> IDLE when confluence fires or the
 * countdown runs out. The next state is decided in full before it is stored,
 * so a cycle that throws leaves the previous state untouched.
 */
@injectable()
export class MomentumWindowStateMachine implements IStateMachine {
    private state: StrategyState = IDLE;
    private history: StateTransition[] = [];
    private readonly logger: Logger;

    constructor(
        @inject(TYPES.StrategyConfig) private readonly config: StrategyConfigType,
        @inject(TYPES.ILevelBreakDetector) private readonly breakDetector: ILevelBreakDetector,
        @inject(TYPES.IConfluenceEvaluator) private readonly confluence: IConfluenceEvaluator,
        @inject(TYPES.Logger) logger: Logger
    ) {
        this.logger = logger.withScope('MomentumWindow');
    }

    getState(): StrategyState {
        return this.state;
    }

    step(snapshot: IndicatorSnapshot, slowSnapshot: IndicatorSnapshot | null, timestamp: number): TradingSignal {
        const current = this.state;
        const decision = current.state === WindowState.ARMED
            ? this.evaluateWindow(current, snapshot, slowSnapshot, timestamp)
            : this.lookForBreak(snapshot, timestamp);

        this.commit(decision.next, decision.reason, timestamp);
        return decision.signal;
    }

    reset(): void {
        this.commit(IDLE, 'Manual reset', Date.now());
    }

    getHistory(): StateTransition[] {
        return [...this.history];
    }

    private lookForBreak(snapshot: IndicatorSnapshot, timestamp: number): Decision {
        const price = snapshot.lastClose;
        const breakEvent = this.breakDetector.check(price, snapshot.resistanceLevels, snapshot.supportLevels);

        if (!breakEvent) {
            return {
                next: IDLE,
                signal: TradingSignal.noSignal(price, 'waiting for setup', timestamp),
                reason: 'no break'
            };
        }

        this.logger.info(`${breakEvent.direction} break of ${breakEvent.level} at ${price}, window of ${this.config.momentumWindow} candles opened`);
        return {
            next: {
                state: WindowState.ARMED,
                windowRemaining: this.config.momentumWindow,
                breakLevel: breakEvent.level,
                breakDirection: breakEvent.direction
            },
            signal: TradingSignal.noSignal(price, 'break detected', timestamp),
            reason: `${breakEvent.direction} break of ${breakEvent.level}`
        };
    }

    private evaluateWindow(
        armed: ArmedState,
        snapshot: IndicatorSnapshot,
        slowSnapshot: IndicatorSnapshot | null,
        timestamp: number
    ): Decision {
        const price = snapshot.lastClose;
        const score = this.confluence.score({
            direction: armed.breakDirection,
            breakLevel: armed.breakLevel,
            price,
            snapshot,
            slowSnapshot
        });

        if (score.count >= this.config.confluenceThreshold) {
            const strength = score.count / score.total;
            this.logger.info(`${armed.breakDirection} signal at ${price} (strength ${strength.toFixed(2)}, ${score})`);
            return {
                next: IDLE,
                signal: TradingSignal.entry(armed.breakDirection, strength, price, score.trueFactors, timestamp),
                reason: `signal fired with confluence ${score.count}/${score.total}`
            };
        }

        const remaining = armed.windowRemaining - 1;
        this.logger.debug(`Window: ${remaining} candles remaining, confluence ${score}`);

        if (remaining <= 0) {
            this.logger.info('Momentum window expired without signal');
            return {
                next: IDLE,
                signal: TradingSignal.noSignal(price, 'momentum window expired', timestamp),
                reason: 'window expired'
            };
        }

        return {
            next: { ...armed, windowRemaining: remaining },
            signal: TradingSignal.noSignal(
                price,
                `momentum window: ${remaining} candles remaining (confluence ${score.count}/${score.total})`,
                timestamp
            ),
            reason: 'countdown'
        };
    }

    private commit(next: StrategyState, reason: string, timestamp: number): void {
        const from = this.state.state;
        if (from !== next.state) {
            this.logger.debug(`State transition: ${from} → ${next.state} (${reason})`);
            this.history.push({ from, to: next.state, timestamp, reason });
            if (this.history.length > MAX_HISTORY) {
                this.history.shift();
            }
        }
        this.state = next;
    }
}
