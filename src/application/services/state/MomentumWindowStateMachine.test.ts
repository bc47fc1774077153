import { MomentumWindowStateMachine } from './MomentumWindowStateMachine';
import { LevelBreakDetector } from '../detection/LevelBreakDetector';
import { StrategyConfig } from '../../../config/strategy.config';
import { IConfluenceEvaluator, ConfluenceInput } from '../../../domain/interfaces/IConfluenceEvaluator';
import { ConfluenceFactor, ConfluenceScore } from '../../../domain/value-objects/ConfluenceScore';
import { IndicatorSnapshot, NEUTRAL_SNAPSHOT } from '../../../domain/value-objects/IndicatorSnapshot';
import { IDLE, SignalKind, TradeDirection, WindowState } from '../../../domain/types/StrategyTypes';
import { Logger, LogLevel } from '../../../shared/logger/Logger';

class FixedConfluence implements IConfluenceEvaluator {
    readonly inputs: ConfluenceInput[] = [];

    constructor(private agreeing: ConfluenceFactor[]) {}

    set(agreeing: ConfluenceFactor[]): void {
        this.agreeing = agreeing;
    }

    score(input: ConfluenceInput): ConfluenceScore {
        this.inputs.push(input);
        const factors: Record<ConfluenceFactor, boolean> = { ...ConfluenceScore.none().factors };
        for (const name of this.agreeing) factors[name] = true;
        return new ConfluenceScore(factors);
    }
}

const FOUR: ConfluenceFactor[] = ['squeeze_release', 'momentum_alignment', 'fast_trend_alignment', 'break_strength'];
const THREE: ConfluenceFactor[] = ['squeeze_release', 'momentum_alignment', 'break_strength'];

const breakingUp: IndicatorSnapshot = { ...NEUTRAL_SNAPSHOT, resistanceLevels: [100], lastClose: 102 };
const quiet: IndicatorSnapshot = { ...NEUTRAL_SNAPSHOT, resistanceLevels: [100], lastClose: 100 };

describe('MomentumWindowStateMachine', () => {
    let confluence: FixedConfluence;
    let machine: MomentumWindowStateMachine;

    beforeEach(() => {
        confluence = new FixedConfluence(THREE);
        machine = new MomentumWindowStateMachine(
            StrategyConfig,
            new LevelBreakDetector(StrategyConfig),
            confluence,
            new Logger(LogLevel.ERROR)
        );
    });

    it('starts idle and waits without a break', () => {
        const signal = machine.step(quiet, null, 1);

        expect(signal.kind).toBe(SignalKind.NO_SIGNAL);
        expect(signal.reasons).toEqual(['waiting for setup']);
        expect(machine.getState()).toEqual(IDLE);
        expect(confluence.inputs).toHaveLength(0);
    });

    it('arms a window on a break without scoring it in the same cycle', () => {
        const signal = machine.step(breakingUp, null, 1);

        expect(signal.kind).toBe(SignalKind.NO_SIGNAL);
        expect(signal.reasons).toEqual(['break detected']);
        expect(machine.getState()).toEqual({
            state: WindowState.ARMED,
            windowRemaining: 6,
            breakLevel: 100,
            breakDirection: TradeDirection.LONG
        });
        expect(confluence.inputs).toHaveLength(0);
    });

    it('fires on the next cycle when four factors agree and returns to idle', () => {
        machine.step(breakingUp, null, 1);
        confluence.set(FOUR);

        const signal = machine.step(breakingUp, null, 2);

        expect(signal.kind).toBe(SignalKind.LONG);
        expect(signal.strength).toBe(0.8);
        expect(signal.price).toBe(102);
        expect(signal.timestamp).toBe(2);
        expect(signal.reasons).toEqual(FOUR);
        expect(machine.getState()).toEqual(IDLE);
    });

    it('scores the window against the stored break', () => {
        const slow = { ...NEUTRAL_SNAPSHOT, trendSignalLong: 1 as const };
        machine.step(breakingUp, null, 1);
        machine.step(quiet, slow, 2);

        expect(confluence.inputs).toEqual([{
            direction: TradeDirection.LONG,
            breakLevel: 100,
            price: 100,
            snapshot: quiet,
            slowSnapshot: slow
        }]);
    });

    it('counts down and expires after the window without a directional signal', () => {
        machine.step(breakingUp, null, 0);

        const signals = [1, 2, 3, 4, 5, 6].map(t => machine.step(quiet, null, t));

        expect(signals.map(s => s.kind)).toEqual(new Array<SignalKind>(6).fill(SignalKind.NO_SIGNAL));
        expect(signals[0].reasons).toEqual(['momentum window: 5 candles remaining (confluence 3/5)']);
        expect(signals[4].reasons).toEqual(['momentum window: 1 candles remaining (confluence 3/5)']);
        expect(signals[5].reasons).toEqual(['momentum window expired']);
        expect(machine.getState()).toEqual(IDLE);
    });

    it('ignores new breaks while armed', () => {
        const breakingDown: IndicatorSnapshot = { ...NEUTRAL_SNAPSHOT, supportLevels: [120], lastClose: 110 };
        machine.step(breakingUp, null, 1);
        machine.step(breakingDown, null, 2);

        const state = machine.getState();
        expect(state.state).toBe(WindowState.ARMED);
        if (state.state === WindowState.ARMED) {
            expect(state.breakDirection).toBe(TradeDirection.LONG);
            expect(state.breakLevel).toBe(100);
            expect(state.windowRemaining).toBe(5);
        }
    });

    it('can re-arm after the window closes', () => {
        machine.step(breakingUp, null, 1);
        confluence.set(FOUR);
        machine.step(breakingUp, null, 2);

        expect(machine.step(breakingUp, null, 3).reasons).toEqual(['break detected']);
        expect(machine.getState().state).toBe(WindowState.ARMED);
    });

    it('leaves the state untouched when scoring throws', () => {
        machine.step(breakingUp, null, 1);
        const before = machine.getState();
        jest.spyOn(confluence, 'score').mockImplementation(() => {
            throw new Error('boom');
        });

        expect(() => machine.step(quiet, null, 2)).toThrow('boom');
        expect(machine.getState()).toBe(before);
    });

    it('records transitions and clears on reset', () => {
        machine.step(breakingUp, null, 1);
        machine.reset();

        expect(machine.getState()).toEqual(IDLE);
        expect(machine.getHistory().map(t => [t.from, t.to])).toEqual([
            [WindowState.IDLE, WindowState.ARMED],
            [WindowState.ARMED, WindowState.IDLE]
        ]);
    });
});
