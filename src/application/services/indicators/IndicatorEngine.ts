import { injectable, inject } from 'inversify';
import { IIndicatorEngine } from '../../../domain/interfaces/IIndicatorEngine';
import { SeriesArrays } from '../../../domain/entities/RollingSeries';
import {
    BandTriple,
    IndicatorSnapshot,
    NEUTRAL_SNAPSHOT,
    NEUTRAL_SQUEEZE,
    PivotLevels,
    SqueezeReading,
    TrendSignal,
    ZERO_BANDS
} from '../../../domain/value-objects/IndicatorSnapshot';
import {
    IndicatorResult,
    fault,
    finite,
    firstFault,
    insufficient,
    isFault,
    ok
} from '../../../shared/result/IndicatorResult';
import { StrategyConfigType, TrendFlowParams } from '../../../config/strategy.config';
import { TYPES } from '../../../config/types';

type Values = readonly number[];

const EMPTY_PIVOTS: PivotLevels = { support: [], resistance: [] };

/** Bollinger bands fully contained in the Keltner channel. */
export function isSqueeze(bb: BandTriple, kc: BandTriple): boolean {
    return bb.upper < kc.upper && bb.lower > kc.lower;
}

/**
 * Indicator math over plain arrays (most recent value last).
 *
 * Nothing here throws on short histories: each method returns its sentinel
 * wrapped as `insufficient`, and a non-finite result comes back as `fault`.
 */
@injectable()
export class IndicatorEngine implements IIndicatorEngine {
    constructor(
        @inject(TYPES.StrategyConfig) private readonly config: StrategyConfigType
    ) { }

    sma(values: Values, period: number): IndicatorResult<number> {
        if (period < 1 || values.length < period) {
            return insufficient(0, `SMA(${period}) needs ${period} values, have ${values.length}`);
        }
        let sum = 0;
        for (let i = values.length - period; i < values.length; i++) {
            sum += values[i];
        }
        return finite(sum / period, `SMA(${period})`);
    }

    /**
     * Seeds with the oldest value and walks forward to the newest.
     * With fewer than `period` values it is just the latest value.
     */
    ema(values: Values, period: number): IndicatorResult<number> {
        if (values.length === 0) {
            return insufficient(0, `EMA(${period}) has no values`);
        }
        if (values.length < period) {
            return insufficient(values[values.length - 1], `EMA(${period}) needs ${period} values, have ${values.length}`);
        }

        const k = 2 / (period + 1);
        let ema = values[0];
        for (let i = 1; i < values.length; i++) {
            ema = (values[i] * k) + (ema * (1 - k));
        }
        return finite(ema, `EMA(${period})`);
    }

    atr(highs: Values, lows: Values, closes: Values, period: number = 14): IndicatorResult<number> {
        const length = Math.min(highs.length, lows.length, closes.length);
        if (length < 2) {
            return insufficient(0, 'ATR needs at least 2 bars');
        }

        const trueRanges: number[] = [];
        for (let i = 1; i < length; i++) {
            const prevClose = closes[i - 1];
            trueRanges.push(Math.max(
                highs[i] - lows[i],
                Math.abs(highs[i] - prevClose),
                Math.abs(lows[i] - prevClose)
            ));
        }

        const window = trueRanges.length < period ? trueRanges : trueRanges.slice(-period);
        const mean = window.reduce((sum, tr) => sum + tr, 0) / window.length;
        return finite(mean, `ATR(${period})`);
    }

    /** Population standard deviation of the last `period` values. */
    stdDev(values: Values, period: number): IndicatorResult<number> {
        const mean = this.sma(values, period);
        if (mean.kind !== 'ok') return mean;

        let squared = 0;
        for (let i = values.length - period; i < values.length; i++) {
            squared += Math.pow(values[i] - mean.value, 2);
        }
        return finite(Math.sqrt(squared / period), `StdDev(${period})`);
    }

    bollinger(closes: Values, period: number = 20, multiplier: number = 2.0): IndicatorResult<BandTriple> {
        if (closes.length < period) {
            return insufficient(ZERO_BANDS, `Bollinger(${period}) needs ${period} closes, have ${closes.length}`);
        }

        const middle = this.sma(closes, period);
        const deviation = this.stdDev(closes, period);
        if (isFault(middle)) return fault(ZERO_BANDS, middle.error);
        if (isFault(deviation)) return fault(ZERO_BANDS, deviation.error);

        const width = deviation.value * multiplier;
        return ok({
            upper: middle.value + width,
            middle: middle.value,
            lower: middle.value - width
        });
    }

    keltner(highs: Values, lows: Values, closes: Values, period: number = 20, multiplier: number = 1.5): IndicatorResult<BandTriple> {
        if (closes.length < period) {
            return insufficient(ZERO_BANDS, `Keltner(${period}) needs ${period} closes, have ${closes.length}`);
        }

        const middle = this.ema(closes, period);
        const atr = this.atr(highs, lows, closes, period);
        if (isFault(middle)) return fault(ZERO_BANDS, middle.error);
        if (isFault(atr)) return fault(ZERO_BANDS, atr.error);

        const width = atr.value * multiplier;
        return ok({
            upper: middle.value + width,
            middle: middle.value,
            lower: middle.value - width
        });
    }

    /**
     * Momentum: mean of (close - midpoint of the N-bar high/low range) and
     * (close - SMA N). Zero with fewer than N bars or a flat range.
     */
    momentum(highs: Values, lows: Values, closes: Values, length: number): IndicatorResult<number> {
        if (closes.length < length || highs.length < length || lows.length < length) {
            return insufficient(0, `Momentum(${length}) needs ${length} bars, have ${closes.length}`);
        }

        const highest = Math.max(...highs.slice(-length));
        const lowest = Math.min(...lows.slice(-length));
        if (highest === lowest) return ok(0);

        const close = closes[closes.length - 1];
        const sma = this.sma(closes, length);
        if (isFault(sma)) return sma;

        return finite(((close - (highest + lowest) / 2) + (close - sma.value)) / 2, `Momentum(${length})`);
    }

    squeeze(highs: Values, lows: Values, closes: Values): IndicatorResult<SqueezeReading> {
        const { bbLength, bbMult, kcLength, kcMult, momentumLength } = this.config.squeeze;

        const bb = this.bollinger(closes, bbLength, bbMult);
        const kc = this.keltner(highs, lows, closes, kcLength, kcMult);
        const momentum = this.momentum(highs, lows, closes, momentumLength);

        const error = firstFault([bb, kc, momentum]);
        if (error) return fault(NEUTRAL_SQUEEZE, error);

        const reading: SqueezeReading = {
            inSqueeze: isSqueeze(bb.value, kc.value),
            momentum: momentum.value,
            bbUpper: bb.value.upper,
            bbLower: bb.value.lower,
            kcUpper: kc.value.upper,
            kcLower: kc.value.lower
        };

        if (bb.kind === 'insufficient' || kc.kind === 'insufficient') {
            return insufficient(reading, `Squeeze needs ${Math.max(bbLength, kcLength)} closes, have ${closes.length}`);
        }
        return ok(reading);
    }

    /** +1 above EMA(smooth) + sens, -1 below EMA(smooth) - sens, else 0. */
    trendFlow(closes: Values, params: TrendFlowParams): IndicatorResult<TrendSignal> {
        const required = Math.max(params.main, params.smooth);
        if (closes.length < required) {
            return insufficient<TrendSignal>(0, `Trend flow needs ${required} closes, have ${closes.length}`);
        }

        const smoothed = this.ema(closes, params.smooth);
        if (isFault(smoothed)) return fault<TrendSignal>(0, smoothed.error);

        const close = closes[closes.length - 1];
        if (close > smoothed.value + params.sens) return ok<TrendSignal>(1);
        if (close < smoothed.value - params.sens) return ok<TrendSignal>(-1);
        return ok<TrendSignal>(0);
    }

    /**
     * Strict pivot lows/highs. A bar needs `leftBars` bars before it and
     * `rightBars` after it; any equal neighbour disqualifies it.
     */
    pivots(
        highs: Values,
        lows: Values,
        leftBars: number = 10,
        rightBars: number = 5,
        maxLevels: number = 5
    ): IndicatorResult<PivotLevels> {
        const length = Math.min(highs.length, lows.length);
        if (length < leftBars + rightBars + 1) {
            return insufficient(EMPTY_PIVOTS, `Pivots need ${leftBars + rightBars + 1} bars, have ${length}`);
        }

        const support: number[] = [];
        const resistance: number[] = [];

        for (let i = leftBars; i < length - rightBars; i++) {
            if (this.dominates(lows, i, leftBars, rightBars, (candidate, other) => candidate < other)) {
                support.push(lows[i]);
            }
            if (this.dominates(highs, i, leftBars, rightBars, (candidate, other) => candidate > other)) {
                resistance.push(highs[i]);
            }
        }

        return ok({
            support: support.slice(-maxLevels),
            resistance: resistance.slice(-maxLevels)
        });
    }

    compute(series: SeriesArrays): IndicatorResult<IndicatorSnapshot> {
        const { highs, lows, closes } = series;
        if (closes.length === 0) {
            return insufficient(NEUTRAL_SNAPSHOT, 'No closes buffered');
        }

        const { trendFlow, pivots, smaLong } = this.config;
        const fast = this.trendFlow(closes, trendFlow.fast);
        const slow = this.trendFlow(closes, trendFlow.slow);
        const squeeze = this.squeeze(highs, lows, closes);
        const levels = this.pivots(highs, lows, pivots.leftBars, pivots.rightBars, pivots.maxLevels);
        const sma200 = this.sma(closes, smaLong);

        const error = firstFault([fast, slow, squeeze, levels, sma200]);
        if (error) return fault(NEUTRAL_SNAPSHOT, error);

        return ok({
            trendSignalShort: fast.value,
            trendSignalLong: slow.value,
            squeeze: squeeze.value,
            supportLevels: levels.value.support,
            resistanceLevels: levels.value.resistance,
            lastClose: closes[closes.length - 1],
            sma200: sma200.value
        });
    }

    private dominates(
        values: Values,
        index: number,
        leftBars: number,
        rightBars: number,
        beats: (candidate: number, other: number) => boolean
    ): boolean {
        const candidate = values[index];
        for (let j = index - leftBars; j <= index + rightBars; j++) {
            if (j !== index && !beats(candidate, values[j])) {
                return false;
            }
        }
        return true;
    }
}
