export type TrendSignal = -1 | 0 | 1;

export interface BandTriple {
    readonly upper: number;
    readonly middle: number;
    readonly lower: number;
}

export interface SqueezeReading {
    readonly inSqueeze: boolean;
    readonly momentum: number;
    readonly bbUpper: number;
    readonly bbLower: number;
    readonly kcUpper: number;
    readonly kcLower: number;
}

export interface PivotLevels {
    /** Oldest first, newest last. */
    readonly support: readonly number[];
    readonly resistance: readonly number[];
}

/** Indicator values computed from one series at one instant. */
export interface IndicatorSnapshot {
    readonly trendSignalShort: TrendSignal;
    readonly trendSignalLong: TrendSignal;
    readonly squeeze: SqueezeReading;
    readonly supportLevels: readonly number[];
    readonly resistanceLevels: readonly number[];
    readonly lastClose: number;
    readonly sma200: number;
}

export const ZERO_BANDS: BandTriple = { upper: 0, middle: 0, lower: 0 };

export const NEUTRAL_SQUEEZE: SqueezeReading = {
    inSqueeze: false,
    momentum: 0,
    bbUpper: 0,
    bbLower: 0,
    kcUpper: 0,
    kcLower: 0
};

export const NEUTRAL_SNAPSHOT: IndicatorSnapshot = {
    trendSignalShort: 0,
    trendSignalLong: 0,
    squeeze: NEUTRAL_SQUEEZE,
    supportLevels: [],
    resistanceLevels: [],
    lastClose: 0,
    sma200: 0
};
