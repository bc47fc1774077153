/**
 * Confluence breakout strategy defaults.
 *
 * Trend flow thresholds (`sens`) are in price points, so they need retuning
 * per instrument.
 */

export const StrategyConfig = {
    // Timeframes
    timeframes: {
        primary: '1m',
        slow: '15m'
    },

    series: {
        capacity: 200,
        minBars: 50 // primary closes required before evaluating
    },

    // Adaptive trend flow (close vs EMA(smooth) ± sens)
    trendFlow: {
        fast: { main: 6, smooth: 14, sens: 2.0 },
        slow: { main: 10, smooth: 14, sens: 2.0 }
    },

    // Pivot support/resistance
    pivots: {
        leftBars: 10,
        rightBars: 5,
        maxLevels: 5
    },

    // Bollinger inside Keltner
    squeeze: {
        bbLength: 20,
        bbMult: 2.0,
        kcLength: 20,
        kcMult: 1.5,
        momentumLength: 20
    },

    smaLong: 200,

    breakTolerance: 0.001, // 0.1% beyond the level

    momentumWindow: 6, // candles to wait for confluence after a break
    confluenceThreshold: 4, // of 5 factors

    exitStrength: 0.8
};

export type StrategyConfigType = typeof StrategyConfig;

export interface TrendFlowParams {
    main: number;
    smooth: number;
    sens: number;
}
