export const TYPES = {
    AppConfig: Symbol.for('AppConfig'),
    StrategyConfig: Symbol.for('StrategyConfig'),
    Logger: Symbol.for('Logger'),
    Clock: Symbol.for('Clock'),
    RandomSource: Symbol.for('RandomSource'),
    IBrokerGateway: Symbol.for('IBrokerGateway'),
    PaperPositionBook: Symbol.for('PaperPositionBook'),
    IIndicatorEngine: Symbol.for('IIndicatorEngine'),
    ILevelBreakDetector: Symbol.for('ILevelBreakDetector'),
    IConfluenceEvaluator: Symbol.for('IConfluenceEvaluator'),
    IStateMachine: Symbol.for('IStateMachine'),
    IExitDetector: Symbol.for('IExitDetector'),
    IStrategyEngine: Symbol.for('IStrategyEngine'),
    CandleValidator: Symbol.for('CandleValidator')
};

export type Clock = () => number;
export type RandomSource = () => number;
