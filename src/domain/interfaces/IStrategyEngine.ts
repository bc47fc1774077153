import { Candle } from '../entities/Candle';
import { EngineStatus, EvaluationResult } from '../types/StrategyTypes';

export interface IStrategyEngine {
    evaluate(candle: Candle, position: number): EvaluationResult;
    getStatus(): EngineStatus;
}
