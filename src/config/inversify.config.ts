import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES, Clock, RandomSource } from './types';
import { AppConfig } from './app.config';
import { StrategyConfigType } from './strategy.config';

// Interfaces
import { IBrokerGateway } from '../domain/interfaces/IBrokerGateway';
import { IIndicatorEngine } from '../domain/interfaces/IIndicatorEngine';
import { ILevelBreakDetector } from '../domain/interfaces/ILevelBreakDetector';
import { IConfluenceEvaluator } from '../domain/interfaces/IConfluenceEvaluator';
import { IStateMachine } from '../domain/interfaces/IStateMachine';
import { IExitDetector } from '../domain/interfaces/IExitDetector';
import { IStrategyEngine } from '../domain/interfaces/IStrategyEngine';

// Implementations
import { IndicatorEngine } from '../application/services/indicators/IndicatorEngine';
import { LevelBreakDetector } from '../application/services/detection/LevelBreakDetector';
import { ConfluenceEvaluator } from '../application/services/detection/ConfluenceEvaluator';
import { TrendFlipExitDetector } from '../application/services/detection/TrendFlipExitDetector';
import { MomentumWindowStateMachine } from '../application/services/state/MomentumWindowStateMachine';
import { CandleValidator } from '../application/services/validation/CandleValidator';
import { ConfluenceBreakoutStrategy } from '../application/strategies/ConfluenceBreakoutStrategy';
import { RunLiveTrading } from '../application/use-cases/RunLiveTrading';
import { PaperPositionBook } from '../infrastructure/exchanges/paper-trading/PaperPositionBook';
import { DemoBrokerGateway } from '../infrastructure/exchanges/demo/DemoBrokerGateway';
import { BybitBrokerGateway } from '../infrastructure/exchanges/bybit/BybitBrokerGateway';
import { Logger } from '../shared/logger/Logger';

export { TYPES };

export interface ContainerOverrides {
    logger?: Logger;
    clock?: Clock;
    random?: RandomSource;
    gateway?: IBrokerGateway;
}

export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
    const container = new Container();

    // --- Configuration & ambient ---
    container.bind<AppConfig>(TYPES.AppConfig).toConstantValue(config);
    container.bind<StrategyConfigType>(TYPES.StrategyConfig).toConstantValue(config.strategy);
    container.bind<Logger>(TYPES.Logger).toConstantValue(overrides.logger ?? new Logger(config.logLevel));
    container.bind<Clock>(TYPES.Clock).toConstantValue(overrides.clock ?? (() => Date.now()));
    container.bind<RandomSource>(TYPES.RandomSource).toConstantValue(overrides.random ?? Math.random);

    // --- Core Services ---
    container.bind<IIndicatorEngine>(TYPES.IIndicatorEngine).to(IndicatorEngine).inSingletonScope();
    container.bind<ILevelBreakDetector>(TYPES.ILevelBreakDetector).to(LevelBreakDetector);
    container.bind<IConfluenceEvaluator>(TYPES.IConfluenceEvaluator).to(ConfluenceEvaluator);
    container.bind<IExitDetector>(TYPES.IExitDetector).to(TrendFlipExitDetector);
    container.bind<IStateMachine>(TYPES.IStateMachine).to(MomentumWindowStateMachine).inSingletonScope();
    container.bind<IStrategyEngine>(TYPES.IStrategyEngine).to(ConfluenceBreakoutStrategy).inSingletonScope();
    container.bind<CandleValidator>(TYPES.CandleValidator).to(CandleValidator);

    // --- Broker Gateway ---
    container.bind<PaperPositionBook>(TYPES.PaperPositionBook).to(PaperPositionBook).inSingletonScope();
    if (overrides.gateway) {
        container.bind<IBrokerGateway>(TYPES.IBrokerGateway).toConstantValue(overrides.gateway);
    } else if (config.demoMode) {
        container.bind<IBrokerGateway>(TYPES.IBrokerGateway).to(DemoBrokerGateway).inSingletonScope();
    } else {
        container.bind<IBrokerGateway>(TYPES.IBrokerGateway).to(BybitBrokerGateway).inSingletonScope();
    }

    // --- Use cases ---
    container.bind<RunLiveTrading>(RunLiveTrading).toSelf().inSingletonScope();

    return container;
}
