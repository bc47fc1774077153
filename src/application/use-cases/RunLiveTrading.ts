import { injectable, inject } from 'inversify';
import { IStrategyEngine } from '../../domain/interfaces/IStrategyEngine';
import { IBrokerGateway } from '../../domain/interfaces/IBrokerGateway';
import { EngineStatus, EvaluationResult } from '../../domain/types/StrategyTypes';
import { TradingSignal } from '../../domain/value-objects/TradingSignal';
import { CandleValidator } from '../services/validation/CandleValidator';
import { AppConfig } from '../../config/app.config';
import { TYPES, Clock } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';

export interface BotStatus {
    status: 'Running' | 'Stopped';
    uptime: string;
    symbol: string;
    position: number;
    lastPrice: number;
    lastSignal: string;
    errorCount: number;
    brokerConnected: boolean;
    engine: EngineStatus;
}

@injectable()
export class RunLiveTrading {
    private readonly logger: Logger;
    private isRunning = false;
    private startedAt: number | null = null;
    private position = 0;
    private lastPrice = 0;
    private lastSignal = 'None';
    private errorCount = 0;
    private wakeUp: (() => void) | null = null;

    constructor(
        @inject(TYPES.AppConfig) private readonly config: AppConfig,
        @inject(TYPES.IStrategyEngine) private readonly strategy: IStrategyEngine,
        @inject(TYPES.IBrokerGateway) private readonly gateway: IBrokerGateway,
        @inject(TYPES.CandleValidator) private readonly validator: CandleValidator,
        @inject(TYPES.Clock) private readonly clock: Clock,
        @inject(TYPES.Logger) logger: Logger
    ) {
        this.logger = logger.withScope('LiveTrading');
    }

    /** Resolves once `stop()` has been called and the current tick has finished. */
    async start(): Promise<void> {
        this.logger.info(`Starting live trading for ${this.config.symbol}`, {
            tickIntervalMs: this.config.tickIntervalMs,
            demoMode: this.config.demoMode
        });

        await this.gateway.connect();
        this.isRunning = true;
        this.startedAt = this.clock();

        while (this.isRunning) {
            let delay = this.config.tickIntervalMs;
            try {
                await this.runOnce();
            } catch (error) {
                this.errorCount++;
                this.logger.error('Error in tick loop', error);
                delay = this.config.errorBackoffMs;
            }
            if (this.isRunning) {
                await this.sleep(delay);
            }
        }

        await this.gateway.disconnect();
        this.logger.info('Live trading stopped');
    }

    stop(): void {
        this.logger.info('Stopping live trading');
        this.isRunning = false;
        this.wakeUp?.();
    }

    /**
     * One cycle: candle in, evaluation out, paper orders placed. Awaited by the
     * loop before the next tick, so the engine never sees two candles at once.
     * Resolves null when the gateway has no new candle; the engine is not run.
     */
    async runOnce(): Promise<EvaluationResult | null> {
        const fetched = await this.gateway.fetchLatestCandle();
        if (fetched === null) {
            this.logger.debug('No new candle this tick');
            return null;
        }

        const candle = this.validator.validate(fetched);
        this.position = await this.gateway.currentPosition();
        this.lastPrice = candle.close;

        this.logger.debug(`${this.config.symbol} close ${candle.close}, position ${this.position}`);

        const result = this.strategy.evaluate(candle, this.position);
        await this.act(result);
        return result;
    }

    getStatus(): BotStatus {
        return {
            status: this.isRunning ? 'Running' : 'Stopped',
            uptime: this.formatUptime(),
            symbol: this.config.symbol,
            position: this.position,
            lastPrice: this.lastPrice,
            lastSignal: this.lastSignal,
            errorCount: this.errorCount,
            brokerConnected: this.gateway.isConnected(),
            engine: this.strategy.getStatus()
        };
    }

    private async act(result: EvaluationResult): Promise<void> {
        const { entry, exit } = result;

        if (exit) {
            this.record(exit);
            await this.gateway.closePosition(exit.price);
            this.position = 0;
        }

        const direction = entry.direction;
        if (direction === null) return;

        this.record(entry);
        if (this.position !== 0) {
            this.logger.info(`Ignoring ${entry.kind} signal while holding ${this.position}`);
            return;
        }
        await this.gateway.openPosition(direction, this.config.positionSize, entry.price);
        this.position = await this.gateway.currentPosition();
    }

    private record(signal: TradingSignal): void {
        this.logger.info(`SIGNAL: ${signal}`);
        this.lastSignal = `${signal.kind} @ ${signal.price.toFixed(2)}`;
    }

    private formatUptime(): string {
        if (this.startedAt === null) return '0:00:00';
        const totalSeconds = Math.max(0, Math.floor((this.clock() - this.startedAt) / 1000));
        const hours = Math.floor(totalSeconds / 3600);
        const minutes = Math.floor((totalSeconds % 3600) / 60);
        const seconds = totalSeconds % 60;
        return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            const wake = (): void => {
                clearTimeout(timer);
                this.wakeUp = null;
                resolve();
            };
            const timer = setTimeout(wake, ms);
            this.wakeUp = wake;
        });
    }
}
