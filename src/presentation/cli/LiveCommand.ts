import { createContainer } from '../../config/inversify.config';
import { AppConfig } from '../../config/app.config';
import { RunLiveTrading } from '../../application/use-cases/RunLiveTrading';
import { startStatusServer } from '../http/statusServer';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';

export async function runLiveCommand(config: AppConfig): Promise<void> {
    const container = createContainer(config);
    const logger = container.get<Logger>(TYPES.Logger);
    let liveTrading: RunLiveTrading | null = null;

    const server = await startStatusServer(
        () => liveTrading?.getStatus() ?? null,
        config.dashboard.host,
        config.dashboard.port,
        logger
    );

    try {
        liveTrading = container.get<RunLiveTrading>(RunLiveTrading);

        logger.info(`Symbol: ${config.symbol}`);
        logger.info(`Tick Interval: ${config.tickIntervalMs}ms`);
        logger.info(`Mode: ${config.demoMode ? 'demo' : 'live (Bybit data, paper positions)'}`);

        const trader = liveTrading;
        const shutdown = (): void => trader.stop();
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);

        await trader.start();
    } catch (error) {
        logger.error('Live trading failed', error);
        throw error;
    } finally {
        await new Promise<void>(resolve => server.close(() => resolve()));
    }
}
