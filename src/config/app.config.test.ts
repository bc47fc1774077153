import { loadAppConfig } from './app.config';
import { StrategyConfig } from './strategy.config';
import { LogLevel } from '../shared/logger/Logger';
import { ConfigError } from '../shared/errors';

describe('loadAppConfig', () => {
    it('falls back to defaults on an empty environment', () => {
        expect(loadAppConfig({})).toEqual({
            demoMode: false,
            symbol: 'BTCUSDT',
            positionSize: 1,
            tickIntervalMs: 60_000,
            errorBackoffMs: 30_000,
            dashboard: { host: '0.0.0.0', port: 5001 },
            logLevel: LogLevel.INFO,
            strategy: StrategyConfig
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadAppConfig({
            DEMO_MODE: 'TRUE',
            SYMBOL: 'ETHUSDT',
            POSITION_SIZE: '3',
            TICK_INTERVAL_MS: '1000',
            ERROR_BACKOFF_MS: '0',
            DASHBOARD_HOST: '127.0.0.1',
            DASHBOARD_PORT: '8080',
            LOG_LEVEL: 'debug',
            MOMENTUM_WINDOW: '8'
        });

        expect(config.demoMode).toBe(true);
        expect(config.symbol).toBe('ETHUSDT');
        expect(config.positionSize).toBe(3);
        expect(config.tickIntervalMs).toBe(1000);
        expect(config.errorBackoffMs).toBe(0);
        expect(config.dashboard).toEqual({ host: '127.0.0.1', port: 8080 });
        expect(config.logLevel).toBe(LogLevel.DEBUG);
        expect(config.strategy.momentumWindow).toBe(8);
        expect(config.strategy.confluenceThreshold).toBe(4);
    });

    it('leaves the shared strategy defaults untouched', () => {
        loadAppConfig({ MOMENTUM_WINDOW: '9' });
        expect(StrategyConfig.momentumWindow).toBe(6);
    });

    it('rejects an unknown log level', () => {
        expect(() => loadAppConfig({ LOG_LEVEL: 'verbose' }))
            .toThrow('LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR (got "verbose")');
    });

    it('rejects malformed and out-of-range numbers', () => {
        expect(() => loadAppConfig({ POSITION_SIZE: 'two' })).toThrow(ConfigError);
        expect(() => loadAppConfig({ POSITION_SIZE: '0' })).toThrow('POSITION_SIZE must be an integer >= 1 (got "0")');
        expect(() => loadAppConfig({ DASHBOARD_PORT: '50.5' })).toThrow(ConfigError);
    });
});
