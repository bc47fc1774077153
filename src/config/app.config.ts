import { StrategyConfig, StrategyConfigType } from './strategy.config';
import { LogLevel, parseLogLevel } from '../shared/logger/Logger';
import { ConfigError } from '../shared/errors';

export interface AppConfig {
    demoMode: boolean;
    symbol: string;
    positionSize: number;
    tickIntervalMs: number;
    errorBackoffMs: number;
    dashboard: {
        host: string;
        port: number;
    };
    logLevel: LogLevel;
    strategy: StrategyConfigType;
}

type Env = Record<string, string | undefined>;

export function loadAppConfig(env: Env = process.env): AppConfig {
    const logLevel = parseLogLevel(env.LOG_LEVEL);
    if (logLevel === null) {
        throw new ConfigError(`LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR (got "${env.LOG_LEVEL}")`);
    }

    return {
        demoMode: (env.DEMO_MODE ?? 'false').toLowerCase() === 'true',
        symbol: env.SYMBOL || 'BTCUSDT',
        positionSize: readInt(env, 'POSITION_SIZE', 1, 1),
        tickIntervalMs: readInt(env, 'TICK_INTERVAL_MS', 60_000, 1),
        errorBackoffMs: readInt(env, 'ERROR_BACKOFF_MS', 30_000, 0),
        dashboard: {
            host: env.DASHBOARD_HOST || '0.0.0.0',
            port: readInt(env, 'DASHBOARD_PORT', 5001, 0)
        },
        logLevel,
        strategy: {
            ...StrategyConfig,
            momentumWindow: readInt(env, 'MOMENTUM_WINDOW', StrategyConfig.momentumWindow, 1)
        }
    };
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${key} must be an integer >= ${min} (got "${raw}")`);
    }
    return value;
}
