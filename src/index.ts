#!/usr/bin/env node
import 'reflect-metadata';
import { runLiveCommand } from './presentation/cli/LiveCommand';
import { loadEnvFiles } from './config/env';
import { loadAppConfig } from './config/app.config';
import { Logger } from './shared/logger/Logger';

async function main(): Promise<void> {
    loadEnvFiles(process.cwd());

    const args = process.argv.slice(2);
    const mode = args[0]; // 'live' or 'demo'

    const config = loadAppConfig();
    if (mode === 'demo') {
        config.demoMode = true;
    } else if (mode === 'live') {
        config.demoMode = false;
    } else if (mode !== undefined) {
        throw new Error(`Unknown mode "${mode}". Usage: confluence-breakout [live|demo]`);
    }

    const logger = new Logger(config.logLevel);
    logger.info(`Starting ${config.demoMode ? 'DEMO' : 'LIVE'} signal engine for ${config.symbol}...`);
    logger.info(`Dashboard will be available at: http://localhost:${config.dashboard.port}`);

    await runLiveCommand(config);
    logger.info('Bot stopped cleanly');
}

main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
});
