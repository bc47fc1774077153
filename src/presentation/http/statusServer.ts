import express from 'express';
import { Server } from 'node:http';
import { BotStatus } from '../../application/use-cases/RunLiveTrading';
import { Logger } from '../../shared/logger/Logger';

/** Returns null until the bot has been wired up. */
export type StatusProvider = () => BotStatus | null;

export const PLACEHOLDER_STATUS = {
    status: 'Starting',
    uptime: '0:00:00',
    symbol: '-',
    position: 0,
    lastPrice: 0,
    lastSignal: 'None',
    errorCount: 0,
    brokerConnected: false,
    engine: {
        windowActive: false,
        windowRemaining: 0,
        breakLevel: 0,
        breakDirection: 'NONE',
        bufferedBarCountPerTimeframe: {},
        lastSignalKind: 'NONE'
    }
} as const;

const DASHBOARD_HTML = `<!DOCTYPE html>
<html>
<head>
    <title>Confluence Breakout Engine</title>
    <style>
        body { font-family: monospace; padding: 20px; background-color: #f0f0f0; }
        .status-box { border: 2px solid #333; padding: 15px; margin: 10px 0; background-color: white; white-space: pre; }
    </style>
</head>
<body>
    <h1>Confluence Breakout Engine</h1>
    <h2>Bot</h2>
    <div id="bot" class="status-box">Loading...</div>
    <h2>Momentum window</h2>
    <div id="engine" class="status-box">Loading...</div>
    <script>
        function render(data) {
            const e = data.engine;
            document.getElementById('bot').textContent =
                'Status: ' + data.status + '\\nUptime: ' + data.uptime + '\\nSymbol: ' + data.symbol +
                '\\nPosition: ' + data.position + '\\nLast price: ' + data.lastPrice +
                '\\nLast signal: ' + data.lastSignal + '\\nErrors: ' + data.errorCount +
                '\\nBroker connected: ' + data.brokerConnected;
            document.getElementById('engine').textContent =
                'Active: ' + e.windowActive + '\\nRemaining: ' + e.windowRemaining +
                '\\nBreak: ' + e.breakDirection + ' @ ' + e.breakLevel +
                '\\nBars: ' + JSON.stringify(e.bufferedBarCountPerTimeframe) +
                '\\nLast signal kind: ' + e.lastSignalKind;
        }
        function refresh() {
            fetch('/api/status').then(r => r.json()).then(render).catch(() => {
                document.getElementById('bot').textContent = 'Status unavailable';
            });
        }
        refresh();
        setInterval(refresh, 5000);
    </script>
</body>
</html>`;

export function createStatusApp(statusProvider: StatusProvider, logger: Logger): express.Express {
    const app = express();

    app.get('/', (_req, res) => {
        res.type('html').send(DASHBOARD_HTML);
    });

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', pid: process.pid });
    });

    app.get('/api/status', (_req, res) => {
        try {
            res.json(statusProvider() ?? PLACEHOLDER_STATUS);
        } catch (err) {
            logger.error('GET /api/status failed', err);
            res.json(PLACEHOLDER_STATUS);
        }
    });

    return app;
}

export function startStatusServer(
    statusProvider: StatusProvider,
    host: string,
    port: number,
    logger: Logger
): Promise<Server> {
    const scoped = logger.withScope('Dashboard');
    const app = createStatusApp(statusProvider, scoped);

    return new Promise((resolve, reject) => {
        const server = app.listen(port, host, () => {
            scoped.info(`Dashboard listening on http://${host}:${port}`);
            resolve(server);
        });
        server.on('error', reject);
    });
}
