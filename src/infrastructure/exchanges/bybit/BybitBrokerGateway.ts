import { injectable, inject } from 'inversify';
import { IBrokerGateway } from '../../../domain/interfaces/IBrokerGateway';
import { Candle } from '../../../domain/entities/Candle';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { PaperPositionBook } from '../paper-trading/PaperPositionBook';
import { BybitCandleMapper } from './BybitCandleMapper';
import { BybitEnvelope, BybitKlineResponse, BybitTickerResponse } from './types/BybitTypes';
import { AppConfig } from '../../../config/app.config';
import { TYPES } from '../../../config/types';
import { BrokerError } from '../../../shared/errors';
import { timeframeToMs } from '../../../shared/utils/timeframe';
import { Logger } from '../../../shared/logger/Logger';

/**
 * Live market data from Bybit's public REST API. Orders are not sent to the
 * exchange; the position is kept in the paper book.
 */
@injectable()
export class BybitBrokerGateway implements IBrokerGateway {
    private readonly baseUrl = 'https://api.bybit.com';
    private readonly logger: Logger;
    private connected = false;
    private sequence = 0;
    private lastCandleTimestamp: number | null = null;

    constructor(
        @inject(TYPES.AppConfig) private readonly config: AppConfig,
        @inject(TYPES.PaperPositionBook) private readonly book: PaperPositionBook,
        @inject(TYPES.Logger) logger: Logger
    ) {
        this.logger = logger.withScope('Bybit');
    }

    async connect(): Promise<void> {
        const price = await this.getCurrentPrice();
        this.connected = true;
        this.logger.info(`Connected, ${this.config.symbol} last price ${price}`);
    }

    async disconnect(): Promise<void> {
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    /**
     * Most recent closed kline of the primary timeframe, or null when that kline
     * was already returned by an earlier call.
     */
    async fetchLatestCandle(): Promise<Candle | null> {
        const timeframe = this.config.strategy.timeframes.primary;
        const params = new URLSearchParams({
            category: 'linear',
            symbol: this.config.symbol,
            interval: this.mapTimeframeToBybit(timeframe),
            limit: '2'
        });

        const json = await this.request<BybitKlineResponse>('/v5/market/kline', params);

        // Bybit lists newest first; index 0 is the candle still forming.
        const list = json.result.list;
        const latestClosed = list[1] ?? list[0];
        if (!latestClosed) {
            throw new BrokerError(`Bybit returned no klines for ${this.config.symbol}`);
        }

        const timestamp = parseInt(latestClosed[0], 10);
        const previous = this.lastCandleTimestamp;
        if (previous !== null && timestamp <= previous) {
            this.logger.debug(`Kline ${timestamp} already consumed, skipping`);
            return null;
        }

        const intervalMs = timeframeToMs(timeframe);
        if (previous !== null && timestamp - previous > intervalMs) {
            const missed = Math.round((timestamp - previous) / intervalMs) - 1;
            this.logger.warn(`Kline gap: ${missed} ${timeframe} candle(s) missed between ${previous} and ${timestamp}`);
        }
        this.lastCandleTimestamp = timestamp;

        return BybitCandleMapper.toDomain(latestClosed, this.sequence++);
    }

    async getCurrentPrice(): Promise<number> {
        const params = new URLSearchParams({
            category: 'linear',
            symbol: this.config.symbol
        });

        const json = await this.request<BybitTickerResponse>('/v5/market/tickers', params);
        const ticker = json.result.list[0];
        if (!ticker) {
            throw new BrokerError(`Bybit has no ticker for ${this.config.symbol}`);
        }
        return parseFloat(ticker.lastPrice);
    }

    async currentPosition(): Promise<number> {
        return this.book.signedSize;
    }

    async openPosition(direction: TradeDirection, size: number, price: number): Promise<void> {
        this.book.open(direction, size, price);
        this.logger.info(`Paper ${direction} ${size} @ ${price}`);
    }

    async closePosition(price: number): Promise<void> {
        const closed = this.book.close();
        if (closed) {
            this.logger.info(`Paper close ${closed.direction} ${closed.size} @ ${price} (entry ${closed.entryPrice})`);
        }
    }

    private async request<T extends BybitEnvelope<unknown>>(endpoint: string, params: URLSearchParams): Promise<T> {
        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}${endpoint}?${params}`);
        } catch (error) {
            this.connected = false;
            throw new BrokerError(`Bybit request ${endpoint} failed`, error);
        }

        if (!response.ok) {
            throw new BrokerError(`Bybit HTTP ${response.status} on ${endpoint}`);
        }

        const json = await response.json() as T;
        if (json.retCode !== 0) {
            throw new BrokerError(`Bybit API error: ${json.retMsg}`);
        }
        return json;
    }

    private mapTimeframeToBybit(tf: string): string {
        const map: Record<string, string> = {
            '1m': '1',
            '3m': '3',
            '5m': '5',
            '15m': '15',
            '30m': '30',
            '1h': '60',
            '2h': '120',
            '4h': '240',
            '1d': 'D'
        };
        return map[tf] || tf;
    }
}
