import { injectable, inject } from 'inversify';
import { IBrokerGateway } from '../../../domain/interfaces/IBrokerGateway';
import { Candle } from '../../../domain/entities/Candle';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { PaperPositionBook } from '../paper-trading/PaperPositionBook';
import { TYPES, Clock, RandomSource } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

const BASE_PRICE = 18500;
const PRICE_SWING = 100;
const WICK = 10;
const VOLUME_MIN = 800;
const VOLUME_MAX = 1200;

/** Synthetic candles around a fixed base price, for running without a broker. */
@injectable()
export class DemoBrokerGateway implements IBrokerGateway {
    private readonly logger: Logger;
    private connected = false;
    private sequence = 0;

    constructor(
        @inject(TYPES.PaperPositionBook) private readonly book: PaperPositionBook,
        @inject(TYPES.RandomSource) private readonly random: RandomSource,
        @inject(TYPES.Clock) private readonly clock: Clock,
        @inject(TYPES.Logger) logger: Logger
    ) {
        this.logger = logger.withScope('DemoBroker');
    }

    async connect(): Promise<void> {
        this.connected = true;
        this.logger.info('Running in DEMO MODE - no broker connection');
    }

    async disconnect(): Promise<void> {
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    async fetchLatestCandle(): Promise<Candle> {
        const close = BASE_PRICE + this.randomInt(-PRICE_SWING, PRICE_SWING);
        const high = close + this.randomInt(0, WICK);
        const low = close - this.randomInt(0, WICK);
        const volume = this.randomInt(VOLUME_MIN, VOLUME_MAX);

        return new Candle(this.sequence++, this.clock(), high, low, close, volume);
    }

    async currentPosition(): Promise<number> {
        return this.book.signedSize;
    }

    async openPosition(direction: TradeDirection, size: number, price: number): Promise<void> {
        this.book.open(direction, size, price);
        this.logger.info(`Demo ${direction} ${size} @ ${price}`);
    }

    async closePosition(price: number): Promise<void> {
        const closed = this.book.close();
        if (closed) {
            this.logger.info(`Demo close ${closed.direction} ${closed.size} @ ${price}`);
        }
    }

    /** Inclusive on both ends. */
    private randomInt(min: number, max: number): number {
        return min + Math.floor(this.random() * (max - min + 1));
    }
}
