import { Candle } from '../entities/Candle';
import { TradeDirection } from '../enums/TradeDirection';

export interface IBrokerGateway {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    /** Latest closed candle, or null when there is no candle the caller has not seen. */
    fetchLatestCandle(): Promise<Candle | null>;
    /** Signed contract count: positive long, negative short, 0 flat. */
    currentPosition(): Promise<number>;
    openPosition(direction: TradeDirection, size: number, price: number): Promise<void>;
    closePosition(price: number): Promise<void>;
}
