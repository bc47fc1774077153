import { TradeDirection } from '../enums/TradeDirection';

export class Position {
    constructor(
        public readonly direction: TradeDirection,
        public readonly entryPrice: number,
        public readonly size: number,
        public readonly entryTime: number
    ) {}

    /** Positive for long, negative for short. */
    get signedSize(): number {
        return this.direction === TradeDirection.LONG ? this.size : -this.size;
    }
}
