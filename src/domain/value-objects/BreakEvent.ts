import { TradeDirection } from '../enums/TradeDirection';

export class BreakEvent {
    constructor(
        public readonly level: number,
        public readonly direction: TradeDirection,
        public readonly price: number
    ) {}

    /** Fractional distance of the breaking price beyond the level. */
    get distance(): number {
        return this.level > 0 ? Math.abs(this.price - this.level) / this.level : 0;
    }
}
