import { SignalKind } from '../enums/SignalKind';
import { TradeDirection } from '../enums/TradeDirection';

export class TradingSignal {
    public readonly reasons: readonly string[];

    constructor(
        public readonly kind: SignalKind,
        public readonly strength: number, // 0..1
        public readonly price: number,
        reasons: readonly string[],
        public readonly timestamp: number
    ) {
        this.reasons = Object.freeze([...reasons]);
    }

    static noSignal(price: number, reason: string, timestamp: number): TradingSignal {
        return new TradingSignal(SignalKind.NO_SIGNAL, 0, price, [reason], timestamp);
    }

    static entry(
        direction: TradeDirection,
        strength: number,
        price: number,
        reasons: readonly string[],
        timestamp: number
    ): TradingSignal {
        const kind = direction === TradeDirection.LONG ? SignalKind.LONG : SignalKind.SHORT;
        return new TradingSignal(kind, strength, price, reasons, timestamp);
    }

    static exit(strength: number, price: number, reason: string, timestamp: number): TradingSignal {
        return new TradingSignal(SignalKind.EXIT, strength, price, [reason], timestamp);
    }

    get isActionable(): boolean {
        return this.kind !== SignalKind.NO_SIGNAL;
    }

    get direction(): TradeDirection | null {
        if (this.kind === SignalKind.LONG) return TradeDirection.LONG;
        if (this.kind === SignalKind.SHORT) return TradeDirection.SHORT;
        return null;
    }

    toString(): string {
        return `${this.kind} @ ${this.price} (strength ${this.strength.toFixed(2)}): ${this.reasons.join('; ')}`;
    }
}
