import { injectable, inject } from 'inversify';
import { Position } from '../../../domain/entities/Position';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { TYPES, Clock } from '../../../config/types';

/** Position held locally for gateways that do not execute orders. */
@injectable()
export class PaperPositionBook {
    private position: Position | null = null;

    constructor(
        @inject(TYPES.Clock) private readonly clock: Clock
    ) { }

    get signedSize(): number {
        return this.position?.signedSize ?? 0;
    }

    getPosition(): Position | null {
        return this.position;
    }

    open(direction: TradeDirection, size: number, price: number): void {
        if (this.position) {
            throw new Error(`Position already open (${this.position.direction} ${this.position.size})`);
        }
        if (size <= 0) {
            throw new Error(`Position size must be positive (got ${size})`);
        }
        this.position = new Position(direction, price, size, this.clock());
    }

    close(): Position | null {
        const closed = this.position;
        this.position = null;
        return closed;
    }
}
