export class Candle {
    constructor(
        public readonly sequenceIndex: number,
        public readonly timestamp: number,
        public readonly high: number,
        public readonly low: number,
        public readonly close: number,
        public readonly volume: number
    ) {}
}
