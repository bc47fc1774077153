export enum TradeDirection {
    LONG = 'LONG',
    SHORT = 'SHORT'
}
