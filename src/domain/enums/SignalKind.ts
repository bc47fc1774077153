export enum SignalKind {
    LONG = 'LONG',
    SHORT = 'SHORT',
    EXIT = 'EXIT',
    NO_SIGNAL = 'NO_SIGNAL'
}
