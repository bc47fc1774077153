export { TradeDirection } from './TradeDirection';
export { SignalKind } from './SignalKind';
export { WindowState } from './WindowState';
