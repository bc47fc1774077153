import { DemoBrokerGateway } from './DemoBrokerGateway';
import { PaperPositionBook } from '../paper-trading/PaperPositionBook';
import { Candle } from '../../../domain/entities/Candle';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { Logger, LogLevel } from '../../../shared/logger/Logger';

describe('DemoBrokerGateway', () => {
    const clock = (): number => 42_000;
    const build = (random: () => number): DemoBrokerGateway =>
        new DemoBrokerGateway(new PaperPositionBook(clock), random, clock, new Logger(LogLevel.ERROR));

    it('generates candles around the base price', async () => {
        const gateway = build(() => 0.5);

        expect(await gateway.fetchLatestCandle()).toEqual(new Candle(0, 42_000, 18505, 18495, 18500, 1000));
        expect((await gateway.fetchLatestCandle()).sequenceIndex).toBe(1);
    });

    it('stays within the configured swing at both extremes', async () => {
        expect(await build(() => 0).fetchLatestCandle()).toEqual(new Candle(0, 42_000, 18400, 18400, 18400, 800));
        expect(await build(() => 0.999999).fetchLatestCandle()).toEqual(new Candle(0, 42_000, 18610, 18590, 18600, 1200));
    });

    it('tracks the connection flag', async () => {
        const gateway = build(() => 0.5);
        expect(gateway.isConnected()).toBe(false);

        await gateway.connect();
        expect(gateway.isConnected()).toBe(true);

        await gateway.disconnect();
        expect(gateway.isConnected()).toBe(false);
    });

    it('keeps positions in the paper book', async () => {
        const gateway = build(() => 0.5);

        await gateway.openPosition(TradeDirection.SHORT, 2, 18500);
        expect(await gateway.currentPosition()).toBe(-2);

        await gateway.closePosition(18450);
        expect(await gateway.currentPosition()).toBe(0);
    });
});
