import { Candle } from '../../../domain/entities/Candle';
import { BybitKlineData } from './types/BybitTypes';

export class BybitCandleMapper {
    static toDomain(data: BybitKlineData, sequenceIndex: number): Candle {
        // data structure: [startTime, open, high, low, close, volume, turnover]
        return new Candle(
            sequenceIndex,
            parseInt(data[0], 10),          // timestamp
            parseFloat(data[2]),            // high
            parseFloat(data[3]),            // low
            parseFloat(data[4]),            // close
            Math.floor(parseFloat(data[5])) // volume, whole units
        );
    }
}
