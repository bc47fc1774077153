import { injectable } from 'inversify';
import { Candle } from '../../../domain/entities/Candle';
import { MalformedCandleError } from '../../../shared/errors';

/**
 * Boundary check for candles coming from a gateway. The strategy engine
 * assumes every candle it receives has passed here.
 */
@injectable()
export class CandleValidator {
    validate(candle: Candle): Candle {
        for (const field of ['high', 'low', 'close', 'volume'] as const) {
            const value = candle[field];
            if (!Number.isFinite(value)) {
                throw new MalformedCandleError(`Candle #${candle.sequenceIndex} has non-finite ${field} (${value})`, field);
            }
            if (value < 0) {
                throw new MalformedCandleError(`Candle #${candle.sequenceIndex} has negative ${field} (${value})`, field);
            }
        }

        if (!Number.isInteger(candle.volume)) {
            throw new MalformedCandleError(`Candle #${candle.sequenceIndex} has fractional volume (${candle.volume})`, 'volume');
        }
        if (candle.low > candle.high) {
            throw new MalformedCandleError(`Candle #${candle.sequenceIndex} has low ${candle.low} above high ${candle.high}`, 'low');
        }
        return candle;
    }
}
