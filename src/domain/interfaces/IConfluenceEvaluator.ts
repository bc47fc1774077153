import { TradeDirection } from '../enums/TradeDirection';
import { ConfluenceScore } from '../value-objects/ConfluenceScore';
import { IndicatorSnapshot } from '../value-objects/IndicatorSnapshot';

export interface ConfluenceInput {
    direction: TradeDirection;
    breakLevel: number;
    price: number;
    snapshot: IndicatorSnapshot;
    /** Snapshot of the slow timeframe, when it has enough bars. */
    slowSnapshot: IndicatorSnapshot | null;
}

export interface IConfluenceEvaluator {
    score(input: ConfluenceInput): ConfluenceScore;
}
