import { SeriesArrays } from '../entities/RollingSeries';
import { IndicatorSnapshot } from '../value-objects/IndicatorSnapshot';
import { IndicatorResult } from '../../shared/result/IndicatorResult';

export interface IIndicatorEngine {
    compute(series: SeriesArrays): IndicatorResult<IndicatorSnapshot>;
}
