import { BreakEvent } from '../value-objects/BreakEvent';

export interface ILevelBreakDetector {
    check(
        price: number,
        resistanceLevels: readonly number[],
        supportLevels: readonly number[]
    ): BreakEvent | null;
}
