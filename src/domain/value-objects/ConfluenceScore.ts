export const CONFLUENCE_FACTORS = [
    'squeeze_release',
    'momentum_alignment',
    'fast_trend_alignment',
    'slow_trend_alignment',
    'break_strength'
] as const;

export type ConfluenceFactor = typeof CONFLUENCE_FACTORS[number];

export type ConfluenceFactors = Readonly<Record<ConfluenceFactor, boolean>>;

export class ConfluenceScore {
    constructor(public readonly factors: ConfluenceFactors) {}

    static none(): ConfluenceScore {
        return new ConfluenceScore({
            squeeze_release: false,
            momentum_alignment: false,
            fast_trend_alignment: false,
            slow_trend_alignment: false,
            break_strength: false
        });
    }

    get count(): number {
        return this.trueFactors.length;
    }

    get total(): number {
        return CONFLUENCE_FACTORS.length;
    }

    /** Names of the factors that agreed, in evaluation order. */
    get trueFactors(): ConfluenceFactor[] {
        return CONFLUENCE_FACTORS.filter(name => this.factors[name]);
    }

    toString(): string {
        return `${this.count}/${this.total} [${this.trueFactors.join(', ')}]`;
    }
}
