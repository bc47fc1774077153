/**
 * Outcome of an indicator computation.
 *
 * Every variant carries a usable `value`: on `insufficient` and `fault` it is
 * the neutral sentinel, so downstream code can read it without branching and
 * still tell a warm-up period apart from a broken computation.
 */
export type IndicatorResult<T> =
    | { readonly kind: 'ok'; readonly value: T }
    | { readonly kind: 'insufficient'; readonly value: T; readonly reason: string }
    | { readonly kind: 'fault'; readonly value: T; readonly error: Error };

export function ok<T>(value: T): IndicatorResult<T> {
    return { kind: 'ok', value };
}

export function insufficient<T>(sentinel: T, reason: string): IndicatorResult<T> {
    return { kind: 'insufficient', value: sentinel, reason };
}

export function fault<T>(sentinel: T, error: Error): IndicatorResult<T> {
    return { kind: 'fault', value: sentinel, error };
}

/** Wraps a finite number, or reports a fault carrying the sentinel. */
export function finite(value: number, label: string, sentinel: number = 0): IndicatorResult<number> {
    if (!Number.isFinite(value)) {
        return fault(sentinel, new Error(`${label} produced a non-finite value (${value})`));
    }
    return ok(value);
}

export function isFault<T>(result: IndicatorResult<T>): result is { readonly kind: 'fault'; readonly value: T; readonly error: Error } {
    return result.kind === 'fault';
}

/** The first fault's error among `results`, or null when none faulted. */
export function firstFault(results: ReadonlyArray<IndicatorResult<unknown>>): Error | null {
    for (const result of results) {
        if (result.kind === 'fault') return result.error;
    }
    return null;
}
