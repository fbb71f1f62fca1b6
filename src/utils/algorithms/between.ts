/**
 * Operations a discrete, totally ordered index type must provide to be searched.
 */
export interface IndexSpace<X> {
    /**
     * Floor midpoint of `low` and `high`, or `undefined` when no index lies
     * strictly between them (including when `high <= low`).
     */
    between(low: X, high: X): X | undefined
    less(a: X, b: X): boolean
    isIndex(x: unknown): x is X
}

function isOdd(n: number): boolean {
    return Math.abs(n % 2) === 1
}

// low + high may leave the safe range, so the halves are summed instead
export const integers: IndexSpace<number> = {
    between(low, high) {
        if (high <= low + 1) return undefined
        const mid = Math.floor(low / 2) + Math.floor(high / 2) + (isOdd(low) && isOdd(high) ? 1 : 0)
        // NaN, infinite or unsafe bounds can yield a midpoint that is not inside
        return low < mid && mid < high ? mid : undefined
    },
    less: (a, b) => a < b,
    isIndex: (x): x is number => Number.isSafeInteger(x),
}

export const bigints: IndexSpace<bigint> = {
    between(low, high) {
        if (high <= low + 1n) return undefined
        return low + (high - low) / 2n
    },
    less: (a, b) => a < b,
    isIndex: (x): x is bigint => typeof x === 'bigint',
}
