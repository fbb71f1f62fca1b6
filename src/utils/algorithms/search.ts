import { integers, type IndexSpace } from './between'
import { InvalidBoundsError } from './errors'

export type Endpoint<X, W> = readonly [index: X, witness: W]

export type SearchResult<X, A, B> = readonly [low: Endpoint<X, A>, high: Endpoint<X, B>]

export interface LowDirection<A> {
    readonly kind: 'low'
    readonly witness: A
}

export interface HighDirection<B> {
    readonly kind: 'high'
    readonly witness: B
}

/**
 * Whether a probed index lies below or above the transition, with the
 * witness the classifier produced for it.
 */
export type Direction<A, B> = LowDirection<A> | HighDirection<B>

function lowDirection(): LowDirection<undefined>
function lowDirection<A>(witness: A): LowDirection<A>
function lowDirection<A>(witness?: A): LowDirection<A | undefined> {
    return { kind: 'low', witness }
}

function highDirection(): HighDirection<undefined>
function highDirection<B>(witness: B): HighDirection<B>
function highDirection<B>(witness?: B): HighDirection<B | undefined> {
    return { kind: 'high', witness }
}

export const Direction = { low: lowDirection, high: highDirection }

export type Classifier<X, A, B> = (index: X) => Direction<A, B>

export interface SearchOptions {
    /**
     * Throw {@link InvalidBoundsError} when the bounds are not valid indices
     * or `low` is not below `high`. Off by default: inverted bounds are
     * returned unchanged.
     */
    strict?: boolean
}

/**
 * Binary search for the transition of a monotone classifier over `space`.
 *
 * Returns the largest index classified low and the smallest classified high,
 * each paired with the witness from the last classifier call that refined
 * that side, or with the input witness if the side was never refined.
 *
 * `classify` must be monotone on `[low[0], high[0]]`; this is not checked.
 * It is called once per halving, at most `ceil(log2(high[0] - low[0]))` times.
 */
export function searchIn<X, A, B>(
    space: IndexSpace<X>,
    low: Endpoint<X, A>,
    high: Endpoint<X, B>,
    classify: Classifier<X, A, B>,
    options: SearchOptions = {},
): SearchResult<X, A, B> {
    if (options.strict) checkBounds(space, low[0], high[0])
    for (;;) {
        const mid = space.between(low[0], high[0])
        if (mid === undefined) return [low, high]
        const direction = classify(mid)
        if (direction.kind === 'low') low = [mid, direction.witness]
        else high = [mid, direction.witness]
    }
}

/**
 * {@link searchIn} over safe integer indices.
 *
 * ```ts
 * binarySearch([1, undefined], [100, undefined], x => (x < 23 ? Direction.low() : Direction.high()))
 * // [[22, undefined], [23, undefined]]
 * ```
 */
export function binarySearch<A, B>(
    low: Endpoint<number, A>,
    high: Endpoint<number, B>,
    classify: Classifier<number, A, B>,
    options?: SearchOptions,
): SearchResult<number, A, B> {
    return searchIn(integers, low, high, classify, options)
}

function checkBounds<X>(space: IndexSpace<X>, low: X, high: X): void {
    if (!space.isIndex(low)) throw new InvalidBoundsError(low, high, 'low is not a valid index')
    if (!space.isIndex(high)) throw new InvalidBoundsError(low, high, 'high is not a valid index')
    if (!space.less(low, high)) throw new InvalidBoundsError(low, high, 'low must be less than high')
}
