export class InvalidBoundsError extends RangeError {
    readonly low: unknown
    readonly high: unknown

    constructor(low: unknown, high: unknown, reason: string) {
        super(`invalid search bounds [${String(low)}, ${String(high)}]: ${reason}`)
        this.name = 'InvalidBoundsError'
        this.low = low
        this.high = high
    }
}
