/**
 * Doubling reconnect delay with a ceiling.
 *
 * `next()` hands out the delay to wait now and advances the sequence;
 * `reset()` is called once a connection is established again.
 */
export class ExponentialBackoff {
    private current: number;

    constructor(
        private readonly initialMs: number,
        private readonly maxMs: number
    ) {
        if (initialMs <= 0 || maxMs < initialMs) {
            throw new Error(`Invalid backoff bounds: initial=${initialMs} max=${maxMs}`);
        }
        this.current = initialMs;
    }

    next(): number {
        const delay = this.current;
        this.current = Math.min(this.current * 2, this.maxMs);
        return delay;
    }

    reset(): void {
        this.current = this.initialMs;
    }

    peek(): number {
        return this.current;
    }
}
