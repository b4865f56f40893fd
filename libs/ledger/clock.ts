/**
 * Timestamp source for createdAt / lastVerifiedAt, in unix seconds.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000)
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
    constructor(private current: number) { }

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        this.current = timestamp;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}
