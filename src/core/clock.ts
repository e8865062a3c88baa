export interface Clock {
    /** Milliseconds since an arbitrary epoch. */
    now(): number
    sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

export function unixSeconds(clock: Clock): number {
    return Math.floor(clock.now() / 1000)
}
