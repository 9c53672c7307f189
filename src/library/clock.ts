export interface Clock {
    /** ms since epoch */
    now(): number
    sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
    now: () => Date.now(),
    async sleep(ms) {
        await new Promise<void>(resolve => {
            setTimeout(resolve, ms)
        })
    },
}
