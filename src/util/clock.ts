/**
 * Wall-clock reads and sleeps, kept behind an interface so that polling
 * loops can be driven by a fake clock in tests.
 */
export interface Clock {
    now(): Date;
    sleep(ms: number): Promise<void>;
}

export const create = (): Clock => ({
    now: () => new Date(),
    sleep: (ms: number) => new Promise<void>((resolve) => {
        setTimeout(resolve, ms);
    }),
});
