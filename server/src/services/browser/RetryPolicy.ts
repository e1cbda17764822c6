import { setTimeout as delay } from 'node:timers/promises';
import { RetrySettings } from '../../config';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = async (ms) => {
    await delay(ms);
};

/**
 * Bounded polling with exponential backoff. Attempt 1 runs immediately;
 * attempt n waits `initialDelayMs * backoffFactor^(n-2)`, capped at `maxDelayMs`.
 */
export class RetryPolicy {
    constructor(
        readonly settings: RetrySettings,
        private readonly sleep: Sleep = defaultSleep,
    ) {
        if (!Number.isInteger(settings.attempts) || settings.attempts < 1) {
            throw new RangeError(`Retry attempts must be a positive integer, got ${settings.attempts}`);
        }
    }

    delayBefore(attempt: number): number {
        if (attempt <= 1) {
            return 0;
        }
        const { initialDelayMs, backoffFactor, maxDelayMs } = this.settings;
        return Math.min(initialDelayMs * backoffFactor ** (attempt - 2), maxDelayMs);
    }

    /** Total time spent sleeping when every attempt misses. */
    get budgetMs(): number {
        let total = 0;
        for (let attempt = 2; attempt <= this.settings.attempts; attempt += 1) {
            total += this.delayBefore(attempt);
        }
        return total;
    }

    /**
     * Calls `probe` until it yields a value or attempts run out. `shouldStop`
     * is checked before each wait so an abandoned poll ends early.
     */
    async poll<T>(
        probe: (attempt: number) => T | undefined | Promise<T | undefined>,
        shouldStop: () => boolean = () => false,
    ): Promise<T | undefined> {
        for (let attempt = 1; attempt <= this.settings.attempts; attempt += 1) {
            const wait = this.delayBefore(attempt);
            if (wait > 0) {
                if (shouldStop()) {
                    return undefined;
                }
                await this.sleep(wait);
            }
            if (shouldStop()) {
                return undefined;
            }
            const value = await probe(attempt);
            if (value !== undefined) {
                return value;
            }
        }
        return undefined;
    }
}
