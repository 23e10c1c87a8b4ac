/**
 * Stability Detector
 *
 * Recorders often append to a file without a close event we could observe,
 * so completion is inferred by polling: a file whose size has not changed
 * for the quiet period is treated as complete. That is a heuristic only;
 * later reads must still handle errors.
 */

import { Clock } from '../util/clock';
import * as Logging from '../logging';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_QUIET_PERIOD_MS, DEFAULT_STABILITY_TIMEOUT_MS } from '../constants';

export interface StabilityOptions {
    quietPeriodMs?: number;
    timeoutMs?: number;
    pollIntervalMs?: number;
}

export interface SizeReader {
    getFileSize(path: string): Promise<number>;
}

export interface StabilityDetector {
    waitStable(path: string, options?: StabilityOptions): Promise<boolean>;
}

export const create = (storage: SizeReader, clock: Clock, defaults: StabilityOptions = {}): StabilityDetector => {
    const logger = Logging.getLogger();

    const waitStable = async (path: string, options: StabilityOptions = {}): Promise<boolean> => {
        const quietPeriodMs = options.quietPeriodMs ?? defaults.quietPeriodMs ?? DEFAULT_QUIET_PERIOD_MS;
        const timeoutMs = options.timeoutMs ?? defaults.timeoutMs ?? DEFAULT_STABILITY_TIMEOUT_MS;
        const pollIntervalMs = options.pollIntervalMs ?? defaults.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

        const start = clock.now().getTime();
        let lastSize: number | null = null;
        let stableSince = start;

        while (clock.now().getTime() - start < timeoutMs) {
            const now = clock.now().getTime();
            let size: number | null;
            try {
                size = await storage.getFileSize(path);
            } catch {
                size = null;
            }

            if (size === null) {
                logger.debug('%s not found, retrying', path);
                lastSize = null;
            } else if (size !== lastSize) {
                lastSize = size;
                stableSince = now;
            } else if (now - stableSince >= quietPeriodMs) {
                logger.debug('%s stable at %d bytes', path, size);
                return true;
            }

            await clock.sleep(pollIntervalMs);
        }

        logger.debug('%s did not settle within %dms', path, timeoutMs);
        return false;
    };

    return { waitStable };
};
