/**
 * Ingest Queue
 *
 * FIFO of candidate audio paths. Every path admitted is remembered for the
 * life of the process, so the create/modify bursts a single incoming file
 * produces are enqueued once.
 */

import path from 'node:path';
import * as Logging from '../logging';
import * as Media from '../util/media';

export interface QueueConfig {
    capacity: number;
}

export interface IngestQueue {
    /** Returns true when the path was appended */
    offer(filePath: string): boolean;
    take(): string | undefined;
    size(): number;
    hasSeen(filePath: string): boolean;
}

export const create = (config: QueueConfig): IngestQueue => {
    const logger = Logging.getLogger();
    const seen = new Set<string>();
    const pending: string[] = [];

    const offer = (filePath: string): boolean => {
        if (!Media.isAudioFile(filePath)) {
            return false;
        }
        const absolute = path.resolve(filePath);
        if (seen.has(absolute)) {
            return false;
        }
        seen.add(absolute);

        if (pending.length >= config.capacity) {
            logger.warn('Ingest queue full (%d), dropping %s', config.capacity, absolute);
            return false;
        }
        pending.push(absolute);
        logger.debug('Queued %s (%d pending)', absolute, pending.length);
        return true;
    };

    return {
        offer,
        take: () => pending.shift(),
        size: () => pending.length,
        hasSeen: (filePath: string) => seen.has(path.resolve(filePath)),
    };
};
