/**
 * Worker Spawner
 *
 * Starts a worker per accepted recording without waiting for it, and keeps
 * track of the running ones so shutdown can let them finish.
 */

import { Worker } from './worker';
import { JobOutcome } from './types';
import * as Logging from '../logging';

export interface WorkerSpawner {
    spawn(audioPath: string): void;
    inFlight(): number;
    drain(): Promise<void>;
}

export const create = (worker: Worker): WorkerSpawner => {
    const logger = Logging.getLogger();
    const running = new Set<Promise<void>>();

    const report = (outcome: JobOutcome) => {
        switch (outcome.status) {
            case 'written':
                logger.verbose('Finished %s -> %s', outcome.job.audioPath, outcome.notePath);
                break;
            case 'dry-run':
                logger.verbose('Finished %s (dry run)', outcome.job.audioPath);
                break;
            case 'unstable':
                logger.verbose('Abandoned %s: file did not stabilize', outcome.job.audioPath);
                break;
            case 'write-failed':
                logger.verbose('Abandoned %s: note could not be written', outcome.job.audioPath);
                break;
        }
    };

    const spawn = (audioPath: string): void => {
        const task: Promise<void> = worker.run(audioPath)
            .then(report)
            .catch((error: unknown) => {
                logger.error('Processing failed for %s: %s', audioPath, error instanceof Error ? error.message : String(error));
            })
            .finally(() => {
                running.delete(task);
            });
        running.add(task);
    };

    const drain = async (): Promise<void> => {
        while (running.size > 0) {
            await Promise.allSettled([...running]);
        }
    };

    return {
        spawn,
        inFlight: () => running.size,
        drain,
    };
};
