/**
 * Dispatcher
 *
 * The only reader of the ingest queue and the only caller of the
 * confirmation prompt. Candidates are offered one at a time, in queue
 * order; accepted ones are handed to the spawner and run concurrently.
 */

import path from 'node:path';
import { IngestQueue } from '../ingest/queue';
import { ConfirmationPrompt } from '../interactive';
import { Clock } from '../util/clock';
import { WorkerSpawner } from './spawner';
import * as Logging from '../logging';
import { DISPATCH_IDLE_MS } from '../constants';

export interface DispatcherOptions {
    queue: Pick<IngestQueue, 'take'>;
    prompt: Pick<ConfirmationPrompt, 'ask'>;
    spawner: Pick<WorkerSpawner, 'spawn'>;
    clock: Clock;
    idleMs?: number;
}

export interface Dispatcher {
    /** Runs until the signal is aborted; in-flight workers are left running */
    run(signal: AbortSignal): Promise<void>;
}

export const create = (options: DispatcherOptions): Dispatcher => {
    const logger = Logging.getLogger();
    const { queue, prompt, spawner, clock } = options;
    const idleMs = options.idleMs ?? DISPATCH_IDLE_MS;

    const run = async (signal: AbortSignal): Promise<void> => {
        logger.debug('Dispatcher started');
        while (!signal.aborted) {
            const audioPath = queue.take();
            if (audioPath === undefined) {
                await clock.sleep(idleMs);
                continue;
            }

            const decision = await prompt.ask(`Process ${path.basename(audioPath)}?`, audioPath);
            if (decision === 'accept') {
                logger.info('Accepted %s', audioPath);
                spawner.spawn(audioPath);
            } else {
                logger.info('Skipped %s', audioPath);
            }
        }
        logger.debug('Dispatcher stopped');
    };

    return { run };
};
