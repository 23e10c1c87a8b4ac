/**
 * Ingest Agent
 *
 * Wires the event source, ingest queue, dispatcher and workers together and
 * owns the shutdown sequence: stop watching, stop prompting, then let the
 * running workers finish.
 */

import { PipelineConfig } from './types';
import * as Dispatcher from './dispatcher';
import * as Spawner from './spawner';
import * as Worker from './worker';
import * as Watch from '../watch';
import * as Queue from '../ingest/queue';
import * as Stability from '../ingest/stability';
import * as Interactive from '../interactive';
import * as Transcription from '../transcription';
import * as Summary from '../summary';
import * as Note from '../note';
import * as Clock from '../util/clock';
import * as Storage from '../util/storage';
import * as Player from '../util/player';
import * as Logging from '../logging';

export interface AgentComponents {
    source: Watch.EventSource;
    queue: Queue.IngestQueue;
    prompt: Interactive.ConfirmationPrompt;
    spawner: Spawner.WorkerSpawner;
    clock: Clock.Clock;
}

export interface BuildOptions {
    /** Called when the operator presses Ctrl+C at the prompt */
    onInterrupt?: () => void;
}

export const build = (config: PipelineConfig, options: BuildOptions = {}): AgentComponents => {
    const logger = Logging.getLogger();
    const clock = Clock.create();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const transcriber = Transcription.create({
        apiKey: config.transcriberApiKey,
        url: config.transcriberUrl,
        model: config.transcriberModel,
        language: config.language,
        timeoutMs: config.requestTimeoutMs,
    });

    const summarizer = Summary.create({
        apiKey: config.summarizerApiKey,
        baseUrl: config.summarizerUrl,
        model: config.summarizerModel,
        timeoutMs: config.requestTimeoutMs,
    });

    const stability = Stability.create(storage, clock, {
        quietPeriodMs: config.quietPeriodMs,
        timeoutMs: config.stabilityTimeoutMs,
        pollIntervalMs: config.pollIntervalMs,
    });

    const worker = Worker.create({
        stability,
        storage,
        transcriber,
        summarizer,
        writer: Note.create({ notesDir: config.notesDirectory }, clock, storage),
        clock,
        dryRun: config.dryRun,
    });

    const prompt = config.batch
        ? Interactive.createAutoAccept()
        : Interactive.create({
            reader: Interactive.createReadlineReader({ onInterrupt: options.onInterrupt }),
            player: Player.create({ command: config.playerCommand }),
        });

    return {
        source: Watch.create({ directory: config.monitorDirectory, includeExisting: config.includeExisting }),
        queue: Queue.create({ capacity: config.queueCapacity }),
        prompt,
        spawner: Spawner.create(worker),
        clock,
    };
};

/**
 * Runs until the signal is aborted or the watched directory is lost.
 * Rejects with SourceUnavailableError if watching cannot start, and with
 * SourceLostError (after shutting down cleanly) if the watch is lost.
 */
export const run = async (components: AgentComponents, signal: AbortSignal): Promise<void> => {
    const logger = Logging.getLogger();
    const { source, queue, prompt, spawner, clock } = components;

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    const state: { lost?: Watch.SourceLostError } = {};

    try {
        await source.start({
            onEvent: (event) => {
                queue.offer(event.path);
            },
            onLost: (error) => {
                logger.error('%s', error.message);
                state.lost = error;
                controller.abort();
            },
        });
    } catch (error) {
        signal.removeEventListener('abort', onAbort);
        prompt.close();
        throw error;
    }

    // A question still waiting for an answer resolves as a cancel
    controller.signal.addEventListener('abort', () => prompt.close(), { once: true });
    if (signal.aborted) {
        controller.abort();
    }

    try {
        await Dispatcher.create({ queue, prompt, spawner, clock }).run(controller.signal);
    } finally {
        signal.removeEventListener('abort', onAbort);
        await source.stop();
        prompt.close();
        if (spawner.inFlight() > 0) {
            logger.info('Waiting for %d job(s) to finish...', spawner.inFlight());
        }
        await spawner.drain();
    }

    if (state.lost) {
        throw state.lost;
    }
};

export * from './types';
