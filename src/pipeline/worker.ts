/**
 * Worker
 *
 * Runs one recording through the whole pipeline:
 * stability -> transcription -> summary -> render -> write.
 *
 * Service failures degrade the note instead of dropping it: a failed
 * transcription leaves its error text where the transcript would be, and
 * a failed summary leaves the summary and TL;DR empty. Only an unstable
 * file or a failed write ends a job without a note.
 */

import { JobOutcome, TranscriptionJob } from './types';
import { StabilityDetector } from '../ingest/stability';
import { Clock } from '../util/clock';
import * as Storage from '../util/storage';
import * as Media from '../util/media';
import * as Logging from '../logging';
import { Transcriber } from '../transcription';
import { Summarizer } from '../summary';
import { NoteWriter, NoteWriteError, render } from '../note';

export interface WorkerDependencies {
    stability: StabilityDetector;
    storage: Pick<Storage.Utility, 'readFile' | 'getBirthTime'>;
    transcriber: Transcriber;
    summarizer: Summarizer;
    writer: NoteWriter;
    clock: Clock;
    dryRun?: boolean;
}

export interface Worker {
    run(audioPath: string): Promise<JobOutcome>;
}

export const TRANSCRIPTION_ERROR_PREFIX = 'Transcription error';

const messageOf = (error: unknown): string => error instanceof Error ? error.message : String(error);

export const create = (deps: WorkerDependencies): Worker => {
    const logger = Logging.getLogger();
    const { stability, storage, transcriber, summarizer, writer, clock } = deps;

    const readCreationTime = async (job: TranscriptionJob): Promise<Date> => {
        try {
            return await storage.getBirthTime(job.audioPath);
        } catch (error) {
            logger.warn('Could not read creation time of %s, using current time: %s', job.audioPath, messageOf(error));
            return clock.now();
        }
    };

    const transcribe = async (job: TranscriptionJob): Promise<string> => {
        try {
            const audio = await storage.readFile(job.audioPath);
            return await transcriber.transcribe(audio, job.mimeType);
        } catch (error) {
            logger.error('Transcription failed for %s: %s', job.audioPath, messageOf(error));
            return `${TRANSCRIPTION_ERROR_PREFIX}: ${messageOf(error)}`;
        }
    };

    const summarize = async (job: TranscriptionJob, transcript: string): Promise<{ summary: string; tldr: string }> => {
        try {
            return await summarizer.summarize(transcript);
        } catch (error) {
            logger.error('Summary generation failed for %s: %s', job.audioPath, messageOf(error));
            return { summary: '', tldr: '' };
        }
    };

    const run = async (audioPath: string): Promise<JobOutcome> => {
        const job: TranscriptionJob = {
            audioPath,
            mimeType: Media.mimeTypeFor(audioPath),
        };
        logger.info('Starting processing: %s', audioPath);

        if (!await stability.waitStable(audioPath)) {
            logger.warn('File not stable: %s', audioPath);
            return { status: 'unstable', job };
        }

        job.createdAt = await readCreationTime(job);
        job.transcript = await transcribe(job);

        const { summary, tldr } = await summarize(job, job.transcript);
        job.summary = summary;
        job.tldr = tldr;

        job.noteText = render({
            summary,
            tldr,
            createdAt: job.createdAt,
            transcript: job.transcript,
        });

        if (deps.dryRun) {
            const notePath = writer.notePathFor(audioPath);
            logger.info('Dry run: would write %s', notePath);
            return { status: 'dry-run', job, notePath };
        }

        try {
            job.notePath = await writer.write(audioPath, job.noteText);
        } catch (error) {
            if (error instanceof NoteWriteError) {
                logger.error('%s', error.message);
                return { status: 'write-failed', job, error };
            }
            throw error;
        }

        logger.info('Successfully processed: %s', audioPath);
        return { status: 'written', job, notePath: job.notePath };
    };

    return { run };
};
