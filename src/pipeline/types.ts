/**
 * Pipeline Types
 *
 * Types shared by the dispatcher, the workers and the agent that wires
 * them to the event source.
 */

import type { NoteWriteError } from '../note';

export interface PipelineConfig {
    // Paths
    monitorDirectory: string;
    notesDirectory: string;

    // Transcription service
    transcriberApiKey: string;
    transcriberUrl: string;
    transcriberModel: string;
    language: string;

    // Summarization service
    summarizerApiKey: string;
    summarizerUrl?: string;
    summarizerModel: string;

    // Timing
    quietPeriodMs: number;
    stabilityTimeoutMs: number;
    pollIntervalMs: number;
    requestTimeoutMs: number;

    queueCapacity: number;
    playerCommand?: string;

    // Feature flags
    batch: boolean;
    includeExisting: boolean;
    dryRun: boolean;
}

/**
 * Everything one worker learns about one recording. Owned by that worker
 * and filled in as the steps complete.
 */
export interface TranscriptionJob {
    audioPath: string;
    mimeType: string;
    createdAt?: Date;
    transcript?: string;
    summary?: string;
    tldr?: string;
    noteText?: string;
    notePath?: string;
}

export type JobOutcome =
    | { status: 'written'; job: TranscriptionJob; notePath: string }
    | { status: 'dry-run'; job: TranscriptionJob; notePath: string }
    | { status: 'unstable'; job: TranscriptionJob }
    | { status: 'write-failed'; job: TranscriptionJob; error: NoteWriteError };
