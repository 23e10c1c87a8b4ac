/**
 * Transcription Types
 *
 * The transcriber is a black box that turns audio bytes into text. It is
 * spoken to over HTTP with a Deepgram-style pre-recorded audio endpoint.
 */

import { z } from 'zod';

export interface TranscriberConfig {
    apiKey: string;
    url: string;
    model: string;
    language: string;
    timeoutMs: number;
}

export interface Transcriber {
    transcribe(audio: Uint8Array, mimeType: string): Promise<string>;
}

export class TranscriberError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'TranscriberError';
        this.status = status;
    }
}

// Only the path we read is described; everything else passes through.
export const ListenResponseSchema = z.object({
    results: z.object({
        channels: z.array(z.object({
            alternatives: z.array(z.object({
                transcript: z.string().optional(),
            }).passthrough()).optional(),
        }).passthrough()).optional(),
    }).passthrough().optional(),
}).passthrough();
