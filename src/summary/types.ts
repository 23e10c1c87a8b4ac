import { z } from 'zod';

export interface SummarizerConfig {
    apiKey: string;
    model: string;
    baseUrl?: string;
    timeoutMs: number;
}

export interface Summary {
    summary: string;
    tldr: string;
}

export interface Summarizer {
    summarize(transcript: string): Promise<Summary>;
}

export class SummarizerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SummarizerError';
    }
}

const textOrEmpty = z.unknown().transform((value) => typeof value === 'string' ? value : '');

export const SummaryResponseSchema = z.object({
    summary: textOrEmpty,
    tldr: textOrEmpty,
});
