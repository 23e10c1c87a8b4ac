/**
 * Confirmation Types
 */

export type Decision = 'accept' | 'reject';

export type Answer = Decision | 'replay';

export interface ConfirmationPrompt {
    /** Resolves only once the operator accepts or rejects; replays happen inside. */
    ask(label: string, audioPath: string): Promise<Decision>;
    close(): void;
}

/**
 * One line of operator input per question. Resolves null once input is
 * closed or interrupted.
 */
export interface LineReader {
    question(text: string): Promise<string | null>;
    close(): void;
}
