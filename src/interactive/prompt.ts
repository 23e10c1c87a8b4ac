/**
 * Confirmation Prompt
 *
 * Asks the operator whether a recording should be processed. Replay plays
 * the file and asks again, so callers only ever see accept or reject.
 */

import * as readline from 'readline';
import { Answer, ConfirmationPrompt, Decision, LineReader } from './types';
import * as Logging from '../logging';
import * as Player from '../util/player';

const ANSWERS: ReadonlyMap<string, Answer> = new Map<string, Answer>([
    ['', 'accept'],
    ['s', 'accept'],
    ['save', 'accept'],
    ['y', 'accept'],
    ['yes', 'accept'],
    ['c', 'reject'],
    ['cancel', 'reject'],
    ['n', 'reject'],
    ['no', 'reject'],
    ['r', 'replay'],
    ['replay', 'replay'],
]);

export const CHOICES_HINT = '[s]ave / [c]ancel / [r]eplay (default: save)';

export const parseAnswer = (text: string): Answer | undefined => ANSWERS.get(text.trim().toLowerCase());

export interface ReadlineReaderOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    /** Called when the operator presses Ctrl+C at the prompt */
    onInterrupt?: () => void;
}

export const createReadlineReader = (options: ReadlineReaderOptions = {}): LineReader => {
    let rl: readline.Interface | null = null;
    let closed = false;
    let pending: ((answer: string | null) => void) | null = null;

    const settle = (answer: string | null) => {
        const resolve = pending;
        pending = null;
        resolve?.(answer);
    };

    // Created on first use so nothing holds the terminal until a question
    // is actually asked.
    const getInterface = (): readline.Interface => {
        if (!rl) {
            const created = readline.createInterface({
                input: options.input ?? process.stdin,
                output: options.output ?? process.stdout,
                terminal: true,
            });
            created.on('close', () => {
                closed = true;
                settle(null);
            });
            // readline keeps the terminal in raw mode, so Ctrl+C arrives here
            // rather than as a process signal.
            created.on('SIGINT', () => {
                options.onInterrupt?.();
                created.close();
            });
            rl = created;
        }
        return rl;
    };

    const question = (text: string): Promise<string | null> => {
        return new Promise((resolve) => {
            if (closed) {
                resolve(null);
                return;
            }
            pending = resolve;
            getInterface().question(text, (answer) => settle(answer.trim()));
        });
    };

    const close = () => {
        if (rl && !closed) {
            rl.close();
        }
        closed = true;
    };

    return { question, close };
};

export interface PromptOptions {
    reader: LineReader;
    player: Player.PlayerInstance;
}

export const create = ({ reader, player }: PromptOptions): ConfirmationPrompt => {
    const logger = Logging.getLogger();

    const ask = async (label: string, audioPath: string): Promise<Decision> => {
        let prefix = '';
        for (;;) {
            const text = await reader.question(`${prefix}${label} ${CHOICES_HINT} `);
            if (text === null) {
                logger.info('Input closed, skipping %s', audioPath);
                return 'reject';
            }

            const answer = parseAnswer(text);
            if (answer === 'replay') {
                prefix = '';
                try {
                    await player.play(audioPath);
                } catch (error) {
                    logger.error('Playback error: %s', error instanceof Error ? error.message : String(error));
                }
                continue;
            }
            if (answer) {
                return answer;
            }
            prefix = `Unrecognized answer "${text}". `;
        }
    };

    return {
        ask,
        close: () => reader.close(),
    };
};

/** Accepts everything without asking; used with --batch. */
export const createAutoAccept = (): ConfirmationPrompt => {
    const logger = Logging.getLogger();
    return {
        ask: async (_label: string, audioPath: string): Promise<Decision> => {
            logger.info('Batch mode: accepting %s', audioPath);
            return 'accept';
        },
        close: () => undefined,
    };
};
