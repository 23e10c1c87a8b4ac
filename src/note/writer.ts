/**
 * Note Writer
 *
 * Places a rendered note in the notes directory as
 * <YYYYMMDD>_<audio basename>.md, dated by the clock at write time.
 * Writing the same note twice leaves the same file behind.
 */

import path from 'node:path';
import { Clock } from '../util/clock';
import * as Storage from '../util/storage';
import * as Media from '../util/media';
import * as Logging from '../logging';
import { DEFAULT_CHARACTER_ENCODING } from '../constants';
import { formatDateStamp } from './render';

export interface WriterConfig {
    notesDir: string;
}

export interface NoteWriter {
    notePathFor(audioPath: string): string;
    write(audioPath: string, text: string): Promise<string>;
}

export class NoteWriteError extends Error {
    readonly notePath: string;

    constructor(message: string, notePath: string) {
        super(message);
        this.name = 'NoteWriteError';
        this.notePath = notePath;
    }
}

export const create = (config: WriterConfig, clock: Clock, storage?: Storage.Utility): NoteWriter => {
    const logger = Logging.getLogger();
    const files = storage ?? Storage.create({ log: logger.debug.bind(logger) });

    const notePathFor = (audioPath: string): string => {
        const fileName = `${formatDateStamp(clock.now())}_${Media.baseNameWithoutExtension(audioPath)}.md`;
        return path.join(config.notesDir, fileName);
    };

    const write = async (audioPath: string, text: string): Promise<string> => {
        const notePath = notePathFor(audioPath);
        try {
            await files.createDirectory(path.dirname(notePath));
            await files.writeFile(notePath, text, DEFAULT_CHARACTER_ENCODING);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new NoteWriteError(`Failed to write note ${notePath}: ${message}`, notePath);
        }
        logger.info('Note saved: %s', notePath);
        return notePath;
    };

    return { notePathFor, write };
};
