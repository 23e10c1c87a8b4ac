/**
 * Audio Player
 *
 * Plays a recording through a local command-line player and waits for it
 * to finish, so the operator hears the whole clip before being asked again.
 *
 * Platform defaults:
 * - macOS: afplay
 * - Windows: PowerShell's System.Media.SoundPlayer (wav only)
 * - Linux/Other: ffplay
 *
 * A custom command (e.g. "mpv --no-video") can be configured; the file path
 * is appended as its last argument.
 */

import { spawn } from 'child_process';
import * as Logging from '../logging';

export interface PlayerConfig {
    /** Player command line; the audio path is appended as the last argument */
    command?: string;
}

export interface PlayerInstance {
    play(audioPath: string): Promise<void>;
}

export class PlaybackError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PlaybackError';
    }
}

interface PlayerCommand {
    program: string;
    args: string[];
}

export const defaultCommand = (audioPath: string, platform: NodeJS.Platform = process.platform): PlayerCommand => {
    if (platform === 'darwin') {
        return { program: 'afplay', args: [audioPath] };
    }
    if (platform === 'win32') {
        const escaped = audioPath.replace(/'/g, "''");
        return {
            program: 'powershell',
            args: ['-NoProfile', '-NonInteractive', '-Command', `(New-Object System.Media.SoundPlayer '${escaped}').PlaySync()`],
        };
    }
    return { program: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet', audioPath] };
};

export const resolveCommand = (config: PlayerConfig, audioPath: string): PlayerCommand => {
    const parts = config.command?.trim().split(/\s+/).filter(Boolean) ?? [];
    const [program, ...args] = parts;
    if (!program) {
        return defaultCommand(audioPath);
    }
    return { program, args: [...args, audioPath] };
};

export const create = (config: PlayerConfig = {}): PlayerInstance => {
    const logger = Logging.getLogger();

    const play = (audioPath: string): Promise<void> => {
        const { program, args } = resolveCommand(config, audioPath);
        logger.debug('Playing %s with %s', audioPath, program);

        return new Promise<void>((resolve, reject) => {
            const child = spawn(program, args, { stdio: 'ignore' });

            child.on('error', (error) => {
                reject(new PlaybackError(`Could not start ${program}: ${error.message}`));
            });

            child.on('close', (code) => {
                if (code === 0) {
                    resolve();
                } else {
                    reject(new PlaybackError(`${program} exited with code ${code}`));
                }
            });
        });
    };

    return { play };
};
