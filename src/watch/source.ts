/**
 * Event Source
 *
 * Watches a single directory (no subdirectories) and reports one event per
 * filesystem notification. Repeated create/modify notifications for the
 * same file are passed through; the ingest queue deduplicates them.
 */

import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { glob } from 'glob';
import { EventSource, PathEvent, SourceConfig, SourceListener, SourceLostError, SourceUnavailableError } from './types';
import * as Logging from '../logging';
import * as Storage from '../util/storage';

const messageOf = (error: unknown): string => error instanceof Error ? error.message : String(error);

export const create = (config: SourceConfig): EventSource => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const directory = path.resolve(config.directory);

    let watcher: FSWatcher | null = null;

    const scanExisting = async (listener: SourceListener): Promise<void> => {
        const files = await glob('*', {
            cwd: directory,
            nodir: true,
            absolute: true,
        });
        logger.info('Found %d existing file(s) in %s', files.length, directory);
        for (const file of files.sort()) {
            listener.onEvent({ path: file, kind: 'created' });
        }
    };

    const start = async (listener: SourceListener): Promise<void> => {
        if (watcher) {
            throw new SourceUnavailableError(`Already watching ${directory}`);
        }
        if (!await storage.isDirectoryReadable(directory)) {
            throw new SourceUnavailableError(`Cannot watch ${directory}: not a readable directory`);
        }

        if (config.includeExisting) {
            await scanExisting(listener);
        }

        const emit = (event: PathEvent) => {
            logger.debug('Watch event %s: %s', event.kind, event.path);
            listener.onEvent(event);
        };

        let lost = false;
        const current = watch(directory, {
            depth: 0,
            ignoreInitial: true,
            awaitWriteFinish: false,
        });
        watcher = current;

        current.on('add', (file: string) => emit({ path: path.resolve(file), kind: 'created' }));
        current.on('change', (file: string) => emit({ path: path.resolve(file), kind: 'modified' }));
        current.on('unlinkDir', (dir: string) => {
            if (path.resolve(dir) === directory && !lost) {
                lost = true;
                listener.onLost(new SourceLostError(`Watched directory ${directory} was removed`));
            }
        });

        await new Promise<void>((resolve, reject) => {
            const onStartupError = (error: unknown) => {
                reject(new SourceUnavailableError(`Cannot watch ${directory}: ${messageOf(error)}`));
            };
            current.once('error', onStartupError);
            current.once('ready', () => {
                current.off('error', onStartupError);
                current.on('error', (error: unknown) => {
                    logger.error('Watcher error on %s: %s', directory, messageOf(error));
                });
                resolve();
            });
        }).catch(async (error: unknown) => {
            watcher = null;
            await current.close();
            throw error;
        });

        logger.info('Watching %s for audio files', directory);
    };

    const stop = async (): Promise<void> => {
        if (!watcher) {
            return;
        }
        const current = watcher;
        watcher = null;
        await current.close();
        logger.debug('Stopped watching %s', directory);
    };

    return { start, stop };
};
