import * as fs from 'fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isDirectory: (path: string) => Promise<boolean>;
    isReadable: (path: string) => Promise<boolean>;
    isDirectoryReadable: (path: string) => Promise<boolean>;
    getFileSize: (path: string) => Promise<number>;
    getBirthTime: (path: string) => Promise<Date>;
    readFile: (path: string) => Promise<Buffer>;
    writeFile: (path: string, data: string, encoding: BufferEncoding) => Promise<void>;
    createDirectory: (path: string) => Promise<void>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => undefined);

    const exists = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.stat(path);
            return true;
        } catch {
            return false;
        }
    };

    const isDirectory = async (path: string): Promise<boolean> => {
        const stats = await fs.promises.stat(path);
        if (!stats.isDirectory()) {
            log(`${path} is not a directory`);
            return false;
        }
        return true;
    };

    const isReadable = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.access(path, fs.constants.R_OK);
            return true;
        } catch (error) {
            log(`${path} is not readable: %s`, error);
            return false;
        }
    };

    const isDirectoryReadable = async (path: string): Promise<boolean> => {
        return await exists(path) && await isDirectory(path) && await isReadable(path);
    };

    const getFileSize = async (path: string): Promise<number> => {
        const stats = await fs.promises.stat(path);
        return stats.size;
    };

    // Not every filesystem records a birth time; Node reports 0 there, so
    // fall back to the inode change time.
    const getBirthTime = async (path: string): Promise<Date> => {
        const stats = await fs.promises.stat(path);
        if (stats.birthtimeMs > 0) {
            return stats.birthtime;
        }
        log(`${path} has no birth time, using ctime`);
        return stats.ctime;
    };

    const readFile = async (path: string): Promise<Buffer> => {
        return await fs.promises.readFile(path);
    };

    // Write to a sibling temp file first and rename it over the target,
    // so readers never observe a half-written file.
    const writeFile = async (target: string, data: string, encoding: BufferEncoding): Promise<void> => {
        const temp = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);
        try {
            await fs.promises.writeFile(temp, data, { encoding });
            await fs.promises.rename(temp, target);
        } catch (error) {
            await fs.promises.rm(temp, { force: true });
            throw error;
        }
    };

    const createDirectory = async (path: string): Promise<void> => {
        await fs.promises.mkdir(path, { recursive: true });
    };

    return {
        exists,
        isDirectory,
        isReadable,
        isDirectoryReadable,
        getFileSize,
        getBirthTime,
        readFile,
        writeFile,
        createDirectory,
    };
};
