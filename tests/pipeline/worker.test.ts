import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
    debug: vi.fn(),
    verbose: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => mockLogger,
}));

import * as Worker from '../../src/pipeline/worker';
import { NoteWriteError } from '../../src/note';
import { TranscriberError } from '../../src/transcription';
import { SummarizerError } from '../../src/summary';
import { createFakeClock } from '../helpers/clock';

const createdAt = new Date(2024, 0, 15, 9, 0, 0);

const setup = () => {
    const deps = {
        stability: { waitStable: vi.fn(async (_path: string) => true) },
        storage: {
            readFile: vi.fn(async (_path: string) => Buffer.from('audio-bytes')),
            getBirthTime: vi.fn(async (_path: string) => createdAt),
        },
        transcriber: { transcribe: vi.fn(async (_audio: Uint8Array, _mimeType: string) => 'hello world') },
        summarizer: { summarize: vi.fn(async (_transcript: string) => ({ summary: 'greeting', tldr: 'hi' })) },
        writer: {
            notePathFor: vi.fn((audioPath: string) => `/notes/20240115_${audioPath.split('/').pop()?.split('.')[0]}.md`),
            write: vi.fn(async (audioPath: string, _text: string) => `/notes/20240115_${audioPath.split('/').pop()?.split('.')[0]}.md`),
        },
        clock: createFakeClock(new Date(2024, 5, 1, 8, 0, 0)),
    };
    return deps;
};

describe('worker', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should transcribe, summarize and write a note', async () => {
        const deps = setup();
        const worker = Worker.create(deps);

        const outcome = await worker.run('/audio/a.mp3');

        expect(outcome.status).toBe('written');
        expect(deps.transcriber.transcribe).toHaveBeenCalledWith(Buffer.from('audio-bytes'), 'audio/mpeg');
        expect(deps.summarizer.summarize).toHaveBeenCalledWith('hello world');
        expect(deps.writer.write).toHaveBeenCalledWith(
            '/audio/a.mp3',
            '## Transcription Summary\n\ngreeting\n\n```tldr\nhi\n```\n\n# 2024-01-15 Monday\n\n\n\nhello world',
        );
        if (outcome.status === 'written') {
            expect(outcome.notePath).toBe('/notes/20240115_a.md');
            expect(outcome.job.createdAt).toEqual(createdAt);
        }
        expect(mockLogger.info).toHaveBeenCalledWith('Successfully processed: %s', '/audio/a.mp3');
    });

    it('should stop without a note when the file never settles', async () => {
        const deps = setup();
        deps.stability.waitStable.mockResolvedValue(false);
        const worker = Worker.create(deps);

        const outcome = await worker.run('/audio/z.ogg');

        expect(outcome.status).toBe('unstable');
        expect(deps.transcriber.transcribe).not.toHaveBeenCalled();
        expect(deps.summarizer.summarize).not.toHaveBeenCalled();
        expect(deps.writer.write).not.toHaveBeenCalled();
        expect(mockLogger.warn).toHaveBeenCalledWith('File not stable: %s', '/audio/z.ogg');
    });

    it('should write the transcription error in place of the transcript', async () => {
        const deps = setup();
        deps.transcriber.transcribe.mockRejectedValue(new TranscriberError('Transcription service returned 401: unauthorized', 401));
        deps.summarizer.summarize.mockResolvedValue({ summary: '', tldr: '' });
        const worker = Worker.create(deps);

        const outcome = await worker.run('/audio/b.wav');

        expect(outcome.status).toBe('written');
        expect(deps.summarizer.summarize).toHaveBeenCalledWith('Transcription error: Transcription service returned 401: unauthorized');
        const [, text] = deps.writer.write.mock.calls[0];
        expect(text.endsWith('\n\nTranscription error: Transcription service returned 401: unauthorized')).toBe(true);
    });

    it('should treat an unreadable file like a failed transcription', async () => {
        const deps = setup();
        deps.storage.readFile.mockRejectedValue(new Error('EACCES: permission denied'));
        const worker = Worker.create(deps);

        const outcome = await worker.run('/audio/c.wav');

        expect(outcome.status).toBe('written');
        expect(deps.transcriber.transcribe).not.toHaveBeenCalled();
        expect(outcome.job.transcript).toBe('Transcription error: EACCES: permission denied');
    });

    it('should leave summary and TL;DR empty when summarizing fails', async () => {
        const deps = setup();
        deps.summarizer.summarize.mockRejectedValue(new SummarizerError('Failed to create summary: timeout'));
        const worker = Worker.create(deps);

        await worker.run('/audio/d.wav');

        expect(deps.writer.write).toHaveBeenCalledWith(
            '/audio/d.wav',
            '## Transcription Summary\n\n\n\n```tldr\n\n```\n\n# 2024-01-15 Monday\n\n\n\nhello world',
        );
        expect(mockLogger.error).toHaveBeenCalledWith('Summary generation failed for %s: %s', '/audio/d.wav', 'Failed to create summary: timeout');
    });

    it('should date the note with the current time when the creation time is unavailable', async () => {
        const deps = setup();
        deps.storage.getBirthTime.mockRejectedValue(new Error('ENOENT'));
        const worker = Worker.create(deps);

        const outcome = await worker.run('/audio/e.wav');

        expect(outcome.job.createdAt).toEqual(new Date(2024, 5, 1, 8, 0, 0));
        expect(outcome.job.noteText).toContain('# 2024-06-01 Saturday\n');
    });

    it('should report a failed write without throwing', async () => {
        const deps = setup();
        const error = new NoteWriteError('Failed to write note /notes/20240115_f.md: EROFS', '/notes/20240115_f.md');
        deps.writer.write.mockRejectedValue(error);
        const worker = Worker.create(deps);

        const outcome = await worker.run('/audio/f.wav');

        expect(outcome).toMatchObject({ status: 'write-failed', error });
        expect(mockLogger.error).toHaveBeenCalledWith('%s', 'Failed to write note /notes/20240115_f.md: EROFS');
    });

    it('should rethrow unexpected write errors', async () => {
        const deps = setup();
        deps.writer.write.mockRejectedValue(new TypeError('boom'));
        const worker = Worker.create(deps);

        await expect(worker.run('/audio/g.wav')).rejects.toThrow('boom');
    });

    it('should render but not write in dry-run mode', async () => {
        const deps = setup();
        const worker = Worker.create({ ...deps, dryRun: true });

        const outcome = await worker.run('/audio/h.flac');

        expect(outcome).toMatchObject({ status: 'dry-run', notePath: '/notes/20240115_h.md' });
        expect(outcome.job.noteText).toContain('hello world');
        expect(deps.writer.write).not.toHaveBeenCalled();
    });

    it('should keep concurrent jobs independent', async () => {
        const deps = setup();
        deps.transcriber.transcribe.mockImplementation(async (audio: Uint8Array) => `text of ${Buffer.from(audio).toString()}`);
        deps.storage.readFile.mockImplementation(async (audioPath: string) => Buffer.from(audioPath));
        const worker = Worker.create(deps);

        const [first, second] = await Promise.all([worker.run('/audio/one.wav'), worker.run('/audio/two.wav')]);

        expect(first.job.transcript).toBe('text of /audio/one.wav');
        expect(second.job.transcript).toBe('text of /audio/two.wav');
        expect(deps.writer.write).toHaveBeenCalledTimes(2);
    });
});
