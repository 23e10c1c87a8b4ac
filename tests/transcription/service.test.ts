import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

const mockLogger = vi.hoisted(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => mockLogger,
}));

import * as Transcription from '../../src/transcription';
import { FetchFunction, TranscriberConfig, TranscriberError } from '../../src/transcription';

const config: TranscriberConfig = {
    apiKey: 'test-key',
    url: 'https://transcriber.test/v1/listen',
    model: 'nova-2',
    language: 'en',
    timeoutMs: 30000,
};

const listenBody = (transcript: string) => JSON.stringify({
    metadata: { request_id: 'req-1' },
    results: {
        channels: [{ alternatives: [{ transcript, confidence: 0.98 }] }],
    },
});

describe('transcription service', () => {
    let fetchFn: Mock<FetchFunction>;

    beforeEach(() => {
        vi.clearAllMocks();
        fetchFn = vi.fn<FetchFunction>();
    });

    describe('buildRequestUrl', () => {
        it('should add model, features and language as query parameters', () => {
            expect(Transcription.buildRequestUrl(config)).toBe(
                'https://transcriber.test/v1/listen?model=nova-2&smart_format=true&punctuate=true&paragraphs=true&diarize=true&language=en'
            );
        });

        it('should use the configured language', () => {
            const url = new URL(Transcription.buildRequestUrl({ ...config, language: 'no' }));
            expect(url.searchParams.get('language')).toBe('no');
        });
    });

    describe('transcribe', () => {
        it('should post the audio with token auth and return the first transcript', async () => {
            fetchFn.mockResolvedValue(new Response(listenBody('hello world'), { status: 200 }));
            const transcriber = Transcription.create(config, fetchFn);
            const audio = new Uint8Array([1, 2, 3, 4]);

            await expect(transcriber.transcribe(audio, 'audio/mpeg')).resolves.toBe('hello world');

            expect(fetchFn).toHaveBeenCalledTimes(1);
            const [url, init] = fetchFn.mock.calls[0];
            expect(url).toBe(Transcription.buildRequestUrl(config));
            expect(init?.method).toBe('POST');
            expect(init?.headers).toEqual({
                'Authorization': 'Token test-key',
                'Content-Type': 'audio/mpeg',
            });
            expect(init?.body).toBe(audio);
            expect(init?.signal).toBeInstanceOf(AbortSignal);
        });

        it('should return an empty transcript and log the response when nothing was recognized', async () => {
            fetchFn.mockResolvedValue(new Response(listenBody(''), { status: 200 }));
            const transcriber = Transcription.create(config, fetchFn);

            await expect(transcriber.transcribe(new Uint8Array([0]), 'audio/wav')).resolves.toBe('');
            expect(mockLogger.error).toHaveBeenCalledWith('Empty transcript. Full response: %s...', listenBody(''));
        });

        it('should treat a response without channels as an empty transcript', async () => {
            fetchFn.mockResolvedValue(new Response(JSON.stringify({ results: {} }), { status: 200 }));
            const transcriber = Transcription.create(config, fetchFn);

            await expect(transcriber.transcribe(new Uint8Array([0]), 'audio/wav')).resolves.toBe('');
        });

        it('should fail with the status and a body preview on a non-2xx response', async () => {
            const body = 'x'.repeat(250);
            fetchFn.mockResolvedValue(new Response(body, { status: 401 }));
            const transcriber = Transcription.create(config, fetchFn);

            const error = await transcriber.transcribe(new Uint8Array([0]), 'audio/wav').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(TranscriberError);
            expect(error).toMatchObject({
                status: 401,
                message: `Transcription service returned 401: ${'x'.repeat(200)}`,
            });
        });

        it('should fail when the request cannot be sent', async () => {
            fetchFn.mockRejectedValue(new TypeError('fetch failed'));
            const transcriber = Transcription.create(config, fetchFn);

            await expect(transcriber.transcribe(new Uint8Array([0]), 'audio/wav'))
                .rejects.toThrow('Transcription request failed: fetch failed');
        });

        it('should fail on a body that is not JSON', async () => {
            fetchFn.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));
            const transcriber = Transcription.create(config, fetchFn);

            await expect(transcriber.transcribe(new Uint8Array([0]), 'audio/wav'))
                .rejects.toThrow('Transcription service returned malformed JSON: <html>oops</html>');
        });

        it('should fail on JSON of the wrong shape', async () => {
            fetchFn.mockResolvedValue(new Response(JSON.stringify({ results: { channels: 'none' } }), { status: 200 }));
            const transcriber = Transcription.create(config, fetchFn);

            await expect(transcriber.transcribe(new Uint8Array([0]), 'audio/wav'))
                .rejects.toBeInstanceOf(TranscriberError);
        });
    });
});
