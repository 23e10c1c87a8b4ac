/**
 * Transcription Service
 *
 * POSTs raw audio to the speech-to-text endpoint and pulls the first
 * alternative of the first channel out of the response.
 */

import { TranscriberConfig, Transcriber, TranscriberError, ListenResponseSchema } from './types';
import { TRANSCRIBER_FEATURES, ERROR_BODY_PREVIEW_LENGTH } from '../constants';
import * as Logging from '../logging';

export type FetchFunction = typeof fetch;

export const buildRequestUrl = (config: TranscriberConfig): string => {
    const url = new URL(config.url);
    url.searchParams.set('model', config.model);
    for (const [key, value] of Object.entries(TRANSCRIBER_FEATURES)) {
        url.searchParams.set(key, value);
    }
    url.searchParams.set('language', config.language);
    return url.toString();
};

const preview = (body: string): string => body.slice(0, ERROR_BODY_PREVIEW_LENGTH);

export const create = (config: TranscriberConfig, fetchFn: FetchFunction = fetch): Transcriber => {
    const logger = Logging.getLogger();
    const requestUrl = buildRequestUrl(config);

    const transcribe = async (audio: Uint8Array, mimeType: string): Promise<string> => {
        logger.debug('Sending %d bytes (%s) to %s', audio.byteLength, mimeType, requestUrl);
        const startTime = Date.now();

        let response: Response;
        let body: string;
        try {
            response = await fetchFn(requestUrl, {
                method: 'POST',
                headers: {
                    'Authorization': `Token ${config.apiKey}`,
                    'Content-Type': mimeType,
                },
                body: audio,
                signal: AbortSignal.timeout(config.timeoutMs),
            });
            body = await response.text();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new TranscriberError(`Transcription request failed: ${message}`);
        }

        if (!response.ok) {
            throw new TranscriberError(
                `Transcription service returned ${response.status}: ${preview(body)}`,
                response.status,
            );
        }

        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch {
            throw new TranscriberError(`Transcription service returned malformed JSON: ${preview(body)}`, response.status);
        }

        const parsed = ListenResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new TranscriberError(`Unexpected transcription response shape: ${parsed.error.message}`, response.status);
        }

        const transcript = parsed.data.results?.channels?.[0]?.alternatives?.[0]?.transcript ?? '';
        if (!transcript) {
            logger.error('Empty transcript. Full response: %s...', preview(body));
        }

        const duration = ((Date.now() - startTime) / 1000).toFixed(1);
        logger.info('Transcription completed in %ss (%d characters)', duration, transcript.length);
        return transcript;
    };

    return { transcribe };
};
