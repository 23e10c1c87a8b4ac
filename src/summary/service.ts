/**
 * Summary Service
 *
 * Asks a chat-completion model for a short summary and a one-line TL;DR of
 * a transcript, in JSON mode.
 */

import OpenAI from 'openai';
import { ChatCompletion, ChatCompletionCreateParamsNonStreaming, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { SummarizerConfig, Summarizer, Summary, SummarizerError, SummaryResponseSchema } from './types';
import * as Logging from '../logging';

export const SYSTEM_PROMPT = 'Generate concise summary and TL;DR. Respond with JSON: {"summary": string, "tldr": string}';

export const buildMessages = (transcript: string): ChatCompletionMessageParam[] => [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: transcript },
];

export const parseSummary = (content: string): Summary => {
    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SummarizerError(`Summary response is not valid JSON: ${message}`);
    }
    const parsed = SummaryResponseSchema.safeParse(json);
    if (!parsed.success) {
        throw new SummarizerError(`Summary response is not a JSON object: ${parsed.error.message}`);
    }
    return parsed.data;
};

// The slice of the OpenAI client this service calls.
export interface ChatClient {
    chat: {
        completions: {
            create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export const create = (config: SummarizerConfig, openaiClient?: ChatClient): Summarizer => {
    const logger = Logging.getLogger();
    const openai: ChatClient = openaiClient ?? new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
    });

    const summarize = async (transcript: string): Promise<Summary> => {
        logger.info('Requesting summary from %s (%d characters)', config.model, transcript.length);
        const startTime = Date.now();

        let content: string | undefined;
        try {
            const completion = await openai.chat.completions.create({
                model: config.model,
                messages: buildMessages(transcript),
                response_format: { type: 'json_object' },
            });
            content = completion.choices[0]?.message?.content?.trim();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new SummarizerError(`Failed to create summary: ${message}`);
        }

        if (!content) {
            throw new SummarizerError('No response received from summarizer');
        }

        const duration = ((Date.now() - startTime) / 1000).toFixed(1);
        logger.info('Summarizer responded in %ss', duration);
        logger.debug('Received summary response: %s', content);
        return parseSummary(content);
    };

    return { summarize };
};
