import { Command, InvalidArgumentError } from "commander";
import * as fs from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
    EARSHOT_DEFAULTS,
    PROGRAM_NAME,
    VERSION
} from "@/constants";
import { getLogger } from "@/logging";

export type Args = {
    config?: string;
    transcriberApiKey?: string;
    summarizerApiKey?: string;
    notesDir?: string;
    monitorDir?: string;
    transcriberUrl?: string;
    transcriberModel?: string;
    language?: string;
    summarizerUrl?: string;
    summarizerModel?: string;
    quietPeriod?: number;
    stabilityTimeout?: number;
    requestTimeout?: number;
    queueCapacity?: number;
    player?: string;
    batch?: boolean;
    includeExisting?: boolean;
    dryRun?: boolean;
    verbose?: boolean;
    debug?: boolean;
};

const positiveInteger = z.number().int().positive();

export const ConfigSchema = z.object({
    transcriberApiKey: z.string({
        required_error: 'Transcriber API key is required. Provide it via --transcriber-api-key, config file, or TRANSCRIBER_API_KEY environment variable.',
    }).min(1, 'Transcriber API key cannot be empty'),
    summarizerApiKey: z.string({
        required_error: 'Summarizer API key is required. Provide it via --summarizer-api-key, config file, or SUMMARIZER_API_KEY environment variable.',
    }).min(1, 'Summarizer API key cannot be empty'),
    notesDir: z.string().min(1),
    monitorDir: z.string().min(1),
    transcriberUrl: z.string().url(),
    transcriberModel: z.string().min(1),
    language: z.string().min(1),
    summarizerUrl: z.string().url().optional(),
    summarizerModel: z.string().min(1),
    quietPeriodMs: positiveInteger,
    stabilityTimeoutMs: positiveInteger,
    pollIntervalMs: positiveInteger,
    requestTimeoutMs: positiveInteger,
    queueCapacity: positiveInteger,
    playerCommand: z.string().min(1).optional(),
    batch: z.boolean(),
    includeExisting: z.boolean(),
    dryRun: z.boolean(),
    verbose: z.boolean(),
    debug: z.boolean(),
});

// Config files may set any subset of the keys, and nothing else.
export const ConfigFileSchema = ConfigSchema.partial().strict();

export type Config = Readonly<z.infer<typeof ConfigSchema>>;
type ConfigValues = Partial<z.infer<typeof ConfigSchema>>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface ConfigureOptions {
    argv: string[];
    env: NodeJS.ProcessEnv;
}

const parsePositiveInteger = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
};

export const createProgram = (): Command => {
    return new Command()
        .name(PROGRAM_NAME)
        .summary('Turn new audio recordings into Markdown notes')
        .description('Watches a directory for audio recordings, asks whether to process each one, then transcribes, summarizes and writes a note')
        .version(VERSION)
        .option('--config <file>', 'YAML configuration file')
        .option('--transcriber-api-key <transcriberApiKey>', 'API key for the transcription service')
        .option('--summarizer-api-key <summarizerApiKey>', 'API key for the summarization service')
        .option('--notes-dir <notesDir>', 'directory notes are written to')
        .option('--monitor-dir <monitorDir>', 'directory watched for new recordings')
        .option('--transcriber-url <transcriberUrl>', 'transcription endpoint')
        .option('--transcriber-model <transcriberModel>', 'transcription model')
        .option('--language <language>', 'spoken language of the recordings')
        .option('--summarizer-url <summarizerUrl>', 'base URL of an OpenAI-compatible summarization API')
        .option('--summarizer-model <summarizerModel>', 'model used for summaries')
        .option('--quiet-period <ms>', 'how long a file size must stay unchanged before processing', parsePositiveInteger)
        .option('--stability-timeout <ms>', 'give up on files that keep changing for this long', parsePositiveInteger)
        .option('--request-timeout <ms>', 'timeout for each service request', parsePositiveInteger)
        .option('--queue-capacity <n>', 'maximum number of recordings waiting for a decision', parsePositiveInteger)
        .option('--player <command>', 'command used to replay recordings')
        .option('--batch', 'process every recording without asking')
        .option('--include-existing', 'also offer recordings already in the directory at startup')
        .option('--dry-run', 'render notes without writing them')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging');
};

export const readConfigFile = async (file: string): Promise<ConfigValues> => {
    let raw: string;
    try {
        raw = await fs.readFile(file, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let loaded: unknown;
    try {
        loaded = yaml.load(raw);
    } catch (error) {
        throw new ConfigError(`Invalid YAML in ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (loaded === undefined || loaded === null) {
        return {};
    }

    const parsed = ConfigFileSchema.safeParse(loaded);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${file}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
};

export const fromEnvironment = (env: NodeJS.ProcessEnv): ConfigValues => {
    const values: ConfigValues = {};
    if (env.TRANSCRIBER_API_KEY) values.transcriberApiKey = env.TRANSCRIBER_API_KEY;
    if (env.SUMMARIZER_API_KEY) values.summarizerApiKey = env.SUMMARIZER_API_KEY;
    if (env.NOTES_DIR) values.notesDir = env.NOTES_DIR;
    if (env.MONITOR_DIR) values.monitorDir = env.MONITOR_DIR;
    if (env.TRANSCRIBER_URL) values.transcriberUrl = env.TRANSCRIBER_URL;
    if (env.SUMMARIZER_URL) values.summarizerUrl = env.SUMMARIZER_URL;
    if (env.AUDIO_PLAYER) values.playerCommand = env.AUDIO_PLAYER;
    return values;
};

export const fromArgs = (cliArgs: Args): ConfigValues => {
    // Only include options that were explicitly set
    const values: ConfigValues = {};
    if (cliArgs.transcriberApiKey !== undefined) values.transcriberApiKey = cliArgs.transcriberApiKey;
    if (cliArgs.summarizerApiKey !== undefined) values.summarizerApiKey = cliArgs.summarizerApiKey;
    if (cliArgs.notesDir !== undefined) values.notesDir = cliArgs.notesDir;
    if (cliArgs.monitorDir !== undefined) values.monitorDir = cliArgs.monitorDir;
    if (cliArgs.transcriberUrl !== undefined) values.transcriberUrl = cliArgs.transcriberUrl;
    if (cliArgs.transcriberModel !== undefined) values.transcriberModel = cliArgs.transcriberModel;
    if (cliArgs.language !== undefined) values.language = cliArgs.language;
    if (cliArgs.summarizerUrl !== undefined) values.summarizerUrl = cliArgs.summarizerUrl;
    if (cliArgs.summarizerModel !== undefined) values.summarizerModel = cliArgs.summarizerModel;
    if (cliArgs.quietPeriod !== undefined) values.quietPeriodMs = cliArgs.quietPeriod;
    if (cliArgs.stabilityTimeout !== undefined) values.stabilityTimeoutMs = cliArgs.stabilityTimeout;
    if (cliArgs.requestTimeout !== undefined) values.requestTimeoutMs = cliArgs.requestTimeout;
    if (cliArgs.queueCapacity !== undefined) values.queueCapacity = cliArgs.queueCapacity;
    if (cliArgs.player !== undefined) values.playerCommand = cliArgs.player;
    if (cliArgs.batch !== undefined) values.batch = cliArgs.batch;
    if (cliArgs.includeExisting !== undefined) values.includeExisting = cliArgs.includeExisting;
    if (cliArgs.dryRun !== undefined) values.dryRun = cliArgs.dryRun;
    if (cliArgs.verbose !== undefined) values.verbose = cliArgs.verbose;
    if (cliArgs.debug !== undefined) values.debug = cliArgs.debug;
    return values;
};

const formatIssues = (error: z.ZodError): string => {
    return error.issues
        .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
        .join('; ');
};

/**
 * Resolves the configuration once at startup.
 * Precedence: defaults -> config file -> environment -> command line.
 */
export const configure = async ({ argv, env }: ConfigureOptions): Promise<Config> => {
    const logger = getLogger();

    const program = createProgram();
    program.parse(argv);

    const cliArgs: Args = program.opts<Args>();
    logger.debug('Command Line Options: %s', JSON.stringify({
        ...cliArgs,
        transcriberApiKey: cliArgs.transcriberApiKey && '***',
        summarizerApiKey: cliArgs.summarizerApiKey && '***',
    }, null, 2));

    const fileValues = cliArgs.config ? await readConfigFile(cliArgs.config) : {};

    const merged: ConfigValues = {
        ...EARSHOT_DEFAULTS,
        ...fileValues,
        ...fromEnvironment(env),
        ...fromArgs(cliArgs),
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError(formatIssues(parsed.error));
    }

    logger.debug('Final configuration: notes=%s monitor=%s', parsed.data.notesDir, parsed.data.monitorDir);
    return Object.freeze(parsed.data);
};
