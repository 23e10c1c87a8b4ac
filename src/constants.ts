export const VERSION = '0.1.0';
export const PROGRAM_NAME = 'earshot';
export const DEFAULT_CHARACTER_ENCODING: BufferEncoding = 'utf-8';

export const DEFAULT_NOTES_DIRECTORY = './notes';
export const DEFAULT_MONITOR_DIRECTORY = './audio_in';

export const AUDIO_EXTENSIONS = ['.wav', '.mp3', '.m4a', '.ogg', '.flac', '.aac'] as const;

export const DEFAULT_MIME_TYPE = 'audio/wav';
export const AUDIO_MIME_TYPES: Record<string, string> = {
    '.wav': 'audio/wav',
    '.mp3': 'audio/mpeg',
    '.m4a': 'audio/mp4',
    '.ogg': 'audio/ogg',
    '.flac': 'audio/flac',
    '.aac': 'audio/aac',
};

// Transcription service
export const DEFAULT_TRANSCRIBER_URL = 'https://api.deepgram.com/v1/listen';
export const DEFAULT_TRANSCRIBER_MODEL = 'nova-2';
export const DEFAULT_LANGUAGE = 'en';
export const TRANSCRIBER_FEATURES = {
    smart_format: 'true',
    punctuate: 'true',
    paragraphs: 'true',
    diarize: 'true',
} as const;
export const ERROR_BODY_PREVIEW_LENGTH = 200;

// Summarization service
export const DEFAULT_SUMMARIZER_MODEL = 'gpt-3.5-turbo';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

// Stability detection
export const DEFAULT_QUIET_PERIOD_MS = 500;
export const DEFAULT_STABILITY_TIMEOUT_MS = 10000;
export const DEFAULT_POLL_INTERVAL_MS = 100;

// Dispatch
export const DEFAULT_QUEUE_CAPACITY = 1024;
export const DISPATCH_IDLE_MS = 100;

export const DEFAULT_BATCH = false;
export const DEFAULT_INCLUDE_EXISTING = false;
export const DEFAULT_DRY_RUN = false;
export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;

export const EARSHOT_DEFAULTS = {
    notesDir: DEFAULT_NOTES_DIRECTORY,
    monitorDir: DEFAULT_MONITOR_DIRECTORY,
    transcriberUrl: DEFAULT_TRANSCRIBER_URL,
    transcriberModel: DEFAULT_TRANSCRIBER_MODEL,
    language: DEFAULT_LANGUAGE,
    summarizerModel: DEFAULT_SUMMARIZER_MODEL,
    quietPeriodMs: DEFAULT_QUIET_PERIOD_MS,
    stabilityTimeoutMs: DEFAULT_STABILITY_TIMEOUT_MS,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    queueCapacity: DEFAULT_QUEUE_CAPACITY,
    batch: DEFAULT_BATCH,
    includeExisting: DEFAULT_INCLUDE_EXISTING,
    dryRun: DEFAULT_DRY_RUN,
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
};
