import 'dotenv/config';
import * as Arguments from '@/arguments';
import { PROGRAM_NAME, VERSION } from '@/constants';
import { getLogger, setLogLevel } from '@/logging';
import * as Pipeline from '@/pipeline';

export const toPipelineConfig = (config: Arguments.Config): Pipeline.PipelineConfig => ({
    monitorDirectory: config.monitorDir,
    notesDirectory: config.notesDir,
    transcriberApiKey: config.transcriberApiKey,
    transcriberUrl: config.transcriberUrl,
    transcriberModel: config.transcriberModel,
    language: config.language,
    summarizerApiKey: config.summarizerApiKey,
    summarizerUrl: config.summarizerUrl,
    summarizerModel: config.summarizerModel,
    quietPeriodMs: config.quietPeriodMs,
    stabilityTimeoutMs: config.stabilityTimeoutMs,
    pollIntervalMs: config.pollIntervalMs,
    requestTimeoutMs: config.requestTimeoutMs,
    queueCapacity: config.queueCapacity,
    playerCommand: config.playerCommand,
    batch: config.batch,
    includeExisting: config.includeExisting,
    dryRun: config.dryRun,
});

export async function main(): Promise<void> {
    let config: Arguments.Config;
    try {
        config = await Arguments.configure({ argv: process.argv, env: process.env });
    } catch (error) {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
    }

    // Set log level based on verbose flag
    if (config.verbose === true) {
        setLogLevel('verbose');
    }
    if (config.debug === true) {
        setLogLevel('debug');
    }

    const logger = getLogger();
    logger.info('Starting %s: %s', PROGRAM_NAME, VERSION);

    const controller = new AbortController();
    const shutdown = (reason: string) => {
        if (!controller.signal.aborted) {
            logger.info('Received %s, shutting down...', reason);
            controller.abort();
        }
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    try {
        const components = Pipeline.build(toPipelineConfig(config), {
            onInterrupt: () => shutdown('interrupt'),
        });
        await Pipeline.run(components, controller.signal);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Exiting due to Error: %s', message);
        process.exit(1);
    }

    logger.info('Stopped');
    process.exit(0);
}
