import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const createLogger = (level: LogLevel = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.splat(),
        winston.format.printf(({ message }) => String(message)),
    );

    if (level !== 'info') {
        format = winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
                const metaText = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
                return `${timestamp} [${service}] ${level}: ${message}${metaText}`;
            }),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            // Everything goes to stderr so the confirmation prompt owns stdout
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug'],
            }),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
