import winston from 'winston';
import config from './config';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export interface LogLine {
    level: string;
    message: unknown;
    [key: string]: unknown;
}

/**
 * Console line: `time [level] [context runId] message {meta}`
 */
export function formatLine({ level, message, timestamp, stack, context, runId, ...meta }: LogLine): string {
    const labels = [context, runId].filter((part): part is string => typeof part === 'string' && part.length > 0);
    let line = `${timestamp} [${level}]${labels.length > 0 ? ` [${labels.join(' ')}]` : ''} ${message}`;

    if (stack) {
        line += `\n${stack}`;
    }

    if (Object.keys(meta).length > 0) {
        line += ` ${JSON.stringify(meta)}`;
    }

    return line;
}

const consoleFormat = printf(info => formatLine(info));

/**
 * Root logger; silent under test
 */
export const logger = winston.createLogger({
    level: config.logging.level,
    silent: config.isTest,
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
    ),
    defaultMeta: { service: 'briefcast-engine' },
    transports: [
        new winston.transports.Console({
            format: config.isDev
                ? combine(colorize(), consoleFormat)
                : consoleFormat,
        }),
    ],
});

// Run logs also go to disk as JSON outside development
if (!config.isDev) {
    logger.add(
        new winston.transports.File({
            filename: `${config.logging.dir}/error.log`,
            level: 'error',
            format: json(),
        })
    );
    logger.add(
        new winston.transports.File({
            filename: `${config.logging.dir}/engine.log`,
            format: json(),
        })
    );
}

/**
 * Child logger labelled with a module or pipeline node name. Extra metadata
 * such as the run id is attached to every line.
 */
export function createLogger(
    context: string,
    meta: Record<string, unknown> = {}
): winston.Logger {
    return logger.child({ context, ...meta });
}

export type Logger = winston.Logger;

export default logger;
