import pino from 'pino';
import { config } from '../config';

function defaultLevel(): pino.LevelWithSilent {
    if (config.logLevel) return config.logLevel;
    if (config.nodeEnv === 'production') return 'info';
    return config.nodeEnv === 'test' ? 'silent' : 'debug';
}

function createLogger() {
    const opts: pino.LoggerOptions = {
        level: defaultLevel(),
        serializers: pino.stdSerializers,
        base: { service: 'opsdesk' },
    };

    // Only use pino-pretty in development (not test/production)
    if (config.nodeEnv === 'development') {
        try {
            require.resolve('pino-pretty');
            opts.transport = { target: 'pino-pretty', options: { colorize: true } };
        } catch {
            // pino-pretty not installed, skip
        }
    }

    return pino(opts);
}

export const logger = createLogger();

export type Logger = pino.Logger;

export function createChildLogger(context: Record<string, unknown>): Logger {
    return logger.child(context);
}
