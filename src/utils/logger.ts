import pino from 'pino';
import { config } from '../config';

function defaultLevel(): pino.LevelWithSilent {
    if (config.nodeEnv === 'production') return 'info';
    if (config.nodeEnv === 'test') return 'silent';
    return 'debug';
}

function createLogger() {
    const opts: pino.LoggerOptions = {
        level: config.logLevel ?? defaultLevel(),
        serializers: pino.stdSerializers,
        base: { service: 'llm-relay' },
    };

    // Only use pino-pretty in development (not test/production)
    if (config.nodeEnv === 'development') {
        try {
            require.resolve('pino-pretty');
            opts.transport = { target: 'pino-pretty', options: { colorize: true } };
        } catch {
            // pino-pretty not installed, keep JSON output
        }
    }

    return pino(opts);
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>) {
    return logger.child(context);
}
