import pino from 'pino';
import { env } from '../../config/env';

export const SERVICE_NAME = 'savings-governance-api';

export const resolveLogLevel = (): pino.LevelWithSilent => {
    if (env.LOG_LEVEL) return env.LOG_LEVEL;
    if (env.NODE_ENV === 'test') return 'silent';
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
};

/**
 * Application logger for services and jobs.
 * Request-scoped logging goes through Fastify's own pino instance (req.log).
 */
export const logger = pino({
    level: resolveLogLevel(),
    transport: env.NODE_ENV === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    base: {
        service: SERVICE_NAME,
        env: env.NODE_ENV
    }
});
