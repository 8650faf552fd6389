/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON lines in production, silent under
 * tests unless LOG_LEVEL says otherwise.
 */
import pino from 'pino';
import type { Logger, DestinationStream, LevelWithSilent } from 'pino';
import { env, isTest } from '../config/env.js';

const isDev = env.NODE_ENV === 'development';

function defaultLevel(): LevelWithSilent {
    if (env.LOG_LEVEL) return env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

function createDestination(): DestinationStream {
    if (!isDev) return pino.destination(1);
    return pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    });
}

// Create the logger instance
const logger: Logger = pino({
    level: defaultLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
}, createDestination());

// Create child loggers for different modules
export const variantLogger: Logger = logger.child({ module: 'variants' });
export const bomLogger: Logger = logger.child({ module: 'bom' });
export const productionLogger: Logger = logger.child({ module: 'production' });
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const dbLogger: Logger = logger.child({ module: 'db' });

// Export the base logger as default
export default logger;
