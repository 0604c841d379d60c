import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const level = process.env.LOG_LEVEL ?? (process.env.VITEST === 'true' ? 'silent' : 'info');

export const logger: Logger = pino({ name: 'rally', level });

export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
