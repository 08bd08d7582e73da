import pino from 'pino';

export type { Logger } from 'pino';

export const log = pino({ name: '@vigil/drift-monitor', level: process.env.LOG_LEVEL || 'info' });
