// src/utils/logger.ts
import winston from 'winston';
import { CONFIG } from '../config';

export const logger = winston.createLogger({
    level: CONFIG.LOG_LEVEL,
    silent: CONFIG.NODE_ENV === 'test',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console()],
});

/** Logger tagged with the component name, the way each service labels its lines. */
export const createServiceLogger = (service: string): winston.Logger => logger.child({ service });
