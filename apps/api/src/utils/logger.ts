import winston from 'winston';

const SERVICE = 'resume-analysis-api';

type LogMeta = Record<string, unknown>;

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.json(),
    transports: [new winston.transports.Console()],
    silent: process.env.NODE_ENV === 'test',
});

export function logRequest(method: string, endpoint: string, meta: LogMeta = {}) {
    logger.info(`: ${method} ${endpoint}`, { service: SERVICE, method, endpoint, ...meta });
}

export function logUpstreamCall(operation: string, status: 'start' | 'success' | 'error', meta: LogMeta = {}) {
    const level = status === 'error' ? 'warn' : 'info';
    logger.log(level, `: Upstream ${operation}: ${status}`, { service: SERVICE, operation, status, ...meta });
}

export function logExtraction(format: string, status: 'start' | 'success' | 'error', meta: LogMeta = {}) {
    logger.info(`: Extract ${format}: ${status}`, { service: SERVICE, format, status, ...meta });
}

export default logger;
