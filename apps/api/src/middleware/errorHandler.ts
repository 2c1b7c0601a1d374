import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import type { ErrorResponse } from '../types/analysis';
import { UnsupportedFormatError } from '../utils/errors';
import logger from '../utils/logger';
import { formatValidationErrors } from '../utils/validators';
import { MAX_UPLOAD_SIZE } from './upload';
import { getRequestContext } from './requestContext';

function isJsonSyntaxError(error: unknown): boolean {
    return error instanceof SyntaxError && 'body' in error;
}

interface ClientHttpError extends Error {
    status: number;
}

// body-parser raises http-errors: a 4xx status plus `expose` when the message is safe to return
function isClientHttpError(error: unknown): error is ClientHttpError {
    return error instanceof Error
        && 'status' in error
        && typeof error.status === 'number'
        && error.status >= 400
        && error.status < 500
        && 'expose' in error
        && error.expose === true;
}

export function notFoundHandler(req: Request, res: Response) {
    const body: ErrorResponse = { detail: 'Not Found' };
    res.status(404).json(body);
}

// Express recognises error middleware by its four parameters
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
    const { requestId } = getRequestContext(req);

    if (error instanceof ZodError) {
        logger.info('Validation error', { requestId, endpoint: req.path, status: 'failed' });
        const body: ErrorResponse = {
            detail: 'Validation failed',
            validation_errors: formatValidationErrors(error),
        };
        res.status(400).json(body);
        return;
    }

    if (error instanceof UnsupportedFormatError) {
        logger.info('Unsupported upload format', { requestId, filename: error.filename });
        const body: ErrorResponse = { detail: error.message };
        res.status(error.statusCode).json(body);
        return;
    }

    if (error instanceof multer.MulterError) {
        const tooLarge = error.code === 'LIMIT_FILE_SIZE';
        logger.info('Upload rejected', { requestId, code: error.code });
        const body: ErrorResponse = {
            detail: tooLarge
                ? `File size exceeds ${MAX_UPLOAD_SIZE / 1024 / 1024}MB limit`
                : error.message,
        };
        res.status(tooLarge ? 413 : 400).json(body);
        return;
    }

    if (isJsonSyntaxError(error)) {
        const body: ErrorResponse = { detail: 'Request body is not valid JSON' };
        res.status(400).json(body);
        return;
    }

    if (isClientHttpError(error)) {
        logger.info('Request rejected', { requestId, endpoint: req.path, status: error.status });
        const body: ErrorResponse = { detail: error.message };
        res.status(error.status).json(body);
        return;
    }

    logger.error('Unhandled error', {
        requestId,
        endpoint: req.path,
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
    });
    const body: ErrorResponse = { detail: 'Internal Server Error' };
    res.status(500).json(body);
}
