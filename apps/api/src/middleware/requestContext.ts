import crypto from 'crypto';
import type { NextFunction, Request, Response } from 'express';

export interface RequestContext {
    requestId: string;
    startTime: number;
    ip?: string;
}

const requestContextMap = new WeakMap<Request, RequestContext>();

function generateRequestId(): string {
    return crypto.randomBytes(8).toString('hex');
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
    const context: RequestContext = {
        requestId: generateRequestId(),
        startTime: Date.now(),
        ip: req.ip,
    };
    requestContextMap.set(req, context);
    res.setHeader('X-Request-ID', context.requestId);
    next();
}

export function getRequestContext(req: Request): RequestContext {
    return requestContextMap.get(req) ?? { requestId: 'unknown', startTime: Date.now() };
}
