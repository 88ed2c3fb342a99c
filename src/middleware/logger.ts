import type { NextFunction, Request, Response } from 'express';
import crypto from 'node:crypto';

export function getSafeRequestId(input?: string | string[]): string | undefined {
    const val = Array.isArray(input) ? input[0] : input;
    if (!val) return undefined;
    const trimmed = String(val).trim();
    if (trimmed.length > 128) return undefined;
    const uuidV4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
    const b64url = /^[A-Za-z0-9_-]{8,64}$/;
    if (uuidV4.test(trimmed) || b64url.test(trimmed)) return trimmed;
    return undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
    const start = Date.now();
    const method = req.method;
    const url = req.originalUrl || req.url;
    const ip = req.ip;
    const requestId = getSafeRequestId(req.headers['x-request-id']) || crypto.randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
        const ms = Date.now() - start;
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ level: 'info', requestId, method, url, status: res.statusCode, ms, ip }));
    });
    next();
}
