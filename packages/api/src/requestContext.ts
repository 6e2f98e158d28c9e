import { randomUUID } from 'node:crypto';
import { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { type Logger } from '@glimpse/core';

declare global {
    namespace Express {
        interface Locals {
            requestId: string;
            startedAt: number;
            log: Logger;
        }
    }
}

const REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Binds a request id (taken from `X-Request-ID` when it looks sane) and a
 * child logger to every request, and logs the request once it finishes.
 */
export function requestContext(logger: Logger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const incoming = req.get('x-request-id');
        const requestId = incoming && REQUEST_ID.test(incoming) ? incoming : randomUUID();

        res.locals.requestId = requestId;
        res.locals.startedAt = performance.now();
        res.locals.log = logger.child({ requestId });
        res.setHeader('X-Request-ID', requestId);

        res.on('finish', () => {
            res.locals.log.info({
                method: req.method,
                path: req.path,
                status: res.statusCode,
                durationMs: elapsedMs(res)
            }, 'request handled');
        });

        next();
    };
}

export function elapsedMs(res: Response): number {
    return Math.round((performance.now() - res.locals.startedAt) * 100) / 100;
}

/** Sends a JSON body with the processing time header. */
export function sendJson(res: Response, status: number, body: unknown): void {
    res.setHeader('X-Process-Time', String(elapsedMs(res)));
    res.status(status).json(body);
}

/** Bearer header first, then the `token` query parameter. */
export function readCredential(req: Request): string | undefined {
    const header = req.get('authorization')?.trim();
    if (header && header.startsWith('Bearer ')) {
        const token = header.slice('Bearer '.length).trim();
        return token.length > 0 ? token : undefined;
    }

    const query = req.query['token'];
    return typeof query === 'string' && query.length > 0 ? query : undefined;
}

export function clientAddress(req: Request): string {
    return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}
