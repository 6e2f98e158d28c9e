import { type ErrorRequestHandler, type RequestHandler } from 'express';
import { GatewayError, RateLimitedError, describeError, toGatewayError } from '@glimpse/core';
import { sendJson } from './requestContext';

export interface ErrorBody {
    code: number;
    message: string;
    error_type: string;
    suggestion: string;
    request_id: string;
    details?: Record<string, unknown>;
}

export function toErrorBody(error: GatewayError, requestId: string): ErrorBody {
    const body: ErrorBody = {
        code: error.code,
        message: error.message,
        error_type: error.kind,
        suggestion: error.suggestion,
        request_id: requestId
    };
    if (error.details) {
        body.details = error.details;
    }
    return body;
}

/** Errors raised by the body parser carry a `type` such as `entity.too.large`. */
function fromBodyParser(error: unknown): GatewayError | null {
    if (typeof error !== 'object' || error === null || !('type' in error) || typeof error.type !== 'string') {
        return null;
    }
    switch (error.type) {
        case 'entity.too.large':
            return new GatewayError('InvalidImage', 'The request body is larger than the gateway accepts', {
                httpStatus: 413
            });
        case 'entity.parse.failed':
            return new GatewayError('InvalidRequest', 'The request body is not valid JSON');
        default:
            return new GatewayError('InvalidRequest', `The request body could not be read (${error.type})`);
    }
}

export function toHttpError(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
        return error;
    }
    return fromBodyParser(error) ?? toGatewayError(error);
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
    next(new GatewayError('InvalidRequest', `No route for ${req.method} ${req.path}`, { httpStatus: 404 }));
};

export const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (res.headersSent) {
        next(error);
        return;
    }

    const failure = toHttpError(error);
    const log = res.locals.log;
    if (failure.httpStatus >= 500 && failure.kind === 'InternalError') {
        log.error({ err: describeError(error), errorKind: failure.kind }, 'unhandled error');
    } else {
        log.info({ errorKind: failure.kind, status: failure.httpStatus }, failure.message);
    }

    if (failure instanceof RateLimitedError) {
        res.setHeader('Retry-After', String(failure.retryAfterSeconds));
    }
    sendJson(res, failure.httpStatus, toErrorBody(failure, res.locals.requestId));
};
