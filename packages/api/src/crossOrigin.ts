import { type RequestHandler } from 'express';

const EXPOSED_HEADERS = 'X-Request-ID, X-Process-Time';
const ALLOWED_METHODS = 'GET, POST, OPTIONS';
const DEFAULT_ALLOWED_HEADERS = 'Authorization, Content-Type, X-Request-ID';
const PREFLIGHT_MAX_AGE_SECONDS = '600';

/**
 * CORS headers for browser clients. `*` in the list allows every origin;
 * otherwise a matching `Origin` is echoed back. Preflight requests from an
 * allowed origin are answered here with 204.
 */
export function crossOrigin(allowedOrigins: readonly string[]): RequestHandler {
    const anyOrigin = allowedOrigins.includes('*');
    const origins = new Set(allowedOrigins);

    return (req, res, next) => {
        const origin = req.get('Origin');
        if (!origin || (!anyOrigin && !origins.has(origin))) {
            next();
            return;
        }

        if (anyOrigin) {
            res.setHeader('Access-Control-Allow-Origin', '*');
        } else {
            res.setHeader('Access-Control-Allow-Origin', origin);
            res.vary('Origin');
        }
        res.setHeader('Access-Control-Expose-Headers', EXPOSED_HEADERS);

        if (req.method === 'OPTIONS' && req.get('Access-Control-Request-Method')) {
            res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS);
            res.setHeader('Access-Control-Allow-Headers', req.get('Access-Control-Request-Headers') ?? DEFAULT_ALLOWED_HEADERS);
            res.setHeader('Access-Control-Max-Age', PREFLIGHT_MAX_AGE_SECONDS);
            res.status(204).end();
            return;
        }
        next();
    };
}
