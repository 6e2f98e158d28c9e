import express, { Router, type Express, type NextFunction, type Request, type Response } from 'express';
import { GatewayError, type Logger } from '@glimpse/core';
import { PROMPT_TEMPLATES, type GatewayRuntime, type RequestContext } from '@glimpse/runtime';
import { crossOrigin } from './crossOrigin';
import { errorHandler, notFoundHandler, toErrorBody, toHttpError } from './errors';
import { clientAddress, elapsedMs, readCredential, requestContext, sendJson } from './requestContext';
import {
    ChatBodySchema,
    TestConnectionBodySchema,
    parseBody,
    toGatewayRequest,
    toProbeRequest
} from './schemas';
import { SseWriter } from './sse';
import { GATEWAY_VERSION } from './version';

export interface GatewayApiOptions {
    runtime: GatewayRuntime;
    logger: Logger;
    version?: string;
    /** Passed to Express `trust proxy`; decides which address the limiter sees. */
    trustProxy?: boolean;
    /** Decoded image limit; the JSON body limit is derived from it. */
    maxImageBytes: number;
    /** Browser origins allowed to call the API; `*` allows any. Omitted disables CORS. */
    allowedOrigins?: string[];
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncRoute) {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

function contextFor(req: Request, res: Response, signal?: AbortSignal): RequestContext {
    return {
        requestId: res.locals.requestId,
        clientAddress: clientAddress(req),
        credential: readCredential(req),
        signal,
        logger: res.locals.log
    };
}

/** Aborts when the client goes away before the response is finished. */
function abortOnDisconnect(res: Response): AbortController {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) {
            controller.abort();
        }
    });
    return controller;
}

function success(res: Response, data: unknown): void {
    sendJson(res, 200, { code: 0, message: 'success', data, request_id: res.locals.requestId });
}

/**
 * Creates the Express router with the public gateway endpoints:
 * health, provider and prompt listings, chat, connection probes and audio.
 */
export function createGatewayApi(options: GatewayApiOptions): Router {
    const { runtime } = options;
    const orchestrator = runtime.orchestrator;
    const version = options.version ?? GATEWAY_VERSION;
    const router = Router();

    router.get('/health', (_req, res) => {
        sendJson(res, 200, {
            status: 'ok',
            version,
            uptimeSeconds: runtime.uptimeSeconds(),
            conversations: runtime.conversations.stats().activeConversations,
            providers: orchestrator.describeProviders()
        });
    });

    router.get('/api/v1/models', (_req, res) => {
        const { vision, speech } = orchestrator.describeProviders();
        success(res, { providers: vision, speech_providers: speech });
    });

    router.get('/api/v1/prompts', (_req, res) => {
        success(res, { prompts: PROMPT_TEMPLATES });
    });

    router.post('/api/v1/chat', route(async (req, res) => {
        const body = parseBody(ChatBodySchema, req.body);
        const request = toGatewayRequest(body);
        const controller = abortOnDisconnect(res);
        const context = contextFor(req, res, controller.signal);

        if (!body.stream) {
            const response = await orchestrator.handle(request, context);
            success(res, {
                text: response.text,
                audio_url: response.audioLocator,
                conversation_id: response.conversationId,
                latency_ms: response.latencyMs
            });
            return;
        }

        const stream = await orchestrator.stream(request, context);
        const writer = new SseWriter(res);
        res.on('close', () => {
            if (!res.writableEnded) {
                stream.cancel();
            }
        });

        try {
            for await (const event of stream) {
                const flushed = event.type === 'fragment'
                    ? writer.send('fragment', { text: event.text })
                    : writer.send('done', {
                        conversation_id: event.conversationId,
                        audio_url: event.audioLocator,
                        latency_ms: event.latencyMs
                    });
                if (!flushed) {
                    await writer.drained();
                }
            }
        } catch (error) {
            const failure = toHttpError(error);
            if (writer.open) {
                writer.send('error', toErrorBody(failure, res.locals.requestId));
            } else {
                res.locals.log.info({ errorKind: failure.kind }, 'stream ended after the client left');
            }
        } finally {
            writer.end();
        }
    }));

    router.post('/api/v1/test-connection', route(async (req, res) => {
        const body = parseBody(TestConnectionBodySchema, req.body);
        const probe = await orchestrator.probe(toProbeRequest(body), contextFor(req, res));
        success(res, { ok: probe.ok, latency_ms: probe.latencyMs, detail: probe.detail });
    }));

    router.get('/audio/:filename', route(async (req, res) => {
        const filename = req.params['filename'];
        if (!filename) {
            throw new GatewayError('AudioNotFound', 'Audio file name is missing');
        }
        const audio = await runtime.audio.resolve(filename);
        res.setHeader('Content-Type', audio.contentType);
        res.setHeader('Content-Length', String(audio.bytes.length));
        res.setHeader('X-Process-Time', String(elapsedMs(res)));
        res.status(200).send(audio.bytes);
    }));

    return router;
}

/** Full application: body parsing, request context, the API router and error mapping. */
export function createGatewayApp(options: GatewayApiOptions): Express {
    const app = express();
    app.disable('x-powered-by');
    app.set('trust proxy', options.trustProxy ?? false);

    // base64 grows the payload by a third; leave room for the other fields.
    const bodyLimit = Math.ceil(options.maxImageBytes * 4 / 3) + 64 * 1024;

    app.use(requestContext(options.logger));
    app.use(crossOrigin(options.allowedOrigins ?? []));
    app.use(express.json({ limit: bodyLimit }));
    app.use(createGatewayApi(options));
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
