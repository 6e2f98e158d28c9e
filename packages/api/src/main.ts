import { config as loadDotenv } from 'dotenv';
import {
    LocalFileStorage,
    LoggerTelemetrySink,
    PinoLogger,
    SpeechAdapterFactory,
    StaticCredentialValidator,
    VisionAdapterFactory
} from '@glimpse/adapters';
import { describeError, loadGatewayConfig } from '@glimpse/core';
import { GatewayRuntime } from '@glimpse/runtime';
import { createGatewayApp } from './app';
import { GatewayHttpServer } from './server';
import { GATEWAY_VERSION } from './version';

async function main(): Promise<void> {
    loadDotenv();
    const config = loadGatewayConfig();
    const logger = new PinoLogger({
        level: config.logging.level,
        prettyPrint: config.logging.pretty,
        name: 'glimpse-gateway',
        bindings: { version: GATEWAY_VERSION }
    });

    const runtime = new GatewayRuntime({
        config,
        resources: {
            logger,
            storage: new LocalFileStorage({ directory: config.audio.directory }),
            visionFactory: new VisionAdapterFactory({
                apiKeys: config.vision.apiKeys,
                timeoutMs: config.vision.timeoutMs
            }),
            speechFactory: new SpeechAdapterFactory({
                timeoutMs: config.speech.timeoutMs,
                openai: config.speech.openai,
                azure: config.speech.azure,
                google: config.speech.google
            }),
            credentials: new StaticCredentialValidator(config.auth),
            telemetry: new LoggerTelemetrySink(logger.child({ component: 'telemetry' }))
        }
    });

    const server = new GatewayHttpServer({
        app: createGatewayApp({
            runtime,
            logger,
            trustProxy: config.server.trustProxy,
            allowedOrigins: config.server.allowedOrigins,
            maxImageBytes: config.limits.maxImageBytes
        }),
        host: config.server.host,
        port: config.server.port,
        logger
    });

    await runtime.start();
    await server.start();

    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) {
            return;
        }
        stopping = true;
        logger.info({ signal }, 'shutting down');
        server.close()
            .then(() => runtime.close())
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error({ err: describeError(error) }, 'shutdown failed');
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    process.stderr.write(`glimpse gateway failed to start: ${describeError(error)}\n`);
    process.exit(1);
});
