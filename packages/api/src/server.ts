import { createServer, type Server } from 'node:http';
import { type Express } from 'express';
import { type Logger } from '@glimpse/core';

export interface GatewayHttpServerOptions {
    app: Express;
    host: string;
    port: number;
    logger: Logger;
}

export class GatewayHttpServer {
    private server: Server | null = null;

    public constructor(private readonly options: GatewayHttpServerOptions) { }

    /** Bound port; differs from the configured one when that was 0. */
    public get port(): number | null {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : null;
    }

    public async start(): Promise<void> {
        if (this.server) {
            return;
        }

        const server = createServer(this.options.app);
        this.server = server;

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this.options.port, this.options.host, () => {
                server.removeListener('error', reject);
                resolve();
            });
        });

        this.options.logger.info({ host: this.options.host, port: this.port }, 'gateway listening');
    }

    public async close(): Promise<void> {
        if (!this.server) {
            return;
        }

        const server = this.server;
        this.server = null;
        server.closeIdleConnections();
        await new Promise<void>((resolve, reject) => {
            server.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
        });
    }
}
