import { type Response } from 'express';

/** One server-sent-events response. Writes are dropped once the client is gone. */
export class SseWriter {
    public constructor(private readonly response: Response) {
        response.statusCode = 200;
        response.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
        response.setHeader('Cache-Control', 'no-cache, no-transform');
        response.setHeader('Connection', 'keep-alive');
        response.setHeader('X-Accel-Buffering', 'no');
        response.flushHeaders();
    }

    public get open(): boolean {
        return !this.response.writableEnded && !this.response.destroyed;
    }

    /** Returns false when the socket buffer is full; wait for `drained()` before sending more. */
    public send(event: string, data: unknown): boolean {
        if (!this.open) {
            return true;
        }
        return this.response.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    }

    /** Resolves once the socket buffer empties or the client goes away. */
    public drained(): Promise<void> {
        if (!this.open) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            const settle = () => {
                this.response.off('drain', settle);
                this.response.off('close', settle);
                resolve();
            };
            this.response.once('drain', settle);
            this.response.once('close', settle);
        });
    }

    public end(): void {
        if (this.open) {
            this.response.end();
        }
    }
}
