import { type GatewayEvent, type Logger, type TelemetrySinkPort } from '@glimpse/core';

/** Writes every gateway event as one structured log line. */
export class LoggerTelemetrySink implements TelemetrySinkPort {
    public constructor(private readonly logger: Logger) { }

    public emit(event: GatewayEvent): void {
        const { type, timestamp, ...fields } = event;
        this.logger.info({ event: type, ...fields, timestamp: timestamp.toISOString() }, type);
    }
}
