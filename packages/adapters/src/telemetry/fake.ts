import { type GatewayEvent, type GatewayEventType, type TelemetrySinkPort } from '@glimpse/core';

export class FakeTelemetrySink implements TelemetrySinkPort {
    public readonly events: GatewayEvent[] = [];

    public emit(event: GatewayEvent): void {
        this.events.push(event);
    }

    public ofType<T extends GatewayEventType>(type: T): Array<Extract<GatewayEvent, { type: T }>> {
        return this.events.filter((event): event is Extract<GatewayEvent, { type: T }> => event.type === type);
    }

    public types(): GatewayEventType[] {
        return this.events.map((event) => event.type);
    }
}
