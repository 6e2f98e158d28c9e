import { type GatewayErrorKind } from '../errors';
import { type RuntimeResource } from '../lifecycle';

export type UpstreamTarget = 'model' | 'speech';

interface GatewayEventBase {
  requestId: string;
  timestamp: Date;
}

export type GatewayEvent =
  | (GatewayEventBase & {
    type: 'request_admitted';
    clientAddress: string;
    provider: string;
    stream: boolean;
  })
  | (GatewayEventBase & {
    type: 'request_rejected';
    errorKind: GatewayErrorKind;
    message: string;
  })
  | (GatewayEventBase & {
    type: 'upstream_call_started';
    target: UpstreamTarget;
    provider: string;
  })
  | (GatewayEventBase & {
    type: 'upstream_call_completed';
    target: UpstreamTarget;
    provider: string;
    durationMs: number;
    outcome: 'ok' | 'error' | 'cancelled';
    errorKind?: GatewayErrorKind | undefined;
  });

export type GatewayEventType = GatewayEvent['type'];

export interface TelemetrySinkPort extends RuntimeResource {
  emit(event: GatewayEvent): void;
}
