import {
  describeError,
  type BlobStoragePort,
  type CredentialValidatorPort,
  type GatewayConfig,
  type Logger,
  type RuntimeResource,
  type SpeechAdapterFactoryPort,
  type TelemetrySinkPort,
  type VisionAdapterFactoryPort
} from '@glimpse/core';
import { AudioLifecycleManager } from '../audio/manager';
import { ConversationStore } from '../conversation/store';
import { SlidingWindowRateLimiter } from '../ratelimit/slidingWindow';
import { closeResources, collectLifecycleResources, startResources } from '../resources/lifecycle';
import { GatewayOrchestrator } from './orchestrator';

export interface GatewayResources {
  logger: Logger;
  storage: BlobStoragePort;
  visionFactory: VisionAdapterFactoryPort;
  speechFactory: SpeechAdapterFactoryPort;
  credentials: CredentialValidatorPort;
  telemetry: TelemetrySinkPort;
}

export interface GatewayRuntimeInput {
  config: GatewayConfig;
  resources: GatewayResources;
  /** Wall clock shared by the stores; tests pin it. */
  now?: () => Date;
}

export interface SweepReport {
  conversations: number;
  addresses: number;
  credentials: number;
  audio: number;
}

/**
 * Owns the gateway state (conversations, limiters, audio) and its lifecycle:
 * `start` opens resources and the sweep timers, `close` undoes both.
 */
export class GatewayRuntime {
  public readonly conversations: ConversationStore;
  public readonly addressLimiter: SlidingWindowRateLimiter;
  public readonly credentialLimiter: SlidingWindowRateLimiter;
  public readonly audio: AudioLifecycleManager;
  public readonly orchestrator: GatewayOrchestrator;
  public readonly startedAt: Date;

  private readonly config: GatewayConfig;
  private readonly resources: GatewayResources;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private timers: Array<ReturnType<typeof setInterval>> = [];
  private lifecycleResources: RuntimeResource[] = [];

  public constructor(input: GatewayRuntimeInput) {
    const { config, resources } = input;
    this.config = config;
    this.resources = resources;
    this.logger = resources.logger.child({ component: 'runtime' });
    this.now = input.now ?? (() => new Date());
    const clock = () => this.now().getTime();

    this.conversations = new ConversationStore({
      ttlMs: config.conversations.ttlMs,
      maxTurns: config.conversations.maxTurns,
      now: this.now
    });
    this.addressLimiter = new SlidingWindowRateLimiter({
      name: 'address',
      quota: config.limits.perAddressPerMinute,
      windowMs: config.limits.windowMs,
      now: clock
    });
    this.credentialLimiter = new SlidingWindowRateLimiter({
      name: 'credential',
      quota: config.limits.perCredentialPerMinute,
      windowMs: config.limits.windowMs,
      now: clock
    });
    this.audio = new AudioLifecycleManager({
      storage: resources.storage,
      publicBaseUrl: config.server.publicBaseUrl,
      expirationMs: config.audio.expirationMs,
      logger: resources.logger,
      now: this.now
    });
    this.orchestrator = new GatewayOrchestrator({
      conversations: this.conversations,
      addressLimiter: this.addressLimiter,
      credentialLimiter: this.credentialLimiter,
      visionFactory: resources.visionFactory,
      speechFactory: resources.speechFactory,
      audio: this.audio,
      credentials: resources.credentials,
      telemetry: resources.telemetry,
      logger: resources.logger,
      defaultSpeechProvider: config.speech.defaultProvider,
      maxImageBytes: config.limits.maxImageBytes,
      clock
    });
    this.startedAt = this.now();
  }

  public async start(): Promise<void> {
    this.lifecycleResources = collectLifecycleResources([this.resources.storage, this.resources.telemetry]);
    await startResources(this.lifecycleResources);

    this.schedule(this.config.conversations.sweepIntervalMs, async () => {
      const removed = this.conversations.sweepExpired(this.now());
      if (removed > 0) {
        this.logger.debug({ removed }, 'expired conversations removed');
      }
    });
    this.schedule(this.config.limits.sweepIntervalMs, async () => {
      const now = this.now().getTime();
      this.addressLimiter.sweepExpired(now);
      this.credentialLimiter.sweepExpired(now);
    });
    this.schedule(this.config.audio.sweepIntervalMs, async () => {
      await this.audio.sweepExpired(this.now());
    });

    this.logger.info({ speechProvider: this.config.speech.defaultProvider }, 'gateway runtime started');
  }

  public async close(): Promise<void> {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];

    await closeResources(this.lifecycleResources);
    this.lifecycleResources = [];
    this.logger.info('gateway runtime closed');
  }

  /** Runs every sweep once, as the timers would. */
  public async runSweeps(now: Date = this.now()): Promise<SweepReport> {
    return {
      conversations: this.conversations.sweepExpired(now),
      addresses: this.addressLimiter.sweepExpired(now.getTime()),
      credentials: this.credentialLimiter.sweepExpired(now.getTime()),
      audio: await this.audio.sweepExpired(now)
    };
  }

  public uptimeSeconds(): number {
    return Math.floor((this.now().getTime() - this.startedAt.getTime()) / 1000);
  }

  private schedule(intervalMs: number, sweep: () => Promise<void>): void {
    const timer = setInterval(() => {
      sweep().catch((error: unknown) => {
        this.logger.error({ err: describeError(error) }, 'background sweep failed');
      });
    }, intervalMs);
    timer.unref();
    this.timers.push(timer);
  }
}
