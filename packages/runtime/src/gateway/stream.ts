import { type FragmentSequence, type GatewayError } from '@glimpse/core';
import { type GatewayDoneEvent, type GatewayStreamEvent } from './types';

export interface GatewayStreamHooks {
  /** Called once with the full text after the last fragment. */
  complete(text: string): Promise<GatewayDoneEvent>;
  /** Maps a fragment failure to the error the consumer sees. */
  fail(error: unknown): GatewayError;
  /** The consumer stopped before the model finished. */
  abandon(): void;
}

/**
 * Fragments as they arrive, then one `done` event. Single-use; `cancel()`
 * aborts the upstream call.
 */
export class GatewayStream implements AsyncIterable<GatewayStreamEvent> {
  private started = false;
  private settled = false;

  public constructor(
    public readonly conversationId: string,
    public readonly requestId: string,
    private readonly fragments: FragmentSequence,
    private readonly hooks: GatewayStreamHooks
  ) { }

  public cancel(): void {
    this.fragments.cancel();
    if (!this.started && !this.settled) {
      this.settled = true;
      this.hooks.abandon();
    }
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<GatewayStreamEvent, void, undefined> {
    if (this.started || this.settled) {
      throw new Error('Gateway stream can only be consumed once');
    }
    this.started = true;

    let text = '';
    try {
      try {
        for await (const fragment of this.fragments) {
          text += fragment;
          yield { type: 'fragment', text: fragment };
        }
      } catch (error) {
        this.settled = true;
        throw this.hooks.fail(error);
      }
      this.settled = true;
      yield await this.hooks.complete(text);
    } finally {
      if (!this.settled) {
        this.settled = true;
        this.hooks.abandon();
      }
    }
  }
}
