import { describeError, GatewayError } from '../errors';
import { type FragmentSequence } from '../ports/vision';

export type UpstreamErrorClassifier = (error: unknown, label: string) => GatewayError;

export interface UpstreamCallOptions {
  /** Provider name used in error messages. */
  label: string;
  timeoutMs: number;
  /** Caller cancellation; aborting it aborts the call. */
  signal?: AbortSignal | undefined;
  classify?: UpstreamErrorClassifier | undefined;
}

/** Default mapping for errors raised by `fetch` and friends. */
export function classifyUpstreamError(error: unknown, label: string): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  if (error instanceof TypeError) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return new GatewayError('UpstreamUnreachable', `Could not reach ${label} (${error.message}${cause})`, {
      cause: error,
      details: { provider: label }
    });
  }
  return new GatewayError('UpstreamRejected', `${label} call failed: ${describeError(error)}`, {
    cause: error,
    details: { provider: label }
  });
}

/**
 * One network call to a provider. It owns the AbortController that the
 * vendor SDK or fetch receives. Every awaited step races a timer, and when
 * the timer fires the controller is aborted and the step rejects with
 * `UpstreamTimeout`.
 */
export class UpstreamCall {
  private readonly controller = new AbortController();
  private readonly detachExternal: () => void;
  private timedOut = false;

  public constructor(private readonly options: UpstreamCallOptions) {
    const external = options.signal;
    if (!external) {
      this.detachExternal = () => undefined;
      return;
    }

    const onAbort = () => this.controller.abort();
    if (external.aborted) {
      onAbort();
    } else {
      external.addEventListener('abort', onAbort, { once: true });
    }
    this.detachExternal = () => external.removeEventListener('abort', onAbort);
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get cancelled(): boolean {
    return this.controller.signal.aborted && !this.timedOut;
  }

  /** Runs one step of the call under the timeout. */
  public async run<T>(step: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.controller.signal.aborted) {
      throw this.normalize(new Error('aborted before start'));
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      timer = setTimeout(() => {
        this.timedOut = true;
        this.controller.abort();
      }, this.options.timeoutMs);
      return await this.raceAbort(step(this.controller.signal));
    } catch (error) {
      throw this.normalize(error);
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  }

  /** Runs a whole request/response exchange and releases the call. */
  public async complete<T>(step: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await this.run(step);
    } finally {
      this.finish();
    }
  }

  /** Opens a streaming exchange; the call stays live for the fragment sequence unless opening fails. */
  public async open<T>(step: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await this.run(step);
    } catch (error) {
      this.finish();
      throw error;
    }
  }

  /** Wraps the open response body as a fragment sequence bound to this call. */
  public stream(source: AsyncIterable<string>): FragmentSequence {
    return new FragmentStream(source, this);
  }

  public cancel(): void {
    this.controller.abort();
  }

  /** Releases the link to the caller's signal. */
  public finish(): void {
    this.detachExternal();
  }

  private async raceAbort<T>(pending: Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(new Error('aborted'));
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      return await Promise.race([pending, aborted]);
    } finally {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  private normalize(error: unknown): GatewayError {
    const { label, timeoutMs } = this.options;
    if (this.timedOut) {
      return new GatewayError('UpstreamTimeout', `${label} did not respond within ${timeoutMs}ms`, {
        details: { provider: label, timeout_ms: timeoutMs }
      });
    }
    if (this.controller.signal.aborted) {
      return new GatewayError('RequestCancelled', `${label} call was cancelled`, {
        details: { provider: label }
      });
    }
    return (this.options.classify ?? classifyUpstreamError)(error, label);
  }
}

/**
 * Pull-based: a fragment is only requested from the vendor stream when the
 * consumer asks for the next one, so nothing is buffered ahead of it.
 */
class FragmentStream implements FragmentSequence {
  private started = false;

  public constructor(
    private readonly source: AsyncIterable<string>,
    private readonly call: UpstreamCall
  ) { }

  public cancel(): void {
    this.call.cancel();
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.started) {
      throw new Error('Fragment stream can only be consumed once');
    }
    this.started = true;

    const iterator = this.source[Symbol.asyncIterator]();
    let exhausted = false;
    let failed = false;

    try {
      while (true) {
        let next: IteratorResult<string>;
        try {
          next = await this.call.run(() => iterator.next());
        } catch (error) {
          failed = true;
          throw error;
        }

        if (next.done) {
          exhausted = true;
          return;
        }
        if (next.value.length > 0) {
          yield next.value;
        }
      }
    } finally {
      if (!exhausted) {
        this.call.cancel();
        // After a failed pull the vendor iterator may still be mid-read; the abort tears it down.
        if (!failed) {
          await iterator.return?.();
        }
      }
      this.call.finish();
    }
  }
}
