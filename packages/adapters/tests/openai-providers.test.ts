import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { type ProviderRequest } from '@glimpse/core';

import { OpenAISpeechProvider, OpenAIVisionProvider } from '../src/index';

const IMAGE = { data: 'aGVsbG8=', mimeType: 'image/png' as const };

function visionRequest(overrides: Partial<ProviderRequest> = {}): ProviderRequest {
  return {
    image: IMAGE,
    systemInstructions: 'You are a museum guide.',
    history: [
      { role: 'user', content: 'Image uploaded', occurredAt: new Date(0) },
      { role: 'assistant', content: 'A bronze statue.', occurredAt: new Date(0) }
    ],
    wantStream: false,
    ...overrides
  };
}

async function collect(fragments: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const fragment of fragments) {
    out.push(fragment);
  }
  return out;
}

describe('openai vision provider', () => {
  it('sends system prompt, history and the image turn in order', async () => {
    const create = vi.fn(async (_input: unknown, _options?: unknown) => ({
      choices: [{ message: { content: 'A red apple on a table.' } }]
    }));
    const provider = new OpenAIVisionProvider({
      id: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
      client: { chat: { completions: { create } } } as unknown as OpenAI
    });

    const result = await provider.processImage(visionRequest());

    expect(result).toEqual({ kind: 'complete', text: 'A red apple on a table.' });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toEqual({
      model: 'gpt-4o',
      max_tokens: 1000,
      messages: [
        { role: 'system', content: 'You are a museum guide.' },
        { role: 'user', content: 'Image uploaded' },
        { role: 'assistant', content: 'A bronze statue.' },
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: 'data:image/png;base64,aGVsbG8=' } },
            { type: 'text', text: 'Describe what you see in this image.' }
          ]
        }
      ]
    });
  });

  it('streams delta content as fragments and skips empty deltas', async () => {
    async function* chunks() {
      yield { choices: [{ delta: { role: 'assistant' } }] };
      yield { choices: [{ delta: { content: 'A red ' } }] };
      yield { choices: [{ delta: { content: 'apple.' } }] };
      yield { choices: [] };
    }
    const create = vi.fn().mockReturnValue(chunks());
    const provider = new OpenAIVisionProvider({
      id: 'qwen',
      apiKey: 'test-secret',
      model: 'qwen-vl-max',
      client: { chat: { completions: { create } } } as unknown as OpenAI
    });

    const result = await provider.processImage(visionRequest({ wantStream: true }));
    if (result.kind !== 'stream') {
      throw new Error('expected a stream');
    }

    expect(await collect(result.fragments)).toEqual(['A red ', 'apple.']);
    expect(create.mock.calls[0]?.[0]).toMatchObject({ stream: true, model: 'qwen-vl-max' });
  });

  it('maps vendor API errors to UpstreamRejected with the status hint', async () => {
    const create = vi.fn().mockRejectedValue(new OpenAI.APIError(401, { message: 'bad key' }, 'bad key', undefined));
    const provider = new OpenAIVisionProvider({
      id: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
      client: { chat: { completions: { create } } } as unknown as OpenAI
    });

    await expect(provider.processImage(visionRequest())).rejects.toMatchObject({
      kind: 'UpstreamRejected',
      details: { provider: 'openai', status: 401 }
    });
  });

  it('times out a call that never answers', async () => {
    const create = vi.fn(() => new Promise<never>(() => undefined));
    const provider = new OpenAIVisionProvider({
      id: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
      timeoutMs: 20,
      client: { chat: { completions: { create } } } as unknown as OpenAI
    });

    await expect(provider.processImage(visionRequest())).rejects.toMatchObject({
      kind: 'UpstreamTimeout',
      message: 'openai did not respond within 20ms'
    });
  });

  it('stops pulling fragments once the caller aborts', async () => {
    let pulled = 0;
    async function* chunks() {
      pulled += 1;
      yield { choices: [{ delta: { content: 'first' } }] };
      pulled += 1;
      yield { choices: [{ delta: { content: 'second' } }] };
    }
    const controller = new AbortController();
    const provider = new OpenAIVisionProvider({
      id: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
      client: { chat: { completions: { create: vi.fn().mockReturnValue(chunks()) } } } as unknown as OpenAI
    });

    const result = await provider.processImage(visionRequest({ wantStream: true, signal: controller.signal }));
    if (result.kind !== 'stream') {
      throw new Error('expected a stream');
    }

    const seen: string[] = [];
    await expect((async () => {
      for await (const fragment of result.fragments) {
        seen.push(fragment);
        controller.abort();
      }
    })()).rejects.toMatchObject({ kind: 'RequestCancelled' });

    expect(seen).toEqual(['first']);
    expect(pulled).toBe(1);
  });

  it('probes with a model listing when configured to', async () => {
    const list = vi.fn(async () => ({ data: [] }));
    const provider = new OpenAIVisionProvider({
      id: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
      probe: 'models',
      client: { models: { list } } as unknown as OpenAI
    });

    const probe = await provider.testConnection();

    expect(probe.ok).toBe(true);
    expect(probe.detail).toBe('openai is reachable');
    expect(list).toHaveBeenCalledTimes(1);
  });

  it('reports a failed probe without throwing', async () => {
    const create = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const provider = new OpenAIVisionProvider({
      id: 'custom',
      apiKey: 'test-secret',
      model: 'my-model',
      client: { chat: { completions: { create } } } as unknown as OpenAI
    });

    const probe = await provider.testConnection();

    expect(probe.ok).toBe(false);
    expect(probe.detail).toBe('Could not reach custom (fetch failed)');
  });
});

describe('openai speech provider', () => {
  it('synthesizes mp3 audio with the requested voice', async () => {
    const create = vi.fn(async (_input: unknown, _options?: unknown) => new Response(Buffer.from('mp3-bytes')));
    const provider = new OpenAISpeechProvider({
      apiKey: 'test-secret',
      client: { audio: { speech: { create } } } as unknown as OpenAI
    });

    const result = await provider.synthesize({ text: 'Hello world', voice: 'nova', speed: 1 });

    expect(result.audio.toString()).toBe('mp3-bytes');
    expect(result.format).toBe('mp3');
    expect(result.voice).toBe('nova');
    expect(result.durationSeconds).toBe(0.7);
    expect(create.mock.calls[0]?.[0]).toEqual({
      model: 'tts-1',
      voice: 'nova',
      input: 'Hello world',
      speed: 1,
      response_format: 'mp3'
    });
  });

  it('falls back to the default voice for unknown names', async () => {
    const create = vi.fn(async () => new Response(Buffer.from('mp3-bytes')));
    const provider = new OpenAISpeechProvider({
      apiKey: 'test-secret',
      client: { audio: { speech: { create } } } as unknown as OpenAI
    });

    const unknown = await provider.synthesize({ text: 'Hi', voice: 'robot', speed: 1 });
    const fallback = await provider.synthesize({ text: 'Hi', voice: 'default', speed: 1 });

    expect(unknown.voice).toBe('alloy');
    expect(fallback.voice).toBe('alloy');
  });
});
