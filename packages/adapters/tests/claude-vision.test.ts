import { describe, expect, it, vi } from 'vitest';
import { type ProviderRequest } from '@glimpse/core';

import { ClaudeVisionProvider, type FetchLike } from '../src/index';

const REQUEST: ProviderRequest = {
  image: { data: 'aGVsbG8=', mimeType: 'image/jpeg' },
  systemInstructions: 'Be brief.',
  history: [{ role: 'user', content: 'Image uploaded', occurredAt: new Date(0) }],
  wantStream: false
};

function sse(blocks: Array<[string, unknown]>): string {
  return blocks.map(([event, data]) => `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`).join('');
}

describe('claude vision provider', () => {
  it('posts the messages payload with anthropic headers', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(JSON.stringify({
      content: [{ type: 'text', text: 'A cat ' }, { type: 'text', text: 'on a sofa.' }]
    })));
    const provider = new ClaudeVisionProvider({ apiKey: 'test-secret', model: 'claude-test', fetch });

    const result = await provider.processImage(REQUEST);

    expect(result).toEqual({ kind: 'complete', text: 'A cat on a sofa.' });
    const call = fetch.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('https://api.anthropic.com/v1/messages');
    expect(init?.headers).toEqual({
      'x-api-key': 'test-secret',
      'anthropic-version': '2023-06-01',
      'content-type': 'application/json'
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'claude-test',
      max_tokens: 4096,
      system: 'Be brief.',
      messages: [
        { role: 'user', content: 'Image uploaded' },
        {
          role: 'user',
          content: [
            { type: 'image', source: { type: 'base64', media_type: 'image/jpeg', data: 'aGVsbG8=' } },
            { type: 'text', text: 'Describe what you see in this image.' }
          ]
        }
      ]
    });
  });

  it('yields text deltas until message_stop', async () => {
    const body = sse([
      ['message_start', { type: 'message_start' }],
      ['content_block_delta', { delta: { type: 'text_delta', text: 'A cat' } }],
      ['ping', { type: 'ping' }],
      ['content_block_delta', { delta: { type: 'text_delta', text: ' sleeps.' } }],
      ['message_stop', { type: 'message_stop' }],
      ['content_block_delta', { delta: { type: 'text_delta', text: 'ignored' } }]
    ]);
    const fetch = vi.fn<FetchLike>(async () => new Response(body));
    const provider = new ClaudeVisionProvider({ apiKey: 'test-secret', model: 'claude-test', fetch });

    const result = await provider.processImage({ ...REQUEST, wantStream: true });
    if (result.kind !== 'stream') {
      throw new Error('expected a stream');
    }

    const fragments: string[] = [];
    for await (const fragment of result.fragments) {
      fragments.push(fragment);
    }
    expect(fragments).toEqual(['A cat', ' sleeps.']);
    expect(JSON.parse(String(fetch.mock.calls[0]?.[1].body))).toMatchObject({ stream: true });
  });

  it('surfaces stream error events as UpstreamRejected', async () => {
    const body = sse([
      ['content_block_delta', { delta: { type: 'text_delta', text: 'A' } }],
      ['error', { error: { type: 'overloaded_error', message: 'Overloaded' } }]
    ]);
    const provider = new ClaudeVisionProvider({
      apiKey: 'test-secret',
      model: 'claude-test',
      fetch: async () => new Response(body)
    });

    const result = await provider.processImage({ ...REQUEST, wantStream: true });
    if (result.kind !== 'stream') {
      throw new Error('expected a stream');
    }

    const fragments: string[] = [];
    await expect((async () => {
      for await (const fragment of result.fragments) {
        fragments.push(fragment);
      }
    })()).rejects.toMatchObject({ kind: 'UpstreamRejected', message: 'claude rejected the request: Overloaded' });
    expect(fragments).toEqual(['A']);
  });

  it('normalizes non-2xx answers with the vendor message', async () => {
    const provider = new ClaudeVisionProvider({
      apiKey: 'test-secret',
      model: 'claude-test',
      fetch: async () => new Response(
        JSON.stringify({ error: { type: 'authentication_error', message: 'invalid x-api-key' } }),
        { status: 401 }
      )
    });

    await expect(provider.processImage(REQUEST)).rejects.toMatchObject({
      kind: 'UpstreamRejected',
      message: 'claude responded 401: invalid API key: invalid x-api-key'
    });
  });

  it('treats network failures as UpstreamUnreachable', async () => {
    const provider = new ClaudeVisionProvider({
      apiKey: 'test-secret',
      model: 'claude-test',
      fetch: async () => {
        throw new TypeError('fetch failed');
      }
    });

    await expect(provider.processImage(REQUEST)).rejects.toMatchObject({
      kind: 'UpstreamUnreachable',
      message: 'Could not reach claude (fetch failed)'
    });
  });
});
