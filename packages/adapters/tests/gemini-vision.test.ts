import { describe, expect, it, vi } from 'vitest';
import { type GoogleGenAI } from '@google/genai';
import { type ProviderRequest } from '@glimpse/core';

import { GeminiVisionProvider } from '../src/index';

const REQUEST: ProviderRequest = {
  image: { data: 'aGVsbG8=', mimeType: 'image/webp' },
  systemInstructions: 'Describe kindly.',
  history: [
    { role: 'user', content: 'Image uploaded', occurredAt: new Date(0) },
    { role: 'assistant', content: 'A tree.', occurredAt: new Date(0) }
  ],
  wantStream: false
};

describe('gemini vision provider', () => {
  it('maps the assistant role to model and sends the image inline', async () => {
    const generateContent = vi.fn(async (_params: unknown) => ({ text: 'A dog in the park.' }));
    const provider = new GeminiVisionProvider({
      apiKey: 'test-secret',
      model: 'gemini-2.0-flash',
      client: { models: { generateContent } } as unknown as GoogleGenAI
    });

    const result = await provider.processImage(REQUEST);

    expect(result).toEqual({ kind: 'complete', text: 'A dog in the park.' });
    expect(generateContent.mock.calls[0]?.[0]).toMatchObject({
      model: 'gemini-2.0-flash',
      contents: [
        { role: 'user', parts: [{ text: 'Image uploaded' }] },
        { role: 'model', parts: [{ text: 'A tree.' }] },
        {
          role: 'user',
          parts: [
            { inlineData: { mimeType: 'image/webp', data: 'aGVsbG8=' } },
            { text: 'Describe what you see in this image.' }
          ]
        }
      ],
      config: { systemInstruction: 'Describe kindly.', maxOutputTokens: 1000 }
    });
  });

  it('streams chunk text', async () => {
    async function* chunks() {
      yield { text: 'A dog ' };
      yield { text: '' };
      yield { text: 'runs.' };
    }
    const generateContentStream = vi.fn(async () => chunks());
    const provider = new GeminiVisionProvider({
      apiKey: 'test-secret',
      model: 'gemini-2.0-flash',
      client: { models: { generateContentStream } } as unknown as GoogleGenAI
    });

    const result = await provider.processImage({ ...REQUEST, wantStream: true });
    if (result.kind !== 'stream') {
      throw new Error('expected a stream');
    }

    const fragments: string[] = [];
    for await (const fragment of result.fragments) {
      fragments.push(fragment);
    }
    expect(fragments).toEqual(['A dog ', 'runs.']);
  });
});
