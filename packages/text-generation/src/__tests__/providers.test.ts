import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockGenerateText } = vi.hoisted(() => ({
  mockGenerateText: vi.fn(),
}));

vi.mock('ai', () => ({
  generateText: mockGenerateText,
}));

vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => (modelId: string) => ({ provider: 'google', modelId })),
}));

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(() => (modelId: string) => ({ provider: 'openai', modelId })),
}));

vi.mock('@ai-sdk/anthropic', () => ({
  createAnthropic: vi.fn(() => (modelId: string) => ({ provider: 'anthropic', modelId })),
}));

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';

import {
  createAnthropicGenerator,
  createGeminiGenerator,
  createOpenAIGenerator,
} from '../providers/index.js';

beforeEach(() => {
  mockGenerateText.mockReset();
});

describe('createGeminiGenerator', () => {
  it('sends the prompt to the default model with the API key', async () => {
    mockGenerateText.mockResolvedValueOnce({ text: 'Causa raiz: GC.' });

    const generator = createGeminiGenerator({ apiKey: 'test-key' });
    const text = await generator.generate('prompt');

    expect(text).toBe('Causa raiz: GC.');
    expect(createGoogleGenerativeAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(mockGenerateText).toHaveBeenCalledWith({
      model: { provider: 'google', modelId: 'gemini-1.5-flash' },
      prompt: 'prompt',
      maxOutputTokens: 2048,
      abortSignal: expect.any(AbortSignal),
    });
  });

  it('throws when no text comes back', async () => {
    mockGenerateText.mockResolvedValueOnce({ text: '  ' });

    const generator = createGeminiGenerator({ apiKey: 'test-key' });

    await expect(generator.generate('prompt')).rejects.toThrow('Gemini returned no text');
  });
});

describe('createOpenAIGenerator', () => {
  it('passes the base URL, model and token limit through', async () => {
    mockGenerateText.mockResolvedValueOnce({ text: 'Reduza o escopo transacional.' });

    const generator = createOpenAIGenerator({
      apiKey: 'test-key',
      model: 'gpt-4o',
      baseUrl: 'http://llm.local/v1',
      maxOutputTokens: 100,
    });
    const text = await generator.generate('prompt');

    expect(text).toBe('Reduza o escopo transacional.');
    expect(createOpenAI).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'http://llm.local/v1',
    });
    expect(mockGenerateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: { provider: 'openai', modelId: 'gpt-4o' },
        maxOutputTokens: 100,
      })
    );
  });

  it('labels provider errors', async () => {
    mockGenerateText.mockRejectedValueOnce(new Error('Incorrect API key provided'));

    const generator = createOpenAIGenerator({ apiKey: 'test-key' });

    await expect(generator.generate('prompt')).rejects.toThrow(
      'OpenAI request failed: Incorrect API key provided'
    );
  });

  it('times out when the provider does not answer', async () => {
    mockGenerateText.mockImplementationOnce(
      ({ abortSignal }: { abortSignal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          abortSignal.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const generator = createOpenAIGenerator({ apiKey: 'test-key', timeout: 10 });

    await expect(generator.generate('prompt')).rejects.toThrow(
      'OpenAI request timed out after 10ms'
    );
  });
});

describe('createAnthropicGenerator', () => {
  it('returns the generated text', async () => {
    mockGenerateText.mockResolvedValueOnce({ text: 'Contenção em locks.' });

    const generator = createAnthropicGenerator({ apiKey: 'test-key' });
    const text = await generator.generate('prompt');

    expect(text).toBe('Contenção em locks.');
    expect(createAnthropic).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(mockGenerateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: { provider: 'anthropic', modelId: 'claude-3-5-haiku-latest' },
      })
    );
  });
});
