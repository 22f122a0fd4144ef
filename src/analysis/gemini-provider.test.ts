/**
 * Tests for the Gemini provider
 *
 * The SDK is replaced with an in-process mock; nothing leaves the process.
 *
 * @module analysis/gemini-provider.test
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { ProviderError, ProviderTimeoutError } from '../errors/index.js';
import { GeminiProvider, classifyGeminiError } from './gemini-provider.js';

interface MockResponse {
  response: {
    text: () => string;
    usageMetadata?: {
      promptTokenCount: number;
      candidatesTokenCount: number;
      totalTokenCount: number;
      cachedContentTokenCount?: number;
    };
  };
}

const mockGenerateContent = jest.fn<(request: unknown) => Promise<MockResponse>>();
const mockGetGenerativeModel = jest.fn((params: unknown) => {
  void params;
  return { generateContent: mockGenerateContent };
});

jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel(params: unknown) {
      return mockGetGenerativeModel(params);
    }
  },
}));

function reply(text: string, cached = 0): MockResponse {
  return {
    response: {
      text: () => text,
      usageMetadata: {
        promptTokenCount: 1200,
        candidatesTokenCount: 300,
        totalTokenCount: 1500,
        cachedContentTokenCount: cached,
      },
    },
  };
}

function createProvider(contextCaching = true, timeoutMs = 1000) {
  return new GeminiProvider({
    apiKey: 'test-key',
    model: { modelId: 'gemini-test', temperature: 0.4, maxOutputTokens: 512 },
    timeoutMs,
    contextCaching,
  });
}

describe('GeminiProvider', () => {
  beforeEach(() => {
    mockGenerateContent.mockReset();
    mockGetGenerativeModel.mockClear();
  });

  it('should return text, model and token usage', async () => {
    mockGenerateContent.mockResolvedValue(reply('{"ok":true}', 1000));

    const result = await createProvider().generate({ prompt: 'hello', jsonMode: true });

    expect(result).toEqual({
      text: '{"ok":true}',
      modelId: 'gemini-test',
      usage: { inputTokens: 1200, outputTokens: 300, cachedInputTokens: 1000 },
    });
    expect(mockGenerateContent).toHaveBeenCalledWith({
      contents: [{ role: 'user', parts: [{ text: 'hello' }] }],
      generationConfig: {
        temperature: 0.4,
        maxOutputTokens: 512,
        responseMimeType: 'application/json',
      },
    });
  });

  it('should send the system instruction separately when context caching is on', async () => {
    mockGenerateContent.mockResolvedValue(reply('text'));

    await createProvider(true).generate({ prompt: 'data', systemInstruction: 'be factual' });

    expect(mockGetGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      systemInstruction: 'be factual',
    });
  });

  it('should inline the system instruction when context caching is off', async () => {
    mockGenerateContent.mockResolvedValue(reply('text'));

    await createProvider(false).generate({ prompt: 'data', systemInstruction: 'be factual' });

    expect(mockGetGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-test' });
    expect(mockGenerateContent).toHaveBeenCalledWith({
      contents: [{ role: 'user', parts: [{ text: 'be factual\n\ndata' }] }],
      generationConfig: { temperature: 0.4, maxOutputTokens: 512 },
    });
  });

  it('should fail with ProviderTimeoutError when the call is too slow', async () => {
    mockGenerateContent.mockImplementation(
      () => new Promise((resolve) => setTimeout(() => resolve(reply('late')), 200))
    );

    await expect(createProvider(true, 10).generate({ prompt: 'p' })).rejects.toBeInstanceOf(
      ProviderTimeoutError
    );
  });

  it('should classify SDK failures', async () => {
    mockGenerateContent.mockRejectedValue(
      Object.assign(new Error('Resource exhausted'), { status: 429 })
    );

    const error = await createProvider().generate({ prompt: 'p' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.statusCode).toBe(429);
      expect(error.isRetryable).toBe(true);
    }
  });

  it('should reject a blocked candidate as non-retryable', async () => {
    mockGenerateContent.mockResolvedValue({
      response: {
        text: () => {
          throw new Error('Candidate was blocked due to SAFETY');
        },
      },
    });

    const error = await createProvider().generate({ prompt: 'p' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.isRetryable).toBe(false);
      expect(error.message).toBe(
        'Gemini returned no usable candidate: Candidate was blocked due to SAFETY'
      );
    }
  });
});

describe('classifyGeminiError', () => {
  it('should treat 5xx as retryable and 4xx as permanent', () => {
    const server = classifyGeminiError(Object.assign(new Error('overloaded'), { status: 503 }));
    const client = classifyGeminiError(Object.assign(new Error('bad'), { status: 400 }));

    expect(server.message).toBe('Gemini API error (503): overloaded');
    expect(server.isRetryable).toBe(true);
    expect(client.isRetryable).toBe(false);
  });

  it('should treat failures without a status as retryable network errors', () => {
    const error = classifyGeminiError(new Error('fetch failed'));

    expect(error.statusCode).toBe(0);
    expect(error.isRetryable).toBe(true);
    expect(error.message).toBe('Gemini request failed: fetch failed');
  });

  it('should pass ProviderErrors through unchanged', () => {
    const original = new ProviderTimeoutError('gemini', 5);
    expect(classifyGeminiError(original)).toBe(original);
  });
});
