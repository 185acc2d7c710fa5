import { describe, it, expect, vi } from 'vitest';
import { GoogleGenerativeAIFetchError, GoogleGenerativeAIResponseError } from '@google/generative-ai';
import { TEST_KEY } from '../test-support/fixtures';
import { ContentModel, GeminiService, classifyGeminiError } from './gemini.service';

const config = { geminiApiKey: TEST_KEY, geminiModel: 'gemini-test', aiTimeoutMs: 1000 };

const answering = (text: string): ContentModel => ({
  generateContent: vi.fn().mockResolvedValue({ response: { text: () => text } })
});

const reasonOf = (error: unknown) => {
  const result = classifyGeminiError(error);
  return result.ok ? null : result.failure.reason;
};

describe('classifyGeminiError', () => {
  it('maps HTTP statuses from the API', () => {
    expect(reasonOf(new GoogleGenerativeAIFetchError('Too many requests', 429))).toBe('quota_exceeded');
    expect(reasonOf(new GoogleGenerativeAIFetchError('Permission denied', 403))).toBe('authentication');
    expect(reasonOf(new GoogleGenerativeAIFetchError('API key not valid. Please pass a valid API key.', 400))).toBe(
      'authentication'
    );
    expect(reasonOf(new GoogleGenerativeAIFetchError('Internal error', 500))).toBe('upstream_error');
  });

  it('separates timeouts from other transport errors', () => {
    expect(reasonOf(new GoogleGenerativeAIFetchError('Request aborted when fetching'))).toBe('timeout');
    expect(reasonOf(new GoogleGenerativeAIFetchError('fetch failed'))).toBe('network');
    expect(reasonOf(new Error('The operation was aborted'))).toBe('timeout');
  });

  it('treats blocked or unreadable answers as malformed', () => {
    expect(reasonOf(new GoogleGenerativeAIResponseError('Candidate was blocked due to SAFETY'))).toBe(
      'malformed_response'
    );
  });
});

describe('GeminiService', () => {
  it('returns the model text', async () => {
    const model = answering('{"days":[]}');
    const service = new GeminiService(config, model);

    const result = await service.generate('Plan a trip');

    expect(result).toEqual({ ok: true, data: '{"days":[]}' });
    expect(model.generateContent).toHaveBeenCalledWith('Plan a trip');
  });

  it('fails on an empty answer', async () => {
    const service = new GeminiService(config, answering('   '));

    const result = await service.generate('Plan a trip');

    expect(result).toEqual({
      ok: false,
      failure: { service: 'gemini', reason: 'malformed_response', message: 'Gemini returned an empty response' }
    });
  });

  it('turns SDK errors into failures', async () => {
    const model: ContentModel = {
      generateContent: vi.fn().mockRejectedValue(new GoogleGenerativeAIFetchError('Too many requests', 429))
    };
    const service = new GeminiService(config, model);

    const result = await service.generate('Plan a trip');

    expect(result.ok ? null : result.failure.reason).toBe('quota_exceeded');
  });

  it('is not configured without an API key', async () => {
    const service = new GeminiService({ ...config, geminiApiKey: undefined });

    expect(service.isConfigured).toBe(false);
    expect(await service.generate('Plan a trip')).toEqual({
      ok: false,
      failure: { service: 'gemini', reason: 'not_configured', message: 'GEMINI_API_KEY is not set' }
    });
  });
});
