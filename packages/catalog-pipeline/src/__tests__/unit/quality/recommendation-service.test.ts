/**
 * Recommendation Service Tests
 *
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaRecommendationService } from '../../../quality/recommendation-service.js';
import { HTTPClient } from '../../../core/http-client.js';
import { jsonResponse } from '../../utils/index.js';

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse(body, status));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('OllamaRecommendationService', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the summary to the chat endpoint and returns the reply', async () => {
    const fetchMock = stubFetch({ message: { role: 'assistant', content: '  1. Fill brands.  ' } });
    const service = new OllamaRecommendationService({ baseUrl: 'http://ollama.test/', model: 'test-model' });

    const reply = await service.generate('Dataset quality analysis:');

    expect(reply).toBe('1. Fill brands.');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test/api/chat');
    expect(init.method).toBe('POST');

    expect(typeof init.body).toBe('string');
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : null;
    expect(body).toMatchObject({
      model: 'test-model',
      stream: false,
      messages: [{ role: 'system' }, { role: 'user', content: 'Dataset quality analysis:\n\nWhat are your priority recommendations?' }],
    });
  });

  it('rejects an unexpected payload', async () => {
    stubFetch({ done: true });
    const service = new OllamaRecommendationService({ client: new HTTPClient({ maxRetries: 0 }) });

    await expect(service.generate('summary')).rejects.toThrow('Unexpected chat response');
  });

  it('rejects an empty reply', async () => {
    stubFetch({ message: { content: '   ' } });

    await expect(new OllamaRecommendationService().generate('summary')).rejects.toThrow('Chat response was empty');
  });

  it('propagates HTTP failures', async () => {
    stubFetch({ error: 'model not found' }, 404);

    await expect(new OllamaRecommendationService().generate('summary')).rejects.toThrow('HTTP 404');
  });
});
