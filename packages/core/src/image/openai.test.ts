import { afterEach, describe, expect, it, vi } from 'vitest';
import { extractErrorMessage, OPENAI_IMAGES_URL, OpenAIImageBackend } from './openai.js';

const options = { apiKey: 'test-key', model: 'gpt-image-1', size: '1024x1024', quality: 'auto', timeoutMs: 5000 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIImageBackend', () => {
  it('posts the prompt and decodes b64 image data', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ data: [{ b64_json: Buffer.from('png-bytes').toString('base64') }] }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await new OpenAIImageBackend(options).generate('draw a cat\u200B', '\u200B');

    expect(result).toEqual({
      success: true,
      imageBuffer: Buffer.from('png-bytes'),
      mimeType: 'image/png',
      provider: 'openai',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(OPENAI_IMAGES_URL);
    expect(init.headers).toEqual({ Authorization: 'Bearer test-key', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'gpt-image-1',
      prompt: 'draw a cat\u200B',
      size: '1024x1024',
      quality: 'auto',
      n: 1,
    });
  });

  it('downloads the image when only a URL comes back', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ data: [{ url: 'https://images.example.test/1.png' }] }))
      .mockResolvedValueOnce(new Response(Buffer.from('remote-bytes')));
    vi.stubGlobal('fetch', fetchMock);

    const result = await new OpenAIImageBackend(options).generate('draw a cat', '');

    expect(result.success && result.imageBuffer.toString()).toBe('remote-bytes');
    expect(fetchMock.mock.calls[1][0]).toBe('https://images.example.test/1.png');
  });

  it('reports API errors with their status and message', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({ error: { message: 'Your request was rejected as a result of our safety system.' } }, 400),
      ),
    );

    const result = await new OpenAIImageBackend(options).generate('draw a cat', '');

    expect(result).toEqual({
      success: false,
      error: 'OpenAI Images API error: 400 Your request was rejected as a result of our safety system.',
      status: 400,
      provider: 'openai',
    });
  });

  it('reports a network failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));

    const result = await new OpenAIImageBackend(options).generate('draw a cat', '');

    expect(result).toEqual({ success: false, error: 'OpenAI error: fetch failed', provider: 'openai' });
  });

  it('reports an empty response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ data: [] })));

    const result = await new OpenAIImageBackend(options).generate('draw a cat', '');

    expect(result).toEqual({
      success: false,
      error: 'OpenAI did not return URL or b64 image data.',
      provider: 'openai',
    });
  });
});

describe('extractErrorMessage', () => {
  it('falls back to the raw body', () => {
    expect(extractErrorMessage('  upstream exploded \n')).toBe('upstream exploded');
    expect(extractErrorMessage('{"error":"flat"}')).toBe('{"error":"flat"}');
  });
});
