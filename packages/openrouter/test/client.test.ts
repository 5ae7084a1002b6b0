import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { buildHeaders, createOpenRouterClient, OPENROUTER_URL, SYSTEM_PROMPT } from '../src/client';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completion(content: string): unknown {
  return { id: 'gen-1', choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

describe('buildHeaders', () => {
  it('adds referrer and title only when set', () => {
    expect(buildHeaders('test-key', {})).toEqual({
      Authorization: 'Bearer test-key',
      'Content-Type': 'application/json',
    });
    expect(buildHeaders('test-key', { referrer: 'https://example.com', title: 'Bot' })).toEqual({
      Authorization: 'Bearer test-key',
      'Content-Type': 'application/json',
      'HTTP-Referer': 'https://example.com',
      'X-Title': 'Bot',
    });
  });
});

describe('createOpenRouterClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it('sends a single-turn chat request and returns the content', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(completion('Hi there!')));
    const client = createOpenRouterClient({ model: 'test/model', title: 'Bot' });

    const reply = await client.chat('test-key', 'hello');

    expect(reply).toBe('Hi there!');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(OPENROUTER_URL);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-key',
      'Content-Type': 'application/json',
      'X-Title': 'Bot',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test/model',
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  it('sends the prompt and image url as content blocks for vision', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(completion('A cat.')));
    const client = createOpenRouterClient({ model: 'test/model', url: 'http://localhost/chat' });

    const reply = await client.vision('test-key', 'What is it?', 'https://files.example/cat.jpg');

    expect(reply).toBe('A cat.');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://localhost/chat');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test/model',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'What is it?' },
            { type: 'image_url', image_url: { url: 'https://files.example/cat.jpg' } },
          ],
        },
      ],
    });
  });

  it('reports a non-success status with its code and body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"invalid key"}', { status: 401 }));
    const client = createOpenRouterClient({ model: 'test/model' });

    await expect(client.chat('bad-key', 'hello')).resolves.toBe(
      '❌ OpenRouter error 401: {"error":"invalid key"}',
    );
  });

  it('reports transport failures for text requests', async () => {
    fetchMock.mockRejectedValueOnce(new Error('The operation was aborted due to timeout'));
    const client = createOpenRouterClient({ model: 'test/model' });

    await expect(client.chat('test-key', 'hello')).resolves.toBe(
      '❌ Error talking to Grok: The operation was aborted due to timeout',
    );
  });

  it('reports transport failures for vision requests', async () => {
    fetchMock.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND'));
    const client = createOpenRouterClient({ model: 'test/model' });

    await expect(client.vision('test-key', 'p', 'https://x/y.jpg')).resolves.toBe(
      '❌ Error while analyzing the image: getaddrinfo ENOTFOUND',
    );
  });

  it('reports a response without content', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    const client = createOpenRouterClient({ model: 'test/model' });

    await expect(client.chat('test-key', 'hello')).resolves.toBe(
      '❌ Error talking to Grok: OpenRouter response has no choices[0].message.content',
    );
  });
});
