import { describe, expect, it } from 'vitest';
import { extractJson, LlmClient } from '../src/llmClient.js';

const CONFIG = { baseUrl: 'http://llm.test/v1/', model: 'test-model', apiKey: 'test-key' };

function fakeFetch(status: number, body: unknown) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status });
  };
  return { calls, fetchImpl };
}

describe('extractJson', () => {
  it('parses a bare object', () => {
    expect(extractJson('{"word": "FRUIT", "number": 2}')).toEqual({ word: 'FRUIT', number: 2 });
  });

  it('drops reasoning blocks', () => {
    expect(extractJson('<think>maybe {"a": 1}</think>\n{"b": 2}')).toEqual({ b: 2 });
  });

  it('reads a fenced block', () => {
    expect(extractJson('Here you go:\n```json\n{"words": ["APPLE"]}\n```')).toEqual({ words: ['APPLE'] });
  });

  it('falls back to the outermost braces', () => {
    expect(extractJson('Answer: {"words": []} hope that helps')).toEqual({ words: [] });
  });

  it('rejects text without an object', () => {
    expect(() => extractJson('no json here')).toThrow('Not valid JSON: no json here');
  });
});

describe('LlmClient', () => {
  it('posts a chat completion and parses the JSON reply', async () => {
    const { calls, fetchImpl } = fakeFetch(200, {
      choices: [{ message: { content: '{"word": "FRUIT", "number": 2}' } }],
    });
    const client = new LlmClient(CONFIG, fetchImpl);

    const result = await client.completeJson('system prompt', [{ role: 'user', content: 'board' }]);

    expect(result).toEqual({ word: 'FRUIT', number: 2 });
    expect(calls[0]?.url).toBe('http://llm.test/v1/chat/completions');
    expect(new Headers(calls[0]?.init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
      model: 'test-model',
      temperature: 0.7,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'system prompt' },
        { role: 'user', content: 'board' },
      ],
    });
  });

  it('omits the authorization header without a key', async () => {
    const { calls, fetchImpl } = fakeFetch(200, { choices: [{ message: { content: '{}' } }] });
    await new LlmClient({ ...CONFIG, apiKey: '' }, fetchImpl).completeJson('s', []);
    expect(new Headers(calls[0]?.init?.headers).has('Authorization')).toBe(false);
  });

  it('reports HTTP failures with the response body', async () => {
    const { fetchImpl } = fakeFetch(500, 'upstream exploded');
    await expect(new LlmClient(CONFIG, fetchImpl).completeJson('s', [])).rejects.toThrow(
      'LLM request failed (500): upstream exploded',
    );
  });

  it('reports a reply without content', async () => {
    const { fetchImpl } = fakeFetch(200, { choices: [] });
    await expect(new LlmClient(CONFIG, fetchImpl).completeJson('s', [])).rejects.toThrow('LLM response missing content');
  });
});
