import { type LlmConfig } from './config.js';
import { createLogger } from './logger.js';

const logger = createLogger('llmClient');

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Anything that can answer a prompt with a JSON value. Agents depend on this, not on HTTP. */
export interface JsonCompleter {
  completeJson(system: string, messages: ChatMessage[]): Promise<unknown>;
}

export function extractJson(raw: string): unknown {
  // Strip <think>...</think> blocks from reasoning models
  const cleaned = raw.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();

  if (cleaned.startsWith('{') && cleaned.endsWith('}')) return JSON.parse(cleaned);

  const fenced = cleaned.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenced?.[1]) return JSON.parse(fenced[1].trim());

  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    return JSON.parse(cleaned.slice(firstBrace, lastBrace + 1));
  }

  throw new Error(`Not valid JSON: ${raw.slice(0, 300)}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readContent(payload: unknown): string | undefined {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return undefined;
  const first: unknown = payload.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  return typeof first.message.content === 'string' ? first.message.content : undefined;
}

// OpenAI-compatible chat completions endpoint.
export class LlmClient implements JsonCompleter {
  constructor(
    private readonly config: LlmConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  get model(): string {
    return this.config.model;
  }

  async completeJson(system: string, messages: ChatMessage[]): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`;

    const url = `${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`;
    logger.info('LLM request', { model: this.config.model });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.config.model,
          temperature: 0.7,
          response_format: { type: 'json_object' },
          messages: [{ role: 'system', content: system }, ...messages],
        }),
      });
    } catch (err) {
      const cause = err instanceof Error ? err.cause ?? err.message : err;
      throw new Error(`Fetch to ${url} failed: ${JSON.stringify(cause)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`LLM request failed (${response.status}): ${body.slice(0, 300)}`);
    }

    const content = readContent(await response.json());
    if (!content) throw new Error('LLM response missing content');
    return extractJson(content);
  }
}
