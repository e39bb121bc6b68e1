import Groq from 'groq-sdk';
import OpenAI from 'openai';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { GeneratorFault, isAbortError } from './errors';
import { logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for the generation collaborator.
 * The pipeline depends on this interface only; tests substitute a stub.
 *
 * Every implementation:
 * - is bounded by a timeout
 * - never retries
 * - throws GeneratorFault on network, timeout, non-2xx, malformed or empty output
 */

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LLMClient {
  readonly model: string;
  generate(prompt: string, options?: LLMOptions): Promise<string>;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function requireText(content: string | null | undefined): string {
  const text = content?.trim() ?? '';
  if (text === '') {
    throw new GeneratorFault('Generation service returned an empty response');
  }
  return text;
}

const OllamaResponseSchema = z.object({
  response: z.string(),
});

export interface OllamaClientOptions {
  url: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * OllamaClient Implementation
 *
 * Wire contract: POST { model, prompt, stream: false } -> { response }.
 */
export class OllamaClient implements LLMClient {
  readonly model: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaClientOptions) {
    this.url = options.url;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    const body: Record<string, unknown> = { model: this.model, prompt, stream: false };
    if (options.temperature !== undefined || options.maxTokens !== undefined) {
      body.options = {
        ...(options.temperature !== undefined && { temperature: options.temperature }),
        ...(options.maxTokens !== undefined && { num_predict: options.maxTokens }),
      };
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new GeneratorFault(`Generation timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new GeneratorFault('Generation service unreachable', { cause: error });
    }

    if (!response.ok) {
      throw new GeneratorFault(`Generation service returned ${response.status}`, {
        status: response.status,
      });
    }

    const payload: unknown = await response.json().catch(() => null);
    const parsed = OllamaResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GeneratorFault('Generation service returned a malformed body');
    }

    const text = requireText(parsed.data.response);
    logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');
    return text;
  }
}

/**
 * GroqClient Implementation
 *
 * Uses the Groq inference API as a hosted alternative to a local model.
 */
export class GroqClient implements LLMClient {
  readonly model: string;
  private client: Groq;

  constructor(options: { apiKey: string | undefined; model: string; timeoutMs: number }) {
    const apiKey = options.apiKey;

    if (!apiKey || apiKey.trim() === '') {
      throw new Error(
        'GROQ_API_KEY is not configured. ' +
        'Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new Groq({ apiKey, timeout: options.timeoutMs, maxRetries: 0 });
    this.model = options.model;

    logger.info({ model: this.model }, 'GroqClient initialized');
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature ?? 0,
        max_tokens: options.maxTokens ?? 500,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      logger.error({ error }, 'LLM generation failed');
      throw new GeneratorFault('Groq generation failed', { cause: error, status: statusOf(error) });
    }

    const text = requireText(content);
    logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');
    return text;
  }
}

/**
 * OpenAIClient Implementation
 */
export class OpenAIClient implements LLMClient {
  readonly model: string;
  private client: OpenAI;

  constructor(options: { apiKey: string | undefined; model: string; timeoutMs: number }) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is not configured.');
    }

    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
    this.model = options.model;

    logger.info({ model: this.model }, 'OpenAIClient initialized');
  }

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature ?? 0.1,
        max_tokens: options.maxTokens ?? 500,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      logger.error({ error }, 'LLM generation failed');
      throw new GeneratorFault('OpenAI generation failed', { cause: error, status: statusOf(error) });
    }

    const text = requireText(content);
    logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');
    return text;
  }
}

export function createLLMClient(generation: AppConfig['generation']): LLMClient {
  switch (generation.provider) {
    case 'groq':
      return new GroqClient({
        apiKey: generation.groqApiKey,
        model: generation.model,
        timeoutMs: generation.timeoutMs,
      });
    case 'openai':
      return new OpenAIClient({
        apiKey: generation.openaiApiKey,
        model: generation.model,
        timeoutMs: generation.timeoutMs,
      });
    case 'ollama':
      return new OllamaClient({
        url: generation.url,
        model: generation.model,
        timeoutMs: generation.timeoutMs,
      });
  }
}
