/**
 * OpenAI-compatible Executor - hosted or local chat-completion endpoints
 *
 * One client covers Gemini (through its OpenAI-compatible endpoint), OpenAI
 * and a local Ollama server. Presets only fill in base URL and model.
 */

import OpenAI from 'openai';
import { APIError, OpenAIError } from 'openai/error';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { AdvisoryError, isAbortError } from '../../core/errors.js';
import { sleep } from '../../core/utils.js';
import { PromptExecutor, PromptOptions, PromptResult } from '../executor.js';

export type OpenAiPreset = 'gemini' | 'openai' | 'ollama';

interface PresetDefaults {
  baseURL?: string;
  model: string;
  apiKey?: string;
}

const PRESETS: Record<OpenAiPreset, PresetDefaults> = {
  gemini: {
    baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
    model: 'gemini-1.5-flash',
  },
  openai: {
    model: 'gpt-4o-mini',
  },
  ollama: {
    baseURL: 'http://localhost:11434/v1',
    model: 'llama3.1',
    // Ollama ignores the key but the SDK requires one
    apiKey: 'ollama',
  },
};

export interface ChatTransport {
  create(body: ChatCompletionCreateParamsNonStreaming, options?: OpenAI.RequestOptions): Promise<ChatCompletion>;
}

export interface OpenAiExecutorOptions {
  preset: OpenAiPreset;
  model?: string;
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
  transport?: ChatTransport;
}

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 2;
const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export class OpenAiCompatibleExecutor implements PromptExecutor {
  readonly name: string;
  readonly model: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly transport: ChatTransport;

  constructor(options: OpenAiExecutorOptions) {
    const preset = PRESETS[options.preset];
    this.name = options.preset;
    this.model = options.model ?? preset.model;
    this.apiKey = options.apiKey ?? preset.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.transport =
      options.transport ??
      createTransport({
        apiKey: this.apiKey ?? '',
        baseURL: options.baseURL ?? preset.baseURL,
      });
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.apiKey);
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    const messages: ChatCompletionMessageParam[] = [];
    if (options.systemContext) {
      messages.push({ role: 'system', content: options.systemContext });
    }
    messages.push({ role: 'user', content: prompt });

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages,
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    };
    const requestOptions: OpenAI.RequestOptions = {
      timeout: options.timeout ?? this.timeoutMs,
      signal: options.signal,
    };

    const response = await this.runWithRetries(() => this.transport.create(body, requestOptions), options.signal);
    const choice = response.choices[0];
    const text = extractText(choice?.message);
    if (!text) {
      throw new AdvisoryError(`${this.name} response did not include assistant content`);
    }

    return { output: text, finishReason: choice?.finish_reason ?? null };
  }

  private async runWithRetries<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) {
          throw error;
        }
        if (!isRetryable(error) || attempt >= this.maxRetries) {
          throw this.wrapError(error);
        }
        await sleep(retryDelayMs(attempt + 1), signal);
      }
    }
  }

  private wrapError(error: unknown): AdvisoryError {
    if (error instanceof APIError) {
      const status = error.status ?? 'unknown';
      const hint =
        status === 401 || status === 403
          ? ' Check the advisory API key.'
          : status === 429
            ? ' Rate limited by the advisory service.'
            : '';
      return new AdvisoryError(`${this.name} request failed (status ${status}): ${error.message}${hint}`, error);
    }
    if (error instanceof OpenAIError) {
      return new AdvisoryError(`${this.name} request failed: ${error.message}`, error);
    }
    if (error instanceof AdvisoryError) {
      return error;
    }
    if (error instanceof Error) {
      return new AdvisoryError(error.message, error);
    }
    return new AdvisoryError(`${this.name} request failed: ${String(error)}`, error);
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof APIError) {
    return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
  }
  if (error instanceof Error) {
    return error.message.toLowerCase().includes('timeout') || error.message.includes('ETIMEDOUT');
  }
  return false;
}

function retryDelayMs(attempt: number): number {
  return 250 * 2 ** (Math.min(attempt, 5) - 1);
}

function createTransport(args: { apiKey: string; baseURL?: string }): ChatTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // retries are handled by the executor
  });
  return {
    create: (body, options) => client.chat.completions.create(body, options),
  };
}

function extractText(message?: ChatCompletionMessage): string {
  if (!message) return '';
  return typeof message.content === 'string' ? message.content : '';
}
