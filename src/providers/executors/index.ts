/**
 * Provider Executors - prompt execution implementations
 *
 * All executors implement the PromptExecutor interface.
 * No policy logic here; they only run prompts and return text.
 */

import { BountyGateConfig } from '../../types.js';
import { PromptExecutor } from '../executor.js';
import { MockExecutor } from './mock.js';
import { OpenAiCompatibleExecutor } from './openai-compatible.js';

/**
 * Build the executor selected by config. Returns undefined when advisory is off.
 */
export function getExecutor(advisory: BountyGateConfig['advisory']): PromptExecutor | undefined {
  switch (advisory.provider) {
    case 'none':
      return undefined;
    case 'mock':
      return new MockExecutor();
    case 'gemini':
    case 'openai':
    case 'ollama':
      return new OpenAiCompatibleExecutor({
        preset: advisory.provider,
        model: advisory.model,
        apiKey: advisory.apiKey,
        baseURL: advisory.baseURL,
        timeoutMs: advisory.timeoutMs,
        maxRetries: advisory.maxRetries,
      });
  }
}

export { MockExecutor, isMockLlmEnabled } from './mock.js';
export { OpenAiCompatibleExecutor } from './openai-compatible.js';
export type { OpenAiPreset, ChatTransport, OpenAiExecutorOptions } from './openai-compatible.js';
