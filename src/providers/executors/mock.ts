/**
 * Mock Executor - offline advisory responses
 *
 * Enabled with MOCK_LLM=1. Returns MOCK_LLM_OUTPUT verbatim when set,
 * otherwise a conservative canned answer shaped for the prompt it was given.
 */

import { PromptExecutor, PromptOptions, PromptResult } from '../executor.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

export function isMockLlmEnabled(env: Record<string, string | undefined> = process.env): boolean {
  const flag = env.MOCK_LLM;
  return flag !== undefined && TRUE_VALUES.has(flag.trim().toLowerCase());
}

export class MockExecutor implements PromptExecutor {
  name = 'mock';
  readonly prompts: string[] = [];

  constructor(private readonly response: string | undefined = process.env.MOCK_LLM_OUTPUT) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    this.prompts.push(prompt);
    if (this.response !== undefined) {
      return { output: this.response, finishReason: 'mock' };
    }
    return { output: cannedResponse(prompt, options.systemContext ?? ''), finishReason: 'mock' };
  }
}

function cannedResponse(prompt: string, system: string): string {
  if (system.includes('"score"')) {
    return JSON.stringify({
      score: 0.5,
      confidence: 0.1,
      explanation: 'mock advisory score',
      severity: 'info',
      is_likely_fp: false,
    });
  }
  if (system.includes('"decision"')) {
    return JSON.stringify({
      decision: 'Unknown',
      confidence: 0,
      reasons: ['mock advisory cannot decide'],
    });
  }
  // Report polishing and free-form asks echo the input back
  return prompt;
}
