// ─────────────────────────────────────────────────────────────
// Prompt Executor Interface
// ─────────────────────────────────────────────────────────────

export interface PromptOptions {
  systemContext?: string;
  maxTokens: number;
  temperature: number;
  timeout?: number;
  signal?: AbortSignal;
}

export interface PromptResult {
  output: string;
  finishReason?: string | null;
}

/**
 * Runs a single prompt against a model. Implementations throw AdvisoryError on failure.
 */
export interface PromptExecutor {
  name: string;
  isAvailable(): Promise<boolean>;
  runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult>;
}
