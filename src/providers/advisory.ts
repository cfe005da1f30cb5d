/**
 * Advisory Client - external reasoning service for ambiguous policy cases
 *
 * Wraps a PromptExecutor and turns its text into validated values. Every
 * failure (transport, empty text, bad JSON, schema mismatch) comes back as
 * a Result failure; callers decide whether that fails open or closed.
 */

import { z } from 'zod';
import { ActionDescriptor, FindingRecord, FindingSeverity, ScopeDefinition } from '../types.js';
import { formatError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { RunStorage } from '../core/storage.js';
import { Result, extractJsonText, fail, ok, safeParseJson } from '../core/validation.js';
import { PromptExecutor } from './executor.js';
import {
  ACTION_MAX_TOKENS,
  ACTION_SYSTEM_PROMPT,
  FINDING_SCORE_MAX_TOKENS,
  FINDING_SCORE_SYSTEM_PROMPT,
  FINDING_SCORE_TEMPERATURE,
  POLICY_TEMPERATURE,
  REPORT_POLISH_MAX_TOKENS,
  REPORT_POLISH_SYSTEM_PROMPT,
  REPORT_POLISH_TEMPERATURE,
  SCOPE_MAX_TOKENS,
  SCOPE_SYSTEM_PROMPT,
  buildActionValidationPrompt,
  buildFindingScorePrompt,
  buildReportPolishPrompt,
  buildScopeValidationPrompt,
} from './prompts/index.js';

// ─────────────────────────────────────────────────────────────
// Response schemas
// ─────────────────────────────────────────────────────────────

type AdvisoryDecisionValue = 'Allowed' | 'Blocked' | 'Unknown';

const DECISION_BY_LOWERCASE: Record<'allowed' | 'blocked' | 'unknown', AdvisoryDecisionValue> = {
  allowed: 'Allowed',
  blocked: 'Blocked',
  unknown: 'Unknown',
};

// Models often answer in upper case; fold before checking the set
const AdvisoryDecisionKind = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['allowed', 'blocked', 'unknown']))
  .transform((value) => DECISION_BY_LOWERCASE[value]);

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

const AdvisoryDecisionSchema = z.object({
  decision: AdvisoryDecisionKind,
  confidence: z.number().transform(clamp01).default(0),
  reasons: z.array(z.string()).default([]),
  suggested_next_steps: z.array(z.string()).optional(),
  risk_level: z.string().optional(),
});

const FindingScoreSchema = z.object({
  score: z.number().transform(clamp01),
  confidence: z.number().transform(clamp01).default(0.5),
  explanation: z.string().default(''),
  severity: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(FindingSeverity)
    .optional()
    .catch(undefined),
  is_likely_fp: z.boolean().default(false),
});

export interface AdvisoryDecision {
  decision: AdvisoryDecisionValue;
  confidence: number;
  reasons: string[];
  suggestedNextSteps?: string[];
  riskLevel?: string;
}

export interface AdvisoryFindingScore {
  score: number;
  confidence: number;
  explanation: string;
  severity?: FindingSeverity;
  isLikelyFp: boolean;
}

export interface AskOptions {
  systemContext?: string;
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export type ValidationRequest =
  | { kind: 'scope'; target: string; scope: ScopeDefinition }
  | { kind: 'action'; action: ActionDescriptor };

/**
 * What the gate, scorer and reporter need from the advisory service.
 */
export interface AdvisoryService {
  ask(prompt: string, options: AskOptions): Promise<Result<string>>;
  validate(request: ValidationRequest, signal?: AbortSignal): Promise<Result<AdvisoryDecision>>;
  scoreFinding(finding: FindingRecord, signal?: AbortSignal): Promise<Result<AdvisoryFindingScore>>;
  polishReport(report: string, signal?: AbortSignal): Promise<Result<string>>;
}

// ─────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────

export interface AdvisoryClientOptions {
  executor: PromptExecutor;
  logger: Logger;
  storage?: RunStorage;
  storeResponses?: boolean;
  timeoutMs?: number;
}

export class AdvisoryClient implements AdvisoryService {
  private readonly executor: PromptExecutor;
  private readonly logger: Logger;

  constructor(private readonly options: AdvisoryClientOptions) {
    this.executor = options.executor;
    this.logger = options.logger.child({ component: 'advisory', provider: options.executor.name });
  }

  async ask(prompt: string, options: AskOptions, kind = 'ask'): Promise<Result<string>> {
    this.logger.debug('Calling advisory service', {
      kind,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });

    let output: string;
    try {
      const result = await this.executor.runPrompt(prompt, {
        systemContext: options.systemContext,
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        timeout: this.options.timeoutMs,
        signal: options.signal,
      });
      output = result.output;
    } catch (error) {
      const message = formatError(error);
      this.logger.warn('Advisory call failed', { kind, error: message });
      await this.store(kind, prompt, undefined, message);
      return fail(message);
    }

    if (!output.trim()) {
      await this.store(kind, prompt, output, 'empty response');
      return fail('Empty response from advisory service');
    }

    await this.store(kind, prompt, output);
    return ok(output);
  }

  async validate(request: ValidationRequest, signal?: AbortSignal): Promise<Result<AdvisoryDecision>> {
    const response =
      request.kind === 'scope'
        ? await this.ask(
            buildScopeValidationPrompt(request.target, request.scope),
            { systemContext: SCOPE_SYSTEM_PROMPT, maxTokens: SCOPE_MAX_TOKENS, temperature: POLICY_TEMPERATURE, signal },
            'scope_validation'
          )
        : await this.ask(
            buildActionValidationPrompt(request.action),
            { systemContext: ACTION_SYSTEM_PROMPT, maxTokens: ACTION_MAX_TOKENS, temperature: POLICY_TEMPERATURE, signal },
            'action_validation'
          );
    if (!response.success) {
      return response;
    }
    return parseAdvisoryDecision(response.data);
  }

  async scoreFinding(finding: FindingRecord, signal?: AbortSignal): Promise<Result<AdvisoryFindingScore>> {
    const response = await this.ask(
      buildFindingScorePrompt(finding),
      {
        systemContext: FINDING_SCORE_SYSTEM_PROMPT,
        maxTokens: FINDING_SCORE_MAX_TOKENS,
        temperature: FINDING_SCORE_TEMPERATURE,
        signal,
      },
      'finding_score'
    );
    if (!response.success) {
      return response;
    }
    return parseFindingScore(response.data);
  }

  async polishReport(report: string, signal?: AbortSignal): Promise<Result<string>> {
    return this.ask(
      buildReportPolishPrompt(report),
      {
        systemContext: REPORT_POLISH_SYSTEM_PROMPT,
        maxTokens: REPORT_POLISH_MAX_TOKENS,
        temperature: REPORT_POLISH_TEMPERATURE,
        signal,
      },
      'report_polish'
    );
  }

  private async store(kind: string, prompt: string, response?: string, error?: string): Promise<void> {
    const storage = this.options.storage;
    if (!storage || !this.options.storeResponses) return;
    try {
      await storage.storeAdvisoryExchange({
        timestamp: new Date().toISOString(),
        kind,
        prompt,
        response,
        success: error === undefined,
        error,
      });
    } catch (storeError) {
      this.logger.warn('Failed to store advisory exchange', { error: formatError(storeError) });
    }
  }
}

// ─────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────

export function parseAdvisoryDecision(output: string): Result<AdvisoryDecision> {
  const parsed = safeParseJson(extractJsonText(output), AdvisoryDecisionSchema);
  if (!parsed.success) {
    return fail(`Malformed advisory decision: ${parsed.error}`);
  }
  const data = parsed.data;
  return ok({
    decision: data.decision,
    confidence: data.confidence,
    reasons: data.reasons,
    ...(data.suggested_next_steps ? { suggestedNextSteps: data.suggested_next_steps } : {}),
    ...(data.risk_level ? { riskLevel: data.risk_level } : {}),
  });
}

export function parseFindingScore(output: string): Result<AdvisoryFindingScore> {
  const parsed = safeParseJson(extractJsonText(output), FindingScoreSchema);
  if (!parsed.success) {
    return fail(`Malformed advisory score: ${parsed.error}`);
  }
  const data = parsed.data;
  return ok({
    score: data.score,
    confidence: data.confidence,
    explanation: data.explanation,
    ...(data.severity ? { severity: data.severity } : {}),
    isLikelyFp: data.is_likely_fp,
  });
}
