/**
 * Policy Validation Prompts - scope and scanner-action checks
 *
 * Input: scope patterns or an action descriptor
 * Output: single JSON decision object
 *
 * Prompts are bounded: lists and fields are truncated to fixed limits and
 * keep their declaration order, so the same input always yields the same prompt.
 */

import { ActionDescriptor, ScopeDefinition } from '../../types.js';

export const MAX_PATTERNS_IN_PROMPT = 50;
export const MAX_FIELD_LENGTH = 200;

export const SCOPE_MAX_TOKENS = 500;
export const ACTION_MAX_TOKENS = 400;
export const POLICY_TEMPERATURE = 0.1;

export function truncateField(value: string, limit: number = MAX_FIELD_LENGTH): string {
  return value.length > limit ? value.slice(0, limit) + '...' : value;
}

function boundedPatterns(patterns: readonly string[]): string[] {
  return patterns.slice(0, MAX_PATTERNS_IN_PROMPT).map((p) => truncateField(p));
}

// ─────────────────────────────────────────────────────────────
// Scope
// ─────────────────────────────────────────────────────────────

export const SCOPE_SYSTEM_PROMPT = `You are a strict security policy assistant for bug bounty programs.
Your role is to determine if a target is within the scope of a security testing program.

Respond ONLY with valid JSON in this exact format:
{
  "decision": "Allowed" or "Blocked" or "Unknown",
  "confidence": 0.0 to 1.0,
  "reasons": ["reason1", "reason2"],
  "suggested_next_steps": ["step1", "step2"]
}

Rules:
- Allowed: Target clearly matches in-scope patterns
- Blocked: Target clearly matches out-of-scope patterns or is high-risk
- Unknown: Insufficient information to make a determination
- Never suggest evasive or destructive actions
- Be conservative. When in doubt, return Unknown`;

export function buildScopeValidationPrompt(target: string, scope: ScopeDefinition): string {
  return `Target: ${truncateField(target)}

In-Scope Patterns: ${JSON.stringify(boundedPatterns(scope.in_scope))}
Out-of-Scope Patterns: ${JSON.stringify(boundedPatterns(scope.out_of_scope))}

Is this target within scope for security testing?`;
}

// ─────────────────────────────────────────────────────────────
// Scanner actions
// ─────────────────────────────────────────────────────────────

export const ACTION_SYSTEM_PROMPT = `You are a security policy validator for ethical bug bounty testing.
Evaluate if a proposed scanner action is safe and appropriate.

Respond ONLY with valid JSON:
{
  "decision": "Allowed" or "Blocked",
  "confidence": 0.0 to 1.0,
  "reasons": ["reason1"],
  "risk_level": "low" or "medium" or "high"
}

Block if:
- The action could cause damage or disruption
- The action involves exploitation rather than detection
- The action is outside typical bug bounty scope

Allow if:
- The action is read-only or passive
- The action is standard vulnerability detection
- Risk is low and within ethical bounds`;

export function buildActionValidationPrompt(action: ActionDescriptor): string {
  return `Scanner Action:
Scanner: ${truncateField(action.scannerKind)}
Target: ${truncateField(action.target)}
Template: ${truncateField(action.templateOrRuleId || 'N/A')}
Severity: ${truncateField(action.severityHint || 'N/A')}

Should this action be allowed?`;
}
