/**
 * Finding Score Prompt - advisory true-positive estimate for one finding
 */

import { FindingRecord } from '../../types.js';
import { truncateField } from './policy-validation.js';

export const FINDING_SCORE_MAX_TOKENS = 400;
export const FINDING_SCORE_TEMPERATURE = 0.2;
const MAX_EVIDENCE_LENGTH = 500;

export const FINDING_SCORE_SYSTEM_PROMPT = `You are a security researcher evaluating vulnerability findings.
Score the finding from 0.0 (false positive) to 1.0 (critical true positive).

Respond with JSON:
{
  "score": 0.0 to 1.0,
  "confidence": 0.0 to 1.0,
  "explanation": "brief explanation",
  "severity": "info|low|medium|high|critical",
  "is_likely_fp": true or false
}

Consider:
- Evidence quality
- Exploitability
- Impact
- Context`;

export function buildFindingScorePrompt(finding: FindingRecord): string {
  const evidence = JSON.stringify(finding.evidence ?? {});
  return `Finding:
Name: ${truncateField(finding.name || 'Unknown')}
Severity: ${finding.severity}
Description: ${truncateField(finding.description || 'N/A', MAX_EVIDENCE_LENGTH)}
Evidence: ${evidence.slice(0, MAX_EVIDENCE_LENGTH)}

Score this finding:`;
}
