/**
 * Advisory Prompts - Barrel Export
 */

export {
  SCOPE_SYSTEM_PROMPT,
  ACTION_SYSTEM_PROMPT,
  SCOPE_MAX_TOKENS,
  ACTION_MAX_TOKENS,
  POLICY_TEMPERATURE,
  MAX_PATTERNS_IN_PROMPT,
  MAX_FIELD_LENGTH,
  buildScopeValidationPrompt,
  buildActionValidationPrompt,
  truncateField,
} from './policy-validation.js';

export {
  FINDING_SCORE_SYSTEM_PROMPT,
  FINDING_SCORE_MAX_TOKENS,
  FINDING_SCORE_TEMPERATURE,
  buildFindingScorePrompt,
} from './finding-score.js';

export {
  REPORT_POLISH_SYSTEM_PROMPT,
  REPORT_POLISH_MAX_TOKENS,
  REPORT_POLISH_TEMPERATURE,
  buildReportPolishPrompt,
} from './report-polish.js';
