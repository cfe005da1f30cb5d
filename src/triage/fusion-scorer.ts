/**
 * Fusion Triage Scorer
 *
 * Combines the local classifier score with the advisory score into one
 * weighted value, flags likely false positives and adjusts severity.
 * Weights are applied as given and are not normalized.
 */

import { FindingRecord, FindingSeverity, TriageResult, TriagedFinding } from '../types.js';
import { formatError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { AdvisoryService } from '../providers/advisory.js';
import { TriageClassifier, findingText } from './classifier.js';

export const NEUTRAL_SCORE = 0.5;
export const FALSE_POSITIVE_THRESHOLD = 0.3;
const DOWNGRADE_THRESHOLD = 0.5;
const UPGRADE_THRESHOLD = 0.8;

export interface FusionWeights {
  mlWeight: number;
  llmWeight: number;
}

export interface FusionScorerOptions {
  weights: FusionWeights;
  logger: Logger;
  classifier?: TriageClassifier;
  advisory?: AdvisoryService;
}

function normalizeSeverity(severity: string): FindingSeverity {
  const parsed = FindingSeverity.safeParse(severity.trim().toLowerCase());
  return parsed.success ? parsed.data : 'unknown';
}

/**
 * - below 0.3: info
 * - below 0.5: high and critical drop to medium
 * - above 0.8: medium rises to high
 */
export function adjustSeverity(severity: string, finalScore: number): FindingSeverity {
  const current = normalizeSeverity(severity);
  if (finalScore < FALSE_POSITIVE_THRESHOLD) {
    return 'info';
  }
  if (finalScore < DOWNGRADE_THRESHOLD && (current === 'high' || current === 'critical')) {
    return 'medium';
  }
  if (finalScore > UPGRADE_THRESHOLD && current === 'medium') {
    return 'high';
  }
  return current;
}

export class FusionTriageScorer {
  private readonly logger: Logger;

  constructor(private readonly options: FusionScorerOptions) {
    this.logger = options.logger.child({ component: 'triage' });
  }

  /**
   * Score a finding. Never throws for classifier or advisory trouble; those
   * fall back to neutral scores. Does not modify the finding.
   */
  async score(finding: FindingRecord, signal?: AbortSignal): Promise<TriageResult> {
    const mlScore = this.mlScore(finding);

    let llmScore = NEUTRAL_SCORE;
    let confidence = 0;
    let explanation = 'Advisory service not available';
    let isLikelyFp = false;

    const advisory = this.options.advisory;
    if (advisory) {
      const result = await advisory.scoreFinding(finding, signal);
      if (result.success) {
        llmScore = result.data.score;
        confidence = result.data.confidence;
        explanation = result.data.explanation;
        isLikelyFp = result.data.isLikelyFp;
      } else {
        explanation = `Advisory scoring failed: ${result.error}`;
      }
    }

    const { mlWeight, llmWeight } = this.options.weights;
    const finalScore = mlWeight * mlScore + llmWeight * llmScore;

    const triage: TriageResult = {
      mlScore,
      llmScore,
      finalScore,
      confidence,
      severityAdjusted: adjustSeverity(finding.severity, finalScore),
      isFalsePositive: isLikelyFp || finalScore < FALSE_POSITIVE_THRESHOLD,
      explanation,
    };

    this.logger.info(`Triaged finding: ${finding.name || 'Unknown'} - Score: ${finalScore.toFixed(2)}`);
    return triage;
  }

  /**
   * Score and write the triage fields onto the finding itself.
   */
  async scoreInPlace(finding: FindingRecord, signal?: AbortSignal): Promise<TriagedFinding> {
    const triage = await this.score(finding, signal);
    return Object.assign(finding, triage);
  }

  private mlScore(finding: FindingRecord): number {
    const classifier = this.options.classifier;
    if (!classifier) {
      return NEUTRAL_SCORE;
    }
    try {
      const score = classifier.predict(findingText(finding));
      return Number.isFinite(score) ? score : NEUTRAL_SCORE;
    } catch (error) {
      this.logger.warn('Classifier scoring failed', { error: formatError(error) });
      return NEUTRAL_SCORE;
    }
  }
}
