import { describe, it, expect } from 'vitest';
import { FindingRecord } from '../../../src/types.js';
import { createSilentLogger } from '../../../src/core/logger.js';
import { FusionTriageScorer, FusionScorerOptions, adjustSeverity } from '../../../src/triage/fusion-scorer.js';
import { TriageClassifier } from '../../../src/triage/classifier.js';
import { FakeAdvisory } from '../../helpers/fake-advisory.js';

function finding(overrides: Partial<FindingRecord> = {}): FindingRecord {
  return {
    target: 'https://api.example.com',
    name: 'Exposed Git Repository',
    severity: 'medium',
    description: 'The .git directory is readable',
    evidence: { matcher_name: 'git-config' },
    scannerKind: 'nuclei',
    matchedAt: 'https://api.example.com/.git/config',
    ...overrides,
  };
}

function fixedClassifier(score: number): TriageClassifier {
  return { predict: () => score };
}

function createScorer(options: Partial<FusionScorerOptions> = {}): FusionTriageScorer {
  return new FusionTriageScorer({
    weights: { mlWeight: 0.4, llmWeight: 0.6 },
    logger: createSilentLogger(),
    ...options,
  });
}

describe('triage/fusion-scorer', () => {
  describe('adjustSeverity', () => {
    it('should drop anything below 0.3 to info', () => {
      expect(adjustSeverity('critical', 0.2999)).toBe('info');
    });

    it('should not drop to info at exactly 0.3', () => {
      expect(adjustSeverity('low', 0.3)).toBe('low');
      expect(adjustSeverity('high', 0.3)).toBe('medium');
    });

    it('should downgrade high and critical below 0.5', () => {
      expect(adjustSeverity('high', 0.49)).toBe('medium');
      expect(adjustSeverity('critical', 0.4)).toBe('medium');
      expect(adjustSeverity('high', 0.5)).toBe('high');
    });

    it('should upgrade medium above 0.8 only', () => {
      expect(adjustSeverity('medium', 0.81)).toBe('high');
      expect(adjustSeverity('medium', 0.8)).toBe('medium');
      expect(adjustSeverity('low', 0.95)).toBe('low');
    });

    it('should lowercase and fall back to unknown', () => {
      expect(adjustSeverity('HIGH', 0.7)).toBe('high');
      expect(adjustSeverity('severe', 0.7)).toBe('unknown');
    });
  });

  describe('score', () => {
    it('should combine weighted scores without normalizing the weights', async () => {
      const advisory = new FakeAdvisory({
        score: { score: 0.4, confidence: 0.9, explanation: 'plausible', isLikelyFp: false },
      });

      const result = await createScorer({ classifier: fixedClassifier(0.8), advisory }).score(finding());

      expect(result.mlScore).toBe(0.8);
      expect(result.llmScore).toBe(0.4);
      expect(result.finalScore).toBeCloseTo(0.56, 10);
      expect(result.confidence).toBe(0.9);
      expect(result.explanation).toBe('plausible');
      expect(result.isFalsePositive).toBe(false);
      expect(result.severityAdjusted).toBe('medium');
    });

    it('should use neutral scores when neither classifier nor advisory is available', async () => {
      const result = await createScorer().score(finding());

      expect(result).toEqual({
        mlScore: 0.5,
        llmScore: 0.5,
        finalScore: 0.5,
        confidence: 0,
        severityAdjusted: 'medium',
        isFalsePositive: false,
        explanation: 'Advisory service not available',
      });
    });

    it('should fall back to neutral advisory values on failure', async () => {
      const advisory = new FakeAdvisory({ score: 'Malformed advisory score: score: Required' });

      const result = await createScorer({ classifier: fixedClassifier(0.9), advisory }).score(finding());

      expect(result.llmScore).toBe(0.5);
      expect(result.confidence).toBe(0);
      expect(result.explanation).toBe('Advisory scoring failed: Malformed advisory score: score: Required');
      expect(result.isFalsePositive).toBe(false);
    });

    it('should mark low scores as false positives', async () => {
      const advisory = new FakeAdvisory({ score: { score: 0.1, confidence: 0.8, explanation: 'noise', isLikelyFp: false } });

      const result = await createScorer({ classifier: fixedClassifier(0.2), advisory }).score(finding({ severity: 'high' }));

      // 0.4 * 0.2 + 0.6 * 0.1 = 0.14
      expect(result.finalScore).toBeCloseTo(0.14, 10);
      expect(result.isFalsePositive).toBe(true);
      expect(result.severityAdjusted).toBe('info');
    });

    it('should honor the advisory false-positive flag regardless of score', async () => {
      const advisory = new FakeAdvisory({ score: { score: 0.9, confidence: 0.8, explanation: 'waf page', isLikelyFp: true } });

      const result = await createScorer({ classifier: fixedClassifier(0.9), advisory }).score(finding());

      expect(result.isFalsePositive).toBe(true);
      expect(result.severityAdjusted).toBe('high');
    });

    it('should use a neutral ML score when the classifier throws', async () => {
      const classifier: TriageClassifier = {
        predict: () => {
          throw new Error('model corrupted');
        },
      };

      const result = await createScorer({ classifier }).score(finding());

      expect(result.mlScore).toBe(0.5);
    });

    it('should give identical results for the same unmutated finding', async () => {
      const advisory = new FakeAdvisory({ score: { score: 0.7, confidence: 0.6, explanation: 'likely', isLikelyFp: false } });
      const scorer = createScorer({ classifier: fixedClassifier(0.3), advisory });
      const input = finding();

      const first = await scorer.score(input);
      const second = await scorer.score(input);

      expect(second).toEqual(first);
      expect(input.finalScore).toBeUndefined();
    });
  });

  describe('scoreInPlace', () => {
    it('should write the triage fields onto the finding', async () => {
      const input = finding();

      const triaged = await createScorer().scoreInPlace(input);

      expect(triaged).toBe(input);
      expect(input.finalScore).toBe(0.5);
      expect(input.severityAdjusted).toBe('medium');
      expect(input.name).toBe('Exposed Git Repository');
    });
  });
});
