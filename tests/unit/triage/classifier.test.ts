import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../../../src/core/errors.js';
import {
  LabeledExample,
  LogisticTriageModel,
  findingText,
  loadClassifier,
  loadLabeledExamples,
  stratifiedSplit,
  tokenize,
  trainClassifier,
} from '../../../src/triage/classifier.js';

const DATA_PATH = fileURLToPath(new URL('../../../data/labeled-examples.json', import.meta.url));

function example(name: string, label: 0 | 1): LabeledExample {
  return { name, description: '', severity: 'info', evidence: {}, label };
}

describe('triage/classifier', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bountygate-model-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('findingText', () => {
    it('should join name, description, severity and evidence JSON with spaces', () => {
      expect(
        findingText({ name: 'Open Redirect', description: 'next param', severity: 'medium', evidence: { a: 1 } })
      ).toBe('Open Redirect next param medium {"a":1}');
    });

    it('should use empty defaults for missing fields', () => {
      expect(findingText({ name: 'X', severity: 'low' })).toBe('X  low {}');
    });
  });

  describe('tokenize', () => {
    it('should lowercase, drop single characters and add bigrams', () => {
      expect(tokenize('Exposed Git a Repo')).toEqual(['exposed', 'git', 'repo', 'exposed git', 'git repo']);
    });
  });

  describe('stratifiedSplit', () => {
    it('should hold out a share of each class', () => {
      const examples = [
        ...Array.from({ length: 10 }, (_, i) => example(`pos ${i}`, 1)),
        ...Array.from({ length: 5 }, (_, i) => example(`neg ${i}`, 0)),
      ];

      const { train, test } = stratifiedSplit(examples, 0.2, 42);

      expect(test.filter((e) => e.label === 1)).toHaveLength(2);
      expect(test.filter((e) => e.label === 0)).toHaveLength(1);
      expect(train).toHaveLength(12);
    });

    it('should be reproducible for a fixed seed', () => {
      const examples = Array.from({ length: 12 }, (_, i) => example(`item ${i}`, i % 2 === 0 ? 1 : 0));

      expect(stratifiedSplit(examples, 0.25, 7)).toEqual(stratifiedSplit(examples, 0.25, 7));
    });
  });

  describe('trainClassifier', () => {
    it('should learn to separate the bundled labeled examples', () => {
      const examples = loadLabeledExamples(DATA_PATH);

      const result = trainClassifier(examples, { testSize: 0 });

      expect(result.testSize).toBe(0);
      expect(result.accuracy).toBeNull();
      const leak = result.model.predict(
        findingText({ name: 'Exposed Private Key', description: 'PEM private key readable', severity: 'critical' })
      );
      const noise = result.model.predict(
        findingText({ name: 'Missing Security Headers', description: 'header missing', severity: 'info' })
      );
      expect(leak).toBeGreaterThan(noise);
    });

    it('should report hold-out accuracy when a test split is used', () => {
      const result = trainClassifier(loadLabeledExamples(DATA_PATH));

      expect(result.trainSize + result.testSize).toBe(30);
      expect(result.testSize).toBe(6);
      expect(result.accuracy).not.toBeNull();
      expect(result.accuracy).toBeGreaterThanOrEqual(0);
      expect(result.accuracy).toBeLessThanOrEqual(1);
    });

    it('should limit the vocabulary to 100 sorted terms', () => {
      const { model } = trainClassifier(loadLabeledExamples(DATA_PATH), { testSize: 0 });

      expect(model.file.vocabulary).toHaveLength(100);
      expect([...model.file.vocabulary].sort()).toEqual(model.file.vocabulary);
    });

    it('should require both classes', () => {
      expect(() => trainClassifier([example('a b', 1), example('c d', 1)])).toThrow(ConfigError);
    });

    it('should produce probabilities between 0 and 1', () => {
      const { model } = trainClassifier(loadLabeledExamples(DATA_PATH), { testSize: 0 });

      const score = model.predict('completely unrelated words');
      expect(score).toBeGreaterThan(0);
      expect(score).toBeLessThan(1);
    });
  });

  describe('persistence', () => {
    it('should round-trip a trained model through disk', () => {
      const { model } = trainClassifier(loadLabeledExamples(DATA_PATH), { testSize: 0 });
      const path = join(dir, 'models', 'triage-model.json');

      model.save(path);
      const loaded = loadClassifier(path);

      expect(loaded).toBeInstanceOf(LogisticTriageModel);
      expect(loaded?.predict('exposed git repository')).toBeCloseTo(model.predict('exposed git repository'), 12);
      expect(JSON.parse(readFileSync(path, 'utf-8')).version).toBe(1);
    });

    it('should return undefined when no model exists', () => {
      expect(loadClassifier(join(dir, 'missing.json'))).toBeUndefined();
    });

    it('should reject a model whose arrays disagree in length', () => {
      const path = join(dir, 'bad.json');
      writeFileSync(
        path,
        JSON.stringify({
          version: 1,
          vocabulary: ['a', 'b'],
          idf: [1],
          weights: [0.1, 0.2],
          bias: 0,
          trainedAt: '2024-05-01T00:00:00.000Z',
          metrics: { trainSize: 2, testSize: 0, accuracy: null },
        })
      );

      expect(() => loadClassifier(path)).toThrow(ConfigError);
    });
  });

  describe('loadLabeledExamples', () => {
    it('should reject labels other than 0 and 1', () => {
      const path = join(dir, 'data.json');
      writeFileSync(path, JSON.stringify([{ name: 'x', label: 2 }]));

      expect(() => loadLabeledExamples(path)).toThrow(ConfigError);
    });
  });
});
