/**
 * Triage Classifier - local true-positive estimate for findings
 *
 * TF-IDF over unigrams and bigrams (top terms by corpus frequency) feeding a
 * logistic regression with balanced class weights. The fitted model is plain
 * JSON so it can be inspected and versioned next to the data it came from.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { formatZodError, safeParseJson } from '../core/validation.js';

export const MAX_FEATURES = 100;
const TOKEN_PATTERN = /\b\w\w+\b/gu;

export interface TriageClassifier {
  /** Probability that the text describes a true positive, in [0, 1]. */
  predict(text: string): number;
}

export const LabeledExample = z.object({
  name: z.string().default(''),
  description: z.string().default(''),
  severity: z.string().default(''),
  evidence: z.record(z.string(), z.unknown()).default({}),
  label: z.union([z.literal(0), z.literal(1)]),
});
export type LabeledExample = z.infer<typeof LabeledExample>;

export const TriageModelFile = z.object({
  version: z.literal(1),
  vocabulary: z.array(z.string()),
  idf: z.array(z.number()),
  weights: z.array(z.number()),
  bias: z.number(),
  trainedAt: z.string(),
  metrics: z.object({
    trainSize: z.number().int(),
    testSize: z.number().int(),
    accuracy: z.number().nullable(),
  }),
}).refine((m) => m.vocabulary.length === m.idf.length && m.idf.length === m.weights.length, {
  message: 'vocabulary, idf and weights must have the same length',
});
export type TriageModelFile = z.infer<typeof TriageModelFile>;

// ─────────────────────────────────────────────────────────────
// Features
// ─────────────────────────────────────────────────────────────

export interface TextFeatureSource {
  name: string;
  description?: string;
  severity: string;
  evidence?: Record<string, unknown>;
}

/** `name description severity evidence-json`, space separated. */
export function findingText(finding: TextFeatureSource): string {
  return [finding.name, finding.description ?? '', finding.severity, JSON.stringify(finding.evidence ?? {})].join(' ');
}

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  const terms = [...words];
  for (let i = 0; i + 1 < words.length; i++) {
    terms.push(`${words[i]} ${words[i + 1]}`);
  }
  return terms;
}

function termCounts(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

class TfidfVectorizer {
  constructor(
    readonly vocabulary: string[],
    readonly idf: number[]
  ) {}

  private readonly index = new Map<string, number>();

  static fit(texts: string[], maxFeatures: number = MAX_FEATURES): TfidfVectorizer {
    const totals = new Map<string, number>();
    const docFreq = new Map<string, number>();

    for (const text of texts) {
      const counts = termCounts(tokenize(text));
      for (const [term, count] of counts) {
        totals.set(term, (totals.get(term) ?? 0) + count);
        docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
    }

    const vocabulary = [...totals.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, maxFeatures)
      .map(([term]) => term)
      .sort();

    const n = texts.length;
    const idf = vocabulary.map((term) => Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1);
    return new TfidfVectorizer(vocabulary, idf);
  }

  transform(text: string): number[] {
    if (this.index.size === 0) {
      this.vocabulary.forEach((term, i) => this.index.set(term, i));
    }

    const vector = new Array<number>(this.vocabulary.length).fill(0);
    for (const [term, count] of termCounts(tokenize(text))) {
      const i = this.index.get(term);
      if (i !== undefined) {
        vector[i] = count * this.idf[i];
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm > 0 ? vector.map((v) => v / norm) : vector;
  }
}

function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

// ─────────────────────────────────────────────────────────────
// Model
// ─────────────────────────────────────────────────────────────

export class LogisticTriageModel implements TriageClassifier {
  private readonly vectorizer: TfidfVectorizer;

  constructor(readonly file: TriageModelFile) {
    this.vectorizer = new TfidfVectorizer(file.vocabulary, file.idf);
  }

  predict(text: string): number {
    const x = this.vectorizer.transform(text);
    let z = this.file.bias;
    for (let i = 0; i < x.length; i++) {
      z += x[i] * this.file.weights[i];
    }
    return sigmoid(z);
  }

  save(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(this.file, null, 2), 'utf-8');
  }
}

/**
 * Returns undefined when no model has been trained yet.
 */
export function loadClassifier(path: string): LogisticTriageModel | undefined {
  if (!existsSync(path)) {
    return undefined;
  }
  const result = safeParseJson(readFileSync(path, 'utf-8'), TriageModelFile);
  if (!result.success) {
    throw new ConfigError(`Invalid triage model ${path}: ${result.error}`);
  }
  return new LogisticTriageModel(result.data);
}

// ─────────────────────────────────────────────────────────────
// Training
// ─────────────────────────────────────────────────────────────

export interface TrainOptions {
  testSize?: number;
  seed?: number;
  iterations?: number;
  learningRate?: number;
  /** Inverse regularization strength */
  c?: number;
  now?: () => Date;
}

export interface TrainResult {
  model: LogisticTriageModel;
  accuracy: number | null;
  trainSize: number;
  testSize: number;
}

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function shuffle<T>(items: T[], random: () => number): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/**
 * Stratified split: each class contributes the same share to the hold-out set.
 */
export function stratifiedSplit<T extends { label: 0 | 1 }>(
  examples: T[],
  testSize: number,
  seed: number
): { train: T[]; test: T[] } {
  const random = mulberry32(seed);
  const train: T[] = [];
  const test: T[] = [];

  for (const label of [0, 1] as const) {
    const group = shuffle(examples.filter((e) => e.label === label), random);
    const holdout = group.length >= 2 ? Math.max(1, Math.round(group.length * testSize)) : 0;
    test.push(...group.slice(0, holdout));
    train.push(...group.slice(holdout));
  }
  return { train, test };
}

export function trainClassifier(examples: LabeledExample[], options: TrainOptions = {}): TrainResult {
  const positives = examples.filter((e) => e.label === 1).length;
  if (positives === 0 || positives === examples.length) {
    throw new ConfigError('Training data needs both true-positive (1) and false-positive (0) examples');
  }

  const testSize = options.testSize ?? 0.2;
  const { train, test } = testSize > 0 ? stratifiedSplit(examples, testSize, options.seed ?? 42) : { train: examples, test: [] };

  const texts = train.map(findingText);
  const labels = train.map((e) => e.label);
  const vectorizer = TfidfVectorizer.fit(texts);
  const X = texts.map((t) => vectorizer.transform(t));

  // Balanced weights: n_samples / (n_classes * n_class_samples)
  const nPos = labels.filter((y) => y === 1).length;
  const nNeg = labels.length - nPos;
  const classWeight = (y: number) => labels.length / (2 * (y === 1 ? nPos : nNeg));

  const features = vectorizer.vocabulary.length;
  const weights = new Array<number>(features).fill(0);
  let bias = 0;
  const iterations = options.iterations ?? 500;
  const lr = options.learningRate ?? 0.5;
  const lambda = 1 / ((options.c ?? 1) * labels.length);

  for (let iter = 0; iter < iterations; iter++) {
    const grad = new Array<number>(features).fill(0);
    let gradBias = 0;
    for (let s = 0; s < X.length; s++) {
      const x = X[s];
      let z = bias;
      for (let i = 0; i < features; i++) z += x[i] * weights[i];
      const error = (sigmoid(z) - labels[s]) * classWeight(labels[s]);
      for (let i = 0; i < features; i++) grad[i] += error * x[i];
      gradBias += error;
    }
    for (let i = 0; i < features; i++) {
      weights[i] -= lr * (grad[i] / X.length + lambda * weights[i]);
    }
    bias -= lr * (gradBias / X.length);
  }

  const file: TriageModelFile = {
    version: 1,
    vocabulary: vectorizer.vocabulary,
    idf: vectorizer.idf,
    weights,
    bias,
    trainedAt: (options.now ?? (() => new Date()))().toISOString(),
    metrics: { trainSize: train.length, testSize: test.length, accuracy: null },
  };
  const model = new LogisticTriageModel(file);

  let accuracy: number | null = null;
  if (test.length > 0) {
    const correct = test.filter((e) => (model.predict(findingText(e)) >= 0.5 ? 1 : 0) === e.label).length;
    accuracy = correct / test.length;
    file.metrics.accuracy = accuracy;
  }

  return { model, accuracy, trainSize: train.length, testSize: test.length };
}

export function loadLabeledExamples(path: string): LabeledExample[] {
  if (!existsSync(path)) {
    throw new ConfigError(`Training data not found: ${path}`);
  }
  let doc: unknown;
  try {
    doc = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Training data is not valid JSON: ${path}`, error);
  }
  const result = z.array(LabeledExample).safeParse(doc);
  if (!result.success) {
    throw new ConfigError(`Invalid training data ${path}: ${formatZodError(result.error)}`);
  }
  return result.data;
}
