/**
 * Rule manifest - block and requires-validation patterns for scanner actions
 *
 * The manifest is data. It is parsed once into tagged rules with compiled
 * case-insensitive regexes and then frozen.
 */

import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { formatZodError } from '../core/validation.js';

export const DEFAULT_MANIFEST_PATH = fileURLToPath(
  new URL('../../policy/blocked-manifest.json', import.meta.url)
);

const ManifestRuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  notes: z.string().default(''),
});

const ManifestFileSchema = z.object({
  version: z.number().int().optional(),
  description: z.string().optional(),
  blocked_patterns: z.array(ManifestRuleSchema).default([]),
  requires_validation: z.array(ManifestRuleSchema).default([]),
});

export type RuleKind = 'block' | 'requires-validation';

export interface ManifestRule {
  readonly kind: RuleKind;
  readonly id: string;
  readonly pattern: string;
  readonly notes: string;
  readonly regex: RegExp;
}

export interface RuleManifest {
  readonly blockRules: readonly ManifestRule[];
  readonly validationRules: readonly ManifestRule[];
}

function compileRule(kind: RuleKind, raw: z.infer<typeof ManifestRuleSchema>): ManifestRule {
  let regex: RegExp;
  try {
    regex = new RegExp(raw.pattern, 'i');
  } catch (error) {
    throw new ConfigError(`Manifest rule ${raw.id} has an invalid pattern: ${raw.pattern}`, error);
  }
  return Object.freeze({ kind, id: raw.id, pattern: raw.pattern, notes: raw.notes, regex });
}

export function parseManifest(doc: unknown): RuleManifest {
  const result = ManifestFileSchema.safeParse(doc);
  if (!result.success) {
    throw new ConfigError(`Invalid rule manifest: ${formatZodError(result.error)}`);
  }

  return Object.freeze({
    blockRules: Object.freeze(result.data.blocked_patterns.map((rule) => compileRule('block', rule))),
    validationRules: Object.freeze(
      result.data.requires_validation.map((rule) => compileRule('requires-validation', rule))
    ),
  });
}

export function loadManifest(path: string = DEFAULT_MANIFEST_PATH): RuleManifest {
  if (!existsSync(path)) {
    throw new ConfigError(`Rule manifest not found: ${path}`);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Rule manifest is not valid JSON: ${path}`, error);
  }
  return parseManifest(doc);
}

/**
 * First matching rule in declaration order. Block rules are consulted first.
 */
export function findMatchingRule(manifest: RuleManifest, identifier: string): ManifestRule | undefined {
  return (
    manifest.blockRules.find((rule) => rule.regex.test(identifier)) ??
    manifest.validationRules.find((rule) => rule.regex.test(identifier))
  );
}
