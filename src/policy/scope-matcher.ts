/**
 * Scope pattern matching. Structural comparison only; patterns are never
 * compiled to regular expressions.
 */

import { ScopeDefinition } from '../types.js';

export type ScopeMatch =
  | { kind: 'out_of_scope'; pattern: string }
  | { kind: 'in_scope'; pattern: string }
  | { kind: 'none' };

/**
 * - exact: `example.com` matches `example.com`
 * - wildcard: `*.example.com` matches `example.com` and any `x.example.com`
 * - bare domain: `example.com` also matches any `x.example.com`
 */
export function matchesScopePattern(target: string, pattern: string): boolean {
  const host = target.trim().toLowerCase();
  const rule = pattern.trim().toLowerCase();
  if (!host || !rule) {
    return false;
  }

  if (host === rule) {
    return true;
  }

  if (rule.startsWith('*.')) {
    const domain = rule.slice(2);
    return domain.length > 0 && (host === domain || host.endsWith('.' + domain));
  }

  return host.endsWith('.' + rule);
}

/**
 * Out-of-scope patterns are checked first so an exclusion always wins.
 */
export function classifyTarget(target: string, scope: ScopeDefinition): ScopeMatch {
  const excluded = scope.out_of_scope.find((pattern) => matchesScopePattern(target, pattern));
  if (excluded !== undefined) {
    return { kind: 'out_of_scope', pattern: excluded };
  }

  const included = scope.in_scope.find((pattern) => matchesScopePattern(target, pattern));
  if (included !== undefined) {
    return { kind: 'in_scope', pattern: included };
  }

  return { kind: 'none' };
}
