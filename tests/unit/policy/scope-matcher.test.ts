import { describe, it, expect } from 'vitest';
import { classifyTarget, matchesScopePattern } from '../../../src/policy/scope-matcher.js';

describe('policy/scope-matcher', () => {
  describe('matchesScopePattern', () => {
    it('should match an exact host', () => {
      expect(matchesScopePattern('example.com', 'example.com')).toBe(true);
    });

    it('should match a wildcard against the bare domain and any subdomain', () => {
      expect(matchesScopePattern('example.com', '*.example.com')).toBe(true);
      expect(matchesScopePattern('api.example.com', '*.example.com')).toBe(true);
      expect(matchesScopePattern('a.b.example.com', '*.example.com')).toBe(true);
    });

    it('should not match a wildcard against a host that only shares a suffix', () => {
      expect(matchesScopePattern('badexample.com', '*.example.com')).toBe(false);
      expect(matchesScopePattern('example.com.evil.org', '*.example.com')).toBe(false);
    });

    it('should treat a bare domain pattern as covering its subdomains', () => {
      expect(matchesScopePattern('shop.example.com', 'example.com')).toBe(true);
      expect(matchesScopePattern('notexample.com', 'example.com')).toBe(false);
    });

    it('should compare case-insensitively', () => {
      expect(matchesScopePattern('API.Example.COM', '*.example.com')).toBe(true);
    });

    it('should never match empty values', () => {
      expect(matchesScopePattern('', '*.example.com')).toBe(false);
      expect(matchesScopePattern('example.com', '')).toBe(false);
      expect(matchesScopePattern('example.com', '*.')).toBe(false);
    });
  });

  describe('classifyTarget', () => {
    const scope = { in_scope: ['*.example.com'], out_of_scope: ['dev.example.com'] };

    it('should let an exclusion win over an inclusion', () => {
      expect(classifyTarget('dev.example.com', scope)).toEqual({ kind: 'out_of_scope', pattern: 'dev.example.com' });
    });

    it('should report the in-scope pattern that matched', () => {
      expect(classifyTarget('api.example.com', scope)).toEqual({ kind: 'in_scope', pattern: '*.example.com' });
    });

    it('should report no match for unrelated hosts', () => {
      expect(classifyTarget('other.org', scope)).toEqual({ kind: 'none' });
    });
  });
});
