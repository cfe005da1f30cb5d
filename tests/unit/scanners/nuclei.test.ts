import { describe, it, expect } from 'vitest';
import { NucleiScanner, parseNucleiOutput } from '../../../src/scanners/nuclei.js';
import { createMemoryLogger, createSilentLogger } from '../../../src/core/logger.js';
import { commandResult, fakeRunner } from '../../helpers/fake-runner.js';

const LINE = JSON.stringify({
  'template-id': 'exposed-git-config',
  info: { name: 'Exposed Git Config', severity: 'Medium', description: 'Git config is readable' },
  type: 'http',
  'matcher-name': 'status',
  'matched-at': 'https://shop.example.com/.git/config',
  'extracted-results': ['[core]'],
});

function scanner(run: ReturnType<typeof fakeRunner>) {
  return new NucleiScanner({
    logger: createSilentLogger(),
    rateLimit: 5,
    concurrency: 3,
    templateTags: ['misconfig', 'exposure'],
    severity: ['low', 'medium'],
    run,
  });
}

describe('scanners/nuclei', () => {
  describe('parseNucleiOutput', () => {
    it('should map a JSONL result to a finding', () => {
      const [finding] = parseNucleiOutput(LINE + '\n', 'https://shop.example.com');

      expect(finding).toEqual({
        target: 'https://shop.example.com',
        name: 'Exposed Git Config',
        severity: 'medium',
        description: 'Git config is readable',
        templateId: 'exposed-git-config',
        matchedAt: 'https://shop.example.com/.git/config',
        evidence: { type: 'http', matcher_name: 'status', extracted_results: ['[core]'] },
        scannerKind: 'nuclei',
      });
    });

    it('should default missing fields and unknown severities', () => {
      const [finding] = parseNucleiOutput('{"info":{"severity":"spicy"}}', 'https://a.example.com');

      expect(finding.name).toBe('Unknown');
      expect(finding.severity).toBe('unknown');
      expect(finding.matchedAt).toBe('https://a.example.com');
    });

    it('should skip and log lines that are not results', () => {
      const { logger, entries } = createMemoryLogger();

      const findings = parseNucleiOutput(`[INF] banner\n${LINE}\n\n`, 'https://shop.example.com', logger);

      expect(findings).toHaveLength(1);
      expect(entries.map((e) => e.msg)).toEqual(['Failed to parse nuclei output line: [INF] banner']);
    });
  });

  describe('NucleiScanner', () => {
    it('should describe itself for policy validation', () => {
      const adapter = scanner(fakeRunner({}));

      expect(adapter.kind).toBe('nuclei');
      expect(adapter.templateOrRuleId).toBe('tags:misconfig,exposure');
      expect(adapter.severity).toBe('low,medium');
    });

    it('should pass rate, tag and severity limits to the binary', async () => {
      const run = fakeRunner({ nuclei: commandResult({ stdout: LINE }) });

      const result = await scanner(run).run('https://shop.example.com', { timeoutSeconds: 20 });

      expect(result.success && result.data).toHaveLength(1);
      expect(run).toHaveBeenCalledWith(
        'nuclei',
        [
          '-u', 'https://shop.example.com',
          '-silent',
          '-jsonl',
          '-rate-limit', '5',
          '-c', '3',
          '-timeout', '20',
          '-retries', '1',
          '-severity', 'low,medium',
          '-tags', 'misconfig,exposure',
        ],
        { timeout: 120_000, signal: undefined }
      );
    });

    it('should reject targets that are not http URLs', async () => {
      const run = fakeRunner({});

      const result = await scanner(run).run('shop.example.com', { timeoutSeconds: 20 });

      expect(result).toEqual({ success: false, error: 'Invalid target URL: shop.example.com' });
      expect(run).not.toHaveBeenCalled();
    });

    it('should report a missing binary', async () => {
      const result = await scanner(fakeRunner({})).run('https://shop.example.com', { timeoutSeconds: 20 });

      expect(result).toEqual({ success: false, error: 'nuclei not found' });
    });

    it('should report a timeout', async () => {
      const run = fakeRunner({ nuclei: commandResult({ failed: true, timedOut: true }) });

      const result = await scanner(run).run('https://shop.example.com', { timeoutSeconds: 20 });

      expect(result).toEqual({ success: false, error: 'nuclei scan timed out for https://shop.example.com' });
    });

    it('should keep partial output from a failed process', async () => {
      const run = fakeRunner({ nuclei: commandResult({ failed: true, exitCode: 2, stdout: LINE, stderr: 'boom' }) });

      const result = await scanner(run).run('https://shop.example.com', { timeoutSeconds: 20 });

      expect(result.success).toBe(true);
    });

    it('should fail on a failed process with no output', async () => {
      const run = fakeRunner({ nuclei: commandResult({ failed: true, exitCode: 2, stderr: 'bad flag' }) });

      const result = await scanner(run).run('https://shop.example.com', { timeoutSeconds: 20 });

      expect(result).toEqual({ success: false, error: 'nuclei scan failed: bad flag' });
    });
  });
});
