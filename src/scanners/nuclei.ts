/**
 * Nuclei Scanner - template-based detection scans through the nuclei CLI
 *
 * Only detection templates selected by tag and severity are run. Output is
 * JSONL; each line is validated and mapped to a FindingRecord.
 */

import { z } from 'zod';
import { FindingRecord, FindingSeverity } from '../types.js';
import { CommandRunner, runCommand } from '../core/command.js';
import { Logger } from '../core/logger.js';
import { ScanAdapter, ScanConstraints } from '../core/pipeline.js';
import { sanitizeUrl } from '../core/utils.js';
import { Result, fail, ok, safeParseJson } from '../core/validation.js';

const NUCLEI_PROCESS_TIMEOUT = 120_000;

const NucleiResultLine = z.object({
  'template-id': z.string().default(''),
  info: z
    .object({
      name: z.string().default('Unknown'),
      severity: z.string().default('unknown'),
      description: z.string().default(''),
    })
    .default({}),
  type: z.string().default(''),
  'matcher-name': z.string().default(''),
  'matched-at': z.string().optional(),
  'extracted-results': z.array(z.string()).default([]),
});

export interface NucleiScannerOptions {
  logger: Logger;
  rateLimit: number;
  concurrency: number;
  templateTags: string[];
  severity: string[];
  run?: CommandRunner;
}

function toSeverity(value: string): FindingSeverity {
  const parsed = FindingSeverity.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : 'unknown';
}

/**
 * Map nuclei JSONL output to findings. Lines that are not valid results are skipped.
 */
export function parseNucleiOutput(output: string, target: string, logger?: Logger): FindingRecord[] {
  const findings: FindingRecord[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim()) continue;

    const parsed = safeParseJson(line, NucleiResultLine);
    if (!parsed.success) {
      logger?.warn(`Failed to parse nuclei output line: ${line.slice(0, 100)}`);
      continue;
    }

    const data = parsed.data;
    findings.push({
      target,
      name: data.info.name,
      severity: toSeverity(data.info.severity),
      description: data.info.description,
      templateId: data['template-id'],
      matchedAt: data['matched-at'] ?? target,
      evidence: {
        type: data.type,
        matcher_name: data['matcher-name'],
        extracted_results: data['extracted-results'],
      },
      scannerKind: 'nuclei',
    });
  }
  return findings;
}

export class NucleiScanner implements ScanAdapter {
  readonly kind = 'nuclei';
  readonly templateOrRuleId: string;
  readonly severity: string;
  private readonly logger: Logger;
  private readonly exec: CommandRunner;

  constructor(private readonly options: NucleiScannerOptions) {
    this.logger = options.logger.child({ component: 'nuclei' });
    this.exec = options.run ?? runCommand;
    this.templateOrRuleId = `tags:${options.templateTags.join(',')}`;
    this.severity = options.severity.join(',');
  }

  async run(target: string, constraints: ScanConstraints): Promise<Result<FindingRecord[]>> {
    const url = sanitizeUrl(target);
    if (!url) {
      return fail(`Invalid target URL: ${target}`);
    }

    this.logger.info(`Running nuclei scan on ${url} (severity: ${this.severity})`);

    const args = [
      '-u', url,
      '-silent',
      '-jsonl',
      '-rate-limit', String(this.options.rateLimit),
      '-c', String(this.options.concurrency),
      '-timeout', String(constraints.timeoutSeconds),
      '-retries', '1',
    ];
    if (this.options.severity.length > 0) {
      args.push('-severity', this.severity);
    }
    if (this.options.templateTags.length > 0) {
      args.push('-tags', this.options.templateTags.join(','));
    }

    const result = await this.exec('nuclei', args, {
      timeout: NUCLEI_PROCESS_TIMEOUT,
      signal: constraints.signal,
    });

    if (result.notFound) {
      return fail('nuclei not found');
    }
    if (result.timedOut) {
      return fail(`nuclei scan timed out for ${url}`);
    }
    if (result.failed && !result.stdout) {
      return fail(`nuclei scan failed: ${result.stderr.slice(0, 200)}`);
    }

    const findings = parseNucleiOutput(result.stdout, url, this.logger);
    this.logger.info(`Nuclei found ${findings.length} potential issues`);
    return ok(findings);
  }
}
