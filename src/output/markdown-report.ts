/**
 * Markdown Report Writer
 *
 * Writes a summary `report.md` plus one `findings/finding_N.md` per reported
 * finding. Which findings are reported is decided by an explicit ReportPolicy:
 * false positives and findings at or below the score threshold are left out,
 * adjusted severity alone never excludes anything.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FindingSeverity, TriagedFinding } from '../types.js';
import { formatError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { Reporter } from '../core/pipeline.js';
import { Result, fail, ok } from '../core/validation.js';
import { AdvisoryService } from '../providers/advisory.js';

export interface ReportPolicy {
  includeFalsePositives: boolean;
  /** Findings must score strictly above this to be reported */
  minScore: number;
  /** Detailed sections and per-finding files are limited to this many */
  maxDetailed: number;
}

export const DEFAULT_REPORT_POLICY: ReportPolicy = {
  includeFalsePositives: false,
  minScore: 0.5,
  maxDetailed: 10,
};

const SEVERITY_ORDER: FindingSeverity[] = ['critical', 'high', 'medium', 'low', 'info'];

const IMPACT_BY_SEVERITY: Partial<Record<FindingSeverity, string>> = {
  critical: 'This vulnerability could lead to complete system compromise, data breach, or significant business impact.',
  high: 'This vulnerability could allow unauthorized access to sensitive data or functionality.',
  medium: 'This vulnerability could expose information or allow limited unauthorized actions.',
  low: 'This issue has minimal security impact but should be addressed.',
  info: 'This is an informational finding that may aid in further attacks.',
};

// ─────────────────────────────────────────────────────────────
// Selection
// ─────────────────────────────────────────────────────────────

export function selectReportable(findings: TriagedFinding[], policy: ReportPolicy): TriagedFinding[] {
  return findings.filter(
    (f) => f.finalScore > policy.minScore && (policy.includeFalsePositives || !f.isFalsePositive)
  );
}

export function groupBySeverity(findings: TriagedFinding[]): Map<FindingSeverity, TriagedFinding[]> {
  const groups = new Map<FindingSeverity, TriagedFinding[]>();
  for (const finding of findings) {
    const list = groups.get(finding.severityAdjusted) ?? [];
    list.push(finding);
    groups.set(finding.severityAdjusted, list);
  }
  return groups;
}

// ─────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────

export function remediationFor(name: string): string {
  const lower = name.toLowerCase();
  if (lower.includes('xss') || lower.includes('cross-site scripting')) {
    return 'Implement proper input validation and output encoding. Use Content-Security-Policy headers.';
  }
  if (lower.includes('sql')) {
    return 'Use parameterized queries or prepared statements. Never concatenate user input into SQL queries.';
  }
  if (lower.includes('csrf')) {
    return 'Implement CSRF tokens for all state-changing operations.';
  }
  if (lower.includes('auth')) {
    return 'Review authentication logic and ensure proper access controls are in place.';
  }
  if (lower.includes('header')) {
    return 'Configure security headers according to OWASP recommendations.';
  }
  return 'Review the specific vulnerability and implement appropriate security controls.';
}

function dateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function renderSummary(
  runId: string,
  target: string,
  findings: TriagedFinding[],
  policy: ReportPolicy,
  date: Date
): string {
  const lines: string[] = [
    '# Security Assessment Report',
    '',
    `**Target:** ${target}`,
    `**Date:** ${dateOnly(date)}`,
    `**Run ID:** ${runId}`,
    '',
    '## Executive Summary',
    '',
    `This report contains the results of an automated security assessment conducted on ${target}.`,
    `The assessment identified ${findings.length} significant findings requiring attention.`,
    '',
    '## Findings Summary',
    '',
  ];

  const groups = groupBySeverity(findings);
  for (const severity of SEVERITY_ORDER) {
    const count = groups.get(severity)?.length ?? 0;
    if (count > 0) {
      lines.push(`- **${severity.toUpperCase()}**: ${count} finding(s)`);
    }
  }
  if (findings.length === 0) {
    lines.push('No findings met the reporting threshold.');
  }

  lines.push('', '## Detailed Findings', '');
  findings.slice(0, policy.maxDetailed).forEach((finding, i) => {
    lines.push(
      `### ${i + 1}. ${finding.name || 'Unknown'}`,
      '',
      `**Severity:** ${finding.severityAdjusted.toUpperCase()}`,
      '',
      `**Confidence Score:** ${finding.finalScore.toFixed(2)}`,
      '',
      `**Description:** ${finding.description || 'N/A'}`,
      '',
      `**Location:** ${finding.matchedAt || finding.target}`,
      '',
      '---',
      ''
    );
  });

  lines.push(
    '## Methodology',
    '',
    'This assessment used automated tools with local and advisory triage to identify potential security issues.',
    'All findings have been scored and filtered to reduce false positives.',
    '',
    '## Recommendations',
    '',
    '1. Review and validate each finding manually',
    '2. Prioritize remediation based on severity and confidence scores',
    '3. Implement security controls to prevent similar issues',
    '4. Conduct regular security assessments',
    '',
    '## Disclaimer',
    '',
    'This is an automated assessment. Manual verification is recommended before reporting to bug bounty programs.',
    ''
  );

  return lines.join('\n');
}

export function renderFinding(finding: TriagedFinding, target: string, date: Date): string {
  const location = finding.matchedAt || finding.target;
  return [
    `# ${finding.name || 'Security Finding'}`,
    '',
    `**Target:** ${target}`,
    `**Severity:** ${finding.severityAdjusted.toUpperCase()}`,
    `**Date:** ${dateOnly(date)}`,
    '',
    '## Description',
    '',
    finding.description || 'No description available',
    '',
    '## Impact',
    '',
    IMPACT_BY_SEVERITY[finding.severityAdjusted] ?? 'Impact assessment required.',
    '',
    '## Steps to Reproduce',
    '',
    `1. Navigate to ${location}`,
    '2. Observe the security issue as described',
    '3. Review the evidence provided below',
    '',
    '## Evidence',
    '',
    '```json',
    JSON.stringify(finding.evidence ?? {}, null, 2),
    '```',
    '',
    '## Remediation',
    '',
    remediationFor(finding.name),
    '',
    '## Score',
    '',
    `- ML Score: ${finding.mlScore.toFixed(2)}`,
    `- Advisory Score: ${finding.llmScore.toFixed(2)}`,
    `- Final Score: ${finding.finalScore.toFixed(2)}`,
    `- Confidence: ${finding.confidence.toFixed(2)}`,
    '',
    '## Explanation',
    '',
    finding.explanation || 'No explanation available',
    '',
  ].join('\n');
}

// ─────────────────────────────────────────────────────────────
// Reporter
// ─────────────────────────────────────────────────────────────

export interface MarkdownReporterOptions {
  logger: Logger;
  policy?: ReportPolicy;
  /** Set to run per-finding reports through the advisory writer */
  advisory?: AdvisoryService;
  now?: () => Date;
}

export class MarkdownReporter implements Reporter {
  private readonly logger: Logger;
  private readonly policy: ReportPolicy;

  constructor(private readonly options: MarkdownReporterOptions) {
    this.logger = options.logger.child({ component: 'report' });
    this.policy = options.policy ?? DEFAULT_REPORT_POLICY;
  }

  async generate(
    runId: string,
    target: string,
    findings: TriagedFinding[],
    outputLocation: string
  ): Promise<Result<string>> {
    this.logger.info(`Generating report for ${target}`);
    const date = (this.options.now ?? (() => new Date()))();
    const reportable = selectReportable(findings, this.policy);

    try {
      mkdirSync(join(outputLocation, 'findings'), { recursive: true });

      const detailed = reportable.slice(0, this.policy.maxDetailed);
      for (const [i, finding] of detailed.entries()) {
        const body = await this.polish(renderFinding(finding, target, date));
        writeFileSync(join(outputLocation, 'findings', `finding_${i + 1}.md`), body, 'utf-8');
      }

      const summaryPath = join(outputLocation, 'report.md');
      writeFileSync(summaryPath, renderSummary(runId, target, reportable, this.policy, date), 'utf-8');
      this.logger.info(`Report saved to ${summaryPath}`);
      return ok(summaryPath);
    } catch (error) {
      return fail(`Failed to write report: ${formatError(error)}`);
    }
  }

  private async polish(report: string): Promise<string> {
    const advisory = this.options.advisory;
    if (!advisory) return report;

    const result = await advisory.polishReport(report);
    if (!result.success) {
      this.logger.warn(`Report polishing failed: ${result.error}`);
      return report;
    }
    return result.data;
  }
}
