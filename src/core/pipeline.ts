/**
 * Pipeline contracts - collaborator interfaces and run results
 */

import { FindingRecord, RunMode, TriagedFinding } from '../types.js';
import { Result } from './validation.js';

// ─────────────────────────────────────────────────────────────
// Collaborators
// ─────────────────────────────────────────────────────────────

export interface ReconCollaborator {
  /** Subdomains of the target, always including the target itself. */
  enumerate(target: string, signal?: AbortSignal): Promise<Result<string[]>>;
  /** Hosts that answer over HTTP(S), as URLs. */
  probe(hosts: string[], signal?: AbortSignal): Promise<Result<string[]>>;
}

export interface CrawlCollaborator {
  crawl(startUrl: string, signal?: AbortSignal): Promise<Result<string[]>>;
}

export interface ScanConstraints {
  timeoutSeconds: number;
  signal?: AbortSignal;
}

/**
 * Runs one kind of scan against one host. An empty list is a successful
 * scan with no results. Safe to retry.
 */
export interface ScanAdapter {
  readonly kind: string;
  /** Template or rule set this adapter runs; checked against the rule manifest. */
  readonly templateOrRuleId: string;
  readonly severity: string;
  run(target: string, constraints: ScanConstraints): Promise<Result<FindingRecord[]>>;
}

export interface Reporter {
  /** Returns the report location. Findings arrive sorted by final score, highest first. */
  generate(runId: string, target: string, findings: TriagedFinding[], outputLocation: string): Promise<Result<string>>;
}

// ─────────────────────────────────────────────────────────────
// Run options and results
// ─────────────────────────────────────────────────────────────

export interface RunOptions {
  mode: RunMode;
  signal?: AbortSignal;
  /** Whole-run timeout in seconds */
  timeoutSeconds?: number;
}

export type PolicyStopReason = 'blocked_by_policy' | 'unknown_scope' | 'override_declined';
export type FailureReason = 'cancelled' | 'error';

interface ResultBase {
  runId: string;
  target: string;
}

export type PipelineResult =
  | (ResultBase & {
      status: 'completed';
      success: true;
      findingsCount: number;
      reportPath?: string;
    })
  | (ResultBase & {
      status: 'policy-stop';
      success: false;
      reason: PolicyStopReason;
      detail: string;
    })
  | (ResultBase & {
      status: 'failed';
      success: false;
      reason: FailureReason;
      error: string;
    });

export interface MultiTargetResult {
  results: PipelineResult[];
  allSucceeded: boolean;
}

export interface ReconOutput {
  target: string;
  subdomains: string[];
  liveHosts: string[];
  crawledUrls: Record<string, string[]>;
}
