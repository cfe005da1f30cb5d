/**
 * Pipeline Orchestrator
 *
 * Runs one target at a time through an explicit state machine:
 *
 *   scope-check → recon → probe → crawl → scan → triage → report
 *
 * Each stage handler returns a transition. Policy stops are ordinary
 * outcomes, not errors. Collaborator failures are logged and degrade the
 * run; only cancellation or an unexpected exception fails it. Storage calls
 * never abort a stage.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  FindingRecord,
  PolicyDecision,
  RunMode,
  RunStatus,
  ScopeDefinition,
  TriagedFinding,
} from '../types.js';
import { AuditTrail } from '../policy/audit.js';
import { OverrideChannel, PolicyGate } from '../policy/gate.js';
import { FusionTriageScorer } from '../triage/fusion-scorer.js';
import { AbortError, formatError, isAbortError } from './errors.js';
import { Logger } from './logger.js';
import {
  CrawlCollaborator,
  FailureReason,
  MultiTargetResult,
  PipelineResult,
  PolicyStopReason,
  ReconCollaborator,
  ReconOutput,
  Reporter,
  RunOptions,
  ScanAdapter,
} from './pipeline.js';
import { RateLimiter } from './rate-limiter.js';
import { RunStorage } from './storage.js';
import { generateRunId } from './utils.js';
import { Result, fail } from './validation.js';
import { runWorkerPool } from './worker-pool.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type Stage = 'scope-check' | 'recon' | 'probe' | 'crawl' | 'scan' | 'triage' | 'report';

type Transition =
  | { kind: 'next'; stage: Stage }
  | { kind: 'completed' }
  | { kind: 'policy-stop'; reason: PolicyStopReason; detail: string };

interface RunContext {
  runId: string;
  target: string;
  mode: RunMode;
  scope?: ScopeDefinition;
  outputLocation: string;
  signal: AbortSignal;
  logger: Logger;
  recon: ReconOutput;
  findings: FindingRecord[];
  triaged: TriagedFinding[];
  scanFailures: number;
  skippedActions: number;
  reportPath?: string;
}

export interface OrchestratorSettings {
  outputDir: string;
  maxConcurrency: number;
  /** Per-request timeout handed to scanners */
  timeoutSeconds: number;
  crawlSeedHosts: number;
}

export interface OrchestratorDeps {
  gate: PolicyGate;
  audit: AuditTrail;
  limiter: RateLimiter;
  storage: RunStorage;
  recon: ReconCollaborator;
  crawler?: CrawlCollaborator;
  scanners: ScanAdapter[];
  scorer: FusionTriageScorer;
  reporter: Reporter;
  logger: Logger;
  settings: OrchestratorSettings;
  overrideChannel?: OverrideChannel;
  runIdFactory?: (target: string) => string;
}

export type ScanPermission = { scan: true } | { scan: false; why: string };

/**
 * Whether a host may be scanned given its action decision and the run mode.
 * Advisory approvals only count in validated-scan mode.
 */
export function scanPermission(decision: PolicyDecision, mode: RunMode): ScanPermission {
  switch (decision.decision) {
    case 'Blocked':
      return { scan: false, why: `blocked: ${decision.reason}` };
    case 'Unknown':
      return { scan: false, why: `undecided: ${decision.reason}` };
    case 'RequiresValidation':
      return { scan: false, why: `requires validation: ${decision.reason}` };
    case 'Allowed':
      if (decision.source === 'advisory' && mode !== 'full-scan-with-validation') {
        return { scan: false, why: 'validated action needs full-scan-with-validation mode' };
      }
      return { scan: true };
  }
}

function isTriaged(finding: FindingRecord): finding is TriagedFinding {
  return (
    finding.mlScore !== undefined &&
    finding.llmScore !== undefined &&
    finding.finalScore !== undefined &&
    finding.confidence !== undefined &&
    finding.severityAdjusted !== undefined &&
    finding.isFalsePositive !== undefined &&
    finding.explanation !== undefined
  );
}

export function sortByScore(findings: TriagedFinding[]): TriagedFinding[] {
  return [...findings].sort((a, b) => b.finalScore - a.finalScore);
}

/**
 * Combine an optional external signal with an optional timeout.
 */
function linkSignals(external?: AbortSignal, timeoutSeconds?: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();

  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener('abort', abort, { once: true });
  }
  const timer = timeoutSeconds !== undefined ? setTimeout(abort, timeoutSeconds * 1000) : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      external?.removeEventListener('abort', abort);
    },
  };
}

// ─────────────────────────────────────────────────────────────
// Orchestrator
// ─────────────────────────────────────────────────────────────

export class Orchestrator {
  private readonly logger: Logger;
  private readonly nextRunId: (target: string) => string;
  private readonly handlers: Record<Stage, (ctx: RunContext) => Promise<Transition>>;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger.child({ component: 'orchestrator' });
    this.nextRunId = deps.runIdFactory ?? generateRunId;
    this.handlers = {
      'scope-check': (ctx) => this.scopeCheck(ctx),
      recon: (ctx) => this.reconStage(ctx),
      probe: (ctx) => this.probeStage(ctx),
      crawl: (ctx) => this.crawlStage(ctx),
      scan: (ctx) => this.scanStage(ctx),
      triage: (ctx) => this.triageStage(ctx),
      report: (ctx) => this.reportStage(ctx),
    };
  }

  /**
   * Run the full pipeline for one target. Never throws.
   */
  async run(target: string, scope: ScopeDefinition | undefined, options: RunOptions): Promise<PipelineResult> {
    const runId = this.nextRunId(target);
    const outputLocation = join(this.deps.settings.outputDir, runId);
    const { signal, dispose } = linkSignals(options.signal, options.timeoutSeconds);
    const logger = this.logger.child({ runId, target });

    const ctx: RunContext = {
      runId,
      target,
      mode: options.mode,
      scope,
      outputLocation,
      signal,
      logger,
      recon: { target, subdomains: [], liveHosts: [], crawledUrls: {} },
      findings: [],
      triaged: [],
      scanFailures: 0,
      skippedActions: 0,
    };

    logger.info(`Starting ${options.mode} run for ${target}`);
    await this.persist(ctx, 'create run', () =>
      this.deps.storage.createRun({
        runId,
        target,
        mode: options.mode,
        outputLocation,
        status: 'Running',
        startTime: new Date().toISOString(),
        findingsCount: 0,
      })
    );

    let result: PipelineResult;
    try {
      mkdirSync(outputLocation, { recursive: true });
      result = await this.drive(ctx);
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        logger.warn('Run cancelled');
        result = this.failed(ctx, 'cancelled', 'Run cancelled');
      } else {
        logger.error(`Run failed: ${formatError(error)}`, {
          stack: error instanceof Error ? error.stack : undefined,
        });
        result = this.failed(ctx, 'error', formatError(error));
      }
    } finally {
      dispose();
    }

    await this.deps.audit.flush();
    await this.finishRun(ctx, result);
    return result;
  }

  /**
   * Process targets one after another. A failure on one target never stops the rest.
   */
  async runTargets(targets: string[], scope: ScopeDefinition | undefined, options: RunOptions): Promise<MultiTargetResult> {
    const results: PipelineResult[] = [];
    for (const target of targets) {
      if (options.signal?.aborted) {
        results.push({
          status: 'failed',
          success: false,
          runId: '',
          target,
          reason: 'cancelled',
          error: 'Run cancelled before start',
        });
        continue;
      }
      results.push(await this.run(target, scope, options));
    }
    return { results, allSucceeded: results.every((r) => r.success) };
  }

  /**
   * Re-render the report of an earlier run from its stored findings.
   */
  async generateReportOnly(runId: string): Promise<Result<string>> {
    const run = await this.deps.storage.getRun(runId);
    if (!run) {
      return fail(`Run not found: ${runId}`);
    }
    const findings = (await this.deps.storage.listFindings(runId)).filter(isTriaged);
    mkdirSync(run.outputLocation, { recursive: true });
    return this.deps.reporter.generate(runId, run.target, sortByScore(findings), run.outputLocation);
  }

  // ─────────────────────────────────────────────────────────────
  // State machine
  // ─────────────────────────────────────────────────────────────

  private async drive(ctx: RunContext): Promise<PipelineResult> {
    let stage: Stage = 'scope-check';
    for (;;) {
      if (ctx.signal.aborted) {
        throw new AbortError();
      }
      ctx.logger.debug(`Entering stage ${stage}`);
      const transition = await this.handlers[stage](ctx);

      switch (transition.kind) {
        case 'next':
          stage = transition.stage;
          break;
        case 'policy-stop':
          ctx.logger.warn(`Run stopped by policy: ${transition.reason}`, { detail: transition.detail });
          return {
            status: 'policy-stop',
            success: false,
            runId: ctx.runId,
            target: ctx.target,
            reason: transition.reason,
            detail: transition.detail,
          };
        case 'completed':
          return {
            status: 'completed',
            success: true,
            runId: ctx.runId,
            target: ctx.target,
            findingsCount: ctx.triaged.length,
            ...(ctx.reportPath ? { reportPath: ctx.reportPath } : {}),
          };
      }
    }
  }

  private async scopeCheck(ctx: RunContext): Promise<Transition> {
    const { gate, overrideChannel } = this.deps;
    const decision = await gate.validateScope(ctx.target, ctx.scope, ctx.signal);

    if (decision.decision === 'Allowed') {
      return { kind: 'next', stage: 'recon' };
    }
    if (decision.decision === 'Blocked') {
      return { kind: 'policy-stop', reason: 'blocked_by_policy', detail: decision.reason };
    }
    if (decision.decision === 'Unknown' && gate.overrideEnabled && overrideChannel) {
      const outcome = await gate.requestManualOverride(ctx.target, decision, overrideChannel);
      return outcome.accepted
        ? { kind: 'next', stage: 'recon' }
        : { kind: 'policy-stop', reason: 'override_declined', detail: decision.reason };
    }
    return { kind: 'policy-stop', reason: 'unknown_scope', detail: decision.reason };
  }

  private async reconStage(ctx: RunContext): Promise<Transition> {
    const result = await this.deps.recon.enumerate(ctx.target, ctx.signal);
    if (result.success) {
      ctx.recon.subdomains = result.data;
    } else {
      ctx.logger.warn(`Subdomain enumeration failed: ${result.error}`);
      ctx.recon.subdomains = [ctx.target];
    }
    ctx.logger.info(`Found ${ctx.recon.subdomains.length} subdomains`);
    return { kind: 'next', stage: 'probe' };
  }

  private async probeStage(ctx: RunContext): Promise<Transition> {
    const result = await this.deps.recon.probe(ctx.recon.subdomains, ctx.signal);
    if (result.success) {
      ctx.recon.liveHosts = result.data;
    } else {
      ctx.logger.warn(`HTTP probing failed: ${result.error}`);
    }
    ctx.logger.info(`Found ${ctx.recon.liveHosts.length} live hosts`);
    this.writeRecon(ctx);

    if (ctx.mode === 'passive-only') {
      ctx.logger.info('Passive-only mode, stopping after recon');
      return { kind: 'completed' };
    }
    return { kind: 'next', stage: this.deps.crawler ? 'crawl' : 'scan' };
  }

  private async crawlStage(ctx: RunContext): Promise<Transition> {
    const crawler = this.deps.crawler;
    if (!crawler) {
      return { kind: 'next', stage: 'scan' };
    }

    for (const host of ctx.recon.liveHosts.slice(0, this.deps.settings.crawlSeedHosts)) {
      if (ctx.signal.aborted) {
        throw new AbortError();
      }
      try {
        const result = await crawler.crawl(host, ctx.signal);
        if (result.success) {
          ctx.recon.crawledUrls[host] = result.data;
        } else {
          ctx.logger.warn(`Crawl failed for ${host}: ${result.error}`);
        }
      } catch (error) {
        if (ctx.signal.aborted) throw error;
        ctx.logger.warn(`Crawl failed for ${host}: ${formatError(error)}`);
      }
    }

    this.writeRecon(ctx);
    return { kind: 'next', stage: 'scan' };
  }

  private async scanStage(ctx: RunContext): Promise<Transition> {
    const { gate, limiter, scanners, settings } = this.deps;
    const jobs = ctx.recon.liveHosts.flatMap((host) => scanners.map((scanner) => ({ host, scanner })));
    ctx.logger.info(`Scanning ${ctx.recon.liveHosts.length} hosts with ${scanners.length} scanner(s)`);

    await runWorkerPool(
      jobs,
      settings.maxConcurrency,
      async ({ host, scanner }) => {
        const decision = await gate.validateAction(
          {
            scannerKind: scanner.kind,
            target: host,
            templateOrRuleId: scanner.templateOrRuleId,
            severityHint: scanner.severity,
          },
          ctx.signal
        );

        const permission = scanPermission(decision, ctx.mode);
        if (!permission.scan) {
          ctx.skippedActions++;
          ctx.logger.warn(`Skipping ${scanner.kind} on ${host} (${permission.why})`);
          return;
        }

        try {
          const result = await limiter.withPermit(
            () => scanner.run(host, { timeoutSeconds: settings.timeoutSeconds, signal: ctx.signal }),
            ctx.signal
          );
          if (result.success) {
            ctx.findings.push(...result.data);
          } else {
            ctx.scanFailures++;
            ctx.logger.warn(`${scanner.kind} scan failed for ${host}: ${result.error}`);
          }
        } catch (error) {
          if (ctx.signal.aborted || isAbortError(error)) throw error;
          ctx.scanFailures++;
          ctx.logger.warn(`${scanner.kind} scan failed for ${host}: ${formatError(error)}`);
        }
      },
      ctx.signal
    );

    ctx.logger.info(
      `Scan stage finished: ${ctx.findings.length} findings, ${ctx.scanFailures} failures, ${ctx.skippedActions} skipped`
    );
    return { kind: 'next', stage: 'triage' };
  }

  private async triageStage(ctx: RunContext): Promise<Transition> {
    for (const finding of ctx.findings) {
      if (ctx.signal.aborted) {
        throw new AbortError();
      }
      try {
        ctx.triaged.push(await this.deps.scorer.scoreInPlace(finding, ctx.signal));
      } catch (error) {
        if (ctx.signal.aborted) throw error;
        ctx.logger.warn(`Triage failed for ${finding.name}: ${formatError(error)}`);
      }
      await this.persist(ctx, 'save finding', () => this.deps.storage.saveFinding(ctx.runId, finding));
    }
    return { kind: 'next', stage: 'report' };
  }

  private async reportStage(ctx: RunContext): Promise<Transition> {
    const result = await this.deps.reporter.generate(
      ctx.runId,
      ctx.target,
      sortByScore(ctx.triaged),
      ctx.outputLocation
    );
    if (result.success) {
      ctx.reportPath = result.data;
    } else {
      ctx.logger.warn(`Report generation failed: ${result.error}`);
    }
    return { kind: 'completed' };
  }

  // ─────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────

  private failed(ctx: RunContext, reason: FailureReason, error: string): PipelineResult {
    return { status: 'failed', success: false, runId: ctx.runId, target: ctx.target, reason, error };
  }

  private async finishRun(ctx: RunContext, result: PipelineResult): Promise<void> {
    const status: RunStatus = result.success ? 'Completed' : 'Failed';
    const reason = result.success ? undefined : result.reason;
    const count = result.status === 'completed' ? result.findingsCount : ctx.triaged.length;
    await this.persist(ctx, 'update run status', () =>
      this.deps.storage.updateRunStatus(ctx.runId, status, count, reason)
    );
    ctx.logger.info(`Run finished: ${status}${reason ? ` (${reason})` : ''}`);
  }

  private writeRecon(ctx: RunContext): void {
    try {
      writeFileSync(join(ctx.outputLocation, 'recon.json'), JSON.stringify(ctx.recon, null, 2), 'utf-8');
    } catch (error) {
      ctx.logger.warn(`Failed to write recon results: ${formatError(error)}`);
    }
  }

  private async persist(ctx: RunContext, what: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      ctx.logger.error(`Storage failed to ${what}: ${formatError(error)}`);
    }
  }
}
