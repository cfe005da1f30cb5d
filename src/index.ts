// bountygate - policy-gated security testing pipeline

export * from './types.js';
export { loadConfig, loadScopeDefinition, CONFIG_FILENAME } from './core/config.js';
export { BountyGateError, ConfigError, AdvisoryError, AbortError, formatError } from './core/errors.js';
export { ok, fail } from './core/validation.js';
export type { Result } from './core/validation.js';
export { createLogger, createSilentLogger, createMemoryLogger, createCliLogger } from './core/logger.js';
export type { Logger, LogEntry, LogSink } from './core/logger.js';
export { RateLimiter } from './core/rate-limiter.js';
export { JsonFileStorage } from './core/storage.js';
export type { RunStorage, AuditQuery, AdvisoryExchange } from './core/storage.js';
export { Orchestrator, scanPermission, sortByScore } from './core/orchestrator.js';
export type { OrchestratorDeps, OrchestratorSettings, Stage } from './core/orchestrator.js';
export type {
  ReconCollaborator,
  CrawlCollaborator,
  ScanAdapter,
  ScanConstraints,
  Reporter,
  RunOptions,
  PipelineResult,
  MultiTargetResult,
} from './core/pipeline.js';
export { PolicyGate, OVERRIDE_TOKEN } from './policy/gate.js';
export type { OverrideChannel, OverrideOutcome } from './policy/gate.js';
export { AuditTrail } from './policy/audit.js';
export { loadManifest, parseManifest, findMatchingRule } from './policy/manifest.js';
export { matchesScopePattern, classifyTarget } from './policy/scope-matcher.js';
export { FusionTriageScorer, adjustSeverity } from './triage/fusion-scorer.js';
export { trainClassifier, loadClassifier, LogisticTriageModel } from './triage/classifier.js';
export * from './providers/index.js';
export { PassiveRecon } from './recon/passive.js';
export { NucleiScanner, parseNucleiOutput } from './scanners/nuclei.js';
export { Crawler, extractLinks } from './scanners/crawler.js';
export { MarkdownReporter, DEFAULT_REPORT_POLICY } from './output/markdown-report.js';
export type { ReportPolicy } from './output/markdown-report.js';
