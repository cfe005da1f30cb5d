import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Policy Types
// ─────────────────────────────────────────────────────────────

// Decision values are written verbatim to the audit trail; other tooling reads them.
export const DecisionKind = z.enum(['Allowed', 'Blocked', 'Unknown', 'RequiresValidation']);
export type DecisionKind = z.infer<typeof DecisionKind>;

export const DecisionSource = z.enum(['local', 'advisory', 'override']);
export type DecisionSource = z.infer<typeof DecisionSource>;

export const PolicyDecision = z.object({
  decision: DecisionKind,
  confidence: z.number().min(0).max(1),
  reason: z.string(),
  details: z.string(),
  source: DecisionSource,
});
export type PolicyDecision = z.infer<typeof PolicyDecision>;

export const ScopeDefinition = z.object({
  in_scope: z.array(z.string().min(1)).default([]),
  out_of_scope: z.array(z.string().min(1)).default([]),
});
export type ScopeDefinition = z.infer<typeof ScopeDefinition>;

export interface ActionDescriptor {
  scannerKind: string;
  target: string;
  templateOrRuleId: string;
  severityHint: string;
}

export const AuditRecord = z.object({
  target: z.string(),
  action_kind: z.string(),
  decision: DecisionKind,
  reason: z.string(),
  confidence: z.number(),
  timestamp: z.string().datetime(),
});
export type AuditRecord = z.infer<typeof AuditRecord>;

// ─────────────────────────────────────────────────────────────
// Finding Types
// ─────────────────────────────────────────────────────────────

export const FindingSeverity = z.enum(['info', 'low', 'medium', 'high', 'critical', 'unknown']);
export type FindingSeverity = z.infer<typeof FindingSeverity>;

export const TriageFields = z.object({
  mlScore: z.number(),
  llmScore: z.number(),
  finalScore: z.number(),
  confidence: z.number(),
  severityAdjusted: FindingSeverity,
  isFalsePositive: z.boolean(),
  explanation: z.string(),
});
export type TriageResult = z.infer<typeof TriageFields>;

export const FindingRecord = z.object({
  target: z.string(),
  name: z.string(),
  severity: FindingSeverity,
  description: z.string().default(''),
  evidence: z.record(z.string(), z.unknown()).default({}),
  scannerKind: z.string(),
  matchedAt: z.string(),
  templateId: z.string().optional(),
  // Triage fields are filled in place by the fusion scorer
  mlScore: z.number().optional(),
  llmScore: z.number().optional(),
  finalScore: z.number().optional(),
  confidence: z.number().optional(),
  severityAdjusted: FindingSeverity.optional(),
  isFalsePositive: z.boolean().optional(),
  explanation: z.string().optional(),
});
export type FindingRecord = z.infer<typeof FindingRecord>;

export type TriagedFinding = FindingRecord & TriageResult;

export const TriagedFindingSchema = FindingRecord.merge(TriageFields);

// ─────────────────────────────────────────────────────────────
// Run Types
// ─────────────────────────────────────────────────────────────

export const RunMode = z.enum(['passive-only', 'safe-scan', 'full-scan-with-validation']);
export type RunMode = z.infer<typeof RunMode>;

export const RunStatus = z.enum(['Running', 'Completed', 'Failed']);
export type RunStatus = z.infer<typeof RunStatus>;

export const RunRecord = z.object({
  runId: z.string(),
  target: z.string(),
  mode: RunMode,
  outputLocation: z.string(),
  status: RunStatus,
  startTime: z.string().datetime(),
  endTime: z.string().datetime().optional(),
  findingsCount: z.number().int().nonnegative().default(0),
  reason: z.string().optional(),
});
export type RunRecord = z.infer<typeof RunRecord>;

export interface RateBudget {
  requestsPerMinute: number;
  maxConcurrency: number;
}

// ─────────────────────────────────────────────────────────────
// Config Types
// ─────────────────────────────────────────────────────────────

export const AdvisoryProvider = z.enum(['none', 'gemini', 'openai', 'ollama', 'mock']);
export type AdvisoryProvider = z.infer<typeof AdvisoryProvider>;

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevel>;

export const BountyGateConfig = z.object({
  advisory: z.object({
    provider: AdvisoryProvider.default('none'),
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(60000),
    maxRetries: z.number().int().min(0).default(2),
    storeResponses: z.boolean().default(true),
  }).default({}),

  // Rate limits (conservative defaults, hard safety caps)
  scanRate: z.number().int().positive().max(100, 'SCAN_RATE too high (max 100 req/min for safety)').default(5),
  maxConcurrency: z.number().int().positive().max(20, 'MAX_CONCURRENCY too high (max 20 for safety)').default(4),
  timeoutSeconds: z.number().int().positive().default(20),
  runTimeoutSeconds: z.number().int().positive().optional(),

  allowManualUnblock: z.boolean().default(false),
  manifestPath: z.string().optional(),

  logging: z.object({
    level: LogLevel.default('info'),
    format: z.enum(['text', 'json']).default('text'),
    file: z.boolean().default(false),
    dir: z.string().default('logs'),
  }).default({}),

  outputDir: z.string().default('./outputs'),
  dataDir: z.string().default('./.bountygate'),

  triage: z.object({
    mlWeight: z.number().min(0).default(0.4),
    llmWeight: z.number().min(0).default(0.6),
    modelPath: z.string().default('models/triage-model.json'),
  }).default({}),

  nuclei: z.object({
    rateLimit: z.number().int().positive().default(5),
    concurrency: z.number().int().positive().default(3),
    templateTags: z.array(z.string()).default(['misconfig', 'exposure', 'tech']),
    severity: z.array(FindingSeverity).default(['low', 'medium']),
  }).default({}),

  httpxThreads: z.number().int().positive().default(10),

  crawler: z.object({
    delaySeconds: z.number().min(0).default(0.5),
    maxDepth: z.number().int().min(0).default(3),
    maxPages: z.number().int().positive().default(50),
    seedHosts: z.number().int().positive().default(5),
  }).default({}),

  report: z.object({
    includeFalsePositives: z.boolean().default(false),
    minScore: z.number().min(0).max(1).default(0.5),
    maxDetailed: z.number().int().positive().default(10),
    polish: z.boolean().default(false),
  }).default({}),
});
export type BountyGateConfig = z.infer<typeof BountyGateConfig>;
