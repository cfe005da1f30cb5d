/**
 * Run storage - JSON file persistence for runs, findings and the audit trail
 *
 * Layout under the data directory:
 *   runs/<runId>/run.json
 *   runs/<runId>/findings.json
 *   audit/policy-decisions.jsonl
 *   audit/advisory-responses.jsonl
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import fg from 'fast-glob';
import { z } from 'zod';
import {
  AuditRecord,
  FindingRecord,
  RunRecord,
  RunStatus,
} from '../types.js';
import { safeParseJson } from './validation.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export const AdvisoryExchange = z.object({
  timestamp: z.string(),
  kind: z.string(),
  prompt: z.string(),
  response: z.string().optional(),
  success: z.boolean(),
  error: z.string().optional(),
});
export type AdvisoryExchange = z.infer<typeof AdvisoryExchange>;

export interface AuditQuery {
  target?: string;
  limit?: number;
}

export interface RunStorage {
  createRun(record: RunRecord): Promise<void>;
  updateRunStatus(runId: string, status: RunStatus, findingsCount?: number, reason?: string): Promise<void>;
  getRun(runId: string): Promise<RunRecord | undefined>;
  listRuns(): Promise<RunRecord[]>;
  saveFinding(runId: string, finding: FindingRecord): Promise<void>;
  listFindings(runId: string): Promise<FindingRecord[]>;
  appendPolicyDecision(record: AuditRecord): Promise<void>;
  listPolicyDecisions(query?: AuditQuery): Promise<AuditRecord[]>;
  storeAdvisoryExchange(exchange: AdvisoryExchange): Promise<void>;
}

const FindingList = z.array(FindingRecord);

// ─────────────────────────────────────────────────────────────
// JSON file implementation
// ─────────────────────────────────────────────────────────────

export class JsonFileStorage implements RunStorage {
  constructor(private readonly dataDir: string) {}

  private runDir(runId: string): string {
    return join(this.dataDir, 'runs', runId);
  }

  private auditPath(name: string): string {
    return join(this.dataDir, 'audit', name);
  }

  async createRun(record: RunRecord): Promise<void> {
    const dir = this.runDir(record.runId);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'run.json'), JSON.stringify(record, null, 2), 'utf-8');
  }

  async updateRunStatus(
    runId: string,
    status: RunStatus,
    findingsCount?: number,
    reason?: string
  ): Promise<void> {
    const existing = await this.getRun(runId);
    if (!existing) {
      throw new Error(`Run not found: ${runId}`);
    }
    const updated: RunRecord = {
      ...existing,
      status,
      findingsCount: findingsCount ?? existing.findingsCount,
      ...(status !== 'Running' ? { endTime: new Date().toISOString() } : {}),
      ...(reason !== undefined ? { reason } : {}),
    };
    writeFileSync(join(this.runDir(runId), 'run.json'), JSON.stringify(updated, null, 2), 'utf-8');
  }

  async getRun(runId: string): Promise<RunRecord | undefined> {
    const path = join(this.runDir(runId), 'run.json');
    if (!existsSync(path)) {
      return undefined;
    }
    const result = safeParseJson(readFileSync(path, 'utf-8'), RunRecord);
    if (!result.success) {
      throw new Error(`Corrupt run record ${path}: ${result.error}`);
    }
    return result.data;
  }

  async listRuns(): Promise<RunRecord[]> {
    const files = await fg('runs/*/run.json', { cwd: this.dataDir, absolute: true });
    const runs: RunRecord[] = [];
    for (const file of files) {
      const result = safeParseJson(readFileSync(file, 'utf-8'), RunRecord);
      if (result.success) {
        runs.push(result.data);
      }
    }
    return runs.sort((a, b) => b.startTime.localeCompare(a.startTime));
  }

  async saveFinding(runId: string, finding: FindingRecord): Promise<void> {
    const dir = this.runDir(runId);
    mkdirSync(dir, { recursive: true });
    const findings = await this.listFindings(runId);
    findings.push(finding);
    writeFileSync(join(dir, 'findings.json'), JSON.stringify(findings, null, 2), 'utf-8');
  }

  async listFindings(runId: string): Promise<FindingRecord[]> {
    const path = join(this.runDir(runId), 'findings.json');
    if (!existsSync(path)) {
      return [];
    }
    const result = safeParseJson(readFileSync(path, 'utf-8'), FindingList);
    if (!result.success) {
      throw new Error(`Corrupt findings file ${path}: ${result.error}`);
    }
    return result.data;
  }

  async appendPolicyDecision(record: AuditRecord): Promise<void> {
    mkdirSync(join(this.dataDir, 'audit'), { recursive: true });
    appendFileSync(this.auditPath('policy-decisions.jsonl'), JSON.stringify(record) + '\n', 'utf-8');
  }

  async listPolicyDecisions(query: AuditQuery = {}): Promise<AuditRecord[]> {
    const path = this.auditPath('policy-decisions.jsonl');
    if (!existsSync(path)) {
      return [];
    }
    const records: AuditRecord[] = [];
    for (const line of readFileSync(path, 'utf-8').split('\n')) {
      if (!line.trim()) continue;
      const result = safeParseJson(line, AuditRecord);
      if (result.success && (query.target === undefined || result.data.target === query.target)) {
        records.push(result.data);
      }
    }
    return query.limit !== undefined ? records.slice(-query.limit) : records;
  }

  async storeAdvisoryExchange(exchange: AdvisoryExchange): Promise<void> {
    mkdirSync(join(this.dataDir, 'audit'), { recursive: true });
    appendFileSync(this.auditPath('advisory-responses.jsonl'), JSON.stringify(exchange) + '\n', 'utf-8');
  }
}
