/**
 * Audit trail - ordered append path for policy decisions
 *
 * Appends are chained on a single promise, so records reach storage in the
 * order decisions were made even when callers do not await each other.
 */

import { AuditRecord, PolicyDecision } from '../types.js';
import { Logger } from '../core/logger.js';
import { RunStorage } from '../core/storage.js';
import { formatError } from '../core/errors.js';

export function toAuditRecord(
  target: string,
  actionKind: string,
  decision: PolicyDecision,
  now: Date = new Date()
): AuditRecord {
  return {
    target,
    action_kind: actionKind,
    decision: decision.decision,
    reason: decision.reason,
    confidence: decision.confidence,
    timestamp: now.toISOString(),
  };
}

export class AuditTrail {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly storage: RunStorage | undefined,
    private readonly logger: Logger
  ) {}

  /**
   * Queue a record. The returned promise settles once this record (and every
   * record queued before it) has been handed to storage. It never rejects.
   */
  record(target: string, actionKind: string, decision: PolicyDecision): Promise<void> {
    const entry = toAuditRecord(target, actionKind, decision);
    this.logger.debug('Policy decision', {
      target,
      action: actionKind,
      decision: decision.decision,
      source: decision.source,
    });

    const storage = this.storage;
    if (!storage) {
      return this.tail;
    }

    this.tail = this.tail.then(async () => {
      try {
        await storage.appendPolicyDecision(entry);
      } catch (error) {
        this.logger.error('Failed to persist policy decision', {
          target,
          action: actionKind,
          error: formatError(error),
        });
      }
    });
    return this.tail;
  }

  /** Resolves once every queued record has been written. */
  flush(): Promise<void> {
    return this.tail;
  }
}
