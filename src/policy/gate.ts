/**
 * Policy Decision Gate
 *
 * Decides whether a target may be tested at all (scope) and whether a given
 * scanner action may run against it. Local rules are deterministic and final
 * when they block; the advisory service is only consulted for cases the
 * local rules leave open. Every decision is written to the audit trail
 * before it is returned.
 */

import { ActionDescriptor, DecisionKind, DecisionSource, PolicyDecision, ScopeDefinition } from '../types.js';
import { Logger } from '../core/logger.js';
import { AdvisoryService } from '../providers/advisory.js';
import { AuditTrail } from './audit.js';
import { RuleManifest, findMatchingRule } from './manifest.js';
import { classifyTarget } from './scope-matcher.js';

export const OVERRIDE_TOKEN = 'I_ACCEPT_RISK';

/**
 * Asks an operator for the override token. Resolves undefined when the
 * operator cancels or no interactive terminal is available.
 */
export type OverrideChannel = (target: string, decision: PolicyDecision) => Promise<string | undefined>;

export type OverrideOutcome =
  | { accepted: true; decision: PolicyDecision }
  | { accepted: false; reason: 'override_disabled' | 'not_overridable' | 'override_declined' };

export interface PolicyGateOptions {
  manifest: RuleManifest;
  audit: AuditTrail;
  logger: Logger;
  advisory?: AdvisoryService;
  /** CLI flag and config switch combined */
  allowManualOverride?: boolean;
}

function decide(
  decision: DecisionKind,
  confidence: number,
  reason: string,
  details: string,
  source: DecisionSource = 'local'
): PolicyDecision {
  return Object.freeze({ decision, confidence, reason, details, source });
}

export class PolicyGate {
  private readonly logger: Logger;

  constructor(private readonly options: PolicyGateOptions) {
    this.logger = options.logger.child({ component: 'policy' });
  }

  get overrideEnabled(): boolean {
    return this.options.allowManualOverride === true;
  }

  // ─────────────────────────────────────────────────────────────
  // Scope
  // ─────────────────────────────────────────────────────────────

  async validateScope(target: string, scope?: ScopeDefinition, signal?: AbortSignal): Promise<PolicyDecision> {
    this.logger.info(`Validating scope for target: ${target}`);

    if (!scope) {
      return this.finish(
        target,
        'scope_check',
        decide(
          'Unknown',
          0,
          'no scope provided',
          'Provide --scope-file with in-scope targets from your bug bounty program'
        )
      );
    }

    const match = classifyTarget(target, scope);
    switch (match.kind) {
      case 'out_of_scope':
        return this.finish(
          target,
          'scope_check',
          decide(
            'Blocked',
            1,
            `Target matches out-of-scope pattern: ${match.pattern}`,
            'This target is explicitly excluded from the program scope'
          )
        );
      case 'in_scope':
        return this.finish(
          target,
          'scope_check',
          decide(
            'Allowed',
            1,
            `Target matches in-scope pattern: ${match.pattern}`,
            'Target is within defined program scope'
          )
        );
      case 'none':
        break;
    }

    const advisory = this.options.advisory;
    if (!advisory) {
      return this.finish(
        target,
        'scope_check',
        decide(
          'Unknown',
          0,
          'Target does not match any scope patterns',
          'Add the target to the scope file or enable advisory validation'
        )
      );
    }

    this.logger.info('No direct scope match, consulting advisory service');
    const result = await advisory.validate({ kind: 'scope', target, scope }, signal);
    const decision = result.success
      ? decide(
          result.data.decision,
          result.data.confidence,
          result.data.reasons.join('; ') || 'advisory validation',
          (result.data.suggestedNextSteps ?? []).join('; '),
          'advisory'
        )
      : // Scope failures stay Unknown so an operator can still review them
        decide('Unknown', 0, `Advisory validation error: ${result.error}`, 'Manual review required', 'advisory');

    return this.finish(target, 'scope_check_advisory', decision);
  }

  // ─────────────────────────────────────────────────────────────
  // Scanner actions
  // ─────────────────────────────────────────────────────────────

  async validateAction(action: ActionDescriptor, signal?: AbortSignal): Promise<PolicyDecision> {
    const actionKind = `scanner_${action.scannerKind}`;
    this.logger.debug(`Validating scanner action: ${action.scannerKind} on ${action.target}`, {
      template: action.templateOrRuleId,
    });

    const rule = findMatchingRule(this.options.manifest, action.templateOrRuleId);

    if (rule?.kind === 'block') {
      return this.finish(
        action.target,
        actionKind,
        decide('Blocked', 1, `Template matches blocked pattern: ${rule.id}`, rule.notes)
      );
    }

    if (rule?.kind === 'requires-validation') {
      const advisory = this.options.advisory;
      if (!advisory) {
        return this.finish(
          action.target,
          actionKind,
          decide('RequiresValidation', 0.5, `Template requires validation: ${rule.id}`, rule.notes)
        );
      }

      const result = await advisory.validate({ kind: 'action', action }, signal);
      const decision = result.success
        ? decide(
            result.data.decision,
            result.data.confidence,
            result.data.reasons.join('; ') || 'advisory validation',
            `Risk level: ${result.data.riskLevel ?? 'unknown'}`,
            'advisory'
          )
        : // Actions fail closed
          decide('Blocked', 0, `Validation error: ${result.error}`, 'Failed to validate, blocking for safety', 'advisory');

      return this.finish(action.target, `${actionKind}_advisory`, decision);
    }

    return this.finish(
      action.target,
      actionKind,
      decide('Allowed', 1, 'No policy restrictions matched', 'Action is within safe parameters')
    );
  }

  // ─────────────────────────────────────────────────────────────
  // Manual override
  // ─────────────────────────────────────────────────────────────

  async requestManualOverride(
    target: string,
    decision: PolicyDecision,
    channel: OverrideChannel
  ): Promise<OverrideOutcome> {
    if (!this.overrideEnabled) {
      return { accepted: false, reason: 'override_disabled' };
    }
    // Blocks are final; only an undecided scope can be overridden
    if (decision.decision !== 'Unknown') {
      return { accepted: false, reason: 'not_overridable' };
    }

    const answer = await channel(target, decision);
    if (answer !== OVERRIDE_TOKEN) {
      this.logger.warn('Manual override declined', { target });
      return { accepted: false, reason: 'override_declined' };
    }

    const accepted = decide('Allowed', 1, 'manual override accepted', `Operator accepted risk for ${target}`, 'override');
    this.logger.warn('Manual override accepted', { target });
    return { accepted: true, decision: await this.finish(target, 'manual_override', accepted) };
  }

  private async finish(target: string, actionKind: string, decision: PolicyDecision): Promise<PolicyDecision> {
    await this.options.audit.record(target, actionKind, decision);
    return decision;
  }
}
