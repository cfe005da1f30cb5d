import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ActionDescriptor, PolicyDecision } from '../../../src/types.js';
import { createSilentLogger } from '../../../src/core/logger.js';
import { AuditTrail } from '../../../src/policy/audit.js';
import { OVERRIDE_TOKEN, PolicyGate, PolicyGateOptions } from '../../../src/policy/gate.js';
import { loadManifest } from '../../../src/policy/manifest.js';
import { FakeAdvisory } from '../../helpers/fake-advisory.js';
import { MemoryStorage } from '../../helpers/memory-storage.js';

const manifest = loadManifest();
const scope = { in_scope: ['*.example.com'], out_of_scope: ['dev.example.com'] };

function action(templateOrRuleId: string): ActionDescriptor {
  return { scannerKind: 'nuclei', target: 'https://api.example.com', templateOrRuleId, severityHint: 'low,medium' };
}

describe('policy/gate', () => {
  let storage: MemoryStorage;

  function createGate(options: Partial<PolicyGateOptions> = {}): PolicyGate {
    const logger = createSilentLogger();
    return new PolicyGate({ manifest, audit: new AuditTrail(storage, logger), logger, ...options });
  }

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  describe('validateScope', () => {
    it('should block an out-of-scope target even when it is also in scope', async () => {
      const decision = await createGate().validateScope('dev.example.com', scope);

      expect(decision.decision).toBe('Blocked');
      expect(decision.confidence).toBe(1);
      expect(decision.reason).toBe('Target matches out-of-scope pattern: dev.example.com');
      expect(decision.source).toBe('local');
    });

    it('should allow an in-scope target', async () => {
      const decision = await createGate().validateScope('api.example.com', scope);

      expect(decision.decision).toBe('Allowed');
      expect(decision.confidence).toBe(1);
      expect(decision.reason).toBe('Target matches in-scope pattern: *.example.com');
    });

    it('should return Unknown for an unmatched target without advisory', async () => {
      const decision = await createGate().validateScope('other.org', scope);

      expect(decision.decision).toBe('Unknown');
      expect(decision.confidence).toBe(0);
      expect(decision.reason).toBe('Target does not match any scope patterns');
    });

    it('should return Unknown when no scope is provided', async () => {
      const decision = await createGate().validateScope('api.example.com');

      expect(decision.decision).toBe('Unknown');
      expect(decision.reason).toBe('no scope provided');
    });

    it('should not consult the advisory service for local matches', async () => {
      const advisory = new FakeAdvisory({ validate: { decision: 'Blocked', confidence: 1, reasons: [] } });

      await createGate({ advisory }).validateScope('api.example.com', scope);

      expect(advisory.validations).toHaveLength(0);
    });

    it('should use the advisory decision for unmatched targets', async () => {
      const advisory = new FakeAdvisory({
        validate: { decision: 'Allowed', confidence: 0.7, reasons: ['listed in program page', 'same org'] },
      });

      const decision = await createGate({ advisory }).validateScope('other.org', scope);

      expect(decision).toEqual({
        decision: 'Allowed',
        confidence: 0.7,
        reason: 'listed in program page; same org',
        details: '',
        source: 'advisory',
      });
      expect(advisory.validations).toEqual([{ kind: 'scope', target: 'other.org', scope }]);
    });

    it('should keep scope Unknown when the advisory call fails', async () => {
      const advisory = new FakeAdvisory({ validate: 'timeout' });

      const decision = await createGate({ advisory }).validateScope('other.org', scope);

      expect(decision.decision).toBe('Unknown');
      expect(decision.confidence).toBe(0);
      expect(decision.reason).toBe('Advisory validation error: timeout');
      expect(decision.details).toBe('Manual review required');
    });

    it('should return frozen decisions', async () => {
      const decision = await createGate().validateScope('api.example.com', scope);

      expect(Object.isFrozen(decision)).toBe(true);
    });
  });

  describe('validateAction', () => {
    it('should block templates matching a blocked pattern', async () => {
      const decision = await createGate().validateAction(action('rce-exploit-template'));

      expect(decision.decision).toBe('Blocked');
      expect(decision.confidence).toBe(1);
      expect(decision.reason).toBe('Template matches blocked pattern: rce-templates');
    });

    it('should require validation when no advisory service is configured', async () => {
      const decision = await createGate().validateAction(action('generic-auth-bypass'));

      expect(decision.decision).toBe('RequiresValidation');
      expect(decision.confidence).toBe(0.5);
      expect(decision.reason).toBe('Template requires validation: auth-bypass');
    });

    it('should allow templates that match no rule', async () => {
      const decision = await createGate().validateAction(action('tags:misconfig,exposure'));

      expect(decision.decision).toBe('Allowed');
      expect(decision.reason).toBe('No policy restrictions matched');
    });

    it('should be deterministic without an advisory service', async () => {
      const gate = createGate();
      const ids = ['rce-exploit-template', 'generic-auth-bypass', 'tags:misconfig'];

      const first = await Promise.all(ids.map((id) => gate.validateAction(action(id))));
      const second = await Promise.all(ids.map((id) => gate.validateAction(action(id))));

      expect(second).toEqual(first);
    });

    it('should block when the advisory call fails for a validation rule', async () => {
      const advisory = new FakeAdvisory({ validate: 'malformed response' });

      const decision = await createGate({ advisory }).validateAction(action('generic-auth-bypass'));

      expect(decision.decision).toBe('Blocked');
      expect(decision.confidence).toBe(0);
      expect(decision.reason).toBe('Validation error: malformed response');
      expect(decision.details).toBe('Failed to validate, blocking for safety');
    });

    it('should use the advisory decision for validation rules', async () => {
      const advisory = new FakeAdvisory({
        validate: { decision: 'Allowed', confidence: 0.9, reasons: ['read-only probe'], riskLevel: 'low' },
      });

      const decision = await createGate({ advisory }).validateAction(action('generic-auth-bypass'));

      expect(decision.decision).toBe('Allowed');
      expect(decision.source).toBe('advisory');
      expect(decision.details).toBe('Risk level: low');
    });

    it('should never ask the advisory service about blocked templates', async () => {
      const advisory = new FakeAdvisory({ validate: { decision: 'Allowed', confidence: 1, reasons: [] } });

      const decision = await createGate({ advisory }).validateAction(action('webshell-upload'));

      expect(decision.decision).toBe('Blocked');
      expect(advisory.validations).toHaveLength(0);
    });
  });

  describe('audit', () => {
    it('should record each decision with its action kind before returning', async () => {
      const gate = createGate();

      await gate.validateScope('dev.example.com', scope);
      await gate.validateAction(action('rce-exploit-template'));

      expect(storage.decisions.map((d) => [d.target, d.action_kind, d.decision])).toEqual([
        ['dev.example.com', 'scope_check', 'Blocked'],
        ['https://api.example.com', 'scanner_nuclei', 'Blocked'],
      ]);
    });

    it('should tag advisory-resolved decisions', async () => {
      const advisory = new FakeAdvisory({ validate: 'down' });
      const gate = createGate({ advisory });

      await gate.validateScope('other.org', scope);
      await gate.validateAction(action('generic-lfi'));

      expect(storage.decisions.map((d) => d.action_kind)).toEqual(['scope_check_advisory', 'scanner_nuclei_advisory']);
    });

    it('should still return decisions when storage fails', async () => {
      storage.failWith = new Error('disk full');

      const decision = await createGate().validateScope('api.example.com', scope);

      expect(decision.decision).toBe('Allowed');
    });
  });

  describe('requestManualOverride', () => {
    const unknown: PolicyDecision = {
      decision: 'Unknown',
      confidence: 0,
      reason: 'Target does not match any scope patterns',
      details: '',
      source: 'local',
    };

    it('should refuse when override is disabled', async () => {
      const channel = vi.fn().mockResolvedValue(OVERRIDE_TOKEN);

      const outcome = await createGate().requestManualOverride('other.org', unknown, channel);

      expect(outcome).toEqual({ accepted: false, reason: 'override_disabled' });
      expect(channel).not.toHaveBeenCalled();
    });

    it('should refuse to override a Blocked decision', async () => {
      const channel = vi.fn().mockResolvedValue(OVERRIDE_TOKEN);
      const blocked: PolicyDecision = { ...unknown, decision: 'Blocked', confidence: 1 };

      const outcome = await createGate({ allowManualOverride: true }).requestManualOverride('x.org', blocked, channel);

      expect(outcome).toEqual({ accepted: false, reason: 'not_overridable' });
      expect(channel).not.toHaveBeenCalled();
    });

    it('should accept the exact token and audit the override', async () => {
      const channel = vi.fn().mockResolvedValue('I_ACCEPT_RISK');

      const outcome = await createGate({ allowManualOverride: true }).requestManualOverride('other.org', unknown, channel);

      expect(outcome.accepted).toBe(true);
      if (outcome.accepted) {
        expect(outcome.decision.decision).toBe('Allowed');
        expect(outcome.decision.source).toBe('override');
        expect(outcome.decision.reason).toBe('manual override accepted');
      }
      expect(channel).toHaveBeenCalledWith('other.org', unknown);
      expect(storage.decisions.map((d) => [d.action_kind, d.decision])).toEqual([['manual_override', 'Allowed']]);
    });

    it.each([['i_accept_risk'], [' I_ACCEPT_RISK'], ['yes'], [undefined]])(
      'should decline for answer %j',
      async (answer) => {
        const channel = vi.fn().mockResolvedValue(answer);

        const outcome = await createGate({ allowManualOverride: true }).requestManualOverride('other.org', unknown, channel);

        expect(outcome).toEqual({ accepted: false, reason: 'override_declined' });
        expect(storage.decisions).toHaveLength(0);
      }
    );
  });
});
