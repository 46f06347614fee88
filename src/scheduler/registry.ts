import { componentLogger } from '../core/logger.js';
import { UnknownPolicyError } from '../core/errors.js';
import { createPolicy, type Policy, type PolicyOf, type PolicyOptions } from './policy.js';
import { POLICY_KINDS, isPolicyKind, type PolicyKind } from './types.js';

/**
 * SchedulerRegistry — one lazily built policy instance per kind.
 *
 * Owned by whoever composes the scheduling service. Repeated lookups return
 * the same instance, so round-robin cursors, history windows and the ledger
 * persist for the registry's lifetime.
 */
export class SchedulerRegistry {
  private instances: Map<PolicyKind, Policy> = new Map();
  private logger = componentLogger('registry');

  constructor(private readonly options: PolicyOptions = {}) {}

  get<K extends PolicyKind>(kind: K): PolicyOf<K>;
  get(kind: PolicyKind): Policy {
    const existing = this.instances.get(kind);
    if (existing) return existing;

    const policy = createPolicy(kind, this.options);
    this.instances.set(kind, policy);
    this.logger.debug({ policy: kind }, 'Created scheduling policy');
    return policy;
  }

  /**
   * Look up a policy by an untrusted name.
   * @throws UnknownPolicyError
   */
  resolve(name: string): Policy {
    if (!isPolicyKind(name)) {
      throw new UnknownPolicyError(name, POLICY_KINDS);
    }
    return this.get(name);
  }

  has(name: string): name is PolicyKind {
    return isPolicyKind(name);
  }

  kinds(): PolicyKind[] {
    return [...POLICY_KINDS];
  }

  /** Kinds whose instance has been built so far */
  instantiated(): PolicyKind[] {
    return [...this.instances.keys()];
  }
}
