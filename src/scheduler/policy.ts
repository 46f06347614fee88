import { BlockchainInspiredPolicy, type BlockchainPolicyOptions } from './policies/blockchain-inspired.js';
import { LeastLoadedPolicy } from './policies/least-loaded.js';
import { RoundRobinPolicy } from './policies/round-robin.js';
import { UrgencyAwarePolicy } from './policies/urgency-aware.js';
import type { PolicyKind } from './types.js';

export type Policy = RoundRobinPolicy | UrgencyAwarePolicy | LeastLoadedPolicy | BlockchainInspiredPolicy;

export type PolicyOf<K extends PolicyKind> = Extract<Policy, { kind: K }>;

export interface PolicyOptions {
  blockchain?: BlockchainPolicyOptions;
}

export interface PolicyDescriptor {
  kind: PolicyKind;
  label: string;
  /** Which direction of the returned score is preferable */
  scoreOrder: 'lower-is-better' | 'higher-is-better' | 'load';
  /**
   * Score returned when no VM is admissible. A null VM is the failure
   * signal: for `blockchain` the sentinel is +Infinity although higher
   * scores are better, and for `roundrobin` it is 0, which is also the
   * load of an idle VM.
   */
  sentinel: number;
  records: boolean;
}

export const POLICY_DESCRIPTORS: Record<PolicyKind, PolicyDescriptor> = {
  roundrobin: {
    kind: 'roundrobin',
    label: 'Round robin',
    scoreOrder: 'load',
    sentinel: 0,
    records: false,
  },
  urgency: {
    kind: 'urgency',
    label: 'Urgency aware',
    scoreOrder: 'lower-is-better',
    sentinel: Infinity,
    records: false,
  },
  leastloaded: {
    kind: 'leastloaded',
    label: 'Least loaded',
    scoreOrder: 'lower-is-better',
    sentinel: Infinity,
    records: false,
  },
  blockchain: {
    kind: 'blockchain',
    label: 'Blockchain inspired',
    scoreOrder: 'higher-is-better',
    sentinel: Infinity,
    records: true,
  },
};

/** True when the sentinel could be mistaken for a successful score */
export function sentinelIsAmbiguous(descriptor: PolicyDescriptor): boolean {
  switch (descriptor.scoreOrder) {
    case 'higher-is-better':
      return descriptor.sentinel === Infinity;
    case 'lower-is-better':
      return descriptor.sentinel === -Infinity;
    case 'load':
      return descriptor.sentinel >= 0 && descriptor.sentinel <= 1;
  }
}

export function createPolicy<K extends PolicyKind>(kind: K, options?: PolicyOptions): PolicyOf<K>;
export function createPolicy(kind: PolicyKind, options: PolicyOptions = {}): Policy {
  switch (kind) {
    case 'roundrobin':
      return new RoundRobinPolicy();
    case 'urgency':
      return new UrgencyAwarePolicy();
    case 'leastloaded':
      return new LeastLoadedPolicy();
    case 'blockchain':
      return new BlockchainInspiredPolicy(options.blockchain);
    default:
      return assertNever(kind);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled policy kind: ${String(value)}`);
}
