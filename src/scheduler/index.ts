/**
 * Scheduler Module — VM selection policies
 *
 * @example
 * ```typescript
 * import { SchedulerRegistry, VirtualMachine } from 'ledgersched/scheduler';
 *
 * const registry = new SchedulerRegistry({ blockchain: { blockSize: 5 } });
 * const vms = [0, 1].map((id) => new VirtualMachine(id, { cpu: 8, mem: 16, io: 4, bw: 10 }));
 *
 * const { vm, score } = registry.get('blockchain').schedule(task, vms);
 * if (vm) vm.commit(task);
 * ```
 */

export { VirtualMachine, meanOf } from './vm.js';
export { ResourceHistoryTracker } from './resource-history.js';
export {
  DEFAULT_WEIGHT_PARAMS,
  currentUsage,
  dynamicWeight,
  fitsAfter,
  priorityScore,
  urgencyFactor,
  type WeightParams,
} from './scoring.js';
export { RoundRobinPolicy } from './policies/round-robin.js';
export { UrgencyAwarePolicy } from './policies/urgency-aware.js';
export { LeastLoadedPolicy } from './policies/least-loaded.js';
export { BlockchainInspiredPolicy, type BlockchainPolicyOptions } from './policies/blockchain-inspired.js';
export {
  createPolicy,
  POLICY_DESCRIPTORS,
  type Policy,
  type PolicyOf,
  type PolicyOptions,
  type PolicyDescriptor,
} from './policy.js';
export { SchedulerRegistry } from './registry.js';
export {
  SchedulingDispatcher,
  type DispatchOptions,
  type DispatchResult,
} from './dispatcher.js';
export {
  RESOURCE_DIMENSIONS,
  POLICY_KINDS,
  isPolicyKind,
  zeroVector,
} from './types.js';
export type {
  ResourceDimension,
  ResourceVector,
  Task,
  VmSnapshot,
  PolicyKind,
  ScheduleDecision,
  SchedulingPolicy,
} from './types.js';
