/**
 * Scheduler Types
 *
 * Resource vectors, tasks, VM snapshots and the shared shape of a
 * scheduling decision.
 */

import type { VirtualMachine } from './vm.js';

// ═══════════════════════════════════════════════════════════════
// RESOURCES
// ═══════════════════════════════════════════════════════════════

export const RESOURCE_DIMENSIONS = ['cpu', 'mem', 'io', 'bw'] as const;

export type ResourceDimension = (typeof RESOURCE_DIMENSIONS)[number];

export type ResourceVector = Record<ResourceDimension, number>;

// ═══════════════════════════════════════════════════════════════
// TASKS & VMS
// ═══════════════════════════════════════════════════════════════

export interface Task {
  readonly id: string;
  readonly demand: Readonly<ResourceVector>;
  /** Absolute deadline, epoch seconds */
  readonly deadline: number;
  /** Expected run time in seconds */
  readonly duration?: number;
}

/** Plain VM state as supplied by callers per request */
export interface VmSnapshot {
  id: number;
  capacity: ResourceVector;
  usage: ResourceVector;
  tasks: string[];
}

// ═══════════════════════════════════════════════════════════════
// POLICIES
// ═══════════════════════════════════════════════════════════════

export const POLICY_KINDS = ['roundrobin', 'urgency', 'leastloaded', 'blockchain'] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

/**
 * Outcome of one scheduling call. `vm` is null when no candidate is
 * admissible; `score` then holds the policy's sentinel.
 */
export interface ScheduleDecision {
  vm: VirtualMachine | null;
  score: number;
}

export interface SchedulingPolicy {
  readonly kind: PolicyKind;
  schedule(task: Task, candidates: readonly VirtualMachine[]): ScheduleDecision;
}

export function isPolicyKind(name: string): name is PolicyKind {
  return POLICY_KINDS.some((kind) => kind === name);
}

export function zeroVector(): ResourceVector {
  return { cpu: 0, mem: 0, io: 0, bw: 0 };
}
