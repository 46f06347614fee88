/**
 * Scoring primitives for the blockchain-inspired policy.
 *
 *   CRU    = mean current utilization
 *   HRU    = mean historical utilization
 *   weight = max(α·CRU + β·HRU, ε)
 *   score  = (1 / max(deadline − now, ε)) / weight     (higher is better)
 */

import { RESOURCE_DIMENSIONS, type Task } from './types.js';
import type { VirtualMachine } from './vm.js';

export interface WeightParams {
  alpha: number;
  beta: number;
  epsilon: number;
}

export const DEFAULT_WEIGHT_PARAMS: WeightParams = {
  alpha: 0.7,
  beta: 0.3,
  epsilon: 1e-6,
};

export function currentUsage(vm: VirtualMachine): number {
  return vm.loadScore();
}

export function dynamicWeight(cru: number, hru: number, params: WeightParams = DEFAULT_WEIGHT_PARAMS): number {
  return Math.max(params.alpha * cru + params.beta * hru, params.epsilon);
}

export function urgencyFactor(deadline: number, now: number, epsilon: number = DEFAULT_WEIGHT_PARAMS.epsilon): number {
  return 1 / Math.max(deadline - now, epsilon);
}

export function priorityScore(urgency: number, weight: number): number {
  return urgency / weight;
}

/**
 * Admissibility by simulated ratios: every (usage + demand) / capacity ≤ 1.
 */
export function fitsAfter(vm: VirtualMachine, task: Task): boolean {
  return RESOURCE_DIMENSIONS.every(
    (dim) => (vm.usage[dim] + task.demand[dim]) / vm.capacity[dim] <= 1.0,
  );
}
