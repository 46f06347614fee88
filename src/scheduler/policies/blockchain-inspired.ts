/**
 * BlockchainInspiredPolicy — urgency normalized by a blended
 * current/historical load, with every decision written to a ledger.
 *
 * Each call first pushes every candidate's utilization into its history
 * window, then scores the admissible candidates:
 *
 *   score = urgencyFactor(deadline) / max(α·CRU + β·HRU, ε)
 *
 * Higher is better; ties go to the lower VM id. The policy never mutates
 * VM usage. The ledger entry for a success records the state the VM would
 * reach once the caller commits the task.
 */

import { TransactionLedger } from '../../ledger/ledger.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import type { LedgerSummary, SchedulingTransaction, VmLedgerStats, LedgerExport } from '../../ledger/types.js';
import { ResourceHistoryTracker } from '../resource-history.js';
import {
  DEFAULT_WEIGHT_PARAMS,
  currentUsage,
  dynamicWeight,
  fitsAfter,
  priorityScore,
  urgencyFactor,
  type WeightParams,
} from '../scoring.js';
import { RESOURCE_DIMENSIONS, type ResourceVector, type ScheduleDecision, type SchedulingPolicy, type Task } from '../types.js';
import type { VirtualMachine } from '../vm.js';

export interface BlockchainPolicyOptions extends Partial<WeightParams> {
  historyWindow?: number;
  /** Block size of the ledger this policy creates (default 5) */
  blockSize?: number;
  clock?: Clock;
  /** Use an existing ledger instead of creating one; blockSize is then ignored */
  ledger?: TransactionLedger;
}

export class BlockchainInspiredPolicy implements SchedulingPolicy {
  readonly kind = 'blockchain' as const;
  readonly ledger: TransactionLedger;
  readonly history: ResourceHistoryTracker;
  readonly params: WeightParams;
  private clock: Clock;

  constructor(options: BlockchainPolicyOptions = {}) {
    this.params = {
      alpha: options.alpha ?? DEFAULT_WEIGHT_PARAMS.alpha,
      beta: options.beta ?? DEFAULT_WEIGHT_PARAMS.beta,
      epsilon: options.epsilon ?? DEFAULT_WEIGHT_PARAMS.epsilon,
    };
    this.clock = options.clock ?? systemClock;
    this.history = new ResourceHistoryTracker(options.historyWindow ?? 10);
    this.ledger = options.ledger ?? new TransactionLedger({ blockSize: options.blockSize ?? 5, clock: this.clock });
  }

  score(vm: VirtualMachine, task: Task, now: number): number {
    const weight = dynamicWeight(currentUsage(vm), this.history.historicalUsage(vm.id), this.params);
    return priorityScore(urgencyFactor(task.deadline, now, this.params.epsilon), weight);
  }

  schedule(task: Task, candidates: readonly VirtualMachine[]): ScheduleDecision {
    const now = this.clock();
    for (const vm of candidates) {
      this.history.record(vm);
    }

    let best: VirtualMachine | null = null;
    let bestScore = -Infinity;
    for (const vm of candidates) {
      if (!fitsAfter(vm, task)) continue;
      const score = this.score(vm, task, now);
      if (best === null || score > bestScore || (score === bestScore && vm.id < best.id)) {
        best = vm;
        bestScore = score;
      }
    }

    if (best) {
      const before = best.state();
      this.ledger.append(best.id, task, before, addDemand(before, task), bestScore, 'assigned');
      return { vm: best, score: bestScore };
    }

    if (candidates.length > 0) {
      // Failed attempts are logged against the first candidate
      const reference = candidates[0];
      const state = reference.state();
      this.ledger.append(reference.id, task, state, state, 0, 'failed');
    }
    return { vm: null, score: Infinity };
  }

  // ─────────────────────────────────────────────────────────
  // LEDGER ACCESS
  // ─────────────────────────────────────────────────────────

  ledgerSummary(): LedgerSummary {
    return this.ledger.summary();
  }

  vmLedgerStats(vmId: number): VmLedgerStats {
    return this.ledger.vmStats(vmId);
  }

  taskLedgerHistory(taskId: string): SchedulingTransaction[] {
    return this.ledger.history({ taskId });
  }

  recentTransactions(limit: number = 10): SchedulingTransaction[] {
    return this.ledger.recent(limit);
  }

  verifyLedger(): boolean {
    return this.ledger.verifyIntegrity();
  }

  forceMine(): void {
    this.ledger.mine();
  }

  exportLedger(): LedgerExport {
    return this.ledger.export();
  }
}

function addDemand(state: ResourceVector, task: Task): ResourceVector {
  const after = { ...state };
  for (const dim of RESOURCE_DIMENSIONS) {
    after[dim] += task.demand[dim];
  }
  return after;
}
