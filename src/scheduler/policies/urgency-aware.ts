import type { ScheduleDecision, SchedulingPolicy, Task } from '../types.js';
import type { VirtualMachine } from '../vm.js';

const LOAD_PENALTY = 5;

/**
 * UrgencyAwarePolicy — score = deadline + 5 × load; lowest wins,
 * ties go to the lower VM id.
 */
export class UrgencyAwarePolicy implements SchedulingPolicy {
  readonly kind = 'urgency' as const;

  score(task: Task, vm: VirtualMachine): number {
    return task.deadline + vm.loadScore() * LOAD_PENALTY;
  }

  schedule(task: Task, candidates: readonly VirtualMachine[]): ScheduleDecision {
    let best: VirtualMachine | null = null;
    let bestScore = Infinity;

    for (const vm of candidates) {
      if (!vm.canAdmit(task)) continue;
      const score = this.score(task, vm);
      if (best === null || score < bestScore || (score === bestScore && vm.id < best.id)) {
        best = vm;
        bestScore = score;
      }
    }

    return { vm: best, score: bestScore };
  }
}
