import type { ScheduleDecision, SchedulingPolicy, Task } from '../types.js';
import type { VirtualMachine } from '../vm.js';

/**
 * LeastLoadedPolicy — the first idle admissible VM, otherwise the
 * admissible VM with the lowest load (earliest wins ties).
 */
export class LeastLoadedPolicy implements SchedulingPolicy {
  readonly kind = 'leastloaded' as const;

  schedule(task: Task, candidates: readonly VirtualMachine[]): ScheduleDecision {
    const admissible = candidates.filter((vm) => vm.canAdmit(task));

    const idle = admissible.find((vm) => vm.loadScore() === 0);
    if (idle) return { vm: idle, score: 0 };

    let best: VirtualMachine | null = null;
    let minLoad = Infinity;
    for (const vm of admissible) {
      const load = vm.loadScore();
      if (load < minLoad) {
        minLoad = load;
        best = vm;
      }
    }

    return { vm: best, score: best ? minLoad : Infinity };
  }
}
