import type { ScheduleDecision, SchedulingPolicy, Task } from '../types.js';
import type { VirtualMachine } from '../vm.js';

/**
 * RoundRobinPolicy — rotates through candidates, taking the first one
 * that admits the task.
 *
 * The cursor persists across calls and resets whenever the number of
 * candidates changes. A scan that finds nothing leaves the cursor where
 * it started.
 */
export class RoundRobinPolicy implements SchedulingPolicy {
  readonly kind = 'roundrobin' as const;

  private cursor = 0;
  private lastCount = 0;

  schedule(task: Task, candidates: readonly VirtualMachine[]): ScheduleDecision {
    const count = candidates.length;
    if (count === 0) return { vm: null, score: 0 };

    if (count !== this.lastCount) {
      this.lastCount = count;
      this.cursor = 0;
    }

    const start = this.cursor;
    for (let scanned = 0; scanned < count; scanned++) {
      const vm = candidates[this.cursor];
      this.cursor = (this.cursor + 1) % count;
      if (vm.canAdmit(task)) {
        return { vm, score: vm.loadScore() };
      }
    }

    this.cursor = start;
    return { vm: null, score: 0 };
  }

  /** Index of the next candidate to be examined */
  get position(): number {
    return this.cursor;
  }
}
