/**
 * SchedulingDispatcher — serialized access to the registry's policies.
 *
 * Every policy kind gets its own lock. Selection, the ledger append
 * (and any mining it triggers) and, when requested, the commit of the task
 * onto the chosen VM all run inside that lock, so concurrent callers
 * cannot interleave on one policy instance or race on a stale admission
 * result.
 */

import { EventEmitter } from 'node:events';
import { KeyedMutex } from '../core/mutex.js';
import { componentLogger } from '../core/logger.js';
import { SchedulerRegistry } from './registry.js';
import type { PolicyKind, Task } from './types.js';
import type { VirtualMachine } from './vm.js';

export interface DispatchOptions {
  /** Commit the task onto the selected VM inside the lock (default false) */
  commit?: boolean;
}

export interface DispatchResult {
  policy: PolicyKind;
  taskId: string;
  vmId: number | null;
  score: number;
  committed: boolean;
}

export class SchedulingDispatcher extends EventEmitter {
  readonly registry: SchedulerRegistry;
  private locks = new KeyedMutex<PolicyKind>();
  private logger = componentLogger('dispatcher');

  constructor(registry: SchedulerRegistry = new SchedulerRegistry()) {
    super();
    this.registry = registry;
  }

  /**
   * Schedule `task` over `candidates` with the named policy.
   * Rejects with UnknownPolicyError for an unregistered name.
   */
  async dispatch(
    policyName: string,
    task: Task,
    candidates: readonly VirtualMachine[],
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const policy = this.registry.resolve(policyName);

    return this.locks.run(policy.kind, () => {
      const decision = policy.schedule(task, candidates);
      const vm = decision.vm;

      let committed = false;
      if (vm && options.commit) {
        vm.commit(task);
        committed = true;
      }

      const result: DispatchResult = {
        policy: policy.kind,
        taskId: task.id,
        vmId: vm ? vm.id : null,
        score: decision.score,
        committed,
      };

      if (vm) {
        this.logger.debug(result, 'Task assigned');
        this.emit('dispatch:assigned', result);
      } else {
        this.logger.debug(result, 'No admissible VM for task');
        this.emit('dispatch:unassigned', result);
      }
      return result;
    });
  }

  /** Number of callers waiting on a policy's lock */
  waiting(kind: PolicyKind): number {
    return this.locks.waiting(kind);
  }
}
