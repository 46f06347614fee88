import { ConfigError } from '../core/errors.js';
import {
  RESOURCE_DIMENSIONS,
  zeroVector,
  type ResourceVector,
  type Task,
  type VmSnapshot,
} from './types.js';

/**
 * VirtualMachine — per-resource usage against a fixed capacity.
 *
 * The model does not guard against overcommit: callers run canAdmit()
 * before commit().
 */
export class VirtualMachine {
  readonly capacity: Readonly<ResourceVector>;
  readonly usage: ResourceVector;
  readonly tasks: string[];

  constructor(
    readonly id: number,
    capacity: ResourceVector,
    usage: ResourceVector = zeroVector(),
    tasks: string[] = [],
  ) {
    for (const dim of RESOURCE_DIMENSIONS) {
      if (!(capacity[dim] > 0)) {
        throw new ConfigError(`VM ${id}: capacity.${dim} must be > 0, got ${capacity[dim]}`);
      }
    }
    this.capacity = Object.freeze({ ...capacity });
    this.usage = { ...usage };
    this.tasks = [...tasks];
  }

  static fromSnapshot(snapshot: VmSnapshot): VirtualMachine {
    return new VirtualMachine(snapshot.id, snapshot.capacity, snapshot.usage, snapshot.tasks);
  }

  canAdmit(task: Task): boolean {
    return RESOURCE_DIMENSIONS.every(
      (dim) => this.usage[dim] + task.demand[dim] <= this.capacity[dim],
    );
  }

  commit(task: Task): void {
    for (const dim of RESOURCE_DIMENSIONS) {
      this.usage[dim] += task.demand[dim];
    }
    this.tasks.push(task.id);
  }

  /** Per-dimension usage / capacity */
  utilization(): ResourceVector {
    const ratios = zeroVector();
    for (const dim of RESOURCE_DIMENSIONS) {
      ratios[dim] = this.usage[dim] / this.capacity[dim];
    }
    return ratios;
  }

  /** Mean utilization ratio across all dimensions */
  loadScore(): number {
    return meanOf(this.utilization());
  }

  state(): ResourceVector {
    return { ...this.usage };
  }

  snapshot(): VmSnapshot {
    return {
      id: this.id,
      capacity: { ...this.capacity },
      usage: this.state(),
      tasks: [...this.tasks],
    };
  }
}

export function meanOf(vector: Readonly<ResourceVector>): number {
  let total = 0;
  for (const dim of RESOURCE_DIMENSIONS) {
    total += vector[dim];
  }
  return total / RESOURCE_DIMENSIONS.length;
}
