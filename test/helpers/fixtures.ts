import type { ResourceVector, Task } from '../../src/scheduler/types.js';
import { VirtualMachine } from '../../src/scheduler/vm.js';

/** Epoch seconds */
export const NOW = 1_700_000_000;

export const CAPACITY: ResourceVector = { cpu: 8, mem: 16, io: 4, bw: 10 };

export const FULL_USAGE: ResourceVector = { ...CAPACITY };

export const HALF_USAGE: ResourceVector = { cpu: 4, mem: 8, io: 2, bw: 5 };

export function makeTask(
  id: string,
  demand: Partial<ResourceVector> = {},
  deadline: number = NOW + 3_600,
): Task {
  return {
    id,
    demand: { cpu: 2, mem: 4, io: 1, bw: 2, ...demand },
    deadline,
  };
}

export function makeVm(
  id: number,
  usage: Partial<ResourceVector> = {},
  capacity: ResourceVector = CAPACITY,
): VirtualMachine {
  return new VirtualMachine(id, capacity, { cpu: 0, mem: 0, io: 0, bw: 0, ...usage });
}

/** Clock that returns the given timestamps in order, then repeats the last */
export function scriptedClock(...times: number[]): () => number {
  let index = 0;
  return () => {
    const value = times[Math.min(index, times.length - 1)];
    index++;
    return value;
  };
}

/** Clock starting at `start` that advances by `step` on every read */
export function steppingClock(start: number = NOW, step: number = 1): () => number {
  let current = start - step;
  return () => {
    current += step;
    return current;
  };
}
