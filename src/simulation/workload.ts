import type { ResourceVector, Task } from '../scheduler/types.js';

/**
 * Small seeded PRNG (mulberry32) so generated workloads are reproducible.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface WorkloadOptions {
  count: number;
  capacity: ResourceVector;
  seed: number;
  /** Epoch seconds */
  now: number;
  /** Largest share of a VM's capacity one task may ask for, per dimension */
  maxShare?: number;
}

/**
 * Generate `count` tasks whose demands are whole units between 1 and
 * `maxShare` of capacity, with deadlines one minute to one hour out.
 */
export function generateWorkload(options: WorkloadOptions): Task[] {
  const random = createRandom(options.seed);
  const maxShare = options.maxShare ?? 0.4;

  const pick = (cap: number): number => 1 + Math.floor(random() * Math.max(cap * maxShare, 1));

  const tasks: Task[] = [];
  for (let i = 0; i < options.count; i++) {
    const demand: ResourceVector = {
      cpu: pick(options.capacity.cpu),
      mem: pick(options.capacity.mem),
      io: pick(options.capacity.io),
      bw: pick(options.capacity.bw),
    };
    const minutesOut = 1 + Math.floor(random() * 60);
    const duration = (5 + Math.floor(random() * 55)) * 60;
    tasks.push({
      id: `task_${String(i + 1).padStart(3, '0')}`,
      demand,
      deadline: options.now + minutesOut * 60,
      duration,
    });
  }
  return tasks;
}
