import { ConfigError } from '../core/errors.js';
import { CircularBuffer } from '../utils/circular-buffer.js';
import type { ResourceVector } from './types.js';
import { meanOf, type VirtualMachine } from './vm.js';

/**
 * ResourceHistoryTracker — per-VM sliding window of utilization snapshots.
 *
 * Feeds the historical-usage (HRU) term of the blockchain-inspired policy.
 * Windows are keyed by VM id and outlive individual scheduling calls.
 */
export class ResourceHistoryTracker {
  private windows: Map<number, CircularBuffer<ResourceVector>> = new Map();

  constructor(readonly windowSize: number = 10) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new ConfigError(`History window must be an integer >= 1, got ${windowSize}`);
    }
  }

  record(vm: VirtualMachine): void {
    let window = this.windows.get(vm.id);
    if (!window) {
      window = new CircularBuffer<ResourceVector>(this.windowSize);
      this.windows.set(vm.id, window);
    }
    window.push(vm.utilization());
  }

  /**
   * Mean over the window of each snapshot's dimension mean; 0 when empty.
   */
  historicalUsage(vmId: number): number {
    const window = this.windows.get(vmId);
    if (!window || window.length === 0) return 0;

    return window.reduce((sum, snapshot) => sum + meanOf(snapshot), 0) / window.length;
  }

  window(vmId: number): ResourceVector[] {
    return this.windows.get(vmId)?.toArray() ?? [];
  }

  get size(): number {
    return this.windows.size;
  }

  clear(): void {
    this.windows.clear();
  }
}
