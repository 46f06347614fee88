import { describe, it, expect } from 'vitest';
import { ResourceHistoryTracker } from '../../../src/scheduler/resource-history.js';
import { ConfigError } from '../../../src/core/errors.js';
import { FULL_USAGE, HALF_USAGE, makeVm } from '../../helpers/fixtures.js';

describe('ResourceHistoryTracker', () => {
  it('reports zero for a VM it has never seen', () => {
    const history = new ResourceHistoryTracker();
    expect(history.historicalUsage(7)).toBe(0);
    expect(history.window(7)).toEqual([]);
  });

  it('averages the mean utilization of each snapshot', () => {
    const history = new ResourceHistoryTracker();
    history.record(makeVm(0, HALF_USAGE));
    history.record(makeVm(0, FULL_USAGE));
    expect(history.historicalUsage(0)).toBe(0.75);
  });

  it('keeps separate windows per VM id', () => {
    const history = new ResourceHistoryTracker();
    history.record(makeVm(0, FULL_USAGE));
    history.record(makeVm(1));
    expect(history.size).toBe(2);
    expect(history.historicalUsage(0)).toBe(1);
    expect(history.historicalUsage(1)).toBe(0);
  });

  it('evicts the oldest snapshot once the window is full', () => {
    const history = new ResourceHistoryTracker(2);
    history.record(makeVm(0, FULL_USAGE));
    history.record(makeVm(0, HALF_USAGE));
    history.record(makeVm(0));
    expect(history.window(0)).toEqual([
      { cpu: 0.5, mem: 0.5, io: 0.5, bw: 0.5 },
      { cpu: 0, mem: 0, io: 0, bw: 0 },
    ]);
    expect(history.historicalUsage(0)).toBe(0.25);
  });

  it('clears all windows', () => {
    const history = new ResourceHistoryTracker();
    history.record(makeVm(0, FULL_USAGE));
    history.clear();
    expect(history.size).toBe(0);
    expect(history.historicalUsage(0)).toBe(0);
  });

  it('rejects a window smaller than one', () => {
    expect(() => new ResourceHistoryTracker(0)).toThrow(ConfigError);
  });
});
