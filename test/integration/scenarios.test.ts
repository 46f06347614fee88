/**
 * End-to-end scheduling scenarios: policy selection, caller commits,
 * ledger mining and verification working together.
 */

import { describe, it, expect } from 'vitest';
import { SchedulingDispatcher } from '../../src/scheduler/dispatcher.js';
import { SchedulerRegistry } from '../../src/scheduler/registry.js';
import { TransactionLedger } from '../../src/ledger/ledger.js';
import type { ResourceVector } from '../../src/scheduler/types.js';
import { CAPACITY, NOW, makeTask, makeVm, steppingClock } from '../helpers/fixtures.js';

describe('Scheduling scenarios', () => {
  it('places a single task on the lowest-id idle VM and records it', async () => {
    const registry = new SchedulerRegistry({ blockchain: { clock: () => NOW } });
    const dispatcher = new SchedulingDispatcher(registry);
    const vms = [makeVm(0), makeVm(1)];

    const result = await dispatcher.dispatch('blockchain', makeTask('t1'), vms, { commit: true });

    expect(result.vmId).toBe(0);
    expect(Number.isFinite(result.score)).toBe(true);
    expect(result.score).toBeGreaterThan(0);
    expect(vms[0].tasks).toEqual(['t1']);

    const policy = registry.get('blockchain');
    policy.forceMine();
    const blocks = policy.ledger.getBlocks();
    expect(blocks).toHaveLength(2);
    expect(blocks[1].transactions).toHaveLength(1);
    expect(blocks[1].transactions[0]).toMatchObject({
      status: 'assigned',
      vmId: 0,
      taskId: 't1',
      vmStateBefore: { cpu: 0, mem: 0, io: 0, bw: 0 },
      vmStateAfter: { cpu: 2, mem: 4, io: 1, bw: 2 },
    });
    expect(policy.verifyLedger()).toBe(true);
  });

  it('mines full blocks automatically and the remainder on demand', async () => {
    const registry = new SchedulerRegistry({ blockchain: { blockSize: 5, clock: steppingClock() } });
    const dispatcher = new SchedulingDispatcher(registry);
    const vms = [makeVm(0), makeVm(1)];
    const big: Partial<ResourceVector> = { cpu: CAPACITY.cpu + 1 };
    const ledger = registry.get('blockchain').ledger;

    const plan: Array<Partial<ResourceVector>> = [{}, big, {}, {}, big, {}, big, {}];
    for (const [i, demand] of plan.entries()) {
      await dispatcher.dispatch('blockchain', makeTask(`t${i + 1}`, demand), vms, { commit: true });
      if (i === 4) {
        expect(ledger.getBlocks()).toHaveLength(2);
        expect(ledger.getBlocks()[1].transactions).toHaveLength(5);
        expect(ledger.getPending()).toHaveLength(0);
      }
    }

    expect(ledger.getPending()).toHaveLength(3);
    const last = ledger.mine();
    expect(last?.transactions).toHaveLength(3);
    expect(ledger.getBlocks()).toHaveLength(3);

    const summary = ledger.summary();
    expect(summary.successfulAssignments).toBe(5);
    expect(summary.failedAssignments).toBe(3);
    expect(summary.successRate).toBe(0.625);
    expect(summary.chainIntegrity).toBe(true);

    const failed = ledger.history().filter((tx) => tx.status === 'failed');
    expect(failed.map((tx) => tx.vmId)).toEqual([0, 0, 0]);
    expect(failed.every((tx) => tx.score === 0)).toBe(true);
  });

  it('survives an export round trip and catches later tampering', async () => {
    const registry = new SchedulerRegistry({ blockchain: { blockSize: 2, clock: steppingClock() } });
    const dispatcher = new SchedulingDispatcher(registry);
    const vms = [makeVm(0), makeVm(1), makeVm(2)];
    for (const id of ['a', 'b', 'c', 'd']) {
      await dispatcher.dispatch('blockchain', makeTask(id), vms, { commit: true });
    }

    const exported = registry.get('blockchain').exportLedger();
    expect(TransactionLedger.fromExport(JSON.parse(JSON.stringify(exported))).verifyIntegrity()).toBe(true);

    exported.blocks[2].transactions[0].vmStateAfter.cpu = 0;
    const tampered = TransactionLedger.fromExport(exported);
    expect(tampered.findViolation()?.blockId).toBe(2);
  });
});
