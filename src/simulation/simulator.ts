import type { LedgerSchedConfig } from '../core/types.js';
import type { LedgerExport, LedgerSummary, VmLedgerStats } from '../ledger/types.js';
import { SchedulingDispatcher, type DispatchResult } from '../scheduler/dispatcher.js';
import { SchedulerRegistry } from '../scheduler/registry.js';
import type { PolicyKind } from '../scheduler/types.js';
import { VirtualMachine } from '../scheduler/vm.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { generateWorkload } from './workload.js';

export interface SimulationOptions {
  policy: PolicyKind;
  tasks: number;
  seed: number;
  config: LedgerSchedConfig;
  /** Overrides config.vm.count */
  vms?: number;
  clock?: Clock;
}

export interface SimulationReport {
  policy: PolicyKind;
  results: DispatchResult[];
  vms: VirtualMachine[];
  assigned: number;
  unassigned: number;
  ledger?: {
    summary: LedgerSummary;
    vmStats: VmLedgerStats[];
    export: LedgerExport;
  };
}

/**
 * Run a generated workload through one policy on a fresh fleet, committing
 * every assignment. For the blockchain policy, pending ledger entries are
 * mined at the end and the ledger is asserted intact.
 */
export async function runSimulation(options: SimulationOptions): Promise<SimulationReport> {
  const clock = options.clock ?? systemClock;
  const { capacity, count } = options.config.vm;
  const registry = new SchedulerRegistry({
    blockchain: { ...options.config.blockchain, clock },
  });
  const dispatcher = new SchedulingDispatcher(registry);

  const vms = Array.from({ length: options.vms ?? count }, (_, id) => new VirtualMachine(id, capacity));
  const tasks = generateWorkload({ count: options.tasks, capacity, seed: options.seed, now: clock() });

  const results: DispatchResult[] = [];
  for (const task of tasks) {
    results.push(await dispatcher.dispatch(options.policy, task, vms, { commit: true }));
  }

  const assigned = results.filter((r) => r.vmId !== null).length;
  const report: SimulationReport = {
    policy: options.policy,
    results,
    vms,
    assigned,
    unassigned: results.length - assigned,
  };

  if (options.policy === 'blockchain') {
    const policy = registry.get('blockchain');
    policy.forceMine();
    policy.ledger.assertIntegrity();
    report.ledger = {
      summary: policy.ledgerSummary(),
      vmStats: vms.map((vm) => policy.vmLedgerStats(vm.id)),
      export: policy.exportLedger(),
    };
  }

  return report;
}
