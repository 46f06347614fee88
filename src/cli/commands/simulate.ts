/**
 * `ledgersched simulate` — run a seeded workload through one policy.
 */

import { Command, InvalidArgumentError } from 'commander';
import { ConfigManager } from '../../core/config.js';
import { UnknownPolicyError } from '../../core/errors.js';
import { createLogger, setLogger } from '../../core/logger.js';
import { runSimulation, type SimulationReport } from '../../simulation/simulator.js';
import { POLICY_KINDS, isPolicyKind } from '../../scheduler/types.js';
import { NAME } from '../../version.js';
import type { CliContext } from '../index.js';

interface SimulateOptions {
  policy: string;
  tasks: number;
  vms?: number;
  seed: number;
  dir: string;
  json?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function createSimulateCommand(context: CliContext = {}): Command {
  const cmd = new Command('simulate');

  cmd
    .description('Schedule a generated workload and report assignments and ledger state')
    .option('-p, --policy <kind>', `Policy (${POLICY_KINDS.join(', ')})`, 'blockchain')
    .option('-t, --tasks <n>', 'Number of tasks', parsePositiveInt, 12)
    .option('--vms <n>', 'Number of VMs (defaults to config vm.count)', parsePositiveInt)
    .option('-s, --seed <n>', 'Workload seed', parsePositiveInt, 42)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Print the ledger export as JSON')
    .action(async (options: SimulateOptions) => {
      await simulate(options, context);
    });

  return cmd;
}

async function simulate(options: SimulateOptions, context: CliContext): Promise<void> {
  if (!isPolicyKind(options.policy)) {
    throw new UnknownPolicyError(options.policy, POLICY_KINDS);
  }

  const config = new ConfigManager(options.dir, { env: context.env, globalDir: context.globalDir }).load();
  if (config.ui.verbose) {
    setLogger(createLogger({ name: NAME, verbose: true }));
  }

  const report = await runSimulation({
    policy: options.policy,
    tasks: options.tasks,
    vms: options.vms,
    seed: options.seed,
    config,
  });

  if (options.json) {
    console.log(JSON.stringify(report.ledger?.export ?? { results: report.results }, null, 2));
    return;
  }

  printReport(report);
}

function printReport(report: SimulationReport): void {
  console.log();
  console.log(`Policy: ${report.policy}`);
  console.log('─'.repeat(60));
  for (const result of report.results) {
    const target = result.vmId === null ? 'unassigned' : `VM ${result.vmId}`;
    console.log(`  ${result.taskId.padEnd(10)} → ${target.padEnd(11)} score ${formatScore(result.score)}`);
  }
  console.log();
  console.log(`Assigned ${report.assigned}, unassigned ${report.unassigned}`);

  for (const vm of report.vms) {
    console.log(`  VM ${vm.id}: load ${(vm.loadScore() * 100).toFixed(1)}%, ${vm.tasks.length} task(s)`);
  }

  if (report.ledger) {
    const { summary, vmStats } = report.ledger;
    console.log();
    console.log('Ledger');
    console.log('─'.repeat(60));
    console.log(`  Blocks:        ${summary.totalBlocks}`);
    console.log(`  Transactions:  ${summary.totalTransactions} (${summary.pendingTransactions} pending)`);
    console.log(`  Success rate:  ${(summary.successRate * 100).toFixed(2)}%`);
    console.log(`  Integrity:     ${summary.chainIntegrity ? 'valid' : 'INVALID'}`);
    console.log(`  Latest hash:   ${summary.latestBlockHash?.slice(0, 16) ?? 'none'}…`);
    for (const stats of vmStats) {
      console.log(
        `  VM ${stats.vmId}: ${stats.totalAssignments} assigned, ${stats.failedAssignments} failed, ` +
          `avg score ${formatScore(stats.averageScore)}, cpu ${stats.totalCpuAllocated}, mem ${stats.totalMemAllocated}`,
      );
    }
  }
  console.log();
}

export function formatScore(score: number): string {
  if (!Number.isFinite(score)) return String(score);
  return Math.abs(score) >= 1e4 || (score !== 0 && Math.abs(score) < 1e-3)
    ? score.toExponential(4)
    : score.toFixed(4);
}
