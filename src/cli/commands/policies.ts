/**
 * `ledgersched policies` — list the scheduling policies and how to read their scores.
 */

import { Command } from 'commander';
import { POLICY_DESCRIPTORS, sentinelIsAmbiguous, type PolicyDescriptor } from '../../scheduler/policy.js';
import { POLICY_KINDS } from '../../scheduler/types.js';

export function createPoliciesCommand(): Command {
  const cmd = new Command('policies');

  cmd
    .description('List the available scheduling policies')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      listPolicies(options.json ?? false);
    });

  return cmd;
}

export function describeScoreOrder(descriptor: PolicyDescriptor): string {
  switch (descriptor.scoreOrder) {
    case 'lower-is-better':
      return 'lower score is better';
    case 'higher-is-better':
      return 'higher score is better';
    case 'load':
      return 'score is the selected VM load';
  }
}

export function describeSentinel(descriptor: PolicyDescriptor): string {
  const text = `no VM → ${descriptor.sentinel}`;
  return sentinelIsAmbiguous(descriptor) ? `${text} (check for a null VM, not the score)` : text;
}

function listPolicies(asJson: boolean): void {
  const descriptors = POLICY_KINDS.map((kind) => POLICY_DESCRIPTORS[kind]);

  if (asJson) {
    // Infinity is not valid JSON
    const data = descriptors.map((d) => ({
      ...d,
      sentinel: String(d.sentinel),
      sentinelAmbiguous: sentinelIsAmbiguous(d),
    }));
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  console.log();
  console.log('Scheduling policies');
  console.log('─'.repeat(60));
  for (const descriptor of descriptors) {
    const ledger = descriptor.records ? ' [ledger]' : '';
    console.log(`  ${descriptor.kind.padEnd(12)} ${descriptor.label}${ledger}`);
    console.log(`  ${''.padEnd(12)} ${describeScoreOrder(descriptor)}; ${describeSentinel(descriptor)}`);
  }
  console.log();
}
