/**
 * ledgersched — policy-driven VM selection with a hash-chained decision ledger
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, SchedulerRegistry, SchedulingDispatcher, VirtualMachine } from 'ledgersched';
 *
 * const config = new ConfigManager().load();
 * const registry = new SchedulerRegistry({ blockchain: config.blockchain });
 * const dispatcher = new SchedulingDispatcher(registry);
 *
 * const vms = [0, 1, 2].map((id) => new VirtualMachine(id, config.vm.capacity));
 * const result = await dispatcher.dispatch('blockchain', task, vms, { commit: true });
 * registry.get('blockchain').ledger.assertIntegrity();
 * ```
 */

// Core
export { ConfigManager } from './core/config.js';
export {
  createLogger,
  getLogger,
  setLogger,
  componentLogger,
  resolveLogLevel,
  type LoggerOptions,
} from './core/logger.js';
export { AsyncMutex, KeyedMutex, type Release } from './core/mutex.js';
export {
  LedgerSchedError,
  ConfigError,
  UnknownPolicyError,
  IntegrityViolationError,
  MalformedRecordError,
} from './core/errors.js';
export {
  LedgerSchedConfigSchema,
  type LedgerSchedConfig,
  type LedgerSchedConfigInput,
} from './core/types.js';

// Scheduler
export * from './scheduler/index.js';

// Ledger
export * from './ledger/index.js';

// Simulation
export { runSimulation, type SimulationOptions, type SimulationReport } from './simulation/simulator.js';
export { generateWorkload, createRandom, type WorkloadOptions } from './simulation/workload.js';

export { VERSION, NAME } from './version.js';
