/**
 * Ledger Module — hash-chained record of scheduling decisions
 *
 * @example
 * ```typescript
 * import { TransactionLedger } from 'ledgersched/ledger';
 *
 * const ledger = new TransactionLedger({ blockSize: 5 });
 * ledger.append(0, task, before, after, score, 'assigned');
 * ledger.mine();
 * ledger.assertIntegrity();
 * ```
 */

export { TransactionLedger } from './ledger.js';
export { GENESIS_PREVIOUS_HASH, computeBlockHash, checkBlockContents, sealBlock } from './block.js';
export { EMPTY_BLOCK_ROOT, merkleRoot, transactionDigest, transactionsRoot } from './merkle.js';
export { LedgerExportSchema } from './schema.js';
export type {
  SchedulingTransaction,
  TransactionStatus,
  LedgerBlock,
  LedgerOptions,
  HistoryFilter,
  VmLedgerStats,
  IntegrityFailure,
  LedgerSummary,
  ExportedTransaction,
  ExportedBlock,
  LedgerExport,
} from './types.js';
