/**
 * Ledger Types
 *
 * Scheduling transactions and the blocks that seal them. Committed values
 * are frozen at runtime; the readonly modifiers mirror that.
 */

import type { ResourceVector } from '../scheduler/types.js';
import type { Clock } from '../utils/clock.js';

export type TransactionStatus = 'assigned' | 'failed' | 'rejected';

export interface SchedulingTransaction {
  readonly transactionId: string;
  readonly timestamp: number;
  readonly vmId: number;
  readonly taskId: string;
  readonly taskRequirements: Readonly<ResourceVector>;
  readonly vmStateBefore: Readonly<ResourceVector>;
  readonly vmStateAfter: Readonly<ResourceVector>;
  readonly score: number;
  readonly status: TransactionStatus;
  /** Hash of the containing block; empty while pending */
  readonly blockHash: string;
}

export interface LedgerBlock {
  readonly blockId: number;
  readonly timestamp: number;
  readonly transactions: readonly SchedulingTransaction[];
  readonly previousHash: string;
  readonly merkleRoot: string;
  readonly blockHash: string;
}

export interface LedgerOptions {
  /** Pending transactions that trigger mining (default 10) */
  blockSize?: number;
  /** Epoch seconds (default: system time) */
  clock?: Clock;
}

export interface HistoryFilter {
  vmId?: number;
  taskId?: string;
}

export interface VmLedgerStats {
  vmId: number;
  totalAssignments: number;
  failedAssignments: number;
  successRate: number;
  averageScore: number;
  totalCpuAllocated: number;
  totalMemAllocated: number;
  totalTransactions: number;
}

export interface IntegrityFailure {
  blockId: number;
  reason: string;
}

export type {
  LedgerSummary,
  ExportedTransaction,
  ExportedBlock,
  LedgerExport,
} from './schema.js';
