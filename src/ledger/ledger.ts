/**
 * TransactionLedger — append-only, hash-chained log of scheduling outcomes.
 *
 * Transactions collect in a pending buffer; once the buffer reaches the
 * configured block size it is sealed into a block whose hash links to the
 * previous block. Committed blocks are frozen and never rewritten.
 * Mining happens inline with the append that fills the buffer.
 */

import { EventEmitter } from 'node:events';
import { componentLogger } from '../core/logger.js';
import { ConfigError, IntegrityViolationError, MalformedRecordError } from '../core/errors.js';
import { systemClock, toEpochMillis, type Clock } from '../utils/clock.js';
import type { ResourceVector, Task } from '../scheduler/types.js';
import { GENESIS_PREVIOUS_HASH, checkBlockContents, freezeTransaction, sealBlock } from './block.js';
import { LedgerExportSchema } from './schema.js';
import type {
  ExportedBlock,
  ExportedTransaction,
  HistoryFilter,
  IntegrityFailure,
  LedgerBlock,
  LedgerExport,
  LedgerOptions,
  LedgerSummary,
  SchedulingTransaction,
  TransactionStatus,
  VmLedgerStats,
} from './types.js';

const DEFAULT_BLOCK_SIZE = 10;

const TX_COUNTER_PATTERN = /^tx_(\d+)_/;

export class TransactionLedger extends EventEmitter {
  readonly blockSize: number;
  private clock: Clock;
  private logger = componentLogger('ledger');

  /** Committed chain; index === blockId */
  private blocks: LedgerBlock[] = [];

  /** Appended but not yet mined, in append order */
  private pending: SchedulingTransaction[] = [];

  private transactionCounter = 0;

  constructor(options: LedgerOptions = {}) {
    super();
    const blockSize = options.blockSize ?? DEFAULT_BLOCK_SIZE;
    if (!Number.isInteger(blockSize) || blockSize < 1) {
      throw new ConfigError(`Ledger block size must be an integer >= 1, got ${blockSize}`);
    }
    this.blockSize = blockSize;
    this.clock = options.clock ?? systemClock;

    this.blocks.push(
      sealBlock({
        blockId: 0,
        timestamp: this.clock(),
        previousHash: GENESIS_PREVIOUS_HASH,
        transactions: [],
      }),
    );
  }

  // ─────────────────────────────────────────────────────────
  // WRITE PATH
  // ─────────────────────────────────────────────────────────

  /**
   * Record a scheduling outcome. Mines a block when the pending buffer
   * reaches `blockSize`. Returns the new transaction id.
   */
  append(
    vmId: number,
    task: Task,
    stateBefore: Readonly<ResourceVector>,
    stateAfter: Readonly<ResourceVector>,
    score: number,
    status: TransactionStatus,
  ): string {
    this.transactionCounter++;
    const timestamp = this.clock();
    const transactionId = `tx_${this.transactionCounter}_${toEpochMillis(timestamp)}`;

    const transaction = freezeTransaction({
      transactionId,
      timestamp,
      vmId,
      taskId: task.id,
      taskRequirements: { ...task.demand },
      vmStateBefore: { ...stateBefore },
      vmStateAfter: { ...stateAfter },
      score,
      status,
      blockHash: '',
    });

    this.pending.push(transaction);
    this.emit('ledger:transaction', { transaction });

    if (this.pending.length >= this.blockSize) {
      this.mine();
    }

    return transactionId;
  }

  /**
   * Seal all pending transactions into a new block.
   * Returns null (and changes nothing) when nothing is pending.
   */
  mine(): LedgerBlock | null {
    if (this.pending.length === 0) return null;

    const block = sealBlock({
      blockId: this.blocks.length,
      timestamp: this.clock(),
      previousHash: this.latestBlock.blockHash,
      transactions: this.pending,
    });

    this.blocks.push(block);
    this.pending = [];

    this.logger.debug(
      { blockId: block.blockId, transactions: block.transactions.length, hash: block.blockHash },
      'Mined ledger block',
    );
    this.emit('ledger:block', { block });
    return block;
  }

  // ─────────────────────────────────────────────────────────
  // INTEGRITY
  // ─────────────────────────────────────────────────────────

  /**
   * Locate the first block whose stored hashes disagree with its contents or
   * with its predecessor. Null when the chain is intact.
   */
  findViolation(): IntegrityFailure | null {
    const genesis = this.blocks[0];
    if (genesis.previousHash !== GENESIS_PREVIOUS_HASH) {
      return { blockId: genesis.blockId, reason: 'genesis previous hash is not the zero sentinel' };
    }
    if (genesis.transactions.length > 0) {
      return { blockId: genesis.blockId, reason: 'genesis block holds transactions' };
    }

    for (let i = 0; i < this.blocks.length; i++) {
      const block = this.blocks[i];
      if (i > 0 && block.previousHash !== this.blocks[i - 1].blockHash) {
        return { blockId: block.blockId, reason: 'previous hash does not match the preceding block' };
      }
      const mismatch = checkBlockContents(block);
      if (mismatch) {
        return { blockId: block.blockId, reason: mismatch };
      }
    }

    return null;
  }

  verifyIntegrity(): boolean {
    return this.findViolation() === null;
  }

  /**
   * Throw IntegrityViolationError if the chain fails verification.
   */
  assertIntegrity(): void {
    const violation = this.findViolation();
    if (violation) {
      this.logger.error(violation, 'Ledger integrity violation');
      throw new IntegrityViolationError(violation.blockId, violation.reason);
    }
  }

  // ─────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────

  get latestBlock(): LedgerBlock {
    return this.blocks[this.blocks.length - 1];
  }

  getBlocks(): readonly LedgerBlock[] {
    return [...this.blocks];
  }

  getPending(): readonly SchedulingTransaction[] {
    return [...this.pending];
  }

  /**
   * Committed and pending transactions, optionally filtered, oldest first.
   */
  history(filter: HistoryFilter = {}): SchedulingTransaction[] {
    const all = [...this.allTransactions()].filter(
      (tx) =>
        (filter.vmId === undefined || tx.vmId === filter.vmId) &&
        (filter.taskId === undefined || tx.taskId === filter.taskId),
    );
    return all.sort((a, b) => a.timestamp - b.timestamp);
  }

  recent(limit: number = 10): SchedulingTransaction[] {
    if (limit <= 0) return [];
    return this.history().slice(-limit);
  }

  vmStats(vmId: number): VmLedgerStats {
    const transactions = this.history({ vmId });
    const assigned = transactions.filter((tx) => tx.status === 'assigned');
    const failedAssignments = transactions.filter((tx) => tx.status === 'failed').length;
    const totalAssignments = assigned.length;

    let scoreSum = 0;
    let totalCpuAllocated = 0;
    let totalMemAllocated = 0;
    for (const tx of assigned) {
      scoreSum += tx.score;
      totalCpuAllocated += tx.taskRequirements.cpu;
      totalMemAllocated += tx.taskRequirements.mem;
    }

    return {
      vmId,
      totalAssignments,
      failedAssignments,
      successRate: totalAssignments / Math.max(totalAssignments + failedAssignments, 1),
      averageScore: scoreSum / Math.max(totalAssignments, 1),
      totalCpuAllocated,
      totalMemAllocated,
      totalTransactions: transactions.length,
    };
  }

  summary(): LedgerSummary {
    let totalTransactions = 0;
    let successfulAssignments = 0;
    let failedAssignments = 0;
    for (const tx of this.allTransactions()) {
      totalTransactions++;
      if (tx.status === 'assigned') successfulAssignments++;
      else if (tx.status === 'failed') failedAssignments++;
    }

    return {
      totalBlocks: this.blocks.length,
      totalTransactions,
      pendingTransactions: this.pending.length,
      successfulAssignments,
      failedAssignments,
      successRate: successfulAssignments / Math.max(totalTransactions, 1),
      chainIntegrity: this.verifyIntegrity(),
      latestBlockHash: this.latestBlock.blockHash,
    };
  }

  // ─────────────────────────────────────────────────────────
  // EXPORT / IMPORT
  // ─────────────────────────────────────────────────────────

  /**
   * Plain, detached copy of the whole ledger.
   */
  export(): LedgerExport {
    return {
      blocks: this.blocks.map(exportBlock),
      pendingTransactions: this.pending.map(exportTransaction),
      summary: this.summary(),
    };
  }

  /**
   * Rebuild a ledger from exported data. Structure is validated; hashes are
   * not, so tampered data loads and then fails verifyIntegrity().
   */
  static fromExport(data: unknown, options: LedgerOptions = {}): TransactionLedger {
    const parsed = LedgerExportSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue.path.join('.');
      throw new MalformedRecordError(`Malformed ledger export at ${path || '(root)'}: ${issue.message}`, path, parsed.error);
    }

    const { blocks, pendingTransactions } = parsed.data;
    blocks.forEach((block, index) => {
      if (block.blockId !== index) {
        throw new MalformedRecordError(
          `Block at position ${index} has id ${block.blockId}`,
          `blocks.${index}.blockId`,
        );
      }
    });

    pendingTransactions.forEach((tx, index) => {
      if (tx.blockHash !== '') {
        throw new MalformedRecordError(
          `Pending transaction ${tx.transactionId} is already stamped with a block hash`,
          `pendingTransactions.${index}.blockHash`,
        );
      }
    });

    const ledger = new TransactionLedger(options);
    ledger.blocks = blocks.map((block) =>
      Object.freeze({
        ...block,
        transactions: Object.freeze(block.transactions.map(freezeTransaction)),
      }),
    );
    ledger.pending = pendingTransactions.map(freezeTransaction);
    ledger.transactionCounter = highestCounter([...ledger.allTransactions()]);
    return ledger;
  }

  private *allTransactions(): Generator<SchedulingTransaction> {
    for (const block of this.blocks) {
      yield* block.transactions;
    }
    yield* this.pending;
  }
}

function exportTransaction(tx: SchedulingTransaction): ExportedTransaction {
  return {
    ...tx,
    taskRequirements: { ...tx.taskRequirements },
    vmStateBefore: { ...tx.vmStateBefore },
    vmStateAfter: { ...tx.vmStateAfter },
  };
}

function exportBlock(block: LedgerBlock): ExportedBlock {
  return {
    blockId: block.blockId,
    timestamp: block.timestamp,
    previousHash: block.previousHash,
    blockHash: block.blockHash,
    merkleRoot: block.merkleRoot,
    transactions: block.transactions.map(exportTransaction),
  };
}

function highestCounter(transactions: readonly SchedulingTransaction[]): number {
  let highest = transactions.length;
  for (const tx of transactions) {
    const match = TX_COUNTER_PATTERN.exec(tx.transactionId);
    if (match) highest = Math.max(highest, Number(match[1]));
  }
  return highest;
}
