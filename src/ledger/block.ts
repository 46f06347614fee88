import { hashCanonical } from '../utils/crypto.js';
import { transactionsRoot } from './merkle.js';
import type { LedgerBlock, SchedulingTransaction } from './types.js';

export const GENESIS_PREVIOUS_HASH = '0'.repeat(64);

interface BlockHeader {
  blockId: number;
  timestamp: number;
  previousHash: string;
  merkleRoot: string;
  transactionCount: number;
}

export function computeBlockHash(header: BlockHeader): string {
  return hashCanonical({
    blockId: header.blockId,
    timestamp: header.timestamp,
    previousHash: header.previousHash,
    merkleRoot: header.merkleRoot,
    transactionCount: header.transactionCount,
  });
}

export function freezeTransaction(tx: SchedulingTransaction): SchedulingTransaction {
  return Object.freeze({
    ...tx,
    taskRequirements: Object.freeze({ ...tx.taskRequirements }),
    vmStateBefore: Object.freeze({ ...tx.vmStateBefore }),
    vmStateAfter: Object.freeze({ ...tx.vmStateAfter }),
  });
}

/**
 * Close a set of transactions into a block: compute the merkle root and
 * block hash, stamp every transaction with that hash, freeze the result.
 */
export function sealBlock(input: {
  blockId: number;
  timestamp: number;
  previousHash: string;
  transactions: readonly SchedulingTransaction[];
}): LedgerBlock {
  const root = transactionsRoot(input.transactions);
  const blockHash = computeBlockHash({
    blockId: input.blockId,
    timestamp: input.timestamp,
    previousHash: input.previousHash,
    merkleRoot: root,
    transactionCount: input.transactions.length,
  });

  const stamped = input.transactions.map((tx) => freezeTransaction({ ...tx, blockHash }));

  return Object.freeze({
    blockId: input.blockId,
    timestamp: input.timestamp,
    transactions: Object.freeze(stamped),
    previousHash: input.previousHash,
    merkleRoot: root,
    blockHash,
  });
}

/**
 * Recheck a block against its own contents. Returns the first mismatch
 * found, or null when the stored hashes agree.
 */
export function checkBlockContents(block: LedgerBlock): string | null {
  const root = transactionsRoot(block.transactions);
  if (root !== block.merkleRoot) {
    return `merkle root mismatch (stored ${block.merkleRoot.slice(0, 12)}…, computed ${root.slice(0, 12)}…)`;
  }

  const hash = computeBlockHash({ ...block, transactionCount: block.transactions.length });
  if (hash !== block.blockHash) {
    return `block hash mismatch (stored ${block.blockHash.slice(0, 12)}…, computed ${hash.slice(0, 12)}…)`;
  }

  const unstamped = block.transactions.find((tx) => tx.blockHash !== block.blockHash);
  if (unstamped) {
    return `transaction ${unstamped.transactionId} carries block hash ${unstamped.blockHash.slice(0, 12)}…`;
  }

  return null;
}
