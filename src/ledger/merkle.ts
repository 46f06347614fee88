import { hashCanonical, sha256 } from '../utils/crypto.js';
import type { SchedulingTransaction } from './types.js';

export const EMPTY_BLOCK_ROOT = sha256('empty_block');

/**
 * Leaf hash of a transaction. The block-hash stamp is left out, since it is
 * derived from this very root.
 */
export function transactionDigest(tx: SchedulingTransaction): string {
  return hashCanonical({
    transactionId: tx.transactionId,
    timestamp: tx.timestamp,
    vmId: tx.vmId,
    taskId: tx.taskId,
    taskRequirements: tx.taskRequirements,
    vmStateBefore: tx.vmStateBefore,
    vmStateAfter: tx.vmStateAfter,
    score: tx.score,
    status: tx.status,
  });
}

/**
 * Pairwise-reduce leaf hashes to one root. Odd levels duplicate their last hash.
 */
export function merkleRoot(leaves: readonly string[]): string {
  if (leaves.length === 0) return EMPTY_BLOCK_ROOT;

  let level = [...leaves];
  while (level.length > 1) {
    if (level.length % 2 === 1) {
      level.push(level[level.length - 1]);
    }
    const next: string[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(sha256(level[i] + level[i + 1]));
    }
    level = next;
  }
  return level[0];
}

export function transactionsRoot(transactions: readonly SchedulingTransaction[]): string {
  return merkleRoot(transactions.map(transactionDigest));
}
