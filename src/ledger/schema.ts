import { z } from 'zod';

const VectorSchema = z.object({
  cpu: z.number(),
  mem: z.number(),
  io: z.number(),
  bw: z.number(),
});

export const TransactionSchema = z.object({
  transactionId: z.string().min(1),
  timestamp: z.number(),
  vmId: z.number().int(),
  taskId: z.string(),
  taskRequirements: VectorSchema,
  vmStateBefore: VectorSchema,
  vmStateAfter: VectorSchema,
  score: z.number(),
  status: z.enum(['assigned', 'failed', 'rejected']),
  blockHash: z.string(),
});

export const BlockSchema = z.object({
  blockId: z.number().int().nonnegative(),
  timestamp: z.number(),
  previousHash: z.string(),
  blockHash: z.string(),
  merkleRoot: z.string(),
  transactions: z.array(TransactionSchema),
});

export const LedgerSummarySchema = z.object({
  totalBlocks: z.number().int(),
  totalTransactions: z.number().int(),
  pendingTransactions: z.number().int(),
  successfulAssignments: z.number().int(),
  failedAssignments: z.number().int(),
  successRate: z.number(),
  chainIntegrity: z.boolean(),
  latestBlockHash: z.string().nullable(),
});

export const LedgerExportSchema = z.object({
  blocks: z.array(BlockSchema).min(1, 'a ledger export needs at least the genesis block'),
  pendingTransactions: z.array(TransactionSchema),
  summary: LedgerSummarySchema.optional(),
});

export type ExportedTransaction = z.infer<typeof TransactionSchema>;
export type ExportedBlock = z.infer<typeof BlockSchema>;
export type LedgerSummary = z.infer<typeof LedgerSummarySchema>;
export type LedgerExport = z.infer<typeof LedgerExportSchema>;
