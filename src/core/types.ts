import { z } from 'zod';

const positive = z.number().positive();

export const CapacitySchema = z.object({
  cpu: positive.default(500),
  mem: positive.default(250),
  io: positive.default(300),
  bw: positive.default(20),
});

export const LedgerSchedConfigSchema = z.object({
  vm: z.object({
    capacity: CapacitySchema.default({}),
    count: z.number().int().min(1).max(1024).default(4),
  }).default({}),
  blockchain: z.object({
    alpha: z.number().min(0).default(0.7),
    beta: z.number().min(0).default(0.3),
    epsilon: positive.default(1e-6),
    historyWindow: z.number().int().min(1).default(10),
    blockSize: z.number().int().min(1).default(5),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type LedgerSchedConfig = z.infer<typeof LedgerSchedConfigSchema>;

/** Input shape accepted as overrides (every field optional, nested) */
export type LedgerSchedConfigInput = z.input<typeof LedgerSchedConfigSchema>;
