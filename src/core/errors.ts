export class LedgerSchedError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'LedgerSchedError';
  }
}

export class ConfigError extends LedgerSchedError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class UnknownPolicyError extends LedgerSchedError {
  constructor(public readonly policy: string, public readonly known: readonly string[]) {
    super(
      `Unknown scheduling policy "${policy}" (expected one of: ${known.join(', ')})`,
      'UNKNOWN_POLICY',
      'resolve',
    );
    this.name = 'UnknownPolicyError';
  }
}

export class IntegrityViolationError extends LedgerSchedError {
  constructor(public readonly blockId: number, public readonly reason: string) {
    super(`Ledger integrity violation at block ${blockId}: ${reason}`, 'INTEGRITY_VIOLATION', 'verify');
    this.name = 'IntegrityViolationError';
  }
}

export class MalformedRecordError extends LedgerSchedError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'MALFORMED_RECORD', 'import', cause);
    this.name = 'MalformedRecordError';
  }
}
