export const NAME = 'ledgersched';
export const VERSION = '0.1.0';
