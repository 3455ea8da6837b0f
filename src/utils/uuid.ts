import { randomUUID } from 'crypto';

/**
 * Generates a ledger transaction id, e.g. `tx-transfer-6f1c…`.
 */
export const generateTxId = (kind: string): string => `tx-${kind}-${randomUUID()}`;
