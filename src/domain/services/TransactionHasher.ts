import crypto from 'node:crypto';

export interface LedgerKeyInput {
  bank: string;
  accountNumber?: string;
  txnDate: string;
}

/**
 * Dedup key for the merged ledger. Null when any part is missing: such rows are never collapsed.
 */
export const buildLedgerKey = (input: LedgerKeyInput): string | null => {
  const accountNumber = input.accountNumber?.trim();

  if (!input.bank || !accountNumber || !input.txnDate) {
    return null;
  }

  const serialized = [input.bank.trim().toLowerCase(), accountNumber, input.txnDate].join('|');

  return crypto.createHash('sha256').update(serialized).digest('hex');
};
