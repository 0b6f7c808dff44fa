import { CellValue } from '../entities/Statement.js';
import { CanonicalTransaction, IncomeTransaction, LedgerTransaction } from '../entities/Transaction.js';

export type FlatRecord = Record<string, CellValue>;

// Raw bank columns first, derived columns last so they win on a name clash.
export const toFlatRecord = (txn: LedgerTransaction): FlatRecord => ({
  ...txn.fields,
  txn_date: txn.txnDate,
  bank: txn.bank,
  account_number: txn.accountNumber ?? null,
  source_statement: txn.sourceStatementId,
});

export const toCanonicalFlatRecord = (txn: CanonicalTransaction): FlatRecord => ({
  ...toFlatRecord(txn),
  amount: txn.amount,
  description: txn.description,
  counterparty_id: txn.counterpartyId,
  counterparty_name: txn.counterpartyName,
});

export const toIncomeFlatRecord = (txn: IncomeTransaction): FlatRecord => ({
  ...toFlatRecord(txn),
  credit_amount: txn.creditAmount,
  income_eligible: txn.incomeEligible,
  exclusion_reason: txn.exclusionReason ?? null,
});
