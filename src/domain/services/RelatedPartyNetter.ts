import { NetRow } from '../entities/AnalysisTables.js';
import { CanonicalTransaction } from '../entities/Transaction.js';
import { DEFAULT_COEFFICIENT } from './CounterpartyAggregator.js';
import { excludeSelfTransfers } from './SelfTransferFilter.js';

// One row per (id, name) pair, first-seen order, no truncation.
export const netRelatedParties = (transactions: CanonicalTransaction[]): NetRow[] => {
  const rows = new Map<string, NetRow>();

  for (const txn of excludeSelfTransfers(transactions)) {
    const key = JSON.stringify([txn.counterpartyId, txn.counterpartyName]);
    const row = rows.get(key) ?? {
      counterpartyId: txn.counterpartyId,
      counterpartyName: txn.counterpartyName,
      debit: 0,
      credit: 0,
      balance: 0,
      turnover: 0,
      coefficient: DEFAULT_COEFFICIENT,
    };

    if (txn.amount < 0) {
      row.debit += txn.amount;
    } else if (txn.amount > 0) {
      row.credit += txn.amount;
    }
    row.balance += txn.amount;
    row.turnover += Math.abs(txn.amount);

    rows.set(key, row);
  }

  return Array.from(rows.values());
};
