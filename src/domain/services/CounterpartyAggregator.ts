import { AggregationRow, CounterpartyTables } from '../entities/AnalysisTables.js';
import { CanonicalTransaction } from '../entities/Transaction.js';
import { excludeSelfTransfers } from './SelfTransferFilter.js';

export const TOP_COUNTERPARTIES = 9;
export const OTHERS_ID = 'OTHERS';
export const OTHERS_LABEL = 'Others';
export const DEFAULT_COEFFICIENT = 1;

export type FlowSide = 'DEBIT' | 'CREDIT';

interface TurnoverGroup {
  counterpartyId: string;
  counterpartyName: string;
  turnover: number;
}

/**
 * Share label for the Top-N tables. Tiny non-zero shares stay visible as "<0.1%".
 */
export const formatShare = (turnover: number, total: number): string => {
  if (total === 0 || turnover === 0) {
    return '0%';
  }

  const percent = (turnover / total) * 100;

  if (percent < 0.1) {
    return '<0.1%';
  }

  const oneDecimal = Math.round(percent * 10) / 10;
  if (oneDecimal < 1) {
    return `${oneDecimal.toFixed(1)}%`;
  }

  return `${Math.round(percent)}%`;
};

const groupBySide = (transactions: CanonicalTransaction[], side: FlowSide): TurnoverGroup[] => {
  const groups = new Map<string, TurnoverGroup>();

  for (const txn of transactions) {
    const matches = side === 'DEBIT' ? txn.amount < 0 : txn.amount > 0;
    if (!matches) {
      continue;
    }

    const existing = groups.get(txn.counterpartyId);
    if (existing) {
      existing.turnover += Math.abs(txn.amount);
    } else {
      groups.set(txn.counterpartyId, {
        counterpartyId: txn.counterpartyId,
        counterpartyName: txn.counterpartyName,
        turnover: Math.abs(txn.amount),
      });
    }
  }

  // Array.prototype.sort is stable: equal turnovers keep first-seen order
  return Array.from(groups.values()).sort((a, b) => b.turnover - a.turnover);
};

export const rankSide = (transactions: CanonicalTransaction[], side: FlowSide): AggregationRow[] => {
  const groups = groupBySide(transactions, side);
  const total = groups.reduce((sum, group) => sum + group.turnover, 0);

  const ranked = groups.slice(0, TOP_COUNTERPARTIES);
  const remainder = groups.slice(TOP_COUNTERPARTIES);

  if (remainder.length > 0) {
    ranked.push({
      counterpartyId: OTHERS_ID,
      counterpartyName: OTHERS_LABEL,
      turnover: remainder.reduce((sum, group) => sum + group.turnover, 0),
    });
  }

  return ranked.map((group) => ({
    counterpartyId: group.counterpartyId,
    counterpartyName: group.counterpartyName,
    turnover: group.turnover,
    share: formatShare(group.turnover, total),
    coefficient: DEFAULT_COEFFICIENT,
  }));
};

export const aggregateTopN = (transactions: CanonicalTransaction[]): CounterpartyTables => {
  const thirdParty = excludeSelfTransfers(transactions);

  return {
    debitTop: rankSide(thirdParty, 'DEBIT'),
    creditTop: rankSide(thirdParty, 'CREDIT'),
  };
};
