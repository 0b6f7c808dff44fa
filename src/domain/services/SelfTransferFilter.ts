import { CanonicalTransaction } from '../entities/Transaction.js';
import { normalizeDescription } from './DescriptionNormalizer.js';

export const SELF_TRANSFER_KEYWORDS = [
  'between own accounts',
  'own account',
  'internal transfer',
  'со своего счета',
  'между своими',
  'перевод между своими',
  'с карты другого банка',
] as const;

const normalizedKeywords = SELF_TRANSFER_KEYWORDS.map(normalizeDescription);

export const isSelfTransferText = (text: string): boolean => {
  const normalized = normalizeDescription(text);
  return normalized.length > 0 && normalizedKeywords.some((keyword) => normalized.includes(keyword));
};

export const isSelfTransfer = (txn: Pick<CanonicalTransaction, 'description' | 'counterpartyName'>): boolean =>
  isSelfTransferText(txn.description) || isSelfTransferText(txn.counterpartyName);

export const excludeSelfTransfers = (transactions: CanonicalTransaction[]): CanonicalTransaction[] =>
  transactions.filter((txn) => !isSelfTransfer(txn));
