import { BankSchema, BankSchemaRegistry } from '../entities/BankSchema.js';
import { RawRecord } from '../entities/Statement.js';
import { CanonicalTransaction, LedgerTransaction } from '../entities/Transaction.js';
import { parseLocaleAmount } from './AmountParser.js';
import { DESCRIPTION_COLUMN_ALIASES, cellText, resolveCounterparty } from './CounterpartyResolver.js';

export const DEBIT_COLUMN_ALIASES = ['debit', 'Дебет', 'Расход', 'Расход в валюте счета'] as const;
export const CREDIT_COLUMN_ALIASES = ['credit', 'Кредит', 'Приход', 'Приход в валюте счета'] as const;
export const OPERATION_AMOUNT_ALIASES = ['operation_amount', 'Сумма операции', 'Сумма', 'Сумма в валюте счета'] as const;

const firstPresent = (fields: RawRecord, columns: Array<string | undefined>): string | undefined =>
  columns.find((column): column is string => column !== undefined && Object.hasOwn(fields, column));

const amountIn = (fields: RawRecord, column: string | undefined): number | null =>
  column ? parseLocaleAmount(fields[column]) : null;

/**
 * Signed amount, positive for credit. Resolution order: canonical `amount`, then credit − debit,
 * then a single signed operation amount, else 0.
 */
export const resolveAmount = (fields: RawRecord, schema: BankSchema | undefined): number => {
  const canonical = amountIn(fields, firstPresent(fields, ['amount', schema?.columns.amount]));
  if (canonical !== null) {
    return canonical;
  }

  const debitColumn = firstPresent(fields, [schema?.columns.debit, ...DEBIT_COLUMN_ALIASES]);
  const creditColumn = firstPresent(fields, [schema?.columns.credit, ...CREDIT_COLUMN_ALIASES]);

  if (debitColumn || creditColumn) {
    const debit = amountIn(fields, debitColumn);
    const credit = amountIn(fields, creditColumn);

    if (debit !== null || credit !== null) {
      return (credit ?? 0) - Math.abs(debit ?? 0);
    }
  }

  const signed = amountIn(fields, firstPresent(fields, [schema?.columns.operationAmount, ...OPERATION_AMOUNT_ALIASES]));

  return signed ?? 0;
};

export const resolveDescription = (fields: RawRecord, schema: BankSchema | undefined): string => {
  const columns = [schema?.columns.purpose, ...DESCRIPTION_COLUMN_ALIASES];

  for (const column of columns) {
    const text = cellText(fields, column);
    if (text) {
      return text;
    }
  }

  return '';
};

export const normalizeTransaction = (
  transaction: LedgerTransaction,
  schema: BankSchema | undefined,
): CanonicalTransaction => {
  const description = resolveDescription(transaction.fields, schema);
  const { counterpartyId, counterpartyName } = resolveCounterparty(transaction.fields, schema, description);

  return {
    ...transaction,
    fields: { ...transaction.fields },
    amount: resolveAmount(transaction.fields, schema),
    description,
    counterpartyId,
    counterpartyName: counterpartyName || counterpartyId || description,
  };
};

export const normalize = (
  transactions: LedgerTransaction[],
  registry: BankSchemaRegistry,
): CanonicalTransaction[] => transactions.map((txn) => normalizeTransaction(txn, registry.get(txn.bank)));
