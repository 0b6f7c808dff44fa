import { CellValue, RawRecord, Statement, StatementFooter } from '../entities/Statement.js';

export const HEADER_FIELD_MAP: Readonly<Record<string, string>> = Object.freeze({
  Валюта: 'currency',
  БИК: 'bic',
  'Кредитный лимит': 'creditLimit',
  'Входящий остаток': 'openingBalance',
  'Входящее сальдо': 'incomingSaldo',
  'Реальный баланс': 'realBalance',
  'Блокированные средства': 'blockedFunds',
});

export type StatementMetadataRow = Record<string, CellValue>;

export const toFooter = (input: RawRecord | RawRecord[] | null | undefined): StatementFooter => {
  if (!input) {
    return { kind: 'EMPTY' };
  }
  if (Array.isArray(input)) {
    return input.length === 0 ? { kind: 'EMPTY' } : { kind: 'LIST', records: input };
  }
  return { kind: 'SINGLE', record: input };
};

export const footerRecords = (footer: StatementFooter): RawRecord[] => {
  switch (footer.kind) {
    case 'EMPTY':
      return [];
    case 'SINGLE':
      return [footer.record];
    case 'LIST':
      return footer.records;
  }
};

export const describeStatement = (statement: Statement): StatementMetadataRow => {
  const row: StatementMetadataRow = {
    statementId: statement.id,
    sourceFileName: statement.sourceFileName ?? null,
    bank: statement.bank,
    holderName: statement.holder.name,
    nationalId: statement.holder.nationalId,
    accountNumber: statement.accountNumber ?? null,
    periodFrom: statement.periodStart ?? null,
    periodTo: statement.periodEnd ?? null,
    generatedAt: statement.generatedAt ?? null,
    transactionCount: statement.transactions.length,
    footerRecords: footerRecords(statement.footer).length,
  };

  if (statement.header) {
    for (const [source, target] of Object.entries(HEADER_FIELD_MAP)) {
      if (Object.hasOwn(statement.header, source)) {
        row[target] = statement.header[source];
      }
    }
  }

  return row;
};

export const buildStatementMetadata = (statements: Statement[]): StatementMetadataRow[] =>
  statements.map(describeStatement);
