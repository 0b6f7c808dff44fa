import { AnalysisWindow } from '../entities/AnalysisWindow.js';
import { BankSchemaRegistry } from '../entities/BankSchema.js';
import { Statement } from '../entities/Statement.js';
import { LedgerTransaction } from '../entities/Transaction.js';
import { MissingDateColumnError } from '../errors/AnalysisErrors.js';
import { isWithinWindow } from './AnalysisWindowCalculator.js';
import { parseOperationDate } from './OperationDateParser.js';
import { buildLedgerKey } from './TransactionHasher.js';

export const DATE_COLUMN_ALIASES = [
  'txn_date',
  'Дата',
  'date',
  'Дата операции',
  'Дата проводки',
  'Дата отражения по счету',
  'Operation date',
] as const;

export interface StatementContribution {
  statementId: string;
  bank: string;
  dateColumn: string | null;
  rows: LedgerTransaction[];
  droppedRows: number;
}

export interface StatementLedgerReport {
  statementId: string;
  bank: string;
  status: 'OK' | 'FAILED';
  dateColumn: string | null;
  retainedRows: number;
  droppedRows: number;
  error?: { code: string; message: string };
}

export interface LedgerBuildResult {
  transactions: LedgerTransaction[];
  reports: StatementLedgerReport[];
}

const statementColumns = (statement: Statement): Set<string> => {
  if (statement.columns && statement.columns.length > 0) {
    return new Set(statement.columns);
  }

  const columns = new Set<string>();
  for (const row of statement.transactions) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return columns;
};

export const resolveDateColumn = (statement: Statement, registry: BankSchemaRegistry): string | null => {
  const configured = registry.get(statement.bank)?.columns.date;
  const candidates = [configured, ...DATE_COLUMN_ALIASES].filter((c): c is string => Boolean(c));
  const columns = statementColumns(statement);

  if (columns.size === 0 && statement.transactions.length === 0) {
    return null;
  }

  const resolved = candidates.find((candidate) => columns.has(candidate));
  if (!resolved) {
    throw new MissingDateColumnError(statement.id, statement.bank, candidates);
  }

  return resolved;
};

/**
 * Dates and tags one statement's rows. Independent of every other statement.
 * Throws MissingDateColumnError when the statement has rows but no usable date column.
 */
export const extractStatementRows = (statement: Statement, registry: BankSchemaRegistry): StatementContribution => {
  const dateColumn = resolveDateColumn(statement, registry);
  const rows: LedgerTransaction[] = [];
  let droppedRows = 0;

  if (dateColumn === null) {
    return { statementId: statement.id, bank: statement.bank, dateColumn, rows, droppedRows };
  }

  for (const fields of statement.transactions) {
    const txnDate = parseOperationDate(fields[dateColumn]);

    if (!txnDate) {
      droppedRows += 1;
      continue;
    }

    rows.push({
      txnDate,
      bank: statement.bank,
      accountNumber: statement.accountNumber,
      sourceStatementId: statement.id,
      fields: { ...fields },
    });
  }

  return { statementId: statement.id, bank: statement.bank, dateColumn, rows, droppedRows };
};

/**
 * Window filter and first-occurrence dedup over (bank, account number, date), in contribution order.
 */
export const mergeLedger = (contributions: StatementContribution[], window: AnalysisWindow): LedgerTransaction[] => {
  const seen = new Set<string>();
  const merged: LedgerTransaction[] = [];

  for (const contribution of contributions) {
    for (const row of contribution.rows) {
      if (!isWithinWindow(row.txnDate, window)) {
        continue;
      }

      const key = buildLedgerKey(row);
      if (key !== null) {
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
      }

      merged.push(row);
    }
  }

  return merged;
};

export const toLedgerReport = (contribution: StatementContribution): StatementLedgerReport => ({
  statementId: contribution.statementId,
  bank: contribution.bank,
  status: 'OK',
  dateColumn: contribution.dateColumn,
  retainedRows: contribution.rows.length,
  droppedRows: contribution.droppedRows,
});

export const buildLedger = (
  statements: Statement[],
  window: AnalysisWindow,
  registry: BankSchemaRegistry,
): LedgerBuildResult => {
  const contributions = statements.map((statement) => extractStatementRows(statement, registry));

  return {
    transactions: mergeLedger(contributions, window),
    reports: contributions.map(toLedgerReport),
  };
};
