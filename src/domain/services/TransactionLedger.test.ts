import test from 'node:test';
import assert from 'node:assert/strict';
import { RawRecord, Statement } from '../entities/Statement.js';
import { MissingDateColumnError } from '../errors/AnalysisErrors.js';
import { createBankSchemaRegistry } from './BankSchemaCatalog.js';
import { buildLedger, extractStatementRows, mergeLedger } from './TransactionLedger.js';

const registry = createBankSchemaRegistry({
  halyk_business: {
    columns: { date: 'Дата', debit: 'Дебет', credit: 'Кредит', purpose: 'Детали платежа' },
  },
});

const window = { start: '2023-03-01', end: '2024-02-29' };

function makeStatement(partial: Partial<Statement> & { transactions: RawRecord[] }): Statement {
  return {
    id: partial.id ?? 's1',
    bank: partial.bank ?? 'halyk_business',
    holder: partial.holder ?? { name: 'Test Holder', nationalId: '900101300123' },
    accountNumber: 'accountNumber' in partial ? partial.accountNumber : 'KZ01',
    footer: { kind: 'EMPTY' },
    ...partial,
  };
}

test('uses the bank-configured date column', () => {
  const statement = makeStatement({ transactions: [{ Дата: '15.04.2023', Кредит: '100' }] });

  const contribution = extractStatementRows(statement, registry);

  assert.equal(contribution.dateColumn, 'Дата');
  assert.equal(contribution.rows[0].txnDate, '2023-04-15');
});

test('falls back to common date aliases for unconfigured banks', () => {
  const statement = makeStatement({
    bank: 'freedom_bank',
    transactions: [{ 'Дата операции': '01.06.2023', Сумма: '-500' }],
  });

  const contribution = extractStatementRows(statement, registry);

  assert.equal(contribution.dateColumn, 'Дата операции');
  assert.equal(contribution.rows.length, 1);
});

test('fails a statement without any usable date column', () => {
  const statement = makeStatement({ bank: 'mystery_bank', transactions: [{ Когда: '01.04.2023' }] });

  assert.throws(
    () => buildLedger([statement], window, registry),
    (error: unknown) => error instanceof MissingDateColumnError && error.code === 'MISSING_DATE_COLUMN',
  );
});

test('drops and counts rows whose date does not parse', () => {
  const statement = makeStatement({
    transactions: [{ Дата: '15.04.2023' }, { Дата: 'bad' }, { Дата: '' }],
  });

  const { reports, transactions } = buildLedger([statement], window, registry);

  assert.equal(transactions.length, 1);
  assert.deepEqual(reports[0], {
    statementId: 's1',
    bank: 'halyk_business',
    status: 'OK',
    dateColumn: 'Дата',
    retainedRows: 1,
    droppedRows: 2,
  });
});

test('tags rows with their origin', () => {
  const statement = makeStatement({ id: 'stmt-a', transactions: [{ Дата: '15.04.2023', Кредит: '100' }] });

  const [row] = buildLedger([statement], window, registry).transactions;

  assert.deepEqual(row, {
    txnDate: '2023-04-15',
    bank: 'halyk_business',
    accountNumber: 'KZ01',
    sourceStatementId: 'stmt-a',
    fields: { Дата: '15.04.2023', Кредит: '100' },
  });
});

test('window bounds are inclusive on both ends', () => {
  const statement = makeStatement({
    transactions: [{ Дата: '28.02.2023' }, { Дата: '01.03.2023' }, { Дата: '29.02.2024' }, { Дата: '01.03.2024' }],
  });

  const dates = buildLedger([statement], window, registry).transactions.map((row) => row.txnDate);

  assert.deepEqual(dates, ['2023-03-01', '2024-02-29']);
});

test('overlapping statements keep one row per bank, account and date', () => {
  const first = makeStatement({
    id: 's1',
    transactions: [{ Дата: '10.05.2023', Кредит: '100' }, { Дата: '11.05.2023', Кредит: '200' }],
  });
  const second = makeStatement({
    id: 's2',
    transactions: [{ Дата: '11.05.2023', Кредит: '200' }, { Дата: '12.05.2023', Кредит: '300' }],
  });

  const ledger = buildLedger([first, second], window, registry).transactions;

  assert.deepEqual(
    ledger.map((row) => [row.txnDate, row.sourceStatementId]),
    [
      ['2023-05-10', 's1'],
      ['2023-05-11', 's1'],
      ['2023-05-12', 's2'],
    ],
  );
});

test('rows without an account number are never collapsed', () => {
  const statement = makeStatement({
    accountNumber: undefined,
    transactions: [{ Дата: '10.05.2023', Кредит: '100' }, { Дата: '10.05.2023', Кредит: '250' }],
  });

  assert.equal(buildLedger([statement], window, registry).transactions.length, 2);
});

test('different accounts on the same date are distinct', () => {
  const first = makeStatement({ id: 's1', accountNumber: 'KZ01', transactions: [{ Дата: '10.05.2023' }] });
  const second = makeStatement({ id: 's2', accountNumber: 'KZ02', transactions: [{ Дата: '10.05.2023' }] });

  assert.equal(buildLedger([first, second], window, registry).transactions.length, 2);
});

test('building twice gives the same ledger and leaves the input untouched', () => {
  const statement = makeStatement({ transactions: [{ Дата: '15.04.2023', Кредит: '100' }] });

  const once = buildLedger([statement], window, registry);
  const twice = buildLedger([statement], window, registry);

  assert.deepEqual(once, twice);
  assert.deepEqual(statement.transactions, [{ Дата: '15.04.2023', Кредит: '100' }]);
});

test('an empty statement contributes nothing', () => {
  const statement = makeStatement({ bank: 'mystery_bank', transactions: [] });

  const contribution = extractStatementRows(statement, registry);

  assert.equal(contribution.dateColumn, null);
  assert.deepEqual(mergeLedger([contribution], window), []);
});
