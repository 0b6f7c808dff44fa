import test from 'node:test';
import assert from 'node:assert/strict';
import { CanonicalTransaction } from '../entities/Transaction.js';
import { aggregateTopN, formatShare } from './CounterpartyAggregator.js';

function makeTxn(counterpartyId: string, amount: number, partial: Partial<CanonicalTransaction> = {}): CanonicalTransaction {
  return {
    txnDate: '2023-06-01',
    bank: 'halyk_business',
    accountNumber: 'KZ01',
    sourceStatementId: 's1',
    fields: {},
    amount,
    description: 'Оплата по договору',
    counterpartyId,
    counterpartyName: `Name ${counterpartyId}`,
    ...partial,
  };
}

test('share labels keep tiny shares visible', () => {
  assert.equal(formatShare(5, 10000), '<0.1%');
  assert.equal(formatShare(60, 10000), '0.6%');
  assert.equal(formatShare(246, 1000), '25%');
  assert.equal(formatShare(99, 10000), '1%');
  assert.equal(formatShare(1000, 1000), '100%');
});

test('zero turnover and zero totals render 0%', () => {
  assert.equal(formatShare(0, 100), '0%');
  assert.equal(formatShare(10, 0), '0%');
});

test('groups by counterparty, sums absolute amounts and keeps the first-seen name', () => {
  const { debitTop, creditTop } = aggregateTopN([
    makeTxn('a', -100, { counterpartyName: 'Alpha LLP' }),
    makeTxn('a', -50, { counterpartyName: 'ALPHA' }),
    makeTxn('b', -300),
  ]);

  assert.deepEqual(debitTop, [
    { counterpartyId: 'b', counterpartyName: 'Name b', turnover: 300, share: '67%', coefficient: 1 },
    { counterpartyId: 'a', counterpartyName: 'Alpha LLP', turnover: 150, share: '33%', coefficient: 1 },
  ]);
  assert.deepEqual(creditTop, []);
});

test('debit and credit flows are ranked separately and zero amounts are ignored', () => {
  const { debitTop, creditTop } = aggregateTopN([makeTxn('a', -100), makeTxn('a', 400), makeTxn('b', 0)]);

  assert.deepEqual(
    debitTop.map((row) => [row.counterpartyId, row.turnover]),
    [['a', 100]],
  );
  assert.deepEqual(
    creditTop.map((row) => [row.counterpartyId, row.turnover]),
    [['a', 400]],
  );
});

test('keeps the top nine and folds the rest into Others', () => {
  const transactions = Array.from({ length: 12 }, (_, index) => makeTxn(`c${index + 1}`, -(12 - index) * 100));

  const { debitTop } = aggregateTopN(transactions);

  assert.equal(debitTop.length, 10);
  assert.deepEqual(
    debitTop.slice(0, 9).map((row) => row.counterpartyId),
    ['c1', 'c2', 'c3', 'c4', 'c5', 'c6', 'c7', 'c8', 'c9'],
  );
  assert.deepEqual(debitTop[9], {
    counterpartyId: 'OTHERS',
    counterpartyName: 'Others',
    turnover: 600,
    share: '8%',
    coefficient: 1,
  });
  assert.equal(debitTop[0].share, '15%');
  assert.equal(
    debitTop.reduce((sum, row) => sum + row.turnover, 0),
    7800,
  );
});

test('exactly nine counterparties produce no Others row', () => {
  const transactions = Array.from({ length: 9 }, (_, index) => makeTxn(`c${index}`, 100 + index));

  const { creditTop } = aggregateTopN(transactions);

  assert.equal(creditTop.length, 9);
  assert.equal(creditTop.some((row) => row.counterpartyId === 'OTHERS'), false);
});

test('ties keep first-seen order', () => {
  const { creditTop } = aggregateTopN([makeTxn('late', 100), makeTxn('early', 100)]);

  assert.deepEqual(
    creditTop.map((row) => row.counterpartyId),
    ['late', 'early'],
  );
});

test('self-transfers are left out of both tables', () => {
  const { debitTop, creditTop } = aggregateTopN([
    makeTxn('own', -500, { description: 'Transfer between own accounts' }),
    makeTxn('own-2', 700, { counterpartyName: 'Перевод между своими счетами' }),
    makeTxn('supplier', -200),
  ]);

  assert.deepEqual(
    debitTop.map((row) => row.counterpartyId),
    ['supplier'],
  );
  assert.deepEqual(creditTop, []);
});
