import test from 'node:test';
import assert from 'node:assert/strict';
import { RawRecord } from '../entities/Statement.js';
import { LedgerTransaction } from '../entities/Transaction.js';
import { createBankSchemaRegistry } from './BankSchemaCatalog.js';
import { extractCounterparty } from './CounterpartyResolver.js';
import { normalize } from './SchemaNormalizer.js';

const registry = createBankSchemaRegistry({
  halyk_business: {
    columns: {
      date: 'Дата',
      debit: 'Дебет',
      credit: 'Кредит',
      purpose: 'Детали платежа',
      counterparty: 'Контрагент (имя)',
    },
  },
  kaspi_gold: {
    columns: { date: 'date', amount: 'amount', purpose: 'details', counterparty: 'details' },
    descriptionPrefixes: ['Оплата у продавца ', 'Перевод с карты на карту '],
  },
});

function makeTxn(fields: RawRecord, bank = 'halyk_business'): LedgerTransaction {
  return {
    txnDate: '2023-06-01',
    bank,
    accountNumber: 'KZ01',
    sourceStatementId: 's1',
    fields,
  };
}

const normalizeOne = (fields: RawRecord, bank?: string) => normalize([makeTxn(fields, bank)], registry)[0];

test('canonical amount column wins over debit and credit', () => {
  assert.equal(normalizeOne({ amount: '-5 000,00', Дебет: '100' }, 'other_bank').amount, -5000);
});

test('debit and credit columns combine as credit minus debit', () => {
  assert.equal(normalizeOne({ Дебет: '1 500,00', Кредит: '0,00' }).amount, -1500);
  assert.equal(normalizeOne({ Дебет: '', Кредит: '2 000,50' }).amount, 2000.5);
});

test('a single signed operation amount is used when nothing else resolves', () => {
  assert.equal(normalizeOne({ 'Сумма операции': '-750,25' }, 'other_bank').amount, -750.25);
});

test('an unresolvable amount degrades to zero', () => {
  assert.equal(normalizeOne({ 'Детали платежа': 'Без суммы' }).amount, 0);
  assert.equal(normalizeOne({ Дебет: 'n/a', Кредит: '' }).amount, 0);
});

test('extracts a BIN from the counterparty column and keeps the preceding name', () => {
  const txn = normalizeOne({
    Кредит: '100',
    'Детали платежа': 'Оплата по договору',
    'Контрагент (имя)': 'ТОО "Альфа" БИН 123456789012',
  });

  assert.equal(txn.counterpartyId, '123456789012');
  assert.equal(txn.counterpartyName, 'ТОО "Альфа"');
  assert.equal(txn.description, 'Оплата по договору');
});

test('uses the first line of the counterparty text when no identifier is present', () => {
  const txn = normalizeOne({ Дебет: '100', 'Контрагент (имя)': 'ИП Сидоров\nг. Алматы' });

  assert.equal(txn.counterpartyId, 'ИП Сидоров');
  assert.equal(txn.counterpartyName, 'ИП Сидоров');
});

test('falls back to the description when there is no counterparty column', () => {
  const txn = normalizeOne({ details: 'Оплата услуг связи', amount: '-10' }, 'other_bank');

  assert.equal(txn.description, 'Оплата услуг связи');
  assert.equal(txn.counterpartyId, 'Оплата услуг связи');
  assert.equal(txn.counterpartyName, 'Оплата услуг связи');
});

test('strips the bank fixed description prefixes before resolving the counterparty', () => {
  const merchant = normalizeOne(
    { date: '01.06.23', amount: '- 3 000,00 ₸', details: 'Оплата у продавца Magnum Cash&Carry' },
    'kaspi_gold',
  );
  const person = normalizeOne(
    { date: '02.06.23', amount: '- 1 000,00 ₸', details: 'Перевод с карты на карту Айгуль С.' },
    'kaspi_gold',
  );

  assert.equal(merchant.amount, -3000);
  assert.equal(merchant.counterpartyId, 'Magnum Cash&Carry');
  assert.equal(person.counterpartyName, 'Айгуль С.');
});

test('a BIN at the start of the text takes its name from what follows', () => {
  assert.deepEqual(extractCounterparty('123456789012 ТОО Бета'), {
    counterpartyId: '123456789012',
    counterpartyName: 'ТОО Бета',
  });
});

test('longer digit runs are not taken for a BIN', () => {
  assert.deepEqual(extractCounterparty('Счет KZ1234567890123456'), {
    counterpartyId: 'Счет KZ1234567890123456',
    counterpartyName: 'Счет KZ1234567890123456',
  });
});

test('normalizing returns new values and leaves the ledger rows alone', () => {
  const ledgerRow = makeTxn({ Дебет: '100' });

  const [canonical] = normalize([ledgerRow], registry);

  assert.equal(canonical.amount, -100);
  assert.equal('amount' in ledgerRow, false);
  assert.notEqual(canonical.fields, ledgerRow.fields);
});
