import { RawRecord } from './Statement.js';

export interface LedgerTransaction {
  txnDate: string; // ISO date
  bank: string;
  accountNumber?: string;
  sourceStatementId: string;
  fields: RawRecord;
}

export interface CanonicalTransaction extends LedgerTransaction {
  amount: number;
  description: string;
  counterpartyId: string;
  counterpartyName: string;
}

export interface IncomeTransaction extends LedgerTransaction {
  creditAmount: number;
  incomeEligible: boolean;
  exclusionReason?: string;
}
