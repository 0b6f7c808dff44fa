import { BankColumns } from '../../domain/entities/BankSchema.js';
import { IncomeSummary } from '../../domain/entities/IncomeSummary.js';
import { IncomeTransaction, LedgerTransaction } from '../../domain/entities/Transaction.js';

export type IncomeColumns = Pick<BankColumns, 'date' | 'credit' | 'purposeCode' | 'purpose' | 'counterparty'>;

export interface IncomeClassificationRequest {
  statementId: string;
  bank: string;
  accountNumber?: string;
  transactions: LedgerTransaction[];
  columns: IncomeColumns;
}

export interface IncomeClassificationResult {
  transactions: IncomeTransaction[];
  summary: IncomeSummary | null;
}

export interface IncomeClassifierPort {
  classify(request: IncomeClassificationRequest): Promise<IncomeClassificationResult>;
}
