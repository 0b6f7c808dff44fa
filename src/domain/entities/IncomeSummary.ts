export interface MonthlyIncome {
  month: string; // YYYY-MM
  income: number;
}

export interface IncomeSummary {
  statementId: string;
  bank: string;
  accountNumber?: string;
  totalIncome: number;
  eligibleCount: number;
  monthly: MonthlyIncome[];
}
