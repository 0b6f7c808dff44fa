import { IncomeSummary, MonthlyIncome } from '../../../domain/entities/IncomeSummary.js';
import { IncomeTransaction } from '../../../domain/entities/Transaction.js';
import { parseLocaleAmount } from '../../../domain/services/AmountParser.js';
import { cellText } from '../../../domain/services/CounterpartyResolver.js';
import { isSelfTransferText } from '../../../domain/services/SelfTransferFilter.js';
import {
  IncomeClassificationRequest,
  IncomeClassificationResult,
  IncomeClassifierPort,
} from '../../../application/ports/IncomeClassifierPort.js';

interface ExclusionRule {
  reason: string;
  test: (text: string) => boolean;
}

const rules: ExclusionRule[] = [
  { reason: 'SELF_TRANSFER', test: isSelfTransferText },
  { reason: 'REFUND', test: (text) => /(возврат|refund|reversal)/i.test(text) },
  { reason: 'LOAN', test: (text) => /(займ|заем|погашение кредита|выдача кредита|loan)/i.test(text) },
  { reason: 'DEPOSIT', test: (text) => /(депозит|deposit)/i.test(text) },
  { reason: 'CASH_DEPOSIT', test: (text) => /(взнос наличных|пополнение наличными|cash top-?up)/i.test(text) },
];

export interface RuleBasedIncomeClassifierOptions {
  excludedPurposeCodes?: string[];
}

export class RuleBasedIncomeClassifier implements IncomeClassifierPort {
  private readonly excludedPurposeCodes: Set<string>;

  constructor(options: RuleBasedIncomeClassifierOptions = {}) {
    this.excludedPurposeCodes = new Set(options.excludedPurposeCodes ?? []);
  }

  async classify(request: IncomeClassificationRequest): Promise<IncomeClassificationResult> {
    const { columns } = request;

    const transactions: IncomeTransaction[] = request.transactions.map((txn) => {
      const creditAmount = Math.max(parseLocaleAmount(columns.credit ? txn.fields[columns.credit] : null) ?? 0, 0);
      const purposeCode = cellText(txn.fields, columns.purposeCode);
      const text = [cellText(txn.fields, columns.purpose), cellText(txn.fields, columns.counterparty)]
        .filter(Boolean)
        .join(' ');

      let exclusionReason: string | undefined;
      if (creditAmount <= 0) {
        exclusionReason = 'NOT_CREDIT';
      } else if (purposeCode && this.excludedPurposeCodes.has(purposeCode)) {
        exclusionReason = 'PURPOSE_CODE';
      } else {
        exclusionReason = rules.find((rule) => rule.test(text))?.reason;
      }

      return {
        ...txn,
        fields: { ...txn.fields },
        creditAmount,
        incomeEligible: exclusionReason === undefined,
        exclusionReason,
      };
    });

    return {
      transactions,
      summary: transactions.length > 0 ? this.summarize(request, transactions) : null,
    };
  }

  private summarize(request: IncomeClassificationRequest, transactions: IncomeTransaction[]): IncomeSummary {
    const monthlyTotals = new Map<string, number>();
    let totalIncome = 0;
    let eligibleCount = 0;

    for (const txn of transactions) {
      if (!txn.incomeEligible) {
        continue;
      }
      const month = txn.txnDate.slice(0, 7);
      monthlyTotals.set(month, (monthlyTotals.get(month) ?? 0) + txn.creditAmount);
      totalIncome += txn.creditAmount;
      eligibleCount += 1;
    }

    const monthly: MonthlyIncome[] = Array.from(monthlyTotals.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([month, income]) => ({ month, income }));

    return {
      statementId: request.statementId,
      bank: request.bank,
      accountNumber: request.accountNumber,
      totalIncome,
      eligibleCount,
      monthly,
    };
  }
}
