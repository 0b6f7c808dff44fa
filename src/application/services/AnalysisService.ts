import { BankSchemaRegistry } from '../../domain/entities/BankSchema.js';
import { IncomeSummary } from '../../domain/entities/IncomeSummary.js';
import { Statement } from '../../domain/entities/Statement.js';
import { IncomeTransaction } from '../../domain/entities/Transaction.js';
import { MissingDateColumnError } from '../../domain/errors/AnalysisErrors.js';
import { computeWindow, isWithinWindow } from '../../domain/services/AnalysisWindowCalculator.js';
import { aggregateTopN } from '../../domain/services/CounterpartyAggregator.js';
import { toCanonicalFlatRecord, toIncomeFlatRecord } from '../../domain/services/FlatRecordSerializer.js';
import { netRelatedParties } from '../../domain/services/RelatedPartyNetter.js';
import { normalize } from '../../domain/services/SchemaNormalizer.js';
import {
  StatementContribution,
  StatementLedgerReport,
  extractStatementRows,
  mergeLedger,
  toLedgerReport,
} from '../../domain/services/TransactionLedger.js';
import { AnalysisReportDTO } from '../dto/AnalysisReportDTO.js';
import { IncomeClassifierPort } from '../ports/IncomeClassifierPort.js';
import { SessionService } from './SessionService.js';

export interface AnalysisServiceOptions {
  maxLedgerRows: number;
}

export class AnalysisService {
  constructor(
    private readonly sessions: SessionService,
    private readonly registry: BankSchemaRegistry,
    private readonly incomeClassifier: IncomeClassifierPort,
    private readonly options: AnalysisServiceOptions = { maxLedgerRows: 5000 },
  ) {}

  async analyzeSession(sessionId: string): Promise<AnalysisReportDTO> {
    const session = await this.sessions.getSession(sessionId);
    const statements = await this.sessions.listStatements(sessionId);
    const report = await this.analyze(statements, session.anchorDate);

    return { sessionId, ...report };
  }

  async analyze(statements: Statement[], anchorDate: string): Promise<AnalysisReportDTO> {
    const window = computeWindow(anchorDate);
    const { contributions, reports } = this.collectContributions(statements);

    const ledger = mergeLedger(contributions, window);
    const canonical = normalize(ledger, this.registry);
    const { debitTop, creditTop } = aggregateTopN(canonical);
    const relatedParties = netRelatedParties(canonical);
    const income = await this.classifyIncome(contributions, (date) => isWithinWindow(date, window));

    const limit = this.options.maxLedgerRows;

    console.log('📊 Analysis complete:', {
      window,
      statements: statements.length,
      ledgerRows: canonical.length,
      debitCounterparties: debitTop.length,
      creditCounterparties: creditTop.length,
      relatedParties: relatedParties.length,
    });

    return {
      window,
      statements: reports,
      ledgerTotal: canonical.length,
      ledgerTruncated: canonical.length > limit,
      ledger: canonical.slice(0, limit).map(toCanonicalFlatRecord),
      debitTop,
      creditTop,
      relatedParties,
      incomeSummaries: income.summaries,
      incomeTransactions: income.transactions.slice(0, limit).map(toIncomeFlatRecord),
      generatedAt: new Date().toISOString(),
    };
  }

  private collectContributions(statements: Statement[]): {
    contributions: StatementContribution[];
    reports: StatementLedgerReport[];
  } {
    const contributions: StatementContribution[] = [];
    const reports: StatementLedgerReport[] = [];

    for (const statement of statements) {
      try {
        const contribution = extractStatementRows(statement, this.registry);
        contributions.push(contribution);
        reports.push(toLedgerReport(contribution));

        if (contribution.droppedRows > 0) {
          console.log(
            `⚠️ Statement ${statement.id} (${statement.bank}) dropped ${contribution.droppedRows} rows without a parseable date`,
          );
        }
      } catch (error) {
        if (!(error instanceof MissingDateColumnError)) {
          throw error;
        }

        console.error(`❌ Statement ${statement.id} skipped: ${error.message}`);
        reports.push({
          statementId: statement.id,
          bank: statement.bank,
          status: 'FAILED',
          dateColumn: null,
          retainedRows: 0,
          droppedRows: 0,
          error: { code: error.code, message: error.message },
        });
      }
    }

    return { contributions, reports };
  }

  private async classifyIncome(
    contributions: StatementContribution[],
    inWindow: (isoDate: string) => boolean,
  ): Promise<{ summaries: IncomeSummary[]; transactions: IncomeTransaction[] }> {
    const summaries: IncomeSummary[] = [];
    const transactions: IncomeTransaction[] = [];

    for (const contribution of contributions) {
      const schema = this.registry.get(contribution.bank);
      const windowed = contribution.rows.filter((row) => inWindow(row.txnDate));

      if (!schema || windowed.length === 0) {
        continue;
      }

      const result = await this.incomeClassifier.classify({
        statementId: contribution.statementId,
        bank: contribution.bank,
        accountNumber: windowed[0].accountNumber,
        transactions: windowed,
        columns: {
          date: contribution.dateColumn ?? schema.columns.date,
          credit: schema.columns.credit,
          purposeCode: schema.columns.purposeCode,
          purpose: schema.columns.purpose,
          counterparty: schema.columns.counterparty,
        },
      });

      transactions.push(...result.transactions);
      if (result.summary) {
        summaries.push(result.summary);
      }
    }

    return { summaries, transactions };
  }
}
