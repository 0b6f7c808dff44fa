import { AggregationRow, NetRow } from '../../domain/entities/AnalysisTables.js';
import { AnalysisWindow } from '../../domain/entities/AnalysisWindow.js';
import { IncomeSummary } from '../../domain/entities/IncomeSummary.js';
import { FlatRecord } from '../../domain/services/FlatRecordSerializer.js';
import { StatementLedgerReport } from '../../domain/services/TransactionLedger.js';

export interface AnalysisReportDTO {
  sessionId?: string;
  window: AnalysisWindow;
  statements: StatementLedgerReport[];
  ledgerTotal: number;
  ledgerTruncated: boolean;
  ledger: FlatRecord[];
  debitTop: AggregationRow[];
  creditTop: AggregationRow[];
  relatedParties: NetRow[];
  incomeSummaries: IncomeSummary[];
  incomeTransactions: FlatRecord[];
  generatedAt: string;
}
