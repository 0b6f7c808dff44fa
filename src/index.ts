export type { AnalysisWindow } from './domain/entities/AnalysisWindow.js';
export type { AggregationRow, CounterpartyTables, NetRow } from './domain/entities/AnalysisTables.js';
export type { BankColumns, BankSchema, BankSchemaRegistry } from './domain/entities/BankSchema.js';
export type { IncomeSummary, MonthlyIncome } from './domain/entities/IncomeSummary.js';
export type { CellValue, RawRecord, Statement, StatementFooter, StatementHolder } from './domain/entities/Statement.js';
export type { CanonicalTransaction, IncomeTransaction, LedgerTransaction } from './domain/entities/Transaction.js';
export type { AnalysisReportDTO } from './application/dto/AnalysisReportDTO.js';
export type { IncomeClassifierPort } from './application/ports/IncomeClassifierPort.js';
export type { StoragePort } from './application/ports/StoragePort.js';

export {
  AnalysisError,
  DuplicateStatementError,
  HolderMismatchError,
  MissingDateColumnError,
  NotFoundError,
} from './domain/errors/AnalysisErrors.js';
export { computeWindow, isWithinWindow } from './domain/services/AnalysisWindowCalculator.js';
export { buildLedger, extractStatementRows, mergeLedger } from './domain/services/TransactionLedger.js';
export { normalize } from './domain/services/SchemaNormalizer.js';
export { aggregateTopN, formatShare } from './domain/services/CounterpartyAggregator.js';
export { netRelatedParties } from './domain/services/RelatedPartyNetter.js';
export { buildStatementMetadata, footerRecords, toFooter } from './domain/services/StatementMetadata.js';
export { toCanonicalFlatRecord, toFlatRecord, toIncomeFlatRecord } from './domain/services/FlatRecordSerializer.js';
export { createBankSchemaRegistry } from './domain/services/BankSchemaCatalog.js';
export { loadBankSchemaRegistry } from './infrastructure/config/BankSchemaLoader.js';
export { AnalysisService } from './application/services/AnalysisService.js';
export { SessionService } from './application/services/SessionService.js';
export { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
export { createApp } from './app.js';
