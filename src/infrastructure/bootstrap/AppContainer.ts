import { AnalysisService } from '../../application/services/AnalysisService.js';
import { SessionService } from '../../application/services/SessionService.js';
import { IncomeClassifierPort } from '../../application/ports/IncomeClassifierPort.js';
import { StoragePort } from '../../application/ports/StoragePort.js';
import { BankSchemaRegistry } from '../../domain/entities/BankSchema.js';
import { RuleBasedIncomeClassifier } from '../adapters/income/RuleBasedIncomeClassifier.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { loadBankSchemaRegistry } from '../config/BankSchemaLoader.js';
import { AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  registry?: BankSchemaRegistry;
  storage?: StoragePort;
  incomeClassifier?: IncomeClassifierPort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly registry: BankSchemaRegistry;
  readonly storage: StoragePort;
  readonly incomeClassifier: IncomeClassifierPort;
  readonly sessionService: SessionService;
  readonly analysisService: AnalysisService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const analysisConfig = this.config.analysis;

    this.registry = overrides.registry ?? loadBankSchemaRegistry(analysisConfig.bankSchemasPath);
    this.storage = overrides.storage ?? new InMemoryStorageAdapter();
    this.incomeClassifier =
      overrides.incomeClassifier ??
      new RuleBasedIncomeClassifier({ excludedPurposeCodes: analysisConfig.excludedPurposeCodes });

    this.sessionService = new SessionService(this.storage, {
      allowHolderMismatchByDefault: analysisConfig.allowHolderMismatch,
    });
    this.analysisService = new AnalysisService(this.sessionService, this.registry, this.incomeClassifier, {
      maxLedgerRows: analysisConfig.maxLedgerRows,
    });
  }
}
