export interface AppConfig {
  server: {
    port: number;
    uploadLimitBytes: number;
  };
  analysis: {
    maxLedgerRows: number;
    bankSchemasPath?: string;
    allowHolderMismatch: boolean;
    excludedPurposeCodes: string[];
  };
}

const readNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value !== '' && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    server: {
      port: readNumber(env.PORT, 4000),
      uploadLimitBytes: readNumber(env.APP_UPLOAD_LIMIT_BYTES, 10 * 1024 * 1024),
    },
    analysis: {
      maxLedgerRows: readNumber(env.APP_MAX_LEDGER_ROWS, 5000),
      bankSchemasPath: env.APP_BANK_SCHEMAS_PATH || undefined,
      allowHolderMismatch: env.APP_ALLOW_HOLDER_MISMATCH === 'true',
      excludedPurposeCodes: readList(env.APP_INCOME_EXCLUDED_PURPOSE_CODES),
    },
  };
};
