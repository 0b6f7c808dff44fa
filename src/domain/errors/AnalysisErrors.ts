export type AnalysisErrorCode = 'MISSING_DATE_COLUMN' | 'HOLDER_MISMATCH' | 'DUPLICATE_STATEMENT' | 'NOT_FOUND';

export class AnalysisError extends Error {
  constructor(
    readonly code: AnalysisErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingDateColumnError extends AnalysisError {
  constructor(
    readonly statementId: string,
    readonly bank: string,
    readonly candidates: string[],
  ) {
    super('MISSING_DATE_COLUMN', `${bank}/${statementId}: no date column found (tried ${candidates.join(', ')})`);
  }
}

export class HolderMismatchError extends AnalysisError {
  constructor(
    readonly expected: string,
    readonly received: string,
  ) {
    super('HOLDER_MISMATCH', `Holder national ID mismatch: ${received} vs session ${expected}`);
  }
}

export class DuplicateStatementError extends AnalysisError {
  constructor(readonly statementId: string) {
    super('DUPLICATE_STATEMENT', `Statement ${statementId} is already in this session`);
  }
}

export class NotFoundError extends AnalysisError {
  constructor(entity: 'session' | 'statement', id: string) {
    super('NOT_FOUND', `Unknown ${entity}: ${id}`);
  }
}
