import dayjs from 'dayjs';
import { AnalysisSession } from '../../domain/entities/AnalysisSession.js';
import { Statement } from '../../domain/entities/Statement.js';
import { DuplicateStatementError, HolderMismatchError, NotFoundError } from '../../domain/errors/AnalysisErrors.js';
import { StatementMetadataRow, buildStatementMetadata, toFooter } from '../../domain/services/StatementMetadata.js';
import { CreateSessionDTO, CreateSessionSchema } from '../dto/SessionDTO.js';
import { ParsedStatementDTO, ParsedStatementSchema } from '../dto/StatementDTO.js';
import { StoragePort } from '../ports/StoragePort.js';

export interface SessionServiceOptions {
  allowHolderMismatchByDefault?: boolean;
}

const generateId = (prefix: string): string => `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;

export class SessionService {
  private readonly pending = new Map<string, Promise<void>>();

  constructor(
    private readonly storage: StoragePort,
    private readonly options: SessionServiceOptions = {},
  ) {}

  async createSession(input: CreateSessionDTO): Promise<AnalysisSession> {
    const parsed = CreateSessionSchema.parse(input);

    const session: AnalysisSession = {
      id: generateId('session'),
      clientName: parsed.clientName,
      anchorDate: parsed.anchorDate ?? dayjs().format('YYYY-MM-DD'),
      allowHolderMismatch: parsed.allowHolderMismatch ?? this.options.allowHolderMismatchByDefault ?? false,
      createdAt: new Date().toISOString(),
    };

    await this.storage.saveSession(session);
    return session;
  }

  async getSession(sessionId: string): Promise<AnalysisSession> {
    const session = await this.storage.loadSession(sessionId);
    if (!session) {
      throw new NotFoundError('session', sessionId);
    }
    return session;
  }

  /**
   * Validates and attaches a parsed statement. The first statement carrying a holder national ID
   * fixes the session's holder; later statements must match unless the session allows mixing.
   * Calls for one session run one at a time.
   */
  async addStatement(sessionId: string, input: unknown): Promise<Statement> {
    const statement = this.toStatement(ParsedStatementSchema.parse(input));

    return this.withSessionLock(sessionId, async () => {
      const session = await this.getSession(sessionId);
      const existing = await this.storage.listStatements(sessionId);

      if (existing.some((stored) => stored.id === statement.id)) {
        throw new DuplicateStatementError(statement.id);
      }

      const nationalId = statement.holder.nationalId;
      if (nationalId) {
        if (!session.holderNationalId) {
          await this.storage.saveSession({ ...session, holderNationalId: nationalId });
        } else if (session.holderNationalId !== nationalId && !session.allowHolderMismatch) {
          throw new HolderMismatchError(session.holderNationalId, nationalId);
        }
      }

      await this.storage.saveStatement(sessionId, statement);

      console.log(`📥 Statement ${statement.id} added to ${sessionId}:`, {
        bank: statement.bank,
        accountNumber: statement.accountNumber,
        rows: statement.transactions.length,
      });

      return statement;
    });
  }

  // An emptied session forgets its holder.
  async removeStatement(sessionId: string, statementId: string): Promise<void> {
    await this.withSessionLock(sessionId, async () => {
      const session = await this.getSession(sessionId);
      const removed = await this.storage.deleteStatement(sessionId, statementId);
      if (!removed) {
        throw new NotFoundError('statement', statementId);
      }

      const remaining = await this.storage.listStatements(sessionId);
      if (remaining.length === 0 && session.holderNationalId) {
        await this.storage.saveSession({ ...session, holderNationalId: undefined });
      }
    });
  }

  async listStatements(sessionId: string): Promise<Statement[]> {
    await this.getSession(sessionId);
    return this.storage.listStatements(sessionId);
  }

  async describeStatements(sessionId: string): Promise<StatementMetadataRow[]> {
    return buildStatementMetadata(await this.listStatements(sessionId));
  }

  private withSessionLock<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);

    const release = (): void => {
      if (this.pending.get(sessionId) === tail) {
        this.pending.delete(sessionId);
      }
    };
    const tail: Promise<void> = run.then(release, release);
    this.pending.set(sessionId, tail);

    return run;
  }

  private toStatement(parsed: ParsedStatementDTO): Statement {
    return {
      id: parsed.id ?? generateId('stmt'),
      bank: parsed.bank,
      holder: parsed.holder,
      accountNumber: parsed.accountNumber?.trim() || undefined,
      periodStart: parsed.period?.start,
      periodEnd: parsed.period?.end,
      generatedAt: parsed.generatedAt,
      sourceFileName: parsed.sourceFileName,
      columns: parsed.columns,
      header: parsed.header,
      footer: toFooter(parsed.footer),
      transactions: parsed.transactions,
      metadata: parsed.metadata,
    };
  }
}
