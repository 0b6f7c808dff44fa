import { AnalysisSession } from '../../../domain/entities/AnalysisSession.js';
import { Statement } from '../../../domain/entities/Statement.js';
import { StoragePort } from '../../../application/ports/StoragePort.js';

export class InMemoryStorageAdapter implements StoragePort {
  private readonly sessions = new Map<string, AnalysisSession>();
  private readonly statements = new Map<string, Map<string, Statement>>();

  async saveSession(session: AnalysisSession): Promise<void> {
    this.sessions.set(session.id, session);
  }

  async loadSession(sessionId: string): Promise<AnalysisSession | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async saveStatement(sessionId: string, statement: Statement): Promise<void> {
    const bucket = this.statements.get(sessionId) ?? new Map<string, Statement>();
    bucket.set(statement.id, statement);
    this.statements.set(sessionId, bucket);
  }

  // Upload order is preserved: it decides which duplicate survives in the ledger.
  async listStatements(sessionId: string): Promise<Statement[]> {
    return Array.from(this.statements.get(sessionId)?.values() ?? []);
  }

  async deleteStatement(sessionId: string, statementId: string): Promise<boolean> {
    return this.statements.get(sessionId)?.delete(statementId) ?? false;
  }
}
