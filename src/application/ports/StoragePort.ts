import { AnalysisSession } from '../../domain/entities/AnalysisSession.js';
import { Statement } from '../../domain/entities/Statement.js';

export interface StoragePort {
  saveSession(session: AnalysisSession): Promise<void>;
  loadSession(sessionId: string): Promise<AnalysisSession | null>;
  saveStatement(sessionId: string, statement: Statement): Promise<void>;
  listStatements(sessionId: string): Promise<Statement[]>;
  deleteStatement(sessionId: string, statementId: string): Promise<boolean>;
}
