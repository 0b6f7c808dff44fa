export interface AnalysisSession {
  id: string;
  clientName: string;
  anchorDate: string; // ISO date
  holderNationalId?: string;
  allowHolderMismatch: boolean;
  createdAt: string; // ISO timestamp
}
