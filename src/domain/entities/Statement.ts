export type CellValue = string | number | boolean | null;

export type RawRecord = Record<string, CellValue>;

export type StatementFooter =
  | { kind: 'EMPTY' }
  | { kind: 'SINGLE'; record: RawRecord }
  | { kind: 'LIST'; records: RawRecord[] };

export interface StatementHolder {
  name: string;
  nationalId: string;
}

export interface Statement {
  id: string;
  bank: string;
  holder: StatementHolder;
  accountNumber?: string;
  periodStart?: string; // ISO date
  periodEnd?: string; // ISO date
  generatedAt?: string; // ISO date
  sourceFileName?: string;
  columns?: string[];
  header?: RawRecord;
  footer: StatementFooter;
  transactions: RawRecord[];
  metadata?: Record<string, unknown>;
}
