export interface AggregationRow {
  counterpartyId: string;
  counterpartyName: string;
  turnover: number;
  share: string;
  coefficient: number;
}

export interface NetRow {
  counterpartyId: string;
  counterpartyName: string;
  debit: number;
  credit: number;
  balance: number;
  turnover: number;
  coefficient: number;
}

export interface CounterpartyTables {
  debitTop: AggregationRow[];
  creditTop: AggregationRow[];
}
