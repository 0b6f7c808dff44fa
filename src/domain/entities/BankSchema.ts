export interface BankColumns {
  date?: string;
  amount?: string;
  debit?: string;
  credit?: string;
  operationAmount?: string;
  purposeCode?: string;
  purpose?: string;
  counterparty?: string;
}

export interface BankSchema {
  bank: string;
  label: string;
  columns: Readonly<BankColumns>;
  descriptionPrefixes: readonly string[];
}

export interface BankSchemaRegistry {
  get(bank: string): BankSchema | undefined;
  banks(): string[];
}
