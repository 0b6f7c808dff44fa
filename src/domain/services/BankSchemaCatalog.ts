import { BankColumns, BankSchema, BankSchemaRegistry } from '../entities/BankSchema.js';

export interface BankSchemaDefinition {
  label?: string;
  columns: BankColumns;
  descriptionPrefixes?: string[];
}

/**
 * Frozen bank → schema lookup. Built once at startup; nothing mutates it afterwards.
 */
export const createBankSchemaRegistry = (definitions: Record<string, BankSchemaDefinition>): BankSchemaRegistry => {
  const schemas = new Map<string, BankSchema>();

  for (const [bank, definition] of Object.entries(definitions)) {
    schemas.set(
      bank,
      Object.freeze({
        bank,
        label: definition.label ?? bank,
        columns: Object.freeze({ ...definition.columns }),
        descriptionPrefixes: Object.freeze([...(definition.descriptionPrefixes ?? [])]),
      }),
    );
  }

  return Object.freeze({
    get: (bank: string) => schemas.get(bank),
    banks: () => Array.from(schemas.keys()),
  });
};
