import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { BankSchemaRegistry } from '../../domain/entities/BankSchema.js';
import { createBankSchemaRegistry } from '../../domain/services/BankSchemaCatalog.js';

const ColumnsSchema = z
  .object({
    date: z.string().min(1),
    amount: z.string().min(1),
    debit: z.string().min(1),
    credit: z.string().min(1),
    operationAmount: z.string().min(1),
    purposeCode: z.string().min(1),
    purpose: z.string().min(1),
    counterparty: z.string().min(1),
  })
  .partial()
  .strict();

export const BankSchemaFileSchema = z.record(
  z.object({
    label: z.string().optional(),
    columns: ColumnsSchema,
    descriptionPrefixes: z.array(z.string().min(1)).optional(),
  }),
);

export const DEFAULT_BANK_SCHEMAS_URL = new URL('../../../config/bank-schemas.json', import.meta.url);

export const loadBankSchemaRegistry = (path: string | URL = DEFAULT_BANK_SCHEMAS_URL): BankSchemaRegistry => {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const definitions = BankSchemaFileSchema.parse(raw);
  const registry = createBankSchemaRegistry(definitions);

  console.log(`🏦 Loaded ${registry.banks().length} bank schemas from ${String(path)}`);

  return registry;
};
