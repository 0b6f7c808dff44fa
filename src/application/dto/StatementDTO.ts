import { z } from 'zod';
import { parseOperationDate } from '../../domain/services/OperationDateParser.js';

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => parseOperationDate(value) === value, 'Not a calendar date');

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RawRecordSchema = z.record(CellValueSchema);

export const ParsedStatementSchema = z.object({
  id: z.string().min(1).optional(),
  bank: z.string().min(1),
  holder: z.object({
    name: z.string().default(''),
    nationalId: z.string().default(''),
  }),
  accountNumber: z.string().optional(),
  period: z
    .object({
      start: IsoDateSchema.optional(),
      end: IsoDateSchema.optional(),
    })
    .optional(),
  generatedAt: IsoDateSchema.optional(),
  sourceFileName: z.string().optional(),
  columns: z.array(z.string()).optional(),
  header: RawRecordSchema.optional(),
  footer: z.union([RawRecordSchema, z.array(RawRecordSchema)]).nullable().optional(),
  transactions: z.array(RawRecordSchema),
  metadata: z.record(z.unknown()).optional(),
});

export type ParsedStatementDTO = z.infer<typeof ParsedStatementSchema>;
