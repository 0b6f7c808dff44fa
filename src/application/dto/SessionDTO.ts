import { z } from 'zod';
import { IsoDateSchema } from './StatementDTO.js';

export const CreateSessionSchema = z.object({
  clientName: z.string().trim().default(''),
  anchorDate: IsoDateSchema.optional(),
  allowHolderMismatch: z.boolean().optional(),
});

export type CreateSessionDTO = z.input<typeof CreateSessionSchema>;

export const WindowQuerySchema = z.object({
  anchor: IsoDateSchema,
});
