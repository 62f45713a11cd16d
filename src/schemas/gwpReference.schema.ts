import { z } from 'zod';

export const gwpReferenceSchema = z.object({
  gasName: z.string().trim().min(1),
  arVersion: z.string().trim().min(1),
  gwpValue: z.number().finite().nullable(),
  gwpDisplay: z.string().nullable().optional(),
  category: z.string().nullable().optional()
});

export const gwpReferenceListSchema = z.array(gwpReferenceSchema);

export type GwpReferenceInput = z.infer<typeof gwpReferenceSchema>;
