import { z } from 'zod';

export const nbtMapperConfigSchema = z
  .object({
    max_depth: z.number().int().min(1).max(10_000).optional(),
    on_unmapped: z.enum(['omit', 'error']).optional(),
  })
  .strict();
