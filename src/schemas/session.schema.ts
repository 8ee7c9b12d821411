import { z } from 'zod';

export const SessionResponseSchema = z.object({
  ok: z.boolean(),
  status: z.number().int(),
  statusText: z.string(),
  url: z.string(),
  headers: z.record(z.string()),
  text: z.string(),
});
