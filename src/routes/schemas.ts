import { z } from 'zod';

export const scoresSchema = z.record(z.number());

export const leverSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('quality') }),
  z.object({ kind: z.literal('marketFit'), marketId: z.string().min(1) }),
  z.object({ kind: z.literal('segmentFit'), segmentId: z.string().min(1) }),
  z.object({ kind: z.literal('criterion'), name: z.string().min(1) })
]);

export const rankQuerySchema = z.object({
  timeWeighted: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true')
});

export const createShipSchema = z.object({
  name: z.string().min(1),
  criteria: z.array(z.string().min(1)).default([]),
  description: z.string().default(''),
  category: z.string().default('')
});

export const renameShipSchema = z.object({
  newName: z.string().min(1)
});
