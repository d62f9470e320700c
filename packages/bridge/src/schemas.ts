// Request schemas common to every route

import { z } from 'zod';
import type { CallerContext } from '@civitas/governance';

export const PresenceSchema = z.object({
  value: z.object({
    account: z.string(),
    operation: z.string(),
    args: z.record(z.unknown()),
    nonce: z.string(),
    issuedAt: z.number(),
  }),
  proofs: z.array(
    z.object({
      id: z.string(),
      signature: z.string(),
    })
  ),
});

/** Body carrying only an optional presence claim */
export const PresenceBodySchema = z.object({
  presence: PresenceSchema.optional(),
});

export const IdParamsSchema = z.object({
  id: z.coerce.number().int().nonnegative(),
});

export function callerFrom(presence: z.infer<typeof PresenceSchema> | undefined): CallerContext {
  return presence ? { presence } : {};
}
