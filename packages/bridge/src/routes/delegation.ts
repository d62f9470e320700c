/**
 * Delegation Routes
 *
 * Make and remove delegations, and read both sides of the delegation graph.
 */

import express from 'express';
import { z } from 'zod';
import { AddressSchema, TimestampSchema, type DelegationRegistry } from '@civitas/governance';
import { sendError } from '../errors.js';
import { PresenceSchema, callerFrom } from '../schemas.js';

// =============================================================================
// Validation Schemas
// =============================================================================

const MakeDelegationRequestSchema = z.object({
  delegator: AddressSchema,
  delegatee: AddressSchema,
  fraction: z.string().min(1, 'Fraction required'),
  validUntil: TimestampSchema,
  presence: PresenceSchema.optional(),
});

const RemoveDelegationRequestSchema = z.object({
  delegator: AddressSchema,
  delegatee: AddressSchema,
  presence: PresenceSchema.optional(),
});

export function delegationRoutes(registry: DelegationRegistry): express.Router {
  const router = express.Router();

  router.post('/', async (req, res) => {
    try {
      const input = MakeDelegationRequestSchema.parse(req.body);

      const delegation = await registry.makeDelegation(
        input.delegator,
        input.delegatee,
        input.fraction,
        input.validUntil,
        callerFrom(input.presence)
      );

      console.log(`[bridge/delegation] ${input.delegator} delegated ${delegation.fraction} to ${input.delegatee}`);
      res.status(201).json({ delegator: input.delegator, ...delegation });
    } catch (err) {
      sendError(res, err, 'delegation');
    }
  });

  router.delete('/', async (req, res) => {
    try {
      const input = RemoveDelegationRequestSchema.parse(req.body);

      await registry.removeDelegation(input.delegator, input.delegatee, callerFrom(input.presence));

      console.log(`[bridge/delegation] ${input.delegator} removed delegation to ${input.delegatee}`);
      res.json({ delegator: input.delegator, delegatee: input.delegatee, removed: true });
    } catch (err) {
      sendError(res, err, 'delegation');
    }
  });

  // Reserved segment, never a delegator address
  router.get('/delegatees', (_req, res) => {
    res.status(400).json({ error: 'Delegatee address required', code: 'VALIDATION_ERROR' });
  });

  router.get('/delegatees/:delegatee', (req, res) => {
    const { delegatee } = req.params;
    res.json({ delegatee, delegators: registry.listDelegateeDelegators(delegatee) });
  });

  router.get('/delegatees/:delegatee/:delegator', (req, res) => {
    const { delegatee, delegator } = req.params;
    const fraction = registry.getDelegateeDelegators(delegatee, delegator);

    if (fraction === undefined) {
      return res.status(404).json({ error: 'No delegation found to the specified delegatee', code: 'NOT_FOUND' });
    }
    res.json({ delegatee, delegator, fraction });
  });

  router.get('/:delegator', (req, res) => {
    const { delegator } = req.params;
    res.json({
      delegator,
      delegations: registry.getDelegations(delegator),
      committedFraction: registry.getCommittedFraction(delegator),
    });
  });

  return router;
}
