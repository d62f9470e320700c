/**
 * Governance Routes
 *
 * Temperature checks, elevation, proposals and the live parameter set.
 * Vote and owner-only routes expect a signed `presence` claim in the body,
 * signed over the same arguments the route hands to the engine.
 */

import express from 'express';
import { z } from 'zod';
import {
  AddressSchema,
  GovernanceParametersInputSchema,
  TemperatureCheckDraftSchema,
  TemperatureCheckVoteSchema,
  VoteOptionIdSchema,
  type GovernanceEngine,
} from '@civitas/governance';
import { sendError } from '../errors.js';
import { IdParamsSchema, PresenceBodySchema, PresenceSchema, callerFrom } from '../schemas.js';

// =============================================================================
// Validation Schemas
// =============================================================================

// Parameters reach the engine as sent; the owner's claim is signed over them
const UpdateParametersRequestSchema = z.object({
  parameters: GovernanceParametersInputSchema,
  presence: PresenceSchema.optional(),
});

const TemperatureCheckVoteRequestSchema = z.object({
  account: AddressSchema,
  vote: TemperatureCheckVoteSchema,
  presence: PresenceSchema.optional(),
});

const ProposalVoteRequestSchema = z.object({
  account: AddressSchema,
  optionIds: z.array(VoteOptionIdSchema),
  presence: PresenceSchema.optional(),
});

export function governanceRoutes(engine: GovernanceEngine): express.Router {
  const router = express.Router();

  // ===========================================================================
  // Parameters
  // ===========================================================================

  router.get('/parameters', (_req, res) => {
    res.json(engine.getGovernanceParameters());
  });

  router.put('/parameters', async (req, res) => {
    try {
      const input = UpdateParametersRequestSchema.parse(req.body);
      await engine.updateGovernanceParameters(input.parameters, callerFrom(input.presence));
      res.json(engine.getGovernanceParameters());
    } catch (err) {
      sendError(res, err, 'governance/parameters');
    }
  });

  // ===========================================================================
  // Temperature checks
  // ===========================================================================

  router.get('/temperature-checks/count', (_req, res) => {
    res.json({ count: engine.getTemperatureCheckCount() });
  });

  router.post('/temperature-checks', (req, res) => {
    try {
      const draft = TemperatureCheckDraftSchema.parse(req.body);
      const id = engine.createTemperatureCheck(draft);
      res.status(201).json({ id });
    } catch (err) {
      sendError(res, err, 'governance/temperature-checks');
    }
  });

  router.get('/temperature-checks/:id', (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      res.json(engine.getTemperatureCheck(id));
    } catch (err) {
      sendError(res, err, 'governance/temperature-checks');
    }
  });

  router.post('/temperature-checks/:id/votes', async (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      const input = TemperatureCheckVoteRequestSchema.parse(req.body);

      await engine.voteOnTemperatureCheck(input.account, id, input.vote, callerFrom(input.presence));

      console.log(`[bridge/governance] ${input.account} voted ${input.vote} on temperature check ${id}`);
      res.status(201).json({ temperatureCheckId: id, account: input.account, vote: input.vote });
    } catch (err) {
      sendError(res, err, 'governance/vote');
    }
  });

  router.get('/temperature-checks/:id/votes', (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      res.json({ votes: engine.listTemperatureCheckVotes(id) });
    } catch (err) {
      sendError(res, err, 'governance/votes');
    }
  });

  router.post('/temperature-checks/:id/elevate', async (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      const input = PresenceBodySchema.parse(req.body ?? {});

      const proposalId = await engine.elevate(id, callerFrom(input.presence));
      res.status(201).json({ proposalId, temperatureCheckId: id });
    } catch (err) {
      sendError(res, err, 'governance/elevate');
    }
  });

  // ===========================================================================
  // Proposals
  // ===========================================================================

  router.get('/proposals/count', (_req, res) => {
    res.json({ count: engine.getProposalCount() });
  });

  router.get('/proposals/:id', (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      res.json(engine.getProposal(id));
    } catch (err) {
      sendError(res, err, 'governance/proposals');
    }
  });

  router.post('/proposals/:id/votes', async (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      const input = ProposalVoteRequestSchema.parse(req.body);

      await engine.voteOnProposal(input.account, id, input.optionIds, callerFrom(input.presence));

      console.log(`[bridge/governance] ${input.account} voted [${input.optionIds.join(', ')}] on proposal ${id}`);
      res.status(201).json({ proposalId: id, account: input.account, optionIds: input.optionIds });
    } catch (err) {
      sendError(res, err, 'governance/vote');
    }
  });

  router.get('/proposals/:id/votes', (req, res) => {
    try {
      const { id } = IdParamsSchema.parse(req.params);
      res.json({ votes: engine.listProposalVotes(id) });
    } catch (err) {
      sendError(res, err, 'governance/votes');
    }
  });

  return router;
}
