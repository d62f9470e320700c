// Express app wiring both engines behind HTTP routes

import express from 'express';
import type { DelegationRegistry, GovernanceEngine } from '@civitas/governance';
import { governanceRoutes } from './routes/governance.js';
import { delegationRoutes } from './routes/delegation.js';

export interface BridgeServices {
  governance: GovernanceEngine;
  delegation: DelegationRegistry;
}

export function createApp(services: BridgeServices): express.Express {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  // Health check
  app.get('/health', (_, res) => {
    res.json({ status: 'ok', service: 'bridge' });
  });

  // Mount routes
  app.use('/governance', governanceRoutes(services.governance));
  app.use('/delegation', delegationRoutes(services.delegation));

  return app;
}
