// Civitas Bridge
// HTTP access to governance and delegation

import 'dotenv/config';
import { closePublisher, getConfig } from '@civitas/shared';
import {
  DelegationRegistry,
  GovernanceEngine,
  NoopEventSink,
  OwnerCallGate,
  SignedPresenceVerifier,
  SystemClock,
  type EventSink,
} from '@civitas/governance';
import { createApp } from './app.js';
import { RedisEventSink } from './events.js';

const config = getConfig();

const clock = new SystemClock();
const presence = new SignedPresenceVerifier(clock, config.PRESENCE_MAX_AGE_SECONDS);
const gate = new OwnerCallGate(config.OWNER_ADDRESS, presence);
const events: EventSink = config.EVENT_SINK === 'redis' ? new RedisEventSink() : new NoopEventSink();

const governance = new GovernanceEngine({
  parameters: {
    temperatureCheckDays: config.TEMPERATURE_CHECK_DAYS,
    temperatureCheckQuorum: config.TEMPERATURE_CHECK_QUORUM,
    temperatureCheckApprovalThreshold: config.TEMPERATURE_CHECK_APPROVAL_THRESHOLD,
    temperatureCheckProposeThreshold: config.TEMPERATURE_CHECK_PROPOSE_THRESHOLD,
    proposalLengthDays: config.PROPOSAL_LENGTH_DAYS,
    proposalQuorum: config.PROPOSAL_QUORUM,
    proposalApprovalThreshold: config.PROPOSAL_APPROVAL_THRESHOLD,
  },
  presence,
  gate,
  clock,
  events,
});
const delegation = new DelegationRegistry({ presence, clock, events });

const app = createApp({ governance, delegation });
const port = config.BRIDGE_PORT;

const server = app.listen(port, () => {
  console.log(`🌉 Bridge listening on port ${port}`);
  console.log(`   Owner:      ${config.OWNER_ADDRESS}`);
  console.log(`   Events:     ${config.EVENT_SINK}`);
  console.log(`   Govern:     POST http://localhost:${port}/governance/temperature-checks`);
  console.log(`               POST http://localhost:${port}/governance/temperature-checks/:id/votes`);
  console.log(`               POST http://localhost:${port}/governance/temperature-checks/:id/elevate`);
  console.log(`               POST http://localhost:${port}/governance/proposals/:id/votes`);
  console.log(`               GET  http://localhost:${port}/governance/parameters`);
  console.log(`   Delegation: POST http://localhost:${port}/delegation`);
  console.log(`               DELETE http://localhost:${port}/delegation`);
  console.log(`               GET  http://localhost:${port}/delegation/:delegator`);
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down...`);
  server.close();
  closePublisher()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error('[bridge] Failed to close Redis publisher:', err);
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
