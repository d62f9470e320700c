// Bridge wired to in-memory engines, a manual clock and a fresh owner key

import {
  DelegationRegistry,
  GovernanceEngine,
  ManualClock,
  MemoryEventSink,
  OwnerCallGate,
  SignedPresenceVerifier,
  type GovernanceParametersInput,
  type TemperatureCheckDraftInput,
} from '@civitas/governance';
import { generateKeyPair, type KeyPair } from '@civitas/sdk';
import { createApp } from '../src/app.js';

export const NOW = 1_700_000_000;
export const DAY = 86_400;

export const PARAMETERS: GovernanceParametersInput = {
  temperatureCheckDays: 7,
  temperatureCheckQuorum: '1000',
  temperatureCheckApprovalThreshold: '0.5',
  temperatureCheckProposeThreshold: '100',
  proposalLengthDays: 14,
  proposalQuorum: '5000',
  proposalApprovalThreshold: '0.5',
};

export const DRAFT: TemperatureCheckDraftInput = {
  title: 'Fund the community grants pool',
  description: 'Allocate 50,000 tokens to community grants for the next quarter',
  voteOptions: [
    { id: 0, label: 'Approve' },
    { id: 1, label: 'Reject' },
  ],
  attachments: [],
  rfcUrl: 'https://forum.example.org/t/community-grants/42',
};

export interface TestBridge {
  app: ReturnType<typeof createApp>;
  clock: ManualClock;
  events: MemoryEventSink;
  owner: KeyPair;
  governance: GovernanceEngine;
  delegation: DelegationRegistry;
}

export function createTestBridge(): TestBridge {
  const clock = new ManualClock(NOW);
  const events = new MemoryEventSink();
  const owner = generateKeyPair();
  const presence = new SignedPresenceVerifier(clock, 300);

  const governance = new GovernanceEngine({
    parameters: PARAMETERS,
    presence,
    gate: new OwnerCallGate(owner.address, presence),
    clock,
    events,
  });
  const delegation = new DelegationRegistry({ presence, clock, events });

  return { app: createApp({ governance, delegation }), clock, events, owner, governance, delegation };
}
