// Test doubles and sample data for the governance engines

import { NotAuthorizedError } from '../errors.js';
import type { ClaimArgs } from '@civitas/sdk';
import type { CallerContext, PresenceVerifier } from '../presence.js';
import type { GovernanceParametersInput, TemperatureCheckDraftInput } from '../schemas.js';
import type { Address, Operation } from '../types.js';

export const NOW = 1_700_000_000;
export const DAY = 86_400;

export const OWNER = 'DAG0OWNER';
export const ALICE = 'DAG1ALICE';
export const BOB = 'DAG2BOB';
export const CAROL = 'DAG3CAROL';

export const PARAMETERS: GovernanceParametersInput = {
  temperatureCheckDays: 7,
  temperatureCheckQuorum: '1000',
  temperatureCheckApprovalThreshold: '0.5',
  temperatureCheckProposeThreshold: '100',
  proposalLengthDays: 14,
  proposalQuorum: '5000',
  proposalApprovalThreshold: '0.5',
};

export function draft(overrides: Partial<TemperatureCheckDraftInput> = {}): TemperatureCheckDraftInput {
  return {
    title: 'Raise the validator set',
    description: 'Increase the active validator set from 100 to 120',
    voteOptions: [
      { id: 0, label: 'For' },
      { id: 1, label: 'Against' },
    ],
    attachments: [],
    rfcUrl: 'https://forum.example.org/t/validator-set/123',
    ...overrides,
  };
}

/**
 * Trusts the claim's account and operation without checking signatures, and
 * records the arguments each call was checked with
 */
export class ClaimPresenceVerifier implements PresenceVerifier {
  checked: Array<{ account: Address; operation: Operation; args: ClaimArgs }> = [];

  async verify(account: Address, operation: Operation, args: ClaimArgs, caller: CallerContext): Promise<void> {
    const claim = caller.presence?.value;
    if (!claim || claim.account !== account || claim.operation !== operation) {
      throw new NotAuthorizedError(`Presence of ${account} not proven`);
    }
    this.checked.push({ account, operation, args });
  }
}

/** Caller context carrying an unsigned claim for `account` */
export function actingAs(account: Address, operation: Operation): CallerContext {
  return { presence: { value: { account, operation, args: {}, nonce: 'test-nonce', issuedAt: NOW }, proofs: [] } };
}

export const ANONYMOUS: CallerContext = {};
