import { describe, it, expect } from 'vitest';
import {
  generateKeyPair,
  createPresenceClaim,
  checkPresenceClaim,
  createSignedObject,
  type PresenceClaim,
} from '../src/index.js';

const NOW = 1_700_000_000;
const VOTE_ARGS = { proposalId: 0, optionIds: [1] };

describe('Presence claims', () => {
  it('should name the signing account and carry the call arguments', async () => {
    const voter = generateKeyPair();
    const presence = await createPresenceClaim(voter.privateKey, 'vote_on_proposal', VOTE_ARGS, NOW);

    expect(presence.value).toEqual({
      account: voter.address,
      operation: 'vote_on_proposal',
      args: VOTE_ARGS,
      nonce: expect.any(String),
      issuedAt: NOW,
    });
  });

  it('should give every claim its own nonce', async () => {
    const voter = generateKeyPair();
    const first = await createPresenceClaim(voter.privateKey, 'vote_on_proposal', VOTE_ARGS, NOW);
    const second = await createPresenceClaim(voter.privateKey, 'vote_on_proposal', VOTE_ARGS, NOW);

    expect(first.value.nonce).not.toBe(second.value.nonce);
  });

  it('should accept a fresh claim for the expected account, operation and arguments', async () => {
    const voter = generateKeyPair();
    const presence = await createPresenceClaim(voter.privateKey, 'vote_on_proposal', VOTE_ARGS, NOW);

    const check = await checkPresenceClaim(presence, {
      account: voter.address,
      operation: 'vote_on_proposal',
      args: { optionIds: [1], proposalId: 0 },
      now: NOW + 60,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: true });
  });

  it('should reject a claim for another operation', async () => {
    const voter = generateKeyPair();
    const presence = await createPresenceClaim(voter.privateKey, 'vote_on_proposal', VOTE_ARGS, NOW);

    const check = await checkPresenceClaim(presence, {
      account: voter.address,
      operation: 'make_delegation',
      args: VOTE_ARGS,
      now: NOW,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: false, reason: 'Claim authorizes vote_on_proposal, not make_delegation' });
  });

  it('should reject a claim presented with other arguments', async () => {
    const voter = generateKeyPair();
    const presence = await createPresenceClaim(voter.privateKey, 'vote_on_proposal', VOTE_ARGS, NOW);

    const check = await checkPresenceClaim(presence, {
      account: voter.address,
      operation: 'vote_on_proposal',
      args: { proposalId: 1, optionIds: [1] },
      now: NOW,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: false, reason: 'Claim was signed for other vote_on_proposal arguments' });
  });

  it('should reject arguments rewritten after signing', async () => {
    const voter = generateKeyPair();
    const presence = await createPresenceClaim(voter.privateKey, 'remove_delegation', { delegatee: 'DAG2BOB' }, NOW);
    const rewritten = { value: { ...presence.value, args: { delegatee: 'DAG3CAROL' } }, proofs: presence.proofs };

    const check = await checkPresenceClaim(rewritten, {
      account: voter.address,
      operation: 'remove_delegation',
      args: { delegatee: 'DAG3CAROL' },
      now: NOW,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: false, reason: 'Invalid signature' });
  });

  it('should reject a stale claim', async () => {
    const voter = generateKeyPair();
    const args = { delegatee: 'DAG2BOB' };
    const presence = await createPresenceClaim(voter.privateKey, 'remove_delegation', args, NOW);

    const check = await checkPresenceClaim(presence, {
      account: voter.address,
      operation: 'remove_delegation',
      args,
      now: NOW + 301,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: false, reason: 'Claim is stale or issued in the future' });
  });

  it('should reject a claim for an account signed by someone else', async () => {
    const victim = generateKeyPair();
    const attacker = generateKeyPair();
    const args = { delegatee: attacker.address, fraction: '1', validUntil: NOW + 60 };
    const forged = await createSignedObject<PresenceClaim>(
      { account: victim.address, operation: 'make_delegation', args, nonce: 'n-1', issuedAt: NOW },
      attacker.privateKey
    );

    const check = await checkPresenceClaim(forged, {
      account: victim.address,
      operation: 'make_delegation',
      args,
      now: NOW,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: false, reason: 'No proof was signed by the claimed account' });
  });

  it('should reject a claim whose account field was rewritten', async () => {
    const voter = generateKeyPair();
    const other = generateKeyPair();
    const args = { temperatureCheckId: 0, vote: 'For' };
    const presence = await createPresenceClaim(voter.privateKey, 'vote_on_temperature_check', args, NOW);
    const rewritten = { value: { ...presence.value, account: other.address }, proofs: presence.proofs };

    const check = await checkPresenceClaim(rewritten, {
      account: other.address,
      operation: 'vote_on_temperature_check',
      args,
      now: NOW,
      maxAgeSeconds: 300,
    });
    expect(check).toEqual({ valid: false, reason: 'Invalid signature' });
  });

  it('should refuse to sign with a malformed private key', async () => {
    await expect(createPresenceClaim('not-a-key', 'elevate', { temperatureCheckId: 0 }, NOW)).rejects.toThrow(
      'Invalid private key: expected 64 hex characters'
    );
  });
});
